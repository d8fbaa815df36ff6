import type { AttributeRef, Attributes, JsonValue } from "@stacksmith/shared";

export function isAttributeRef(value: JsonValue): value is AttributeRef {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const keys = Object.keys(value);
  return (
    keys.length === 2 &&
    typeof value.$ref === "string" &&
    typeof value.attr === "string"
  );
}

function walk(value: JsonValue, visit: (ref: AttributeRef) => void): void {
  if (isAttributeRef(value)) {
    visit(value);
  } else if (Array.isArray(value)) {
    for (const item of value) walk(item, visit);
  } else if (value !== null && typeof value === "object") {
    for (const item of Object.values(value)) walk(item, visit);
  }
}

/**
 * All derived-attribute references in `attributes`, in traversal order.
 */
export function collectRefs(attributes: Attributes): AttributeRef[] {
  const refs: AttributeRef[] = [];
  for (const value of Object.values(attributes)) {
    walk(value, (ref) => refs.push(ref));
  }
  return refs;
}

/**
 * Top-level fields whose value contains a reference to `target`.
 */
export function fieldsReferencing(attributes: Attributes, target: string): string[] {
  const fields: string[] = [];
  for (const [field, value] of Object.entries(attributes)) {
    let found = false;
    walk(value, (ref) => {
      if (ref.$ref === target) found = true;
    });
    if (found) fields.push(field);
  }
  return fields;
}

function resolveValue(
  value: JsonValue,
  lookup: (ref: AttributeRef) => JsonValue
): JsonValue {
  if (isAttributeRef(value)) return lookup(value);
  if (Array.isArray(value)) return value.map((item) => resolveValue(item, lookup));
  if (value !== null && typeof value === "object") {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = resolveValue(item, lookup);
    }
    return out;
  }
  return value;
}

/**
 * Replace every reference with the value `lookup` returns for it.
 */
export function resolveRefs(
  attributes: Attributes,
  lookup: (ref: AttributeRef) => JsonValue
): Attributes {
  const out: Attributes = {};
  for (const [field, value] of Object.entries(attributes)) {
    out[field] = resolveValue(value, lookup);
  }
  return out;
}
