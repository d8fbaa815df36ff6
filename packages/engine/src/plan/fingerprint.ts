import { createHash } from "node:crypto";
import stringify from "json-stable-stringify";
import type { Attributes, Fingerprint, JsonValue, ResourceNode } from "@stacksmith/shared";

/**
 * Canonical JSON: object keys sorted at every depth.
 */
export function canonicalJson(value: JsonValue): string {
  return stringify(value) ?? "null";
}

export function digest(payload: JsonValue): Fingerprint {
  return createHash("sha256").update(canonicalJson(payload)).digest("hex");
}

export function fingerprintNode(node: Pick<ResourceNode, "kind" | "attributes">): Fingerprint {
  return digest({ kind: node.kind, attributes: node.attributes });
}

/**
 * Aggregate fingerprint: own static attributes plus the current fingerprints
 * of the curated triggers, in declared order.
 */
export function fingerprintAggregate(
  node: Pick<ResourceNode, "kind" | "attributes">,
  upstream: Fingerprint[]
): Fingerprint {
  return digest({ kind: node.kind, attributes: node.attributes, triggers: upstream });
}

export function attributesEqual(a: JsonValue | undefined, b: JsonValue | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return canonicalJson(a) === canonicalJson(b);
}

/**
 * Top-level fields added, removed or changed between two attribute maps.
 * Fields of `after` come first in declaration order, then removed ones.
 */
export function diffAttributes(before: Attributes, after: Attributes): string[] {
  const changed: string[] = [];
  for (const field of Object.keys(after)) {
    if (!attributesEqual(before[field], after[field])) changed.push(field);
  }
  for (const field of Object.keys(before)) {
    if (!(field in after)) changed.push(field);
  }
  return changed;
}
