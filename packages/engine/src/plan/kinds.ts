import type { ResourceKind } from "@stacksmith/shared";

type ReplacementRule = readonly string[] | "all";

// Fields a kind cannot change in place; a change to one forces create-before-destroy.
const REPLACEMENT_FIELDS: Record<ResourceKind, ReplacementRule> = {
  Function: ["functionName"],
  ApiGateway: [],
  Route: ["restApiId", "parentId", "pathPart"],
  Method: ["restApiId", "resourceId", "httpMethod"],
  Integration: ["restApiId", "resourceId", "httpMethod"],
  MethodResponse: ["restApiId", "resourceId", "httpMethod", "statusCode"],
  IntegrationResponse: ["restApiId", "resourceId", "httpMethod", "statusCode"],
  // A deployment is an immutable snapshot of the API
  Deployment: "all",
  Stage: ["restApiId", "stageName"],
  Table: ["name", "hashKey", "rangeKey"],
  Bucket: ["bucket"],
  BucketPolicy: ["bucket"],
  Role: ["name"],
  Policy: ["name"],
  PolicyAttachment: ["role", "policyArn"],
  Permission: ["statementId", "functionName", "principal", "action", "sourceArn"],
};

const SENSITIVE_FIELDS: Partial<Record<ResourceKind, readonly string[]>> = {
  Function: ["environment"],
};

/**
 * The subset of `fields` that `kind` cannot update in place.
 */
export function replacementFields(kind: ResourceKind, fields: string[]): string[] {
  const rule = REPLACEMENT_FIELDS[kind];
  if (rule === "all") return [...fields];
  return fields.filter((field) => rule.includes(field));
}

export function isSensitiveField(kind: ResourceKind, field: string): boolean {
  return SENSITIVE_FIELDS[kind]?.includes(field) ?? false;
}
