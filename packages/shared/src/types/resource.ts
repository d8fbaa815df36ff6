export const RESOURCE_KINDS = [
  "Function",
  "ApiGateway",
  "Route",
  "Method",
  "Integration",
  "MethodResponse",
  "IntegrationResponse",
  "Deployment",
  "Stage",
  "Table",
  "Bucket",
  "BucketPolicy",
  "Role",
  "Policy",
  "PolicyAttachment",
  "Permission",
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// Field name -> value, in declaration order
export type Attributes = Record<string, JsonValue>;

// Derived-attribute reference: { "$ref": "<node id>", "attr": "<output name>" }
export type AttributeRef = {
  $ref: string;
  attr: string;
};

export interface Lifecycle {
  // Trigger-driven changes replace the node (create-before-destroy) instead of updating it
  replaceOnTrigger?: boolean;
}

export interface ResourceNode {
  id: string;
  kind: ResourceKind;
  attributes: Attributes;
  dependsOn: string[];
  // Curated upstream ids whose fingerprints force this node to redeploy
  triggers?: string[];
  lifecycle?: Lifecycle;
}

// CORS options rendered into an OPTIONS method with a mock integration
export interface CorsPolicy {
  allowedHeaders: string[];
  allowedMethods: string[];
  allowedOrigins: string[];
}

export interface CorsDeclaration extends CorsPolicy {
  id: string;
  restApi: string;
  resource: string;
}

export interface FunctionArtifact {
  content: Uint8Array;
  contentHash: string;
}
