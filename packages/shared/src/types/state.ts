import type { Attributes, ResourceKind } from "./resource.js";

export type Fingerprint = string;

export type AppliedStatus = "Applied" | "CreatedNotCleanedUp";

export interface AppliedRecord {
  id: string;
  kind: ResourceKind;
  externalId: string;
  lastFingerprint: Fingerprint;
  // Declared attributes as last applied, references unresolved
  lastAppliedAttributes: Attributes;
  // Resulting attributes reported by the provider
  outputs: Attributes;
  dependsOn: string[];
  status: AppliedStatus;
  // Superseded resources still awaiting destroy after a replacement
  staleExternalIds: string[];
  appliedAt: string;
}

export type StateRecords = Map<string, AppliedRecord>;
