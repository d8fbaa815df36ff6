import type { ResourceNode } from "./resource.js";
import type { Fingerprint } from "./state.js";

export type PlanAction =
  | "Create"
  | "Update"
  | "ReplaceCreateThenDestroy"
  | "Destroy"
  | "NoOp";

export interface PlanEntry {
  node: ResourceNode;
  action: PlanAction;
  reason: string;
  // Fingerprint the node will carry once applied (the recorded one for Destroy)
  fingerprint: Fingerprint;
  changedFields: string[];
  // Ids whose entries must reach Succeeded before this one is dispatched
  dependencies: string[];
  // External ids of superseded resources to destroy
  cleanup: string[];
}

export interface Plan {
  entries: PlanEntry[];
  warnings: string[];
}

export type NodeStatus =
  | "Pending"
  | "InProgress"
  | "Succeeded"
  | "Failed"
  | "Skipped";

export interface NodeResult {
  id: string;
  action: PlanAction;
  status: NodeStatus;
  attempts: number;
  error?: string;
  // Set when the node succeeded but its superseded resources could not be destroyed
  cleanupError?: string;
  startedAt?: string;
  finishedAt?: string;
}

export interface ApplyReport {
  results: NodeResult[];
  succeeded: boolean;
  cancelled: boolean;
}
