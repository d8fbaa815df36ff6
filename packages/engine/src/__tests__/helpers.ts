/**
 * In-process provider and node builders for engine tests.
 */
import type {
  AppliedRecord,
  Attributes,
  ResourceKind,
  ResourceNode,
  StateRecords,
} from "@stacksmith/shared";
import type { CreateResult, ProvisioningProvider } from "../provider/types.js";
import { MemoryStateStore } from "../state/store.js";

export type ProviderOp = "create" | "update" | "destroy";

export interface ProviderEvent {
  seq: number;
  op: ProviderOp;
  phase: "start" | "end" | "error";
  // Node label for create, external id for update and destroy
  target: string;
}

/**
 * Every node built with `node()` carries its id as `label`, which is how the
 * provider names external ids: `<label>#<n>` for the n-th create of that label.
 */
export function node(
  id: string,
  kind: ResourceKind,
  attributes: Attributes = {},
  extra: Partial<Pick<ResourceNode, "dependsOn" | "triggers" | "lifecycle">> = {}
): ResourceNode {
  return {
    id,
    kind,
    attributes: { label: id, ...attributes },
    dependsOn: extra.dependsOn ?? [],
    ...(extra.triggers ? { triggers: extra.triggers } : {}),
    ...(extra.lifecycle ? { lifecycle: extra.lifecycle } : {}),
  };
}

export class RecordingProvider implements ProvisioningProvider {
  events: ProviderEvent[] = [];
  resources = new Map<string, { kind: ResourceKind; attributes: Attributes }>();
  received = new Map<string, Attributes>(); // label -> last attributes sent
  active = 0;
  maxActive = 0;
  private seq = 0;
  private creates = new Map<string, number>();
  private failures = new Map<string, Error[]>();
  private delays = new Map<string, number>();

  /** Queue errors thrown by the next calls of `op` on `label`. */
  failNext(op: ProviderOp, label: string, ...errors: Error[]): void {
    const key = `${op}:${label}`;
    this.failures.set(key, [...(this.failures.get(key) ?? []), ...errors]);
  }

  delay(label: string, ms: number): void {
    this.delays.set(label, ms);
  }

  calls(op: ProviderOp, phase: ProviderEvent["phase"] = "start"): string[] {
    return this.events.filter((e) => e.op === op && e.phase === phase).map((e) => e.target);
  }

  find(op: ProviderOp, phase: ProviderEvent["phase"], target: string): ProviderEvent | undefined {
    return this.events.find((e) => e.op === op && e.phase === phase && e.target === target);
  }

  async create(kind: ResourceKind, attributes: Attributes): Promise<CreateResult> {
    const label = String(attributes.label);
    return this.run("create", label, label, () => {
      const n = (this.creates.get(label) ?? 0) + 1;
      this.creates.set(label, n);
      const externalId = `${label}#${n}`;
      const resulting = { ...attributes, arn: `arn:test:${externalId}` };
      this.resources.set(externalId, { kind, attributes: resulting });
      this.received.set(label, attributes);
      return { externalId, attributes: resulting };
    });
  }

  async update(externalId: string, attributes: Attributes): Promise<Attributes> {
    return this.run("update", externalId, labelOf(externalId), () => {
      const existing = this.resources.get(externalId);
      if (!existing) throw new Error(`unknown resource ${externalId}`);
      const resulting = { ...attributes, arn: `arn:test:${externalId}` };
      this.resources.set(externalId, { kind: existing.kind, attributes: resulting });
      this.received.set(labelOf(externalId), attributes);
      return resulting;
    });
  }

  async destroy(externalId: string): Promise<void> {
    return this.run("destroy", externalId, labelOf(externalId), () => {
      this.resources.delete(externalId);
    });
  }

  private async run<T>(op: ProviderOp, target: string, label: string, fn: () => T): Promise<T> {
    this.events.push({ seq: ++this.seq, op, phase: "start", target });
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await new Promise((resolve) => setTimeout(resolve, this.delays.get(label) ?? 0));
      const failure = this.failures.get(`${op}:${label}`)?.shift();
      if (failure) throw failure;
      const value = fn();
      this.events.push({ seq: ++this.seq, op, phase: "end", target });
      return value;
    } catch (err) {
      this.events.push({ seq: ++this.seq, op, phase: "error", target });
      throw err;
    } finally {
      this.active--;
    }
  }
}

function labelOf(externalId: string): string {
  const at = externalId.lastIndexOf("#");
  return at === -1 ? externalId : externalId.slice(0, at);
}

/**
 * MemoryStateStore that keeps every saved snapshot and can be told to fail.
 */
export class SnapshotStore extends MemoryStateStore {
  snapshots: StateRecords[] = [];
  failFrom: number | undefined;

  override async save(records: StateRecords): Promise<void> {
    if (this.failFrom !== undefined && this.snapshots.length + 1 >= this.failFrom) {
      throw new Error("disk full");
    }
    this.snapshots.push(new Map(records));
    await super.save(records);
  }
}

export function record(overrides: Partial<AppliedRecord> & Pick<AppliedRecord, "id">): AppliedRecord {
  return {
    kind: "Function",
    externalId: `${overrides.id}#1`,
    lastFingerprint: "0".repeat(64),
    lastAppliedAttributes: { label: overrides.id },
    outputs: {},
    dependsOn: [],
    status: "Applied",
    staleExternalIds: [],
    appliedAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export const fastRetry = { baseDelayMs: 0, maxDelayMs: 0 };
