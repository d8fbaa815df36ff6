import { z } from "zod";
import { RESOURCE_KINDS, jsonValueSchema } from "@stacksmith/shared";
import type { AppliedRecord, StateRecords } from "@stacksmith/shared";

/**
 * Durable record of what was last applied. `save` replaces the whole record
 * set atomically: a later `load` sees either the previous set or the new one.
 */
export interface StateStore {
  load(): Promise<StateRecords>;
  save(records: StateRecords): Promise<void>;
}

export const STATE_VERSION = 1;

export const appliedRecordSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(RESOURCE_KINDS),
  externalId: z.string().min(1),
  lastFingerprint: z.string().min(1),
  lastAppliedAttributes: z.record(jsonValueSchema),
  outputs: z.record(jsonValueSchema),
  dependsOn: z.array(z.string()),
  status: z.enum(["Applied", "CreatedNotCleanedUp"]),
  staleExternalIds: z.array(z.string()),
  appliedAt: z.string(),
});

export const stateDocumentSchema = z.object({
  version: z.literal(STATE_VERSION),
  serial: z.number().int().min(0),
  resources: z.array(appliedRecordSchema),
});

export type StateDocument = z.infer<typeof stateDocumentSchema>;

export function toRecords(resources: AppliedRecord[]): StateRecords {
  return new Map(resources.map((record) => [record.id, record]));
}

export function fromRecords(records: StateRecords): AppliedRecord[] {
  return [...records.values()].sort((a, b) => a.id.localeCompare(b.id));
}

function cloneRecord(record: AppliedRecord): AppliedRecord {
  return structuredClone(record);
}

export class MemoryStateStore implements StateStore {
  private records: StateRecords = new Map();
  saves = 0;

  constructor(initial: AppliedRecord[] = []) {
    this.records = toRecords(initial.map(cloneRecord));
  }

  async load(): Promise<StateRecords> {
    return new Map([...this.records].map(([id, record]) => [id, cloneRecord(record)]));
  }

  async save(records: StateRecords): Promise<void> {
    this.records = new Map([...records].map(([id, record]) => [id, cloneRecord(record)]));
    this.saves++;
  }
}
