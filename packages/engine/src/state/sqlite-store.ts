import type { Client } from "@libsql/client";
import { createLogger } from "@stacksmith/shared";
import type { StateRecords } from "@stacksmith/shared";
import { StatePersistenceError } from "../errors.js";
import { migrate, openDatabase } from "../sqlite.js";
import { appliedRecordSchema, type StateStore } from "./store.js";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS applied_records (
    id TEXT PRIMARY KEY,
    record_json TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )
`;

/**
 * SqliteStateStore keeps one row per applied record. `save` swaps the whole
 * set inside a single write batch. Uses WAL journal mode like the local
 * provider's database.
 */
export class SqliteStateStore implements StateStore {
  private client: Client;
  private ready: Promise<void> | undefined;
  private logger = createLogger("sqlite-state");

  constructor(private readonly dbPath: string) {
    this.client = openDatabase(dbPath);
  }

  async load(): Promise<StateRecords> {
    try {
      await this.init();
      const result = await this.client.execute(
        "SELECT id, record_json FROM applied_records ORDER BY id"
      );
      const records: StateRecords = new Map();
      for (const row of result.rows) {
        const json = row.record_json;
        if (typeof json !== "string") {
          throw new Error(`Row ${String(row.id)} has no record_json`);
        }
        const record = appliedRecordSchema.parse(JSON.parse(json));
        records.set(record.id, record);
      }
      return records;
    } catch (err) {
      throw new StatePersistenceError(
        `Failed to load state: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
  }

  async save(records: StateRecords): Promise<void> {
    try {
      await this.init();
      const now = new Date().toISOString();
      await this.client.batch(
        [
          "DELETE FROM applied_records",
          ...[...records.values()].map((record) => ({
            sql: "INSERT INTO applied_records (id, record_json, updated_at) VALUES (?, ?, ?)",
            args: [record.id, JSON.stringify(record), now],
          })),
        ],
        "write"
      );
    } catch (err) {
      throw new StatePersistenceError(
        `Failed to save state: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
  }

  close(): void {
    this.client.close();
  }

  private init(): Promise<void> {
    this.ready ??= migrate(this.client, SCHEMA).then(() =>
      this.logger.info(`State store initialized at ${this.dbPath}`)
    );
    return this.ready;
  }
}
