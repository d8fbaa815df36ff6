import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { randomBytes } from "node:crypto";
import { createLogger } from "@stacksmith/shared";
import type { StateRecords } from "@stacksmith/shared";
import { StatePersistenceError } from "../errors.js";
import {
  STATE_VERSION,
  fromRecords,
  stateDocumentSchema,
  toRecords,
  type StateDocument,
  type StateStore,
} from "./store.js";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * JSON state document on disk. Saves go to a sibling temp file that is then
 * renamed over the target, so readers never see a half-written document.
 */
export class FileStateStore implements StateStore {
  private logger = createLogger("file-state");
  private serial = 0;

  constructor(private readonly path: string) {}

  async load(): Promise<StateRecords> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        this.logger.debug(`No state at ${this.path}, starting empty`);
        return new Map();
      }
      throw new StatePersistenceError(`Failed to read state ${this.path}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    let document: StateDocument;
    try {
      document = stateDocumentSchema.parse(JSON.parse(raw));
    } catch (err) {
      throw new StatePersistenceError(`State ${this.path} is invalid: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    this.serial = document.serial;
    this.logger.debug(`Loaded ${document.resources.length} records (serial ${document.serial})`);
    return toRecords(document.resources);
  }

  async save(records: StateRecords): Promise<void> {
    const document: StateDocument = {
      version: STATE_VERSION,
      serial: this.serial + 1,
      resources: fromRecords(records),
    };
    const temp = `${this.path}.${randomBytes(4).toString("hex")}.tmp`;

    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(temp, JSON.stringify(document, null, 2) + "\n", "utf-8");
      await rename(temp, this.path);
    } catch (err) {
      await rm(temp, { force: true });
      throw new StatePersistenceError(`Failed to write state ${this.path}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    this.serial = document.serial;
  }
}
