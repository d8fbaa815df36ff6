import type { Client, Row } from "@libsql/client";
import { randomBytes } from "node:crypto";
import { z } from "zod";
import { RESOURCE_KINDS, createLogger } from "@stacksmith/shared";
import type { Attributes, JsonValue, ResourceKind } from "@stacksmith/shared";
import { ProviderError } from "../errors.js";
import { migrate, openDatabase } from "../sqlite.js";
import type { CreateResult, ProvisioningProvider } from "./types.js";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS resources (
    external_id TEXT PRIMARY KEY,
    kind TEXT NOT NULL,
    attributes_json TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )
`;

const kindSchema = z.enum(RESOURCE_KINDS);

export interface LocalResource {
  externalId: string;
  kind: ResourceKind;
}

function toResource(row: Row): LocalResource {
  return { externalId: String(row.external_id), kind: kindSchema.parse(row.kind) };
}

const REGION = "local-1";
const ACCOUNT = "000000000000";

function text(value: JsonValue | undefined, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

/**
 * Outputs a real account would compute for a freshly provisioned resource.
 */
export function computedOutputs(
  kind: ResourceKind,
  externalId: string,
  attributes: Attributes
): Attributes {
  const arn = `arn:local:${kind.toLowerCase()}:${REGION}:${ACCOUNT}:${externalId}`;
  switch (kind) {
    case "Function":
      return {
        arn,
        invokeArn: `arn:local:apigateway:${REGION}:lambda:path/functions/${arn}/invocations`,
      };
    case "ApiGateway":
      return {
        arn,
        rootResourceId: `${externalId}-root`,
        executionArn: `arn:local:execute-api:${REGION}:${ACCOUNT}:${externalId}`,
      };
    case "Stage":
      return {
        arn,
        invokeUrl: `https://${text(attributes.restApiId, externalId)}.execute-api.localhost/${text(attributes.stageName, "default")}`,
      };
    case "Bucket":
      return {
        arn,
        websiteEndpoint: `${text(attributes.bucket, externalId)}.website.localhost`,
      };
    default:
      return { arn };
  }
}

/**
 * LocalProvider simulates a cloud account in SQLite so stacks can be planned
 * and applied without touching a real provider.
 */
export class LocalProvider implements ProvisioningProvider {
  private client: Client;
  private ready: Promise<void> | undefined;
  private logger = createLogger("local-provider");

  constructor(private readonly dbPath: string) {
    this.client = openDatabase(dbPath);
  }

  async create(kind: ResourceKind, attributes: Attributes): Promise<CreateResult> {
    await this.init();
    const externalId = `${kind.toLowerCase()}-${randomBytes(4).toString("hex")}`;
    const resulting = { ...attributes, ...computedOutputs(kind, externalId, attributes) };
    const now = new Date().toISOString();
    await this.client.execute({
      sql: `INSERT INTO resources (external_id, kind, attributes_json, created_at, updated_at)
            VALUES (?, ?, ?, ?, ?)`,
      args: [externalId, kind, JSON.stringify(resulting), now, now],
    });
    this.logger.debug(`Created ${kind} ${externalId}`);
    return { externalId, attributes: resulting };
  }

  async update(externalId: string, attributes: Attributes): Promise<Attributes> {
    await this.init();
    const existing = await this.find(externalId);
    if (!existing) {
      throw ProviderError.permanent(`Resource ${externalId} does not exist`);
    }
    const resulting = { ...attributes, ...computedOutputs(existing.kind, externalId, attributes) };
    await this.client.execute({
      sql: "UPDATE resources SET attributes_json = ?, updated_at = ? WHERE external_id = ?",
      args: [JSON.stringify(resulting), new Date().toISOString(), externalId],
    });
    this.logger.debug(`Updated ${existing.kind} ${externalId}`);
    return resulting;
  }

  async destroy(externalId: string): Promise<void> {
    await this.init();
    const result = await this.client.execute({
      sql: "DELETE FROM resources WHERE external_id = ?",
      args: [externalId],
    });
    if (result.rowsAffected === 0) {
      this.logger.debug(`Destroy of ${externalId}: already gone`);
    }
  }

  async list(): Promise<LocalResource[]> {
    await this.init();
    const result = await this.client.execute(
      "SELECT external_id, kind FROM resources ORDER BY external_id"
    );
    return result.rows.map(toResource);
  }

  close(): void {
    this.client.close();
  }

  private async find(externalId: string): Promise<LocalResource | undefined> {
    const result = await this.client.execute({
      sql: "SELECT external_id, kind FROM resources WHERE external_id = ?",
      args: [externalId],
    });
    const row = result.rows[0];
    return row ? toResource(row) : undefined;
  }

  private init(): Promise<void> {
    this.ready ??= migrate(this.client, SCHEMA).then(() =>
      this.logger.info(`Local provider initialized at ${this.dbPath}`)
    );
    return this.ready;
  }
}
