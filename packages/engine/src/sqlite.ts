import { createClient, type Client } from "@libsql/client";

/**
 * Open a libsql client on a local database file (or `:memory:`). Statements
 * run after the schema, so callers await `migrate` before their first query.
 */
export function openDatabase(path: string): Client {
  const url = path === ":memory:" || path.startsWith("file:") ? path : `file:${path}`;
  return createClient({ url });
}

export async function migrate(client: Client, schema: string): Promise<void> {
  await client.execute("PRAGMA journal_mode = WAL;");
  // Wait when another process holds the lock instead of failing with SQLITE_BUSY
  await client.execute("PRAGMA busy_timeout = 30000;");
  await client.execute(schema);
}
