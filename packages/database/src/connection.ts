// ──────────────────────────────────────────────
// Switchboard - Database Connection
// ──────────────────────────────────────────────

import { drizzle } from "drizzle-orm/postgres-js";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import postgres from "postgres";
import * as schema from "./schema/index.js";

/** Any drizzle Postgres driver over this schema: postgres-js in production, PGlite in tests. */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface ConnectionOptions {
  max?: number;
}

let connectionInstance: ReturnType<typeof postgres> | null = null;
let dbInstance: Database | null = null;

export function createConnection(databaseUrl: string, options: ConnectionOptions = {}) {
  if (connectionInstance) return connectionInstance;
  connectionInstance = postgres(databaseUrl, {
    max: options.max ?? 10,
    idle_timeout: 20,
    connect_timeout: 10,
  });
  return connectionInstance;
}

export function getDatabase(databaseUrl: string, options: ConnectionOptions = {}): Database {
  if (dbInstance) return dbInstance;
  const connection = createConnection(databaseUrl, options);
  dbInstance = drizzle(connection, { schema });
  return dbInstance;
}

export async function closeConnection(): Promise<void> {
  if (connectionInstance) {
    await connectionInstance.end();
    connectionInstance = null;
    dbInstance = null;
  }
}
