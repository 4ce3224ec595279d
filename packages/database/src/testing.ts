// ──────────────────────────────────────────────
// Switchboard - In-process Test Database (PGlite)
// ──────────────────────────────────────────────

import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import * as schema from "./schema/index.js";
import { applySchema } from "./apply-schema.js";
import type { Database } from "./connection.js";

export interface TestDatabase {
  db: Database;
  close(): Promise<void>;
}

export async function createTestDatabase(): Promise<TestDatabase> {
  const client = new PGlite();
  const db: Database = drizzle(client, { schema });
  await applySchema(db);

  return {
    db,
    async close() {
      await client.close();
    },
  };
}
