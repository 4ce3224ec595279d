// ──────────────────────────────────────────────
// Switchboard - Database Migration Runner
// ──────────────────────────────────────────────

import { getDatabase, closeConnection } from "./connection.js";
import { applySchema } from "./apply-schema.js";

async function runMigrations() {
  const databaseUrl = process.env["DATABASE_URL"];
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is required for migrations");
  }

  console.log("Running migrations...");
  const db = getDatabase(databaseUrl);
  const statements = await applySchema(db);
  console.log(`Migrations completed successfully (${statements} statements)`);
  await closeConnection();
  process.exit(0);
}

runMigrations().catch((err) => {
  console.error("Migration failed:", err);
  process.exit(1);
});
