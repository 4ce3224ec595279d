// ──────────────────────────────────────────────
// Switchboard - Database Seed
// Usage: npm run db:seed
// ──────────────────────────────────────────────

import { getDatabase, closeConnection } from "./connection.js";
import { seedSampleData } from "./seed.js";

async function seed() {
  const databaseUrl = process.env["DATABASE_URL"];
  if (!databaseUrl) {
    throw new Error("DATABASE_URL env var is required");
  }

  console.log("[seed] seeding database...");
  const inserted = await seedSampleData(getDatabase(databaseUrl));
  if (inserted === 0) {
    console.log("[seed] function configurations already exist, skipping...");
  } else {
    console.log(`[seed] inserted ${inserted} sample function configurations`);
  }
  await closeConnection();
}

seed().catch((err) => {
  console.error("[seed] failed:", err);
  process.exit(1);
});
