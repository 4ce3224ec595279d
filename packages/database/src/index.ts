// ──────────────────────────────────────────────
// Switchboard - Database Package
// ──────────────────────────────────────────────

export * from "./schema/index.js";
export { getDatabase, createConnection, closeConnection } from "./connection.js";
export type { Database, ConnectionOptions } from "./connection.js";
export { applySchema } from "./apply-schema.js";
export { seedSampleData, SAMPLE_FUNCTION_CONFIGS } from "./seed.js";
