// ──────────────────────────────────────────────
// Switchboard - Shared Types
// ──────────────────────────────────────────────

export * from "./function-config.js";
export * from "./execution.js";
export * from "./api.js";
