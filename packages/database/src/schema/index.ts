// ──────────────────────────────────────────────
// Switchboard - Database Schema Index
// ──────────────────────────────────────────────

export { functionConfigs } from "./function-configs.js";
export { functionExecutions } from "./function-executions.js";
