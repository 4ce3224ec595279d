// ──────────────────────────────────────────────
// Switchboard - Utils Package
// ──────────────────────────────────────────────

export { rootLogger, createLogger, createExecutionLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { loadConfig, getEnvOrThrow, getEnvOrDefault, getEnvAsNumber, getEnvAsBoolean } from "./config.js";
export type { AppConfig } from "./config.js";
export {
  sleep,
  capLength,
  stripNulChars,
  measureDuration,
  startTimer,
  sanitizeErrorMessage,
  isNonEmptyString,
  cloneJson,
  formatDuration,
} from "./helpers.js";
export { AppError, ValidationError, NotFoundError, InternalError, isAppError } from "./errors.js";
