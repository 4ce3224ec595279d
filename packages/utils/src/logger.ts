// ──────────────────────────────────────────────
// Switchboard - Structured Logger (Pino)
// ──────────────────────────────────────────────

import pino from "pino";

const LOG_LEVEL = process.env["LOG_LEVEL"] ?? "info";

export const rootLogger = pino({
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  redact: {
    paths: [
      "apiKey",
      "password",
      "authorization",
      "cookie",
      "headers.authorization",
      "headers.Authorization",
      "requestHeaders.authorization",
      "requestHeaders.Authorization",
    ],
    censor: "[REDACTED]",
  },
});

export type Logger = pino.Logger;

export function createLogger(module: string, extra?: Record<string, unknown>): Logger {
  return rootLogger.child({ module, ...extra });
}

export function createExecutionLogger(executionId: number, functionConfigId: number): Logger {
  return rootLogger.child({
    module: "execution",
    executionId,
    functionConfigId,
  });
}
