// ──────────────────────────────────────────────
// Switchboard - Utility Helpers
// ──────────────────────────────────────────────

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Hard cap: keeps at most `maxLength` UTF-16 units verbatim, never splitting a surrogate pair. */
export function capLength(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  const last = str.charCodeAt(maxLength - 1);
  const end = last >= 0xd800 && last <= 0xdbff ? maxLength - 1 : maxLength;
  return str.slice(0, end);
}

/** Postgres text cannot hold NUL. */
export function stripNulChars(str: string): string {
  return str.replace(/\u0000/g, "\uFFFD");
}

export function measureDuration(startTime: bigint): number {
  const duration = process.hrtime.bigint() - startTime;
  return Number(duration / 1_000_000n);
}

export function startTimer(): bigint {
  return process.hrtime.bigint();
}

export function sanitizeErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
      .replace(/key[=:]\s*["']?[a-zA-Z0-9_-]{20,}["']?/gi, "key=[REDACTED]")
      .replace(/Bearer\s+[a-zA-Z0-9._-]+/gi, "Bearer [REDACTED]");
  }
  return "An unexpected error occurred";
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export function cloneJson<T>(value: T): T {
  return structuredClone(value);
}

export function formatDuration(durationMs: number | null): string {
  if (durationMs === null) return "N/A";
  if (durationMs < 1000) return `${durationMs}ms`;
  return `${(durationMs / 1000).toFixed(1)}s`;
}
