// ──────────────────────────────────────────────
// Switchboard - Failure Description
// Turns whatever a failed call threw into one audit-trail line
// ──────────────────────────────────────────────

import { capLength, isNonEmptyString } from "@switchboard/utils";
import { HttpStatusError, HttpTimeoutError } from "./http-client.js";

export const TIMEOUT_MESSAGE = "Request timed out";
const STATUS_BODY_PREVIEW_LENGTH = 500;

/**
 * Priority, first match wins:
 *   1. HTTP status + body from the transport
 *   2. timeout
 *   3. error message plus its transport cause (errno code or cause message)
 *   4. error message, or the error name when the message is empty
 *   5. a thrown string
 *   6. "Unknown error"
 */
export function describeFailure(error: unknown): string {
  if (error instanceof HttpStatusError) {
    return `HTTP ${error.statusCode}: ${capLength(error.body, STATUS_BODY_PREVIEW_LENGTH)}`;
  }

  if (error instanceof HttpTimeoutError) {
    return TIMEOUT_MESSAGE;
  }

  if (error instanceof Error) {
    const message = isNonEmptyString(error.message) ? error.message : error.name;
    const cause = describeCause(error.cause);
    if (cause && !message.includes(cause)) {
      return `${message}: ${cause}`;
    }
    return message;
  }

  if (isNonEmptyString(error)) {
    return error;
  }

  return "Unknown error";
}

function describeCause(cause: unknown): string | null {
  if (cause instanceof Error) {
    if (isNonEmptyString(cause.message)) return cause.message;
    const code = readCode(cause);
    return code ?? (isNonEmptyString(cause.name) ? cause.name : null);
  }
  if (isNonEmptyString(cause)) return cause;
  return null;
}

function readCode(error: Error): string | null {
  if ("code" in error && isNonEmptyString(error.code)) {
    return error.code;
  }
  return null;
}
