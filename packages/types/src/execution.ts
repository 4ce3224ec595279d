// ──────────────────────────────────────────────
// Switchboard - Execution Types
// ──────────────────────────────────────────────

import type { HeaderMap, JsonPayload } from "./function-config.js";

export const EXECUTION_STATUSES = ["pending", "running", "success", "failed", "timeout"] as const;

export type ExecutionStatus = (typeof EXECUTION_STATUSES)[number];
export type TerminalExecutionStatus = Extract<ExecutionStatus, "success" | "failed" | "timeout">;
export type FailureStatus = Extract<ExecutionStatus, "failed" | "timeout">;

export const MAX_RESPONSE_BODY_LENGTH = 10_000;
export const MAX_ERROR_MESSAGE_LENGTH = 1_000;

export interface FunctionExecution {
  id: number;
  functionConfigId: number;
  status: ExecutionStatus;
  startedAt: Date;
  completedAt: Date | null;
  durationMs: number | null;
  requestUrl: string;
  requestMethod: string;
  requestHeaders: HeaderMap;
  requestPayload: JsonPayload;
  responseStatusCode: number | null;
  responseHeaders: HeaderMap;
  responseBody: string;
  errorMessage: string;
}

/** What was attempted, copied from the configuration when the execution begins. */
export interface RequestSnapshot {
  url: string;
  method: string;
  headers: HeaderMap;
  payload: JsonPayload;
}

export interface ExecutionSummary {
  id: number;
  functionConfigId: number;
  functionName: string;
  status: ExecutionStatus;
  startedAt: Date;
  completedAt: Date | null;
  durationMs: number | null;
  durationDisplay: string;
  responseStatusCode: number | null;
  success: boolean;
}

export interface CompleteSuccessInput {
  statusCode: number;
  headers: HeaderMap;
  body: string;
  endTime?: Date;
}

export interface CompleteFailureInput {
  message: string;
  status?: FailureStatus;
  endTime?: Date;
}
