// ──────────────────────────────────────────────
// Switchboard - Execution Query Service
// Read side: history summaries and per-call detail
// ──────────────────────────────────────────────

import { eq, desc } from "drizzle-orm";
import type { Database } from "@switchboard/database";
import { functionConfigs, functionExecutions } from "@switchboard/database";
import { formatDuration } from "@switchboard/utils";
import type { ExecutionSummary, FunctionExecution } from "@switchboard/types";

export const DEFAULT_RECENT_LIMIT = 20;
export const DELETED_FUNCTION_NAME = "(deleted function)";

export interface ExecutionQueryService {
  getRecentExecutions(limit?: number): Promise<ExecutionSummary[]>;
  getRunningExecutions(): Promise<ExecutionSummary[]>;
  getExecutionDetails(executionId: number): Promise<FunctionExecution | null>;
}

export interface ExecutionQueryOptions {
  defaultLimit?: number;
}

export function isSuccessfulExecution(execution: Pick<FunctionExecution, "status" | "responseStatusCode">): boolean {
  return (
    execution.status === "success" &&
    execution.responseStatusCode !== null &&
    execution.responseStatusCode >= 200 &&
    execution.responseStatusCode < 300
  );
}

export function toExecutionSummary(execution: FunctionExecution, functionName: string | null): ExecutionSummary {
  return {
    id: execution.id,
    functionConfigId: execution.functionConfigId,
    functionName: functionName ?? DELETED_FUNCTION_NAME,
    status: execution.status,
    startedAt: execution.startedAt,
    completedAt: execution.completedAt,
    durationMs: execution.durationMs,
    durationDisplay: formatDuration(execution.durationMs),
    responseStatusCode: execution.responseStatusCode,
    success: isSuccessfulExecution(execution),
  };
}

export function createExecutionQueryService(
  db: Database,
  options: ExecutionQueryOptions = {}
): ExecutionQueryService {
  const defaultLimit = options.defaultLimit ?? DEFAULT_RECENT_LIMIT;

  // Left join: executions of a deleted configuration stay listable.
  function summaries() {
    return db
      .select({ execution: functionExecutions, functionName: functionConfigs.name })
      .from(functionExecutions)
      .leftJoin(functionConfigs, eq(functionConfigs.id, functionExecutions.functionConfigId));
  }

  return {
    async getRecentExecutions(limit = defaultLimit) {
      const rows = await summaries()
        .orderBy(desc(functionExecutions.startedAt), desc(functionExecutions.id))
        .limit(limit);

      return rows.map((row) => toExecutionSummary(row.execution, row.functionName));
    },

    async getRunningExecutions() {
      const rows = await summaries()
        .where(eq(functionExecutions.status, "running"))
        .orderBy(desc(functionExecutions.startedAt), desc(functionExecutions.id));

      return rows.map((row) => toExecutionSummary(row.execution, row.functionName));
    },

    async getExecutionDetails(executionId) {
      const [execution] = await db
        .select()
        .from(functionExecutions)
        .where(eq(functionExecutions.id, executionId))
        .limit(1);

      return execution ?? null;
    },
  };
}
