// ──────────────────────────────────────────────
// Switchboard - Execution Recorder
// Opens a RUNNING row per attempt and finalizes it exactly once
// ──────────────────────────────────────────────

import { and, eq } from "drizzle-orm";
import type { Database } from "@switchboard/database";
import { functionConfigs, functionExecutions } from "@switchboard/database";
import {
  createLogger,
  cloneJson,
  capLength,
  stripNulChars,
  isNonEmptyString,
  NotFoundError,
  InternalError,
} from "@switchboard/utils";
import { MAX_ERROR_MESSAGE_LENGTH, MAX_RESPONSE_BODY_LENGTH } from "@switchboard/types";
import type {
  CompleteFailureInput,
  CompleteSuccessInput,
  FunctionConfig,
  FunctionExecution,
  RequestSnapshot,
} from "@switchboard/types";

const logger = createLogger("execution-recorder");

export interface ExecutionRecorder {
  begin(configId: number, snapshot: RequestSnapshot): Promise<FunctionExecution>;
  /** Returns null when the execution is unknown or already finalized. */
  completeSuccess(executionId: number, input: CompleteSuccessInput): Promise<FunctionExecution | null>;
  /** Returns null when the execution is unknown or already finalized. */
  completeFailure(executionId: number, input: CompleteFailureInput): Promise<FunctionExecution | null>;
}

export function snapshotRequest(config: FunctionConfig): RequestSnapshot {
  return {
    url: config.endpointUrl,
    method: config.httpMethod,
    headers: cloneJson(config.headers),
    payload: cloneJson(config.payload),
  };
}

export function elapsedMs(startedAt: Date, endTime: Date): number {
  return Math.max(0, Math.floor(endTime.getTime() - startedAt.getTime()));
}

export function createExecutionRecorder(db: Database): ExecutionRecorder {
  async function findRunning(executionId: number) {
    const [execution] = await db
      .select({ id: functionExecutions.id, status: functionExecutions.status, startedAt: functionExecutions.startedAt })
      .from(functionExecutions)
      .where(eq(functionExecutions.id, executionId))
      .limit(1);

    if (!execution) {
      logger.warn({ executionId }, "Finalization skipped: execution not found");
      return null;
    }
    if (execution.status !== "running") {
      logger.warn({ executionId, status: execution.status }, "Finalization skipped: execution already terminal");
      return null;
    }
    return execution;
  }

  async function finalize(
    executionId: number,
    changes: Partial<typeof functionExecutions.$inferInsert>
  ): Promise<FunctionExecution | null> {
    const [execution] = await db
      .update(functionExecutions)
      .set(changes)
      .where(and(eq(functionExecutions.id, executionId), eq(functionExecutions.status, "running")))
      .returning();

    if (!execution) {
      logger.warn({ executionId }, "Finalization lost a race with another writer");
      return null;
    }
    return execution;
  }

  return {
    async begin(configId, snapshot) {
      const [config] = await db
        .select({ id: functionConfigs.id })
        .from(functionConfigs)
        .where(eq(functionConfigs.id, configId))
        .limit(1);

      if (!config) {
        throw new NotFoundError("Function configuration", configId);
      }

      const [execution] = await db
        .insert(functionExecutions)
        .values({
          functionConfigId: configId,
          status: "running",
          startedAt: new Date(),
          requestUrl: snapshot.url,
          requestMethod: snapshot.method,
          requestHeaders: cloneJson(snapshot.headers),
          requestPayload: cloneJson(snapshot.payload),
        })
        .returning();

      if (!execution) {
        throw new InternalError("Failed to create execution record");
      }

      logger.info({ executionId: execution.id, configId }, "Execution started");
      return execution;
    },

    async completeSuccess(executionId, input) {
      const running = await findRunning(executionId);
      if (!running) return null;

      const endTime = input.endTime ?? new Date();
      return finalize(executionId, {
        status: "success",
        completedAt: endTime,
        durationMs: elapsedMs(running.startedAt, endTime),
        responseStatusCode: input.statusCode,
        responseHeaders: { ...input.headers },
        responseBody: capLength(stripNulChars(input.body), MAX_RESPONSE_BODY_LENGTH),
      });
    },

    async completeFailure(executionId, input) {
      const running = await findRunning(executionId);
      if (!running) return null;

      const endTime = input.endTime ?? new Date();
      const message = isNonEmptyString(input.message) ? input.message : "Unknown error";
      return finalize(executionId, {
        status: input.status ?? "failed",
        completedAt: endTime,
        durationMs: elapsedMs(running.startedAt, endTime),
        errorMessage: capLength(stripNulChars(message), MAX_ERROR_MESSAGE_LENGTH),
      });
    },
  };
}
