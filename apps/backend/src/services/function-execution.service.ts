// ──────────────────────────────────────────────
// Switchboard - Function Execution Service
// Trigger → RUNNING row → outbound call → terminal row
// ──────────────────────────────────────────────

import { HttpClient, describeFailure, dispatchCall } from "@switchboard/engine";
import type { CallOutcome, HttpClientOptions } from "@switchboard/engine";
import { createLogger, createExecutionLogger, NotFoundError, InternalError } from "@switchboard/utils";
import type { FunctionExecution } from "@switchboard/types";
import type { FunctionConfigService } from "./function-config.service.js";
import { snapshotRequest } from "./execution-recorder.service.js";
import type { ExecutionRecorder } from "./execution-recorder.service.js";
import type { ExecutionQueryService } from "./execution-query.service.js";

const logger = createLogger("function-execution-service");

export interface FunctionExecutionService {
  /**
   * Fires one call and waits for it to finish. Throws only when the
   * configuration is unknown or the execution row cannot be created; every
   * later problem is reported through the returned record's status.
   */
  executeFunction(configId: number): Promise<FunctionExecution>;
  /** Releases the HTTP client. Waits for calls already in flight. */
  close(): Promise<void>;
}

export interface FunctionExecutionServiceDeps {
  configs: FunctionConfigService;
  recorder: ExecutionRecorder;
  queries: ExecutionQueryService;
  http?: HttpClientOptions;
}

export function createFunctionExecutionService(deps: FunctionExecutionServiceDeps): FunctionExecutionService {
  const { configs, recorder, queries } = deps;
  const httpClient = new HttpClient(deps.http);

  async function record(executionId: number, outcome: CallOutcome): Promise<void> {
    const endTime = new Date();
    switch (outcome.kind) {
      case "response":
        await recorder.completeSuccess(executionId, {
          statusCode: outcome.response.statusCode,
          headers: outcome.response.headers,
          body: outcome.response.body,
          endTime,
        });
        return;
      case "timeout":
        await recorder.completeFailure(executionId, { message: outcome.message, status: "timeout", endTime });
        return;
      case "failure":
        await recorder.completeFailure(executionId, { message: outcome.message, status: "failed", endTime });
        return;
    }
  }

  return {
    async executeFunction(configId) {
      const config = await configs.getById(configId);
      if (!config) {
        throw new NotFoundError("Function configuration", configId);
      }

      const snapshot = snapshotRequest(config);
      const execution = await recorder.begin(configId, snapshot);
      const executionLogger = createExecutionLogger(execution.id, configId);

      const outcome = await dispatchCall(
        httpClient,
        {
          url: snapshot.url,
          method: snapshot.method,
          headers: snapshot.headers,
          payload: snapshot.payload,
          timeoutSeconds: config.timeoutSeconds,
        },
        executionLogger
      );
      try {
        await record(execution.id, outcome);
      } catch (err) {
        // The row must not stay RUNNING when the outcome cannot be stored.
        const message = describeFailure(err);
        executionLogger.error({ error: message }, "Recording the outcome failed");
        await recorder.completeFailure(execution.id, {
          message: `Could not record outcome: ${message}`,
          status: "failed",
        });
      }

      const finalized = await queries.getExecutionDetails(execution.id);
      if (!finalized) {
        throw new InternalError(`Execution ${execution.id} disappeared before it could be returned`);
      }

      executionLogger.info(
        { status: finalized.status, durationMs: finalized.durationMs, callDurationMs: outcome.durationMs },
        "Execution finished"
      );
      return finalized;
    },

    async close() {
      await httpClient.close();
      logger.info("HTTP client released");
    },
  };
}
