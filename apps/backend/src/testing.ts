// ──────────────────────────────────────────────
// Switchboard - Service Wiring for Tests
// ──────────────────────────────────────────────

import { createTestDatabase } from "@switchboard/database/testing";
import type { Database } from "@switchboard/database";
import type { HttpClientOptions } from "@switchboard/engine";
import { createFunctionConfigService } from "./services/function-config.service.js";
import type { FunctionConfigService } from "./services/function-config.service.js";
import { createExecutionRecorder } from "./services/execution-recorder.service.js";
import type { ExecutionRecorder } from "./services/execution-recorder.service.js";
import { createExecutionQueryService } from "./services/execution-query.service.js";
import type { ExecutionQueryService } from "./services/execution-query.service.js";
import { createFunctionExecutionService } from "./services/function-execution.service.js";
import type { FunctionExecutionService } from "./services/function-execution.service.js";

export interface TestServices {
  db: Database;
  configs: FunctionConfigService;
  recorder: ExecutionRecorder;
  queries: ExecutionQueryService;
  executions: FunctionExecutionService;
  teardown(): Promise<void>;
}

export async function createTestServices(http?: HttpClientOptions): Promise<TestServices> {
  const database = await createTestDatabase();
  const configs = createFunctionConfigService(database.db);
  const recorder = createExecutionRecorder(database.db);
  const queries = createExecutionQueryService(database.db);
  const executions = createFunctionExecutionService({ configs, recorder, queries, http });

  return {
    db: database.db,
    configs,
    recorder,
    queries,
    executions,
    async teardown() {
      await executions.close();
      await database.close();
    },
  };
}
