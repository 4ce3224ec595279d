// ──────────────────────────────────────────────
// Switchboard - Backend API Server
// ──────────────────────────────────────────────

import { getDatabase, closeConnection, seedSampleData } from "@switchboard/database";
import { loadConfig, createLogger } from "@switchboard/utils";
import { createFunctionConfigService } from "./services/function-config.service.js";
import { createExecutionRecorder } from "./services/execution-recorder.service.js";
import { createExecutionQueryService } from "./services/execution-query.service.js";
import { createFunctionExecutionService } from "./services/function-execution.service.js";
import { buildApp } from "./app.js";

const logger = createLogger("server");

async function bootstrap(): Promise<void> {
  const config = loadConfig();

  // Database
  const db = getDatabase(config.database.url, { max: config.database.poolMax });

  if (config.seedSampleData) {
    const inserted = await seedSampleData(db);
    logger.info({ inserted }, "Sample function configurations seeded");
  }

  // Services (dependency injection)
  const configService = createFunctionConfigService(db);
  const queryService = createExecutionQueryService(db, { defaultLimit: config.executions.recentLimit });
  const executionService = createFunctionExecutionService({
    configs: configService,
    recorder: createExecutionRecorder(db),
    queries: queryService,
    http: {
      userAgent: config.http.userAgent,
      throwOnErrorStatus: config.http.throwOnErrorStatus,
    },
  });

  const app = await buildApp(
    { configs: configService, executions: executionService, queries: queryService },
    {
      logLevel: config.logLevel,
      corsOrigin: config.backend.corsOrigin,
      exposeStack: config.nodeEnv === "development",
    }
  );

  // Start server
  try {
    await app.listen({ port: config.backend.port, host: config.backend.host });
    logger.info({
      port: config.backend.port,
      environment: config.nodeEnv,
    }, "Switchboard backend started");
  } catch (err) {
    logger.error({ error: err }, "Failed to start server");
    process.exit(1);
  }

  // Graceful shutdown: stop taking requests, drain outbound calls, then drop the pool
  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Shutdown signal received");
    await app.close();
    await executionService.close();
    await closeConnection();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error({ error: err, signal }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

bootstrap().catch((err) => {
  logger.error({ error: err }, "Bootstrap failed");
  process.exit(1);
});
