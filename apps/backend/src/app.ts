// ──────────────────────────────────────────────
// Switchboard - Fastify Application
// ──────────────────────────────────────────────

import Fastify from "fastify";
import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import cors from "@fastify/cors";
import { createLogger, isAppError, sanitizeErrorMessage } from "@switchboard/utils";
import type { FunctionConfigService } from "./services/function-config.service.js";
import type { FunctionExecutionService } from "./services/function-execution.service.js";
import type { ExecutionQueryService } from "./services/execution-query.service.js";
import { registerFunctionConfigRoutes } from "./routes/function-config.routes.js";
import { registerExecutionRoutes } from "./routes/execution.routes.js";

const logger = createLogger("app");

export interface AppServices {
  configs: FunctionConfigService;
  executions: FunctionExecutionService;
  queries: ExecutionQueryService;
}

export interface AppOptions {
  logLevel: string;
  corsOrigin: string;
  exposeStack?: boolean;
}

export async function buildApp(services: AppServices, options: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: options.logLevel,
      timestamp: true,
    },
  });

  await app.register(cors, {
    origin: options.corsOrigin === "*" ? true : options.corsOrigin,
  });

  registerFunctionConfigRoutes(app, services.configs, services.executions);
  registerExecutionRoutes(app, services.queries);

  // Health check
  app.get("/api/health", async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  // Global error handler
  app.setErrorHandler((error: Error & { statusCode?: number }, _request: FastifyRequest, reply: FastifyReply) => {
    if (isAppError(error)) {
      if (error.statusCode >= 500) {
        logger.error({ code: error.code, message: sanitizeErrorMessage(error) }, "Request failed");
      }
      return reply.status(error.statusCode).send({
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined ? { details: error.details } : {}),
        },
      });
    }

    logger.error({
      message: sanitizeErrorMessage(error),
      statusCode: error.statusCode,
      stack: options.exposeStack ? error.stack : undefined,
    }, "Unhandled error");

    const statusCode = error.statusCode ?? 500;
    return reply.status(statusCode).send({
      success: false,
      error: {
        code: statusCode >= 500 ? "INTERNAL_ERROR" : "BAD_REQUEST",
        message: statusCode >= 500 ? "Internal server error" : error.message,
      },
    });
  });

  return app;
}
