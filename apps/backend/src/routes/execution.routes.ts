// ──────────────────────────────────────────────
// Switchboard - Execution History Routes
// ──────────────────────────────────────────────

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { idParamsSchema, recentExecutionsQuerySchema } from "../validation/schemas.js";
import type { ExecutionQueryService } from "../services/execution-query.service.js";

export function registerExecutionRoutes(app: FastifyInstance, queryService: ExecutionQueryService): void {
  app.get("/api/executions", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = recentExecutionsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({
        success: false,
        error: { code: "VALIDATION_ERROR", message: "Invalid query", details: parsed.error.flatten() },
      });
    }

    const summaries = await queryService.getRecentExecutions(parsed.data.limit);
    return reply.send({ success: true, data: summaries, meta: { total: summaries.length } });
  });

  app.get("/api/executions/running", async (_request: FastifyRequest, reply: FastifyReply) => {
    const running = await queryService.getRunningExecutions();
    return reply.send({ success: true, data: running, meta: { total: running.length } });
  });

  app.get("/api/executions/:id", async (request: FastifyRequest, reply: FastifyReply) => {
    const params = idParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({
        success: false,
        error: { code: "VALIDATION_ERROR", message: "Invalid execution id", details: params.error.flatten() },
      });
    }

    const execution = await queryService.getExecutionDetails(params.data.id);
    if (!execution) {
      return reply.status(404).send({
        success: false,
        error: { code: "NOT_FOUND", message: "Execution not found" },
      });
    }

    return reply.send({ success: true, data: execution });
  });
}
