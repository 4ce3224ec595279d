// ──────────────────────────────────────────────
// Switchboard - Function Configuration Routes
// ──────────────────────────────────────────────

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import {
  createFunctionConfigSchema,
  updateFunctionConfigSchema,
  idParamsSchema,
  listFunctionConfigsQuerySchema,
} from "../validation/schemas.js";
import type { FunctionConfigService } from "../services/function-config.service.js";
import type { FunctionExecutionService } from "../services/function-execution.service.js";

export function registerFunctionConfigRoutes(
  app: FastifyInstance,
  configService: FunctionConfigService,
  executionService: FunctionExecutionService
): void {
  // List configurations
  app.get("/api/functions", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = listFunctionConfigsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({
        success: false,
        error: { code: "VALIDATION_ERROR", message: "Invalid query", details: parsed.error.flatten() },
      });
    }

    const configs = parsed.data.active ? await configService.getAllActive() : await configService.list();
    return reply.send({ success: true, data: configs, meta: { total: configs.length } });
  });

  // Create configuration
  app.post("/api/functions", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = createFunctionConfigSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({
        success: false,
        error: { code: "VALIDATION_ERROR", message: "Invalid input", details: parsed.error.flatten() },
      });
    }

    const config = await configService.create(parsed.data);
    return reply.status(201).send({ success: true, data: config });
  });

  // Get single configuration
  app.get("/api/functions/:id", async (request: FastifyRequest, reply: FastifyReply) => {
    const params = idParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({
        success: false,
        error: { code: "VALIDATION_ERROR", message: "Invalid function id", details: params.error.flatten() },
      });
    }

    const config = await configService.getById(params.data.id);
    if (!config) {
      return reply.status(404).send({
        success: false,
        error: { code: "NOT_FOUND", message: "Function configuration not found" },
      });
    }

    return reply.send({ success: true, data: config });
  });

  // Update configuration
  app.patch("/api/functions/:id", async (request: FastifyRequest, reply: FastifyReply) => {
    const params = idParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({
        success: false,
        error: { code: "VALIDATION_ERROR", message: "Invalid function id", details: params.error.flatten() },
      });
    }

    const parsed = updateFunctionConfigSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({
        success: false,
        error: { code: "VALIDATION_ERROR", message: "Invalid input", details: parsed.error.flatten() },
      });
    }

    const config = await configService.update(params.data.id, parsed.data);
    return reply.send({ success: true, data: config });
  });

  // Delete configuration
  app.delete("/api/functions/:id", async (request: FastifyRequest, reply: FastifyReply) => {
    const params = idParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({
        success: false,
        error: { code: "VALIDATION_ERROR", message: "Invalid function id", details: params.error.flatten() },
      });
    }

    const deleted = await configService.delete(params.data.id);
    if (!deleted) {
      return reply.status(404).send({
        success: false,
        error: { code: "NOT_FOUND", message: "Function configuration not found" },
      });
    }

    return reply.send({ success: true, data: { deleted: true } });
  });

  // Trigger one call and wait for its record
  app.post("/api/functions/:id/execute", async (request: FastifyRequest, reply: FastifyReply) => {
    const params = idParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({
        success: false,
        error: { code: "VALIDATION_ERROR", message: "Invalid function id", details: params.error.flatten() },
      });
    }

    const execution = await executionService.executeFunction(params.data.id);
    return reply.send({ success: true, data: execution });
  });
}
