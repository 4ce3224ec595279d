// ──────────────────────────────────────────────
// Switchboard - Function Configuration Service
// The configuration store: what each button calls
// ──────────────────────────────────────────────

import { eq, asc } from "drizzle-orm";
import type { Database } from "@switchboard/database";
import { functionConfigs } from "@switchboard/database";
import { createLogger, NotFoundError } from "@switchboard/utils";
import type { FunctionConfig, FunctionConfigInput, FunctionConfigPatch } from "@switchboard/types";
import {
  createFunctionConfigSchema,
  updateFunctionConfigSchema,
  parseOrThrow,
} from "../validation/schemas.js";

const logger = createLogger("function-config-service");

export interface FunctionConfigService {
  create(data: FunctionConfigInput): Promise<FunctionConfig>;
  getById(configId: number): Promise<FunctionConfig | null>;
  getAllActive(): Promise<FunctionConfig[]>;
  list(): Promise<FunctionConfig[]>;
  update(configId: number, patch: FunctionConfigPatch): Promise<FunctionConfig>;
  delete(configId: number): Promise<boolean>;
}

export function createFunctionConfigService(db: Database): FunctionConfigService {
  return {
    async create(data) {
      const values = parseOrThrow(createFunctionConfigSchema, data);
      const now = new Date();

      const [config] = await db
        .insert(functionConfigs)
        .values({ ...values, createdAt: now, updatedAt: now })
        .returning();

      if (!config) {
        throw new Error("Failed to create function configuration");
      }

      logger.info({ configId: config.id, name: config.name }, "Function configuration created");
      return config;
    },

    async getById(configId) {
      const [config] = await db
        .select()
        .from(functionConfigs)
        .where(eq(functionConfigs.id, configId))
        .limit(1);

      return config ?? null;
    },

    async getAllActive() {
      return db
        .select()
        .from(functionConfigs)
        .where(eq(functionConfigs.isActive, true))
        .orderBy(asc(functionConfigs.displayOrder), asc(functionConfigs.name));
    },

    async list() {
      return db
        .select()
        .from(functionConfigs)
        .orderBy(asc(functionConfigs.displayOrder), asc(functionConfigs.name));
    },

    async update(configId, patch) {
      const changes = parseOrThrow(updateFunctionConfigSchema, patch);

      const [config] = await db
        .update(functionConfigs)
        .set({ ...changes, updatedAt: new Date() })
        .where(eq(functionConfigs.id, configId))
        .returning();

      if (!config) {
        throw new NotFoundError("Function configuration", configId);
      }

      logger.info({ configId, fields: Object.keys(changes) }, "Function configuration updated");
      return config;
    },

    async delete(configId) {
      const result = await db
        .delete(functionConfigs)
        .where(eq(functionConfigs.id, configId))
        .returning({ id: functionConfigs.id });

      if (result.length > 0) {
        logger.info({ configId }, "Function configuration deleted");
      }
      return result.length > 0;
    },
  };
}
