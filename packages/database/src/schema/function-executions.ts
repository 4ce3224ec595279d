// ──────────────────────────────────────────────
// Switchboard - Function Executions Table Schema
// ──────────────────────────────────────────────

import { pgTable, serial, varchar, integer, timestamp, jsonb, text, index } from "drizzle-orm/pg-core";
import { EXECUTION_STATUSES } from "@switchboard/types";
import type { HeaderMap, JsonPayload } from "@switchboard/types";

// No foreign key on function_config_id: executions outlive their configuration.
export const functionExecutions = pgTable(
  "function_executions",
  {
    id: serial("id").primaryKey(),
    functionConfigId: integer("function_config_id").notNull(),
    status: varchar("status", { length: 20, enum: EXECUTION_STATUSES }).default("pending").notNull(),
    startedAt: timestamp("started_at", { withTimezone: true }).defaultNow().notNull(),
    completedAt: timestamp("completed_at", { withTimezone: true }),
    durationMs: integer("duration_ms"),

    requestUrl: varchar("request_url", { length: 500 }).notNull(),
    requestMethod: varchar("request_method", { length: 10 }).notNull(),
    requestHeaders: jsonb("request_headers").$type<HeaderMap>().default({}).notNull(),
    requestPayload: jsonb("request_payload").$type<JsonPayload>().default({}).notNull(),

    responseStatusCode: integer("response_status_code"),
    responseHeaders: jsonb("response_headers").$type<HeaderMap>().default({}).notNull(),
    responseBody: text("response_body").default("").notNull(),
    errorMessage: varchar("error_message", { length: 1000 }).default("").notNull(),
  },
  (table) => ({
    functionConfigIdIdx: index("function_executions_function_config_id_idx").on(table.functionConfigId),
    statusIdx: index("function_executions_status_idx").on(table.status),
    startedAtIdx: index("function_executions_started_at_idx").on(table.startedAt),
  })
);
