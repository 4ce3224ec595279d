// ──────────────────────────────────────────────
// Switchboard - Function Configs Table Schema
// ──────────────────────────────────────────────

import { pgTable, serial, varchar, integer, boolean, timestamp, jsonb, index } from "drizzle-orm/pg-core";
import type { HeaderMap, JsonPayload } from "@switchboard/types";

export const functionConfigs = pgTable(
  "function_configs",
  {
    id: serial("id").primaryKey(),
    name: varchar("name", { length: 100 }).notNull(),
    description: varchar("description", { length: 500 }).default("").notNull(),
    endpointUrl: varchar("endpoint_url", { length: 500 }).notNull(),
    httpMethod: varchar("http_method", { length: 10 }).default("POST").notNull(),
    headers: jsonb("headers").$type<HeaderMap>().default({}).notNull(),
    payload: jsonb("payload").$type<JsonPayload>().default({}).notNull(),
    timeoutSeconds: integer("timeout_seconds").default(30).notNull(),
    isActive: boolean("is_active").default(true).notNull(),
    buttonColor: varchar("button_color", { length: 20 }).default("primary").notNull(),
    displayOrder: integer("display_order").default(0).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    activeOrderIdx: index("function_configs_active_order_idx").on(table.isActive, table.displayOrder, table.name),
  })
);
