// ──────────────────────────────────────────────
// Switchboard - Zod Validation Schemas
// ──────────────────────────────────────────────

import { z } from "zod";
import { SUPPORTED_HTTP_METHODS, MIN_TIMEOUT_SECONDS, MAX_TIMEOUT_SECONDS } from "@switchboard/types";
import type { JsonValue } from "@switchboard/types";
import { ValidationError } from "@switchboard/utils";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

const httpMethodSchema = z
  .string()
  .trim()
  .transform((value) => value.toUpperCase())
  .pipe(
    z.enum(SUPPORTED_HTTP_METHODS, {
      errorMap: () => ({ message: `must be one of ${SUPPORTED_HTTP_METHODS.join(", ")}` }),
    })
  );

const functionConfigFields = {
  name: z.string().trim().min(1, "is required").max(100),
  description: z.string().trim().max(500),
  endpointUrl: z.string().trim().min(1, "is required").max(500),
  httpMethod: httpMethodSchema,
  headers: z.record(z.string()),
  payload: z.record(jsonValueSchema),
  timeoutSeconds: z
    .number()
    .int("must be a whole number of seconds")
    .min(MIN_TIMEOUT_SECONDS, `must be at least ${MIN_TIMEOUT_SECONDS}`)
    .max(MAX_TIMEOUT_SECONDS, `must be at most ${MAX_TIMEOUT_SECONDS}`),
  isActive: z.boolean(),
  buttonColor: z.string().trim().min(1).max(20),
  displayOrder: z.number().int(),
};

// Function configuration schemas
export const createFunctionConfigSchema = z.object({
  ...functionConfigFields,
  description: functionConfigFields.description.default(""),
  httpMethod: functionConfigFields.httpMethod.default("POST"),
  headers: functionConfigFields.headers.default({}),
  payload: functionConfigFields.payload.default({}),
  timeoutSeconds: functionConfigFields.timeoutSeconds.default(30),
  isActive: functionConfigFields.isActive.default(true),
  buttonColor: functionConfigFields.buttonColor.default("primary"),
  displayOrder: functionConfigFields.displayOrder.default(0),
});

export const updateFunctionConfigSchema = z
  .object(functionConfigFields)
  .partial()
  .refine((value) => Object.keys(value).length > 0, { message: "at least one field is required" });

export const idParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listFunctionConfigsQuerySchema = z.object({
  active: z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional(),
});

// Execution schemas
export const recentExecutionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional(),
});

/** Parses or throws a ValidationError naming the first offending field. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error);
  }
  return parsed.data;
}
