// ──────────────────────────────────────────────
// Switchboard - Error Taxonomy
// ──────────────────────────────────────────────

import type { ZodError } from "zod";

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  readonly field: string;

  constructor(field: string, message: string, details?: unknown) {
    super("VALIDATION_ERROR", `${field}: ${message}`, 400, details);
    this.field = field;
  }

  static fromZod(error: ZodError): ValidationError {
    const [issue] = error.issues;
    const field = issue && issue.path.length > 0 ? issue.path.join(".") : "input";
    return new ValidationError(field, issue?.message ?? "Invalid input", error.flatten());
  }
}

export class NotFoundError extends AppError {
  readonly resource: string;
  readonly id: string | number;

  constructor(resource: string, id: string | number) {
    super("NOT_FOUND", `${resource} ${id} not found`, 404);
    this.resource = resource;
    this.id = id;
  }
}

export class InternalError extends AppError {
  constructor(message: string) {
    super("INTERNAL_ERROR", message, 500);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
