// ──────────────────────────────────────────────
// Switchboard - HTTP Method Dispatch Table
// The closed set of methods a configuration may use
// ──────────────────────────────────────────────

import { SUPPORTED_HTTP_METHODS } from "@switchboard/types";
import type { SupportedHttpMethod } from "@switchboard/types";

export interface MethodDispatch {
  sendsBody: boolean;
}

export const METHOD_DISPATCH: Readonly<Record<SupportedHttpMethod, MethodDispatch>> = {
  GET: { sendsBody: false },
  POST: { sendsBody: true },
  PUT: { sendsBody: true },
  DELETE: { sendsBody: false },
};

export type MethodResolution =
  | { supported: true; method: SupportedHttpMethod; sendsBody: boolean }
  | { supported: false; method: string; error: string };

export function normalizeMethod(method: string): string {
  return method.trim().toUpperCase();
}

export function isSupportedMethod(method: string): method is SupportedHttpMethod {
  return SUPPORTED_HTTP_METHODS.some((supported) => supported === method);
}

export function resolveMethod(rawMethod: string): MethodResolution {
  const method = normalizeMethod(rawMethod);
  if (!isSupportedMethod(method)) {
    return { supported: false, method, error: `Unsupported HTTP method: ${method}` };
  }
  return { supported: true, method, sendsBody: METHOD_DISPATCH[method].sendsBody };
}
