// ──────────────────────────────────────────────
// Switchboard - Call Dispatch
// Performs one outbound call and classifies how it ended
// ──────────────────────────────────────────────

import type { HeaderMap, JsonPayload } from "@switchboard/types";
import { startTimer, measureDuration } from "@switchboard/utils";
import type { Logger } from "@switchboard/utils";
import { resolveMethod } from "./methods.js";
import { HttpTimeoutError } from "./http-client.js";
import type { HttpClient, HttpRequest, HttpResponse } from "./http-client.js";
import { describeFailure, TIMEOUT_MESSAGE } from "./describe-failure.js";

export interface CallSpec {
  url: string;
  method: string;
  headers: HeaderMap;
  payload: JsonPayload;
  timeoutSeconds: number;
}

export type CallOutcome =
  | { kind: "response"; response: HttpResponse; durationMs: number }
  | { kind: "timeout"; message: string; durationMs: number }
  | { kind: "failure"; reason: "unsupported-method" | "transport"; message: string; durationMs: number };

export type BuildRequestResult =
  | { ok: true; request: HttpRequest }
  | { ok: false; error: string };

export function buildRequest(call: CallSpec): BuildRequestResult {
  const resolved = resolveMethod(call.method);
  if (!resolved.supported) {
    return { ok: false, error: resolved.error };
  }

  const request: HttpRequest = {
    url: call.url,
    method: resolved.method,
    headers: { ...call.headers },
    timeoutMs: call.timeoutSeconds * 1000,
  };
  if (resolved.sendsBody && Object.keys(call.payload).length > 0) {
    request.body = JSON.stringify(call.payload);
  }
  return { ok: true, request };
}

/** Never throws: every way a call can end is an outcome. */
export async function dispatchCall(client: HttpClient, call: CallSpec, logger?: Logger): Promise<CallOutcome> {
  const built = buildRequest(call);
  if (!built.ok) {
    logger?.warn({ method: call.method }, "Rejected call before dispatch");
    return { kind: "failure", reason: "unsupported-method", message: built.error, durationMs: 0 };
  }

  const { request } = built;
  logger?.info({ method: request.method, url: request.url, timeoutMs: request.timeoutMs }, "Making HTTP request");

  const timer = startTimer();
  try {
    const response = await client.request(request);
    const durationMs = measureDuration(timer);
    logger?.info({ statusCode: response.statusCode, durationMs }, "HTTP request completed");
    return { kind: "response", response, durationMs };
  } catch (err) {
    const durationMs = measureDuration(timer);
    if (err instanceof HttpTimeoutError) {
      logger?.warn({ timeoutMs: err.timeoutMs, durationMs }, "HTTP request timed out");
      return { kind: "timeout", message: TIMEOUT_MESSAGE, durationMs };
    }
    const message = describeFailure(err);
    logger?.warn({ error: message, durationMs }, "HTTP request failed");
    return { kind: "failure", reason: "transport", message, durationMs };
  }
}
