// ──────────────────────────────────────────────
// Switchboard - Engine Package
// ──────────────────────────────────────────────

export { METHOD_DISPATCH, resolveMethod, normalizeMethod, isSupportedMethod } from "./methods.js";
export type { MethodDispatch, MethodResolution } from "./methods.js";
export {
  HttpClient,
  HttpTimeoutError,
  HttpStatusError,
  HttpClientClosedError,
  hasHeader,
} from "./http-client.js";
export type { HttpClientOptions, HttpRequest, HttpResponse } from "./http-client.js";
export { describeFailure, TIMEOUT_MESSAGE } from "./describe-failure.js";
export { buildRequest, dispatchCall } from "./dispatch.js";
export type { CallSpec, CallOutcome, BuildRequestResult } from "./dispatch.js";
