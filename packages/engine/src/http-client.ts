// ──────────────────────────────────────────────
// Switchboard - Outbound HTTP Client
// One long-lived instance per executor; released with close()
// ──────────────────────────────────────────────

import type { HeaderMap, SupportedHttpMethod } from "@switchboard/types";
import { createLogger } from "@switchboard/utils";

const logger = createLogger("http-client");

export interface HttpClientOptions {
  userAgent?: string;
  /** Raise HttpStatusError for non-2xx responses instead of returning them. */
  throwOnErrorStatus?: boolean;
}

export interface HttpRequest {
  url: string;
  method: SupportedHttpMethod;
  headers: HeaderMap;
  body?: string;
  timeoutMs: number;
}

export interface HttpResponse {
  statusCode: number;
  statusText: string;
  headers: HeaderMap;
  body: string;
}

export class HttpTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "HttpTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class HttpStatusError extends Error {
  readonly statusCode: number;
  readonly statusText: string;
  readonly body: string;

  constructor(response: HttpResponse) {
    super(`HTTP ${response.statusCode} ${response.statusText}`.trim());
    this.name = "HttpStatusError";
    this.statusCode = response.statusCode;
    this.statusText = response.statusText;
    this.body = response.body;
  }
}

export class HttpClientClosedError extends Error {
  constructor() {
    super("HTTP client has been closed");
    this.name = "HttpClientClosedError";
  }
}

export function hasHeader(headers: HeaderMap, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === wanted);
}

export class HttpClient {
  private readonly userAgent: string | undefined;
  private readonly throwOnErrorStatus: boolean;
  private readonly inFlight = new Set<Promise<unknown>>();
  private closed = false;

  constructor(options: HttpClientOptions = {}) {
    this.userAgent = options.userAgent;
    this.throwOnErrorStatus = options.throwOnErrorStatus ?? false;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get pendingRequests(): number {
    return this.inFlight.size;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    if (this.closed) {
      throw new HttpClientClosedError();
    }

    const pending = this.send(request);
    this.inFlight.add(pending);
    try {
      return await pending;
    } finally {
      this.inFlight.delete(pending);
    }
  }

  /** Refuses new requests and waits for the ones already running to settle. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.inFlight.size > 0) {
      logger.info({ pending: this.inFlight.size }, "Waiting for in-flight requests before release");
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private async send(request: HttpRequest): Promise<HttpResponse> {
    const headers = this.buildHeaders(request);
    const signal = AbortSignal.timeout(request.timeoutMs);

    let response: HttpResponse;
    try {
      const raw = await fetch(request.url, {
        method: request.method,
        headers,
        body: request.body,
        signal,
      });
      // The timeout covers reading the body as well as the headers.
      const body = await raw.text();
      response = {
        statusCode: raw.status,
        statusText: raw.statusText,
        headers: Object.fromEntries(raw.headers.entries()),
        body,
      };
    } catch (err) {
      if (signal.aborted) {
        throw new HttpTimeoutError(request.timeoutMs);
      }
      throw err;
    }

    if (this.throwOnErrorStatus && (response.statusCode < 200 || response.statusCode >= 300)) {
      throw new HttpStatusError(response);
    }
    return response;
  }

  private buildHeaders(request: HttpRequest): HeaderMap {
    const headers: HeaderMap = { ...request.headers };
    if (this.userAgent && !hasHeader(headers, "user-agent")) {
      headers["User-Agent"] = this.userAgent;
    }
    if (request.body !== undefined && !hasHeader(headers, "content-type")) {
      headers["Content-Type"] = "application/json";
    }
    return headers;
  }
}
