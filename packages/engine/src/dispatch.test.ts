import test from "node:test";
import assert from "node:assert/strict";
import { buildRequest, dispatchCall } from "./dispatch.js";
import { HttpClient } from "./http-client.js";
import { startTargetServer, unusedUrl } from "./testing.js";

const baseSpec = {
  url: "http://127.0.0.1/unused",
  method: "GET",
  headers: {},
  payload: {},
  timeoutSeconds: 5,
};

test("GET and DELETE never carry a body", () => {
  for (const method of ["GET", "delete"]) {
    const built = buildRequest({ ...baseSpec, method, payload: { a: 1 } });
    assert.equal(built.ok, true);
    if (built.ok) {
      assert.equal(built.request.body, undefined);
    }
  }
});

test("POST and PUT send the payload only when it has keys", () => {
  const withPayload = buildRequest({ ...baseSpec, method: "put", payload: { a: 1 } });
  assert.ok(withPayload.ok);
  if (withPayload.ok) {
    assert.equal(withPayload.request.method, "PUT");
    assert.equal(withPayload.request.body, '{"a":1}');
    assert.equal(withPayload.request.timeoutMs, 5000);
  }

  const empty = buildRequest({ ...baseSpec, method: "POST" });
  assert.ok(empty.ok);
  if (empty.ok) {
    assert.equal(empty.request.body, undefined);
  }
});

test("unsupported methods are rejected before any network I/O", async () => {
  const client = new HttpClient();
  try {
    const outcome = await dispatchCall(client, { ...baseSpec, method: "PATCH" });
    assert.deepEqual(outcome, {
      kind: "failure",
      reason: "unsupported-method",
      message: "Unsupported HTTP method: PATCH",
      durationMs: 0,
    });
    assert.equal(client.pendingRequests, 0);
  } finally {
    await client.close();
  }
});

test("classifies responses, timeouts and transport failures", async () => {
  const server = await startTargetServer();
  const client = new HttpClient();
  try {
    const ok = await dispatchCall(client, { ...baseSpec, url: `${server.baseUrl}/status/502` });
    assert.equal(ok.kind, "response");
    if (ok.kind === "response") {
      assert.equal(ok.response.statusCode, 502);
      assert.ok(ok.durationMs >= 0);
    }

    const slow = await dispatchCall(client, {
      ...baseSpec,
      url: `${server.baseUrl}/slow?ms=3000`,
      timeoutSeconds: 1,
    });
    assert.equal(slow.kind, "timeout");
    if (slow.kind === "timeout") {
      assert.equal(slow.message, "Request timed out");
      assert.ok(slow.durationMs >= 900, `expected ~1000ms, got ${slow.durationMs}`);
    }

    const refused = await dispatchCall(client, { ...baseSpec, url: await unusedUrl() });
    assert.equal(refused.kind, "failure");
    if (refused.kind === "failure") {
      assert.equal(refused.reason, "transport");
      assert.match(refused.message, /^fetch failed/);
    }

    const malformed = await dispatchCall(client, { ...baseSpec, url: "not a url" });
    assert.equal(malformed.kind, "failure");
    if (malformed.kind === "failure") {
      assert.match(malformed.message, /not a url/);
    }
  } finally {
    await client.close();
    await server.close();
  }
});
