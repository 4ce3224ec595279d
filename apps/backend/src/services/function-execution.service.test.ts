import test from "node:test";
import assert from "node:assert/strict";
import { functionConfigs } from "@switchboard/database";
import { startTargetServer, unusedUrl } from "@switchboard/engine/testing";
import { NotFoundError, sleep } from "@switchboard/utils";
import { createTestServices } from "../testing.js";
import { createFunctionExecutionService } from "./function-execution.service.js";

test("a 2xx call finishes as SUCCESS with the response recorded", async () => {
  const target = await startTargetServer();
  const { configs, executions, teardown } = await createTestServices();
  try {
    const config = await configs.create({ name: "Ok", endpointUrl: `${target.baseUrl}/ok`, httpMethod: "GET" });
    const execution = await executions.executeFunction(config.id);

    assert.equal(execution.status, "success");
    assert.equal(execution.responseStatusCode, 200);
    assert.equal(execution.responseBody, '{"ok":true}');
    assert.equal(execution.responseHeaders["content-type"], "application/json; charset=utf-8");
    assert.equal(execution.errorMessage, "");
    assert.ok(execution.completedAt instanceof Date);
    assert.ok((execution.durationMs ?? -1) >= 0);
  } finally {
    await teardown();
    await target.close();
  }
});

test("an error status is still a completed call", async () => {
  const target = await startTargetServer();
  const { configs, executions, queries, teardown } = await createTestServices();
  try {
    const config = await configs.create({ name: "Missing", endpointUrl: `${target.baseUrl}/status/404`, httpMethod: "GET" });
    const execution = await executions.executeFunction(config.id);

    assert.equal(execution.status, "success");
    assert.equal(execution.responseStatusCode, 404);
    assert.equal(execution.responseBody, "status 404");

    const [summary] = await queries.getRecentExecutions();
    assert.equal(summary?.id, execution.id);
    assert.equal(summary?.success, false);
  } finally {
    await teardown();
    await target.close();
  }
});

test("error statuses fail the call when the client raises them", async () => {
  const target = await startTargetServer();
  const { configs, executions, teardown } = await createTestServices({ throwOnErrorStatus: true });
  try {
    const config = await configs.create({ name: "Broken", endpointUrl: `${target.baseUrl}/status/500`, httpMethod: "GET" });
    const execution = await executions.executeFunction(config.id);

    assert.equal(execution.status, "failed");
    assert.equal(execution.errorMessage, "HTTP 500: status 500");
    assert.equal(execution.responseStatusCode, null);
  } finally {
    await teardown();
    await target.close();
  }
});

test("POST sends the payload as JSON and records the request snapshot", async () => {
  const target = await startTargetServer();
  const { configs, executions, teardown } = await createTestServices();
  try {
    const config = await configs.create({
      name: "Echo",
      endpointUrl: `${target.baseUrl}/echo`,
      httpMethod: "POST",
      headers: { "X-Token": "test-secret" },
      payload: { title: "hello" },
    });
    const execution = await executions.executeFunction(config.id);

    assert.equal(execution.status, "success");
    assert.equal(execution.requestUrl, `${target.baseUrl}/echo`);
    assert.equal(execution.requestMethod, "POST");
    assert.deepEqual(execution.requestHeaders, { "X-Token": "test-secret" });
    assert.deepEqual(execution.requestPayload, { title: "hello" });
    assert.match(execution.responseBody, /"method":"POST"/);
    assert.match(execution.responseBody, /"x-token":"test-secret"/);
    assert.match(execution.responseBody, /"content-type":"application\/json"/);
    assert.match(execution.responseBody, /"body":\{"title":"hello"\}/);
  } finally {
    await teardown();
    await target.close();
  }
});

test("GET never carries the payload", async () => {
  const target = await startTargetServer();
  const { configs, executions, teardown } = await createTestServices();
  try {
    const config = await configs.create({
      name: "Echo GET",
      endpointUrl: `${target.baseUrl}/echo`,
      httpMethod: "GET",
      payload: { ignored: true },
    });
    const execution = await executions.executeFunction(config.id);

    assert.equal(execution.status, "success");
    assert.match(execution.responseBody, /"method":"GET"/);
    assert.match(execution.responseBody, /"body":null/);
  } finally {
    await teardown();
    await target.close();
  }
});

test("a call slower than its timeout finishes as TIMEOUT", async () => {
  const target = await startTargetServer();
  const { configs, executions, teardown } = await createTestServices();
  try {
    const config = await configs.create({
      name: "Slow",
      endpointUrl: `${target.baseUrl}/slow?ms=3000`,
      httpMethod: "GET",
      timeoutSeconds: 1,
    });
    const execution = await executions.executeFunction(config.id);

    assert.equal(execution.status, "timeout");
    assert.equal(execution.errorMessage, "Request timed out");
    assert.equal(execution.responseStatusCode, null);
    assert.equal(execution.responseBody, "");
    assert.ok((execution.durationMs ?? 0) >= 900);
  } finally {
    await teardown();
    await target.close();
  }
});

test("a method outside the dispatch table fails without a call", async () => {
  const { db, executions, teardown } = await createTestServices();
  try {
    // Other writers can store methods the configuration store rejects.
    const [config] = await db
      .insert(functionConfigs)
      .values({ name: "Patch", endpointUrl: "http://127.0.0.1:9/never", httpMethod: "PATCH" })
      .returning();
    assert.ok(config);

    const execution = await executions.executeFunction(config.id);

    assert.equal(execution.status, "failed");
    assert.equal(execution.errorMessage, "Unsupported HTTP method: PATCH");
    assert.equal(execution.requestMethod, "PATCH");
    assert.equal(execution.responseStatusCode, null);
    assert.ok(execution.completedAt instanceof Date);
  } finally {
    await teardown();
  }
});

test("a refused connection finishes as FAILED", async () => {
  const url = await unusedUrl();
  const { configs, executions, teardown } = await createTestServices();
  try {
    const config = await configs.create({ name: "Nobody home", endpointUrl: url, httpMethod: "GET" });
    const execution = await executions.executeFunction(config.id);

    assert.equal(execution.status, "failed");
    assert.match(execution.errorMessage, /^fetch failed/);
    assert.equal(execution.responseStatusCode, null);
  } finally {
    await teardown();
  }
});

test("unknown configurations are rejected before anything is recorded", async () => {
  const { executions, queries, teardown } = await createTestServices();
  try {
    await assert.rejects(executions.executeFunction(999), NotFoundError);
    assert.deepEqual(await queries.getRecentExecutions(), []);
  } finally {
    await teardown();
  }
});

test("editing a configuration mid-call does not change the recorded request", async () => {
  const target = await startTargetServer();
  const { configs, executions, teardown } = await createTestServices();
  try {
    const original = `${target.baseUrl}/slow?ms=300`;
    const config = await configs.create({
      name: "Moving",
      endpointUrl: original,
      httpMethod: "GET",
      headers: { "X-Version": "1" },
    });

    const pending = executions.executeFunction(config.id);
    await sleep(100);
    await configs.update(config.id, { endpointUrl: `${target.baseUrl}/ok`, headers: { "X-Version": "2" } });
    const execution = await pending;

    assert.equal(execution.requestUrl, original);
    assert.deepEqual(execution.requestHeaders, { "X-Version": "1" });
    assert.match(execution.responseBody, /"slow":true/);
  } finally {
    await teardown();
    await target.close();
  }
});

test("concurrent triggers each get their own execution", async () => {
  const target = await startTargetServer();
  const { configs, executions, queries, teardown } = await createTestServices();
  try {
    const config = await configs.create({ name: "Burst", endpointUrl: `${target.baseUrl}/ok`, httpMethod: "GET" });
    const results = await Promise.all([1, 2, 3].map(() => executions.executeFunction(config.id)));

    assert.equal(new Set(results.map((execution) => execution.id)).size, 3);
    assert.ok(results.every((execution) => execution.status === "success"));
    assert.equal((await queries.getRecentExecutions()).length, 3);
  } finally {
    await teardown();
    await target.close();
  }
});

test("long response bodies are stored truncated", async () => {
  const target = await startTargetServer();
  const { configs, executions, teardown } = await createTestServices();
  try {
    const config = await configs.create({ name: "Large", endpointUrl: `${target.baseUrl}/large`, httpMethod: "GET" });
    const execution = await executions.executeFunction(config.id);

    assert.equal(execution.status, "success");
    assert.equal(execution.responseBody.length, 10_000);
  } finally {
    await teardown();
    await target.close();
  }
});

test("after close, triggers are recorded as FAILED", async () => {
  const { configs, executions, teardown } = await createTestServices();
  try {
    const config = await configs.create({ name: "Late", endpointUrl: "http://127.0.0.1:9/late", httpMethod: "GET" });
    await executions.close();

    const execution = await executions.executeFunction(config.id);
    assert.equal(execution.status, "failed");
    assert.equal(execution.errorMessage, "HTTP client has been closed");
  } finally {
    await teardown();
  }
});

test("a binary body with NUL bytes is stored as a SUCCESS", async () => {
  const target = await startTargetServer();
  const { configs, executions, queries, teardown } = await createTestServices();
  try {
    const config = await configs.create({ name: "Binary", endpointUrl: `${target.baseUrl}/bin`, httpMethod: "GET" });
    const execution = await executions.executeFunction(config.id);

    assert.equal(execution.status, "success");
    assert.equal(execution.responseStatusCode, 200);
    assert.equal(execution.responseBody, "PNG\uFFFD\u0001\u0002");
    assert.deepEqual(await queries.getRunningExecutions(), []);
  } finally {
    await teardown();
    await target.close();
  }
});

test("an outcome that cannot be stored still leaves a terminal row", async () => {
  const target = await startTargetServer();
  const { configs, recorder, queries, teardown } = await createTestServices();
  const executions = createFunctionExecutionService({
    configs,
    queries,
    recorder: {
      ...recorder,
      async completeSuccess() {
        throw new Error("disk full");
      },
    },
  });
  try {
    const config = await configs.create({ name: "Unstorable", endpointUrl: `${target.baseUrl}/ok`, httpMethod: "GET" });
    const execution = await executions.executeFunction(config.id);

    assert.equal(execution.status, "failed");
    assert.equal(execution.errorMessage, "Could not record outcome: disk full");
    assert.ok(execution.completedAt instanceof Date);
    assert.deepEqual(await queries.getRunningExecutions(), []);
  } finally {
    await executions.close();
    await teardown();
    await target.close();
  }
});
