// ──────────────────────────────────────────────
// Switchboard - In-process Target Server for Tests
// Binds 127.0.0.1 on an ephemeral port
// ──────────────────────────────────────────────

import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import { sleep } from "@switchboard/utils";

export interface TargetServer {
  app: FastifyInstance;
  baseUrl: string;
  close(): Promise<void>;
}

export async function startTargetServer(): Promise<TargetServer> {
  const app = Fastify({ logger: false });

  app.get("/ok", async () => ({ ok: true }));

  app.get<{ Querystring: { ms?: string } }>("/slow", async (request) => {
    const { ms } = request.query;
    await sleep(Number(ms ?? "10000"));
    return { ok: true, slow: true };
  });

  app.route({
    method: ["GET", "POST", "PUT", "DELETE"],
    url: "/echo",
    handler: async (request) => ({
      method: request.method,
      headers: request.headers,
      body: request.body ?? null,
    }),
  });

  app.get<{ Params: { code: string } }>("/status/:code", async (request, reply) => {
    const { code } = request.params;
    return reply.status(Number(code)).type("text/plain").send(`status ${code}`);
  });

  app.get<{ Querystring: { size?: string } }>("/large", async (request, reply) => {
    const { size } = request.query;
    return reply.type("text/plain").send("x".repeat(Number(size ?? "20000")));
  });

  app.get("/bin", async (_request, reply) => {
    return reply.type("application/octet-stream").send(Buffer.from([0x50, 0x4e, 0x47, 0x00, 0x01, 0x02]));
  });

  await app.listen({ port: 0, host: "127.0.0.1" });
  const address = app.server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Target server did not bind a TCP port");
  }

  return {
    app,
    baseUrl: `http://127.0.0.1:${address.port}`,
    async close() {
      await app.close();
    },
  };
}

/** A URL on which nothing is listening. */
export async function unusedUrl(): Promise<string> {
  const server = await startTargetServer();
  const url = `${server.baseUrl}/ok`;
  await server.close();
  return url;
}
