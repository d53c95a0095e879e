import { describe, it, expect, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildServer } from "../src/server.js";
import { parseConfig } from "../src/config.js";
import { silentLogger } from "../src/logger.js";
import type { JsonValue } from "../src/rpc/types.js";
import { blockAt, chainNode, fakeClient } from "./fakes.js";

const config = parseConfig(
  {
    rpc: { url: "http://node.test:8332", user: "test-user", pass: "test-secret" },
    server: { host: "127.0.0.1", port: 0 },
    logging: { level: "error", requests: false },
  },
  "test"
);

const BLOCK_HASH = "0000000000000000000320283a032748cef8227873ff4872689bf23f1cda83a5";

describe("HTTP server", () => {
  let server: FastifyInstance;

  afterEach(async () => {
    await server.close();
  });

  it("should serve a block as JSON, unchanged", async () => {
    const detail: JsonValue = {
      hash: BLOCK_HASH,
      height: 840000,
      difficulty: 86388558925171.02,
      tx: ["a", "b"],
      nextblockhash: null,
    };
    server = buildServer(config, {
      client: fakeClient(() => ({ result: detail })),
      logger: silentLogger,
    });

    const response = await server.inject({ method: "GET", url: `/block/${BLOCK_HASH}` });

    expect(response.statusCode).toBe(200);
    expect(response.headers["content-type"]).toBe("application/json; charset=utf-8");
    expect(response.body).toBe(JSON.stringify(detail));
    expect(response.json()).toEqual(detail);
  });

  it("should send a bare string result as a JSON string", async () => {
    server = buildServer(config, {
      client: fakeClient(() => ({ result: "0100000001" })),
      logger: silentLogger,
    });

    const response = await server.inject({ method: "GET", url: `/block/${BLOCK_HASH}` });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('"0100000001"');
  });

  it("should reject an invalid block hash with 400 and no RPC call", async () => {
    const client = fakeClient(() => ({ result: {} }));
    server = buildServer(config, { client, logger: silentLogger });

    const response = await server.inject({ method: "GET", url: "/block/not-a-hash" });

    expect(response.statusCode).toBe(400);
    expect(response.headers["content-type"]).toBe("text/plain; charset=utf-8");
    expect(response.body).toBe("Invalid block hash");
    expect(client.call).not.toHaveBeenCalled();
  });

  it.each([
    ["/block/", "a".repeat(101), "Invalid block hash"],
    ["/block/", "0".repeat(128), "Invalid block hash"],
    ["/tx/", "a".repeat(101), "Invalid transaction id"],
    ["/tx/", "0".repeat(128), "Invalid transaction id"],
  ])("should reject an over-long id on %s with 400 and no RPC call", async (route, id, body) => {
    const client = fakeClient(() => ({ result: {} }));
    server = buildServer(config, { client, logger: silentLogger });

    const response = await server.inject({ method: "GET", url: `${route}${id}` });

    expect(response.statusCode).toBe(400);
    expect(response.body).toBe(body);
    expect(client.call).not.toHaveBeenCalled();
  });

  it("should serve a verbose transaction", async () => {
    const txid = "e3bf3d07d4b0375638d5f1db5255fe07ba2c4cb067cd81b84ee974b6585fb468";
    const client = fakeClient(() => ({ result: { txid, size: 225 } }));
    server = buildServer(config, { client, logger: silentLogger });

    const response = await server.inject({ method: "GET", url: `/tx/${txid}` });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ txid, size: 225 });
    expect(client.call).toHaveBeenCalledWith("getrawtransaction", [txid, true]);
  });

  it("should serve the latest blocks with the skipped header", async () => {
    server = buildServer(config, {
      client: chainNode({ tip: 20, failBlock: [18] }),
      logger: silentLogger,
    });

    const response = await server.inject({ method: "GET", url: "/latest_blocks" });

    expect(response.statusCode).toBe(200);
    expect(response.headers["x-skipped-blocks"]).toBe("1");
    expect(response.json()).toEqual([20, 19, 17, 16, 15, 14, 13, 12, 11].map(blockAt));
  });

  it("should return 500 without leaking error detail", async () => {
    server = buildServer(config, {
      client: chainNode({ failBlock: [0] }),
      logger: silentLogger,
    });

    const response = await server.inject({
      method: "GET",
      url: `/block/${"0".repeat(64)}`,
    });

    expect(response.statusCode).toBe(500);
    expect(response.body).toBe("Failed to retrieve block information");
  });

  it("should add CORS headers and answer preflight requests", async () => {
    server = buildServer(config, { client: chainNode(), logger: silentLogger });

    const preflight = await server.inject({ method: "OPTIONS", url: "/latest_blocks" });
    expect(preflight.statusCode).toBe(204);
    expect(preflight.headers["access-control-allow-origin"]).toBe("*");
    expect(preflight.headers["access-control-allow-methods"]).toBe("GET, OPTIONS");
    expect(preflight.headers["access-control-expose-headers"]).toBe("x-skipped-blocks");

    const latest = await server.inject({ method: "GET", url: "/latest_blocks" });
    expect(latest.headers["access-control-expose-headers"]).toBe("x-skipped-blocks");
  });

  it("should return 404 for unknown routes", async () => {
    server = buildServer(config, { client: chainNode(), logger: silentLogger });

    const response = await server.inject({ method: "GET", url: "/blocks" });

    expect(response.statusCode).toBe(404);
  });
});
