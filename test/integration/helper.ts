import Fastify, { type FastifyInstance } from "fastify";
import { parseConfig, type Config } from "../../src/config.js";
import type { JsonValue } from "../../src/rpc/types.js";
import { blockAt, hashFor, heightOf } from "../fakes.js";

export const NODE_USER = "test-user";
export const NODE_PASS = "test-secret";

const EXPECTED_AUTH =
  "Basic " + Buffer.from(`${NODE_USER}:${NODE_PASS}`).toString("base64");

interface RpcBody {
  jsonrpc: string;
  id: string;
  method: string;
  params: JsonValue[];
}

export interface FakeNode {
  server: FastifyInstance;
  url: string;
  /** Methods received, in arrival order */
  calls: string[];
}

/**
 * Start an in-process JSON-RPC node on a random loopback port.
 * Heights in `missing` answer like a node that has no such block.
 */
export async function startFakeNode(options: {
  tip: number;
  missing?: number[];
}): Promise<FakeNode> {
  const { tip, missing = [] } = options;
  const calls: string[] = [];
  const server = Fastify();

  server.post<{ Body: RpcBody }>("/", async (request, reply) => {
    if (request.headers.authorization !== EXPECTED_AUTH) {
      return reply.status(401).type("text/plain").send("Unauthorized");
    }

    const { id, method, params } = request.body;
    calls.push(method);

    const notFound = (message: string) =>
      reply.status(500).send({ result: null, error: { code: -8, message }, id });

    switch (method) {
      case "getblockcount":
        return { result: tip, error: null, id };
      case "getblockhash": {
        const height = Number(params[0]);
        if (height > tip || missing.includes(height)) {
          return notFound("Block height out of range");
        }
        return { result: hashFor(height), error: null, id };
      }
      case "getblock":
        return { result: blockAt(heightOf(String(params[0]))), error: null, id };
      case "getrawtransaction":
        return {
          result: { txid: params[0], verbose: params[1], vout: [{ value: 6.25, n: 0 }] },
          error: null,
          id,
        };
      default:
        return reply
          .status(404)
          .send({ result: null, error: { code: -32601, message: "Method not found" }, id });
    }
  });

  await server.listen({ host: "127.0.0.1", port: 0 });
  const address = server.addresses()[0];

  return { server, url: `http://127.0.0.1:${address.port}/`, calls };
}

export function gatewayConfig(url: string, pass: string = NODE_PASS): Config {
  return parseConfig(
    {
      rpc: { url, user: NODE_USER, pass },
      server: { host: "127.0.0.1", port: 0 },
      logging: { level: "error", requests: false },
    },
    "test"
  );
}
