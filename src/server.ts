import Fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import chalk from "chalk";
import type { Config } from "./config.js";
import {
  createGatewayHandlers,
  SKIPPED_HEADER,
  type GatewayResponse,
} from "./gateway/handlers.js";
import { createLogger, type Logger } from "./logger.js";
import { RpcClient } from "./rpc/client.js";

// Long enough that any single path segment reaches the identifier check
const MAX_PARAM_LENGTH = 2048;

interface ServerOptions {
  logger?: Logger;
  /** Node client; built from `config.rpc` when omitted */
  client?: Pick<RpcClient, "call">;
}

function send(reply: FastifyReply, response: GatewayResponse) {
  if (response.status === 200) {
    if (response.headers) {
      reply.headers(response.headers);
    }
    // Serialize ourselves so a bare string result still goes out as JSON
    return reply
      .status(200)
      .type("application/json; charset=utf-8")
      .send(JSON.stringify(response.body));
  }

  return reply
    .status(response.status)
    .type("text/plain; charset=utf-8")
    .send(response.body);
}

/**
 * Build the HTTP app without binding a socket
 */
export function buildServer(config: Config, options: ServerOptions = {}): FastifyInstance {
  const logger = options.logger ?? createLogger({ level: config.logging.level });
  const client = options.client ?? new RpcClient(config.rpc, logger);
  const handlers = createGatewayHandlers({
    client,
    logger,
    windowSize: config.latestBlocks.windowSize,
  });

  const server = Fastify({ maxParamLength: MAX_PARAM_LENGTH });

  // Enable CORS for browser requests
  server.addHook("onRequest", async (request, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Methods", "GET, OPTIONS");
    reply.header("Access-Control-Allow-Headers", "Content-Type");
    reply.header("Access-Control-Expose-Headers", SKIPPED_HEADER);

    if (config.logging.requests) {
      logger.info(chalk.yellow(`← ${request.method} ${request.url}`));
    }
  });

  if (config.logging.requests) {
    server.addHook("onResponse", async (_request, reply) => {
      const status = reply.statusCode;
      const line = `→ ${status}`;
      logger.info(status < 400 ? chalk.green(line) : chalk.red(line), {
        ms: Math.round(reply.elapsedTime),
      });
    });
  }

  // Handle preflight OPTIONS requests
  server.options("*", async (_request, reply) => {
    return reply.status(204).send();
  });

  server.get<{ Params: { hash: string } }>("/block/:hash", async (request, reply) => {
    return send(reply, await handlers.getBlock(request.params.hash));
  });

  server.get<{ Params: { txid: string } }>("/tx/:txid", async (request, reply) => {
    return send(reply, await handlers.getTransaction(request.params.txid));
  });

  server.get("/latest_blocks", async (_request, reply) => {
    return send(reply, await handlers.getLatestBlocks());
  });

  return server;
}

/**
 * Build the app, bind it to `config.server` and install shutdown handlers
 */
export async function startServer(config: Config, options: ServerOptions = {}) {
  const logger = options.logger ?? createLogger({ level: config.logging.level });
  const server = buildServer(config, { ...options, logger });

  logger.info("Starting block gateway");
  await server.listen({ host: config.server.host, port: config.server.port });

  const address = server.addresses()[0];
  console.log(
    chalk.green(`\nblock-gateway running on http://${address.address}:${address.port}`)
  );
  console.log(chalk.dim(`Node RPC: ${config.rpc.url}`));
  console.log(chalk.dim(`Latest blocks window: ${config.latestBlocks.windowSize}`));
  console.log(chalk.dim("Waiting for requests...\n"));

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("Failed to close server", { error: err });
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  return { server };
}
