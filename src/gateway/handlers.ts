import { ValidationError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { RpcClient } from "../rpc/client.js";
import type { JsonValue } from "../rpc/types.js";
import { parseBlockHash, parseTxid } from "./identifiers.js";
import { DEFAULT_WINDOW_SIZE, fetchLatestBlocks } from "./latest.js";

export const SKIPPED_HEADER = "x-skipped-blocks";

export type GatewayResponse =
  | { status: 200; body: JsonValue; headers?: Record<string, string> }
  | { status: 400 | 500; body: string };

interface HandlerOptions {
  client: Pick<RpcClient, "call">;
  logger: Logger;
  windowSize?: number;
}

interface ResourceLookup {
  method: string;
  parse: (value: string) => string | ValidationError;
  extraParams: JsonValue[];
  invalidMessage: string;
  failureMessage: string;
}

const BLOCK_LOOKUP: ResourceLookup = {
  method: "getblock",
  parse: parseBlockHash,
  extraParams: [],
  invalidMessage: "Invalid block hash",
  failureMessage: "Failed to retrieve block information",
};

const TRANSACTION_LOOKUP: ResourceLookup = {
  method: "getrawtransaction",
  parse: parseTxid,
  // verbose: decoded transaction instead of hex
  extraParams: [true],
  invalidMessage: "Invalid transaction id",
  failureMessage: "Failed to retrieve transaction information",
};

export function createGatewayHandlers(options: HandlerOptions) {
  const { client, logger, windowSize = DEFAULT_WINDOW_SIZE } = options;

  async function lookup(
    resource: ResourceLookup,
    raw: string
  ): Promise<GatewayResponse> {
    const id = resource.parse(raw);
    if (id instanceof ValidationError) {
      logger.debug("Rejected identifier", { field: id.field, value: raw });
      return { status: 400, body: resource.invalidMessage };
    }

    const outcome = await client.call(resource.method, [id, ...resource.extraParams]);
    if ("error" in outcome) {
      logger.error(resource.failureMessage, {
        id,
        kind: outcome.error.kind,
        error: outcome.error,
      });
      return { status: 500, body: resource.failureMessage };
    }

    return { status: 200, body: outcome.result };
  }

  return {
    getBlock: (hash: string) => lookup(BLOCK_LOOKUP, hash),

    getTransaction: (txid: string) => lookup(TRANSACTION_LOOKUP, txid),

    async getLatestBlocks(): Promise<GatewayResponse> {
      const outcome = await fetchLatestBlocks(client, logger, windowSize);
      if ("error" in outcome) {
        logger.error("Failed to retrieve block count", {
          kind: typeof outcome.error === "string" ? outcome.error : outcome.error.kind,
        });
        return { status: 500, body: "Failed to retrieve latest blocks" };
      }

      const { blocks, skipped } = outcome.result;
      return {
        status: 200,
        body: blocks,
        headers: { [SKIPPED_HEADER]: String(skipped) },
      };
    },
  };
}

export type GatewayHandlers = ReturnType<typeof createGatewayHandlers>;
