import type { RpcError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { RpcClient } from "../rpc/client.js";
import type { CallResult, JsonValue } from "../rpc/types.js";

export const DEFAULT_WINDOW_SIZE = 10;

export interface LatestBlocks {
  /** Block details, tip first */
  blocks: JsonValue[];
  /** Heights that were attempted but produced no entry */
  skipped: number;
}

export type LatestBlocksResult =
  | { result: LatestBlocks }
  | { error: RpcError | "invalid_block_count" };

type BlockSource = Pick<RpcClient, "call">;

function isBlockCount(value: JsonValue): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Fetch up to `windowSize` blocks ending at the chain tip.
 *
 * Runs getblockcount, then getblockhash + getblock per height, one call at a
 * time. A failed height is skipped; only a failed block count fails the whole
 * request.
 */
export async function fetchLatestBlocks(
  client: BlockSource,
  logger: Logger,
  windowSize: number = DEFAULT_WINDOW_SIZE
): Promise<LatestBlocksResult> {
  const count: CallResult = await client.call("getblockcount", []);
  if ("error" in count) {
    return count;
  }
  if (!isBlockCount(count.result)) {
    logger.error("Unexpected block count", { result: count.result });
    return { error: "invalid_block_count" };
  }
  const tip = count.result;

  const blocks: JsonValue[] = [];
  let skipped = 0;

  for (let i = 0; i < windowSize; i++) {
    const height = tip - i;
    if (height < 0) break;

    const hash = await client.call("getblockhash", [height]);
    if ("error" in hash) {
      skipped++;
      logger.warn("Skipping block", { height, stage: "getblockhash", kind: hash.error.kind });
      continue;
    }

    const block = await client.call("getblock", [hash.result]);
    if ("error" in block) {
      skipped++;
      logger.warn("Skipping block", { height, stage: "getblock", kind: block.error.kind });
      continue;
    }

    blocks.push(block.result);
  }

  return { result: { blocks, skipped } };
}
