export { RpcClient, parseOutcome, rpcErrorMessage } from "./rpc/client.js";
export type {
  CallResult,
  JsonValue,
  RpcEndpoint,
  RpcEnvelope,
  RpcOutcome,
} from "./rpc/types.js";
export {
  createGatewayHandlers,
  SKIPPED_HEADER,
  type GatewayHandlers,
  type GatewayResponse,
} from "./gateway/handlers.js";
export {
  fetchLatestBlocks,
  DEFAULT_WINDOW_SIZE,
  type LatestBlocks,
  type LatestBlocksResult,
} from "./gateway/latest.js";
export { parseBlockHash, parseTxid } from "./gateway/identifiers.js";
export {
  loadConfig,
  loadConfigFromPath,
  parseConfig,
  findConfigFile,
  type Config,
} from "./config.js";
export { buildServer, startServer } from "./server.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./logger.js";
export * from "./errors.js";
