/**
 * Base class for all gateway errors
 */
export abstract class GatewayError extends Error {}

export type RpcErrorKind = "connection" | "http_status" | "parse" | "rpc_logic";

/**
 * Failure of a call to the node. Never crosses the HTTP boundary.
 */
export abstract class RpcError extends GatewayError {
  abstract readonly kind: RpcErrorKind;
}

/**
 * The node could not be reached (refused, DNS, TLS, reset)
 */
export class ConnectionError extends RpcError {
  readonly kind = "connection";

  constructor(detail: string) {
    super(`RPC connection error: ${detail}`);
    this.name = "ConnectionError";
  }
}

/**
 * The node answered with a non-success HTTP status
 */
export class HttpStatusError extends RpcError {
  readonly kind = "http_status";

  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`RPC server error. Status: ${status}`);
    this.name = "HttpStatusError";
  }
}

/**
 * The response body is not a JSON-RPC outcome
 */
export class ParseError extends RpcError {
  readonly kind = "parse";

  constructor(
    detail: string,
    readonly rawBody: string
  ) {
    super(`Failed to parse RPC response: ${detail}`);
    this.name = "ParseError";
  }
}

/**
 * The node processed the call but returned no result
 */
export class RpcLogicError extends RpcError {
  readonly kind = "rpc_logic";

  constructor(
    message: string,
    readonly rpcError?: unknown
  ) {
    super(message);
    this.name = "RpcLogicError";
  }
}

/**
 * Caller-supplied identifier failed the syntax check
 */
export class ValidationError extends GatewayError {
  constructor(
    readonly field: string,
    readonly value: string
  ) {
    super(`Invalid ${field}: ${value}`);
    this.name = "ValidationError";
  }
}

/**
 * Configuration file missing, unreadable or invalid. Fatal at startup.
 */
export class ConfigError extends GatewayError {
  constructor(
    message: string,
    readonly path: string | null
  ) {
    super(path ? `${message} (${path})` : message);
    this.name = "ConfigError";
  }
}
