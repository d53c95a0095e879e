import { randomUUID } from "node:crypto";
import {
  ConnectionError,
  HttpStatusError,
  ParseError,
  RpcLogicError,
  type RpcError,
} from "../errors.js";
import type { Logger } from "../logger.js";
import type {
  CallResult,
  JsonValue,
  RpcEndpoint,
  RpcEnvelope,
  RpcOutcome,
} from "./types.js";

export const UNREADABLE_BODY = "Unable to read error response";

function isJsonObject(value: unknown): value is { [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPresent(value: JsonValue | undefined): value is JsonValue {
  return value !== undefined && value !== null;
}

function errorDetail(err: unknown): string {
  if (err instanceof Error) {
    // fetch wraps the socket error (ECONNREFUSED, ENOTFOUND) in `cause`
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : "";
    return `${err.message}${cause}`;
  }
  return "Unknown error";
}

/**
 * Message for a call that produced no result
 */
export function rpcErrorMessage(error: JsonValue | undefined): string {
  if (!isPresent(error)) return "Unknown error";
  if (isJsonObject(error) && typeof error.message === "string") {
    return error.message;
  }
  return JSON.stringify(error);
}

/**
 * Parse a response body into an outcome, or explain why it is not one
 */
export function parseOutcome(body: string): RpcOutcome | string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    return err instanceof Error ? err.message : "invalid JSON";
  }

  if (!isJsonObject(parsed)) {
    return "response is not a JSON object";
  }

  return { result: parsed.result, error: parsed.error, id: parsed.id };
}

/**
 * JSON-RPC client for the node. Every call is a single attempt; failures are
 * returned, never thrown.
 */
export class RpcClient {
  private readonly authorization: string;

  constructor(
    private readonly endpoint: RpcEndpoint,
    private readonly logger: Logger
  ) {
    this.authorization =
      "Basic " +
      Buffer.from(`${endpoint.user}:${endpoint.pass}`).toString("base64");
  }

  async call(method: string, params: JsonValue[] = []): Promise<CallResult> {
    const request: RpcEnvelope = {
      jsonrpc: "2.0",
      id: randomUUID(),
      method,
      params,
    };

    this.logger.info("Making RPC call", { method, params });

    let response: Response;
    try {
      response = await fetch(this.endpoint.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: this.authorization,
        },
        body: JSON.stringify(request),
      });
    } catch (err) {
      return this.fail(method, new ConnectionError(errorDetail(err)));
    }

    this.logger.debug("RPC response status", { method, status: response.status });

    if (!response.ok) {
      const body = await response.text().catch(() => UNREADABLE_BODY);
      this.logger.warn("RPC server returned non-OK status", {
        method,
        status: response.status,
        body,
      });
      return this.fail(method, new HttpStatusError(response.status, body));
    }

    let body: string;
    try {
      body = await response.text();
    } catch (err) {
      return this.fail(
        method,
        new ConnectionError(`Failed to read RPC response: ${errorDetail(err)}`)
      );
    }

    this.logger.debug("Raw RPC response", { method, body });

    const outcome = parseOutcome(body);
    if (typeof outcome === "string") {
      return this.fail(method, new ParseError(outcome, body));
    }

    if (isPresent(outcome.id) && outcome.id !== request.id) {
      return this.fail(
        method,
        new ParseError(`response id ${JSON.stringify(outcome.id)} does not match request`, body)
      );
    }

    if (isPresent(outcome.result)) {
      this.logger.info("RPC call successful", { method });
      return { result: outcome.result };
    }

    return this.fail(
      method,
      new RpcLogicError(rpcErrorMessage(outcome.error), outcome.error)
    );
  }

  /**
   * Get the node URL (for logging)
   */
  get url(): string {
    return this.endpoint.url;
  }

  private fail(method: string, error: RpcError): { error: RpcError } {
    const fields: Record<string, unknown> = { method, kind: error.kind, error };
    if (error instanceof HttpStatusError) fields.body = error.body;
    if (error instanceof ParseError) fields.raw = error.rawBody;
    this.logger.error("RPC call failed", fields);
    return { error };
  }
}
