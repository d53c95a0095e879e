import type { RpcError } from "../errors.js";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Node endpoint and credentials. Loaded once at startup and shared read-only.
 */
export interface RpcEndpoint {
  readonly url: string;
  readonly user: string;
  readonly pass: string;
}

export interface RpcEnvelope {
  jsonrpc: "2.0";
  id: string;
  method: string;
  params: JsonValue[];
}

/**
 * Body returned by the node. A well-behaved node fills exactly one of
 * `result` / `error`; `null` counts as absent.
 */
export interface RpcOutcome {
  result?: JsonValue;
  error?: JsonValue;
  id?: JsonValue;
}

export type CallResult<T = JsonValue> = { result: T } | { error: RpcError };
