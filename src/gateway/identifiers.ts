import { ValidationError } from "../errors.js";

// 32-byte hashes, hex encoded
const HASH_PATTERN = /^[0-9a-fA-F]{64}$/;

function parseHash(field: string, value: string): string | ValidationError {
  if (!HASH_PATTERN.test(value)) {
    return new ValidationError(field, value);
  }
  // The node expects lowercase hex
  return value.toLowerCase();
}

export function parseBlockHash(value: string): string | ValidationError {
  return parseHash("block hash", value);
}

export function parseTxid(value: string): string | ValidationError {
  return parseHash("transaction id", value);
}
