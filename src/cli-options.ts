import { InvalidArgumentError } from "commander";

/**
 * Option parser for `--port`; commander reports the error and exits
 */
export function parsePort(value: string): number {
  const port = Number(value);
  if (value.trim() === "" || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError("Port must be an integer between 0 and 65535.");
  }
  return port;
}
