import { readFile, access } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import * as yaml from "js-yaml";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import type { RpcEndpoint } from "./rpc/types.js";
import { DEFAULT_WINDOW_SIZE } from "./gateway/latest.js";

export interface ServerConfig {
  readonly host: string;
  readonly port: number;
}

/**
 * Logging configuration
 */
export interface LogConfig {
  /** Minimum level printed (default: info) */
  readonly level: LogLevel;
  /** Show incoming HTTP requests and response status (default: true) */
  readonly requests: boolean;
}

export interface LatestBlocksConfig {
  /** Number of blocks fetched back from the tip (default: 10) */
  readonly windowSize: number;
}

export interface Config {
  readonly rpc: RpcEndpoint;
  readonly server: ServerConfig;
  readonly logging: LogConfig;
  readonly latestBlocks: LatestBlocksConfig;
}

export type ConfigFormat = "yaml" | "json";

/**
 * Extensions tried for a config path given without one, in order of precedence
 */
const CONFIG_EXTENSIONS = [".yaml", ".yml", ".json"] as const;

const DEFAULT_CONFIG_FILES = [
  "gateway.config.yaml",
  "gateway.config.yml",
  "gateway.config.json",
  "config.yaml",
] as const;

const MAX_WINDOW_SIZE = 100;

/**
 * Check if a file exists
 */
async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find the config file path, checking multiple extensions
 * Returns the path if found, null otherwise
 */
export async function findConfigFile(cwd: string, configFile?: string): Promise<string | null> {
  if (configFile) {
    const configPath = isAbsolute(configFile) ? configFile : join(cwd, configFile);

    if (/\.(ya?ml|json)$/.test(configFile)) {
      return (await fileExists(configPath)) ? configPath : null;
    }

    for (const ext of CONFIG_EXTENSIONS) {
      if (await fileExists(configPath + ext)) {
        return configPath + ext;
      }
    }
    return null;
  }

  for (const name of DEFAULT_CONFIG_FILES) {
    const configPath = join(cwd, name);
    if (await fileExists(configPath)) {
      return configPath;
    }
  }
  return null;
}

/**
 * Get the format of a config file based on its extension
 */
export function getConfigFormat(configPath: string): ConfigFormat {
  return configPath.endsWith(".json") ? "json" : "yaml";
}

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(parent: Section, key: string, path: string, optional = false): Section {
  const value = parent[key];
  if (value === undefined && optional) return {};
  if (!isSection(value)) {
    throw new ConfigError(`"${key}" must be a mapping`, path);
  }
  return value;
}

function requireString(parent: Section, key: string, name: string, path: string): string {
  const value = parent[key];
  if (typeof value !== "string") {
    throw new ConfigError(`"${name}" must be a string`, path);
  }
  return value;
}

function integerInRange(
  value: unknown,
  name: string,
  min: number,
  max: number,
  path: string
): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`"${name}" must be an integer between ${min} and ${max}`, path);
  }
  return value;
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Validate raw parsed content and fill defaults. The result is frozen.
 */
export function parseConfig(raw: unknown, path: string): Config {
  if (!isSection(raw)) {
    throw new ConfigError("Config must be a mapping", path);
  }

  const rpc = section(raw, "rpc", path);
  const url = requireString(rpc, "url", "rpc.url", path);
  let protocol: string;
  try {
    protocol = new URL(url).protocol;
  } catch {
    throw new ConfigError(`"rpc.url" is not a valid URL: ${url}`, path);
  }
  if (protocol !== "http:" && protocol !== "https:") {
    throw new ConfigError(`"rpc.url" must use http or https: ${url}`, path);
  }

  const server = section(raw, "server", path);
  const logging = section(raw, "logging", path, true);
  const latest = section(raw, "latestBlocks", path, true);

  const level = logging.level ?? "info";
  if (!isLogLevel(level)) {
    throw new ConfigError(`"logging.level" must be one of ${LOG_LEVELS.join(", ")}`, path);
  }
  const requests = logging.requests ?? true;
  if (typeof requests !== "boolean") {
    throw new ConfigError(`"logging.requests" must be a boolean`, path);
  }

  return Object.freeze({
    rpc: Object.freeze({
      url,
      user: requireString(rpc, "user", "rpc.user", path),
      pass: requireString(rpc, "pass", "rpc.pass", path),
    }),
    server: Object.freeze({
      host: requireString(server, "host", "server.host", path),
      port: integerInRange(server.port, "server.port", 0, 65535, path),
    }),
    logging: Object.freeze({ level, requests }),
    latestBlocks: Object.freeze({
      windowSize: integerInRange(
        latest.windowSize ?? DEFAULT_WINDOW_SIZE,
        "latestBlocks.windowSize",
        1,
        MAX_WINDOW_SIZE,
        path
      ),
    }),
  });
}

/**
 * Load config from a specific path
 */
export async function loadConfigFromPath(configPath: string): Promise<Config> {
  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(
      `Failed to read config file: ${err instanceof Error ? err.message : "unknown error"}`,
      configPath
    );
  }

  let raw: unknown;
  try {
    raw = getConfigFormat(configPath) === "json" ? JSON.parse(content) : yaml.load(content);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse config file: ${err instanceof Error ? err.message : "unknown error"}`,
      configPath
    );
  }

  return parseConfig(raw, configPath);
}

/**
 * Load configuration from file
 * Looks for gateway.config.yaml, .yml, .json, then config.yaml unless a path is given.
 * A missing or invalid file is fatal.
 */
export async function loadConfig(cwd: string, configFile?: string): Promise<Config> {
  const configPath = await findConfigFile(cwd, configFile);

  if (!configPath) {
    throw new ConfigError(
      configFile ? `Config file not found: ${configFile}` : "No config file found",
      null
    );
  }

  return loadConfigFromPath(configPath);
}

/**
 * Replace server bind settings (CLI flags) without touching the loaded value
 */
export function withServerOverrides(
  config: Config,
  overrides: { host?: string; port?: number }
): Config {
  return Object.freeze({
    ...config,
    server: Object.freeze({
      host: overrides.host ?? config.server.host,
      port: overrides.port ?? config.server.port,
    }),
  });
}
