/**
 * Configuration loading with layered sources.
 *
 * Precedence, later wins: schema defaults, JSON config file, `.env` file,
 * process environment, explicit overrides (CLI flags).
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { parse as parseDotenv } from "dotenv";
import { ZodError } from "zod";
import type { Config } from "../../core/types/config.js";
import { ConfigValidationError } from "../../core/errors.js";
import { parseConfig } from "./schema.js";

export type RawConfig = Record<string, unknown>;

export interface LoadConfigOptions {
  /** Explicit config file path, e.g. from --config */
  configPath?: string;
  /** Environment to read, defaults to process.env */
  env?: Record<string, string | undefined>;
  /** Directory holding the .env file */
  cwd?: string;
  /** Highest-precedence values */
  overrides?: RawConfig;
}

/** Environment variable to config path bindings. */
const ENV_BINDINGS: ReadonlyArray<{ variable: string; path: readonly string[] }> = [
  { variable: "APP_ENV", path: ["env"] },
  { variable: "LOG_LEVEL", path: ["logLevel"] },
  { variable: "OPENAI_API_KEY", path: ["openai", "apiKey"] },
  { variable: "OPENAI_MODEL", path: ["openai", "model"] },
  { variable: "OPENAI_BASE_URL", path: ["openai", "baseUrl"] },
  { variable: "OPENAI_TEMPERATURE", path: ["openai", "temperature"] },
  { variable: "OPENAI_MAX_TOKENS", path: ["openai", "maxTokens"] },
  { variable: "REDIS_URL", path: ["history", "redisUrl"] },
  { variable: "HISTORY_MAX_TURNS", path: ["history", "maxTurns"] },
  { variable: "HISTORY_TTL_SECONDS", path: ["history", "ttlSeconds"] },
  { variable: "HOST", path: ["server", "host"] },
  { variable: "PORT", path: ["server", "port"] },
];

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setPath(target: RawConfig, path: readonly string[], value: unknown): void {
  let node = target;
  for (const key of path.slice(0, -1)) {
    const child = node[key];
    if (isRecord(child)) {
      node = child;
    } else {
      const created: RawConfig = {};
      node[key] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}

/**
 * Get the data directory for user-level settings.
 */
export function getDataDir(): string {
  return join(homedir(), ".session-chat");
}

/**
 * Get the config file path.
 */
export function getConfigPath(
  explicit?: string,
  env: Record<string, string | undefined> = process.env,
): string {
  return explicit || env.CHAT_CONFIG || join(getDataDir(), "config.json");
}

/**
 * Read a JSON config file. A missing file yields no settings.
 */
export function readConfigFile(path: string): RawConfig {
  if (!existsSync(path)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch {
    throw new ConfigValidationError(`Config file ${path} is not valid JSON`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigValidationError(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Read KEY=value pairs from a .env file. A missing file yields none.
 */
export function readDotEnv(path: string): Record<string, string> {
  if (!existsSync(path)) {
    return {};
  }
  return parseDotenv(readFileSync(path, "utf-8"));
}

/**
 * Copy recognised environment variables onto raw settings. Blank values are ignored.
 */
export function applyEnvOverrides(
  raw: RawConfig,
  env: Record<string, string | undefined>,
): RawConfig {
  for (const { variable, path } of ENV_BINDINGS) {
    const value = env[variable]?.trim();
    if (value) {
      setPath(raw, path, value);
    }
  }
  return raw;
}

/**
 * Deep-merge plain objects from `source` into `target`, skipping undefined values.
 */
export function mergeConfig(target: RawConfig, source: RawConfig): RawConfig {
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;

    const existing = target[key];
    if (isRecord(value) && isRecord(existing)) {
      mergeConfig(existing, value);
    } else if (isRecord(value)) {
      target[key] = mergeConfig({}, value);
    } else {
      target[key] = value;
    }
  }
  return target;
}

function formatIssues(error: ZodError): string {
  const details = error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  return `Invalid configuration: ${details}`;
}

/**
 * Resolve configuration from every source.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const raw = readConfigFile(getConfigPath(options.configPath, env));
  applyEnvOverrides(raw, readDotEnv(join(cwd, ".env")));
  applyEnvOverrides(raw, env);
  if (options.overrides) {
    mergeConfig(raw, options.overrides);
  }

  try {
    return parseConfig(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigValidationError(formatIssues(error));
    }
    throw error;
  }
}
