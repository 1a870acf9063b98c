/**
 * Configuration schema.
 */

import { z } from "zod";
import type { Config } from "../../core/types/config.js";
import { ConfigValidationError } from "../../core/errors.js";

export const OpenAIConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).default("gpt-4o-mini"),
  baseUrl: z.string().url().optional(),
  temperature: z.coerce.number().min(0).max(2).default(0.7),
  maxTokens: z.coerce.number().int().positive().optional(),
});

export const HistoryConfigSchema = z.object({
  redisUrl: z.string().min(1).optional(),
  maxTurns: z.coerce.number().int().min(1).default(20),
  /** 30 days */
  ttlSeconds: z.coerce.number().int().min(1).default(30 * 24 * 3600),
});

export const ServerConfigSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.coerce.number().int().min(0).max(65535).default(8501),
});

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const ConfigSchema = z.object({
  env: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, "Environment name may only contain letters, digits, '-' and '_'")
    .default("dev"),
  logLevel: LogLevelSchema.optional(),
  openai: OpenAIConfigSchema.default({}),
  history: HistoryConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
});

const VERBOSE_ENVIRONMENTS = new Set(["dev", "development", "local", "test"]);

/**
 * Validate raw settings and fill in defaults.
 */
export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw);
}

/**
 * Get the API key, failing when none was configured.
 */
export function getApiKey(config: Config): string {
  const apiKey = config.openai.apiKey;
  if (!apiKey) {
    throw new ConfigValidationError(
      "OpenAI API key is required. Set OPENAI_API_KEY in the environment, a .env file or the config file.",
    );
  }
  return apiKey;
}

/**
 * Get the API base URL override, if any.
 */
export function getApiBase(config: Config): string | undefined {
  return config.openai.baseUrl;
}

/**
 * Redis keys are namespaced by environment so dev and prod can share a server.
 */
export function getKeyPrefix(config: Config): string {
  return config.env;
}

/**
 * Explicit level wins; otherwise development environments log at debug.
 */
export function resolveLogLevel(config: Config): string {
  if (config.logLevel) {
    return config.logLevel;
  }
  return VERBOSE_ENVIRONMENTS.has(config.env.toLowerCase()) ? "debug" : "info";
}

/**
 * Copy of the config that is safe to print.
 */
export function redactConfig(config: Config): Config {
  return {
    ...config,
    openai: {
      ...config.openai,
      apiKey: config.openai.apiKey ? "********" : undefined,
    },
    history: {
      ...config.history,
      redisUrl: config.history.redisUrl?.replace(/\/\/([^@/]*)@/, "//****@"),
    },
  };
}
