/**
 * Application configuration.
 */

export interface OpenAIConfig {
  apiKey?: string;
  model: string;
  baseUrl?: string;
  temperature: number;
  maxTokens?: number;
}

export interface HistoryConfig {
  /** Redis connection string; history stays in memory when unset */
  redisUrl?: string;
  /** Maximum number of stored messages per session */
  maxTurns: number;
  ttlSeconds: number;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface Config {
  /** Environment name, also the Redis key prefix */
  env: string;
  logLevel?: string;
  openai: OpenAIConfig;
  history: HistoryConfig;
  server: ServerConfig;
}
