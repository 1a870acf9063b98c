/**
 * Config infrastructure exports.
 */

export {
  ConfigSchema,
  OpenAIConfigSchema,
  HistoryConfigSchema,
  ServerConfigSchema,
  LogLevelSchema,
  parseConfig,
  getApiKey,
  getApiBase,
  getKeyPrefix,
  resolveLogLevel,
  redactConfig,
} from "./schema.js";

export {
  loadConfig,
  getConfigPath,
  getDataDir,
  readConfigFile,
  readDotEnv,
  applyEnvOverrides,
  mergeConfig,
  type LoadConfigOptions,
  type RawConfig,
} from "./loader.js";
