/**
 * Command line interface.
 */

import { Command } from "commander";
import type { Config } from "../core/types/config.js";
import type { IHistoryStore } from "../core/interfaces/storage.js";
import { ChatService } from "../application/chat-service.js";
import { isValidSessionId } from "../application/session-resolver.js";
import {
  loadConfig,
  redactConfig,
  resolveLogLevel,
  getKeyPrefix,
  type RawConfig,
} from "../infrastructure/config/index.js";
import { createHistoryStore } from "../infrastructure/storage/index.js";
import { AIProvider } from "../infrastructure/llm/index.js";
import { WebChannel } from "../infrastructure/web/index.js";
import logger, { setLogLevel } from "../utils/logger.js";

export const VERSION = "1.0.0";

interface GlobalOptions {
  config?: string;
}

interface ServeOptions {
  port?: string;
  host?: string;
}

function resolveConfig(program: Command, overrides?: RawConfig): Config {
  const { config: configPath } = program.opts<GlobalOptions>();
  const config = loadConfig({ configPath, overrides });
  setLogLevel(resolveLogLevel(config));
  return config;
}

function requireSessionId(sid: string): string {
  if (!isValidSessionId(sid)) {
    throw new Error(`Invalid session id: ${sid}`);
  }
  return sid;
}

/**
 * Run a command body against the configured history store and close it afterwards.
 */
async function withHistory<T>(
  config: Config,
  body: (history: IHistoryStore) => Promise<T>,
): Promise<T> {
  const history = createHistoryStore(config);
  try {
    await history.isHealthy();
    const warning = history.takeWarning();
    if (warning) {
      console.error(`Warning: ${warning}`);
    }
    return await body(history);
  } finally {
    await history.close();
  }
}

async function serve(config: Config): Promise<void> {
  const history = createHistoryStore(config);
  const provider = new AIProvider({ config });
  const chat = new ChatService({ config, history, provider });

  await history.isHealthy();
  logger.info(
    {
      env: config.env,
      store: history.label,
      keyPrefix: getKeyPrefix(config),
      model: provider.getDefaultModel(),
    },
    "Starting session chat",
  );

  const channel = new WebChannel({
    chat,
    host: config.server.host,
    port: config.server.port,
  });
  await channel.start();

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    channel
      .stop()
      .then(() => history.close())
      .then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ error }, "Shutdown failed");
          process.exit(1);
        },
      );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

/**
 * Create the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("session-chat")
    .description("Browser chat front end for a hosted language model")
    .version(VERSION)
    .option("-c, --config <path>", "path to a JSON config file");

  program
    .command("serve")
    .description("Start the web chat server")
    .option("-p, --port <port>", "port to listen on")
    .option("-H, --host <host>", "interface to bind")
    .action(async (options: ServeOptions) => {
      const config = resolveConfig(program, {
        server: { port: options.port, host: options.host },
      });
      await serve(config);
    });

  program
    .command("status")
    .description("Show environment, model and history backend")
    .action(async () => {
      const config = resolveConfig(program);
      await withHistory(config, async (history) => {
        console.log(`Env:        ${config.env}`);
        console.log(`Model:      ${config.openai.model}`);
        console.log(`Store:      ${history.label}`);
        console.log(`Key prefix: ${getKeyPrefix(config)}`);
        console.log(`Max turns:  ${config.history.maxTurns}`);
        console.log(`TTL:        ${config.history.ttlSeconds}s`);
      });
    });

  program
    .command("config")
    .description("Print the resolved configuration")
    .action(() => {
      const config = resolveConfig(program);
      console.log(JSON.stringify(redactConfig(config), null, 2));
    });

  const history = program.command("history").description("Inspect stored conversations");

  history
    .command("show <sid>")
    .description("Print a session's messages")
    .action(async (sid: string) => {
      const sessionId = requireSessionId(sid);
      const config = resolveConfig(program);
      await withHistory(config, async (store) => {
        const messages = await store.read(sessionId);
        if (messages.length === 0) {
          console.log("No messages.");
          return;
        }
        for (const message of messages) {
          console.log(`[${message.timestamp}] ${message.role}: ${message.content}`);
        }
        const ttl = await store.ttl(sessionId);
        console.log(`\n${messages.length} message(s), expires in ${ttl ?? "?"}s`);
      });
    });

  history
    .command("clear <sid>")
    .description("Delete a session's messages")
    .action(async (sid: string) => {
      const sessionId = requireSessionId(sid);
      const config = resolveConfig(program);
      await withHistory(config, async (store) => {
        await store.clear(sessionId);
        console.log(`Cleared ${sessionId}.`);
      });
    });

  return program;
}
