#!/usr/bin/env node
/**
 * session-chat - browser chat front end for a hosted language model.
 */

import { createProgram } from "./cli/commands.js";
import logger from "./utils/logger.js";

const program = createProgram();
program.parseAsync().catch((error: unknown) => {
  logger.debug({ error }, "Command failed");
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
