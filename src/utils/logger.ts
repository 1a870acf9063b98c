/**
 * Process-wide structured logger.
 */

import { pino } from "pino";

const logger = pino({
  name: "session-chat",
  level: process.env.LOG_LEVEL || "info",
});

/**
 * Change the level after configuration has been resolved.
 */
export function setLogLevel(level: string): void {
  logger.level = level;
}

export default logger;
