/**
 * Web channel exports.
 */

export { WebChannel, createWebApp, DEFAULT_PUBLIC_DIR, type WebChannelOptions } from "./server.js";
export { createApiRouter, sendError, STATUS_BY_CATEGORY } from "./routes.js";
export { EventStream } from "./event-stream.js";
