/**
 * HTTP channel serving the chat page and its API.
 */

import * as http from "http";
import { join } from "path";
import { fileURLToPath } from "url";
import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import type { IChannel } from "../../core/interfaces/channel.js";
import type { ChatService } from "../../application/chat-service.js";
import { SESSION_PARAM, resolveSession } from "../../application/session-resolver.js";
import { createApiRouter, sendError } from "./routes.js";
import logger from "../../utils/logger.js";

/** Static assets shipped beside src/ and dist/. */
export const DEFAULT_PUBLIC_DIR = fileURLToPath(new URL("../../../public/", import.meta.url));

export interface WebChannelOptions {
  chat: ChatService;
  host: string;
  port: number;
  publicDir?: string;
}

function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}

/**
 * Build the Express application.
 *
 * `GET /` without a usable `sid` redirects to a URL carrying a new one, so
 * the browser keeps its session across reloads.
 */
export function createWebApp(chat: ChatService, publicDir: string = DEFAULT_PUBLIC_DIR): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "256kb" }));

  app.get("/", (req, res) => {
    const supplied = req.query[SESSION_PARAM];
    const session = resolveSession(supplied);
    if (supplied !== session.sid) {
      res.redirect(302, `/?${SESSION_PARAM}=${encodeURIComponent(session.sid)}`);
      return;
    }
    res.sendFile(join(publicDir, "index.html"));
  });

  app.use("/api", createApiRouter(chat));
  app.use(express.static(publicDir, { index: false }));

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (isBodyParseError(error)) {
      res.status(400).json({
        error: {
          category: "invalid_input",
          title: "Invalid request",
          message: "The request body is not valid JSON.",
        },
      });
      return;
    }
    logger.error({ error }, "Unhandled request error");
    sendError(res, error);
  });

  return app;
}

/**
 * Web channel running the Express app on a node HTTP server.
 */
export class WebChannel implements IChannel {
  readonly name = "web";

  private app: Express;
  private host: string;
  private port: number;
  private server: http.Server | null = null;

  constructor(options: WebChannelOptions) {
    this.app = createWebApp(options.chat, options.publicDir);
    this.host = options.host;
    this.port = options.port;
  }

  get isRunning(): boolean {
    return this.server !== null;
  }

  /**
   * Bound address; the real port when started on port 0.
   */
  get address(): { host: string; port: number } {
    const address = this.server?.address();
    if (address && typeof address === "object") {
      return { host: this.host, port: address.port };
    }
    return { host: this.host, port: this.port };
  }

  async start(): Promise<void> {
    if (this.server) return;

    const server = http.createServer(this.app);
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.port, this.host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    this.server = server;

    const { host, port } = this.address;
    logger.info({ url: `http://${host}:${port}/` }, "Web channel listening");
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      // Open event streams would otherwise keep close() waiting
      server.closeAllConnections();
    });
    logger.info("Web channel stopped");
  }
}
