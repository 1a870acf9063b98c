/**
 * JSON and streaming API for the browser page.
 */

import { Router } from "express";
import type { Request, Response } from "express";
import { z } from "zod";
import type { ErrorCategory } from "../../core/errors.js";
import type { ResolvedSession } from "../../core/types/session.js";
import type { ChatService } from "../../application/chat-service.js";
import { SESSION_PARAM, resolveSession } from "../../application/session-resolver.js";
import { invalidInputError, toChatError } from "../../application/error-humanizer.js";
import { EventStream } from "./event-stream.js";

/** HTTP status per error category. */
export const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  auth: 401,
  permission: 403,
  rate_limit: 429,
  connection: 502,
  timeout: 504,
  config: 500,
  invalid_input: 400,
  unknown: 500,
};

const ChatRequestSchema = z.object({
  content: z.string().trim().min(1).max(32_000),
});

type ChatRequest = z.infer<typeof ChatRequestSchema>;

function sessionFrom(req: Request): ResolvedSession {
  return resolveSession(req.query[SESSION_PARAM]);
}

/**
 * Respond with the humanized form of a failure.
 */
export function sendError(res: Response, error: unknown): void {
  const chatError = toChatError(error);
  res.status(STATUS_BY_CATEGORY[chatError.category]).json({ error: chatError.toJSON() });
}

function parseChatRequest(req: Request, res: Response): ChatRequest | null {
  const result = ChatRequestSchema.safeParse(req.body);
  if (!result.success) {
    sendError(res, invalidInputError());
    return null;
  }
  return result.data;
}

/**
 * Create the API router.
 */
export function createApiRouter(chat: ChatService): Router {
  const router = Router();

  router.get("/session", (req, res) => {
    res.json(sessionFrom(req));
  });

  router.get("/status", async (_req, res) => {
    res.json(await chat.getStatus());
  });

  router.get("/history", async (req, res) => {
    const { sid } = sessionFrom(req);
    const messages = await chat.getHistory(sid);
    res.json({ sid, messages, count: messages.length });
  });

  router.delete("/history", async (req, res) => {
    const { sid } = sessionFrom(req);
    await chat.clearHistory(sid);
    res.sendStatus(204);
  });

  router.post("/chat", async (req, res) => {
    const body = parseChatRequest(req, res);
    if (!body) return;

    const { sid } = sessionFrom(req);
    try {
      const message = await chat.sendMessage(sid, body.content);
      res.json({ sid, message });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post("/chat/stream", async (req, res) => {
    const body = parseChatRequest(req, res);
    if (!body) return;

    const { sid } = sessionFrom(req);
    const controller = new AbortController();
    // A client that goes away counts as a stop request
    res.on("close", () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    const events = new EventStream(res);
    events.open();
    events.send("session", { sid });

    try {
      const result = await chat.streamMessage(sid, body.content, {
        signal: controller.signal,
        onChunk: (text) => events.send("chunk", { text }),
      });
      events.send("done", { sid, ...result });
    } catch (error) {
      events.send("error", toChatError(error).toJSON());
    } finally {
      events.end();
    }
  });

  router.post("/chat/stop", (req, res) => {
    const { sid } = sessionFrom(req);
    res.json({ sid, stopped: chat.stop(sid) });
  });

  return router;
}
