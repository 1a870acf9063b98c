/**
 * Server-sent events over an Express response.
 */

import type { Response } from "express";

/**
 * Writes named events to a `text/event-stream` response. Writes after the
 * client has gone away are dropped.
 */
export class EventStream {
  private res: Response;

  constructor(res: Response) {
    this.res = res;
  }

  open(): void {
    this.res.status(200);
    this.res.setHeader("Content-Type", "text/event-stream; charset=utf-8");
    this.res.setHeader("Cache-Control", "no-cache, no-transform");
    this.res.setHeader("Connection", "keep-alive");
    this.res.setHeader("X-Accel-Buffering", "no");
    this.res.flushHeaders();
  }

  send(event: string, data: unknown): void {
    if (this.res.writableEnded || this.res.destroyed) {
      return;
    }
    this.res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
  }

  end(): void {
    if (!this.res.writableEnded) {
      this.res.end();
    }
  }
}
