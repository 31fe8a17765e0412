import type { Response } from "express";
import { v4 as uuidv4 } from "uuid";
import type { SubscriberChannel } from "../pipeline/status-broadcaster";
import type { StatusEvent } from "../types";

/** Server-Sent Events stream for one client. */
export class SseChannel implements SubscriberChannel {
  readonly id = uuidv4();
  private readonly res: Response;

  constructor(res: Response) {
    this.res = res;
  }

  open(): void {
    this.res.status(200);
    this.res.setHeader("Content-Type", "text/event-stream");
    this.res.setHeader("Cache-Control", "no-cache");
    this.res.setHeader("Connection", "keep-alive");
    this.res.setHeader("X-Accel-Buffering", "no");
    this.res.flushHeaders();
  }

  send(event: StatusEvent): void {
    if (this.res.writableEnded) {
      throw new Error(`SSE channel ${this.id} is closed`);
    }
    this.res.write(`event: ${event.type}\ndata: ${JSON.stringify(event.data)}\n\n`);
  }

  heartbeat(): void {
    if (!this.res.writableEnded) this.res.write(": ping\n\n");
  }

  close(): void {
    if (!this.res.writableEnded) this.res.end();
  }
}
