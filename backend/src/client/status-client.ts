import type { Readable } from "node:stream";
import axios from "axios";
import type { AxiosInstance } from "axios";
import { z } from "zod";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import { isTerminalStatus } from "../types";
import type { JobStatusView, ProcessingErrorNotice, QueuePositionUpdate, StatusEvent } from "../types";

const jobStatusSchema = z.enum(["uploaded", "processing", "completed", "failed", "cancelled", "deleted"]);
const errorKindSchema = z.enum(["Transient", "AuthError", "InvalidAudio", "QuotaExceeded", "Unknown", "Timeout"]);

const statusViewSchema = z.object({
  id: z.string(),
  status: jobStatusSchema,
  progress: z.number(),
  processingPhase: z.string().optional(),
  queuePosition: z.number().optional(),
  errorKind: errorKindSchema.optional(),
  errorMessage: z.string().optional()
});

const statusEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("job_status_update"), data: statusViewSchema }),
  z.object({
    type: z.literal("queue_position_update"),
    data: z.object({ id: z.string(), queuePosition: z.number(), estimatedWaitSeconds: z.number() })
  }),
  z.object({
    type: z.literal("processing_error"),
    data: z.object({
      id: z.string(),
      errorKind: errorKindSchema,
      errorMessage: z.string(),
      suggestedActions: z.array(z.string())
    })
  })
]);

export interface ParsedSse {
  events: StatusEvent[];
  /** Trailing partial block, to be prefixed to the next chunk. */
  rest: string;
}

/** Splits an SSE byte stream into status events. Comments and unknown events are skipped. */
export function parseSseChunk(buffer: string): ParsedSse {
  const blocks = buffer.replace(/\r\n/g, "\n").split("\n\n");
  const rest = blocks.pop() ?? "";
  const events: StatusEvent[] = [];

  for (const block of blocks) {
    let type = "message";
    const data: string[] = [];
    for (const line of block.split("\n")) {
      if (!line || line.startsWith(":")) continue;
      const separator = line.indexOf(":");
      const field = separator === -1 ? line : line.slice(0, separator);
      const value = separator === -1 ? "" : line.slice(separator + 1).replace(/^ /, "");
      if (field === "event") type = value;
      if (field === "data") data.push(value);
    }
    if (data.length === 0) continue;

    let payload: unknown;
    try {
      payload = JSON.parse(data.join("\n"));
    } catch {
      continue;
    }
    const parsed = statusEventSchema.safeParse({ type, data: payload });
    if (parsed.success) events.push(parsed.data);
  }

  return { events, rest };
}

export interface PushHandlers {
  onOpen(): void;
  onEvent(event: StatusEvent): void;
  /** The connection failed or dropped. Called at most once per connection. */
  onError(error: unknown): void;
}

export interface PushSubscription {
  close(): void;
}

export type PushConnector = (jobId: string, handlers: PushHandlers) => PushSubscription;

/** Push connector over the `/api/jobs/:id/events` SSE stream. */
export function createSseConnector(client: AxiosInstance, baseUrl: string): PushConnector {
  return (jobId, handlers) => {
    const controller = new AbortController();
    let closed = false;
    let buffer = "";

    const fail = (error: unknown) => {
      if (closed) return;
      closed = true;
      controller.abort();
      handlers.onError(error);
    };

    client
      .get<Readable>(`${baseUrl}/api/jobs/${encodeURIComponent(jobId)}/events`, {
        responseType: "stream",
        headers: { Accept: "text/event-stream" },
        signal: controller.signal
      })
      .then((response) => {
        if (closed) return;
        handlers.onOpen();
        const stream = response.data;
        // Decodes across chunk boundaries, so split multibyte characters survive.
        stream.setEncoding("utf8");
        stream.on("data", (chunk: string) => {
          const parsed = parseSseChunk(buffer + chunk);
          buffer = parsed.rest;
          for (const event of parsed.events) handlers.onEvent(event);
        });
        stream.on("end", () => fail(new Error("Event stream ended")));
        stream.on("error", fail);
      })
      .catch(fail);

    return {
      close: () => {
        closed = true;
        controller.abort();
      }
    };
  };
}

export interface FollowerOptions {
  baseUrl: string;
  onStatus: (view: JobStatusView) => void;
  onQueuePosition?: (update: QueuePositionUpdate) => void;
  onProcessingError?: (notice: ProcessingErrorNotice) => void;
  client?: AxiosInstance;
  connector?: PushConnector;
  reconnectDelaysMs?: readonly number[];
  pollIntervalMs?: number;
  logger?: Logger;
}

export type FollowerMode = "idle" | "push" | "reconnecting" | "polling" | "done";

export const DEFAULT_RECONNECT_DELAYS_MS = [1000, 2000, 4000, 8000, 16000] as const;

/**
 * Follows one job until it is terminal: push first, a snapshot on every
 * (re)connect, exponential reconnects, then polling for good.
 */
export class JobStatusFollower {
  private readonly options: FollowerOptions;
  private readonly client: AxiosInstance;
  private readonly connector: PushConnector;
  private readonly delays: readonly number[];
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;

  private jobId?: string;
  private subscription?: PushSubscription;
  private timer?: NodeJS.Timeout;
  private reconnectAttempts = 0;
  private currentMode: FollowerMode = "idle";
  private lastView?: JobStatusView;

  constructor(options: FollowerOptions) {
    this.options = options;
    this.client = options.client ?? axios.create();
    this.connector = options.connector ?? createSseConnector(this.client, options.baseUrl);
    this.delays = options.reconnectDelaysMs ?? DEFAULT_RECONNECT_DELAYS_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? 3000;
    this.logger = options.logger ?? silentLogger;
  }

  get mode(): FollowerMode {
    return this.currentMode;
  }

  get latest(): JobStatusView | undefined {
    return this.lastView;
  }

  follow(jobId: string): void {
    this.stop();
    this.jobId = jobId;
    this.reconnectAttempts = 0;
    this.lastView = undefined;
    this.connect();
  }

  stop(): void {
    this.subscription?.close();
    this.subscription = undefined;
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    if (this.currentMode !== "done") this.currentMode = "idle";
  }

  /** Pulls the current snapshot; used on every connect and by the polling fallback. */
  async resync(): Promise<JobStatusView | undefined> {
    const jobId = this.jobId;
    if (!jobId) return undefined;
    const response = await this.client.get<unknown>(`${this.options.baseUrl}/api/jobs/${encodeURIComponent(jobId)}`);
    const view = statusViewSchema.parse(response.data);
    if (this.jobId === jobId && this.currentMode !== "done") this.applyStatus(view);
    return view;
  }

  private connect(): void {
    const jobId = this.jobId;
    if (!jobId) return;
    this.currentMode = "push";
    const subscription = this.connector(jobId, {
      onOpen: () => {
        this.reconnectAttempts = 0;
        this.resync().catch((error: unknown) => this.logger.warn(`Snapshot for job ${jobId} failed`, error));
      },
      onEvent: (event) => this.handleEvent(event),
      onError: (error) => {
        this.logger.debug(`Push channel for job ${jobId} dropped`, error);
        this.scheduleReconnect();
      }
    });
    // A connector may fail synchronously, in which case a reconnect is already scheduled.
    if (this.currentMode === "push") {
      this.subscription = subscription;
    } else {
      subscription.close();
    }
  }

  private scheduleReconnect(): void {
    if (this.currentMode === "done" || this.currentMode === "idle") return;
    this.subscription?.close();
    this.subscription = undefined;

    if (this.reconnectAttempts >= this.delays.length) {
      this.logger.info(`Push unavailable for job ${this.jobId}; polling every ${this.pollIntervalMs}ms`);
      this.currentMode = "polling";
      this.schedulePoll(0);
      return;
    }

    const delay = this.delays[this.reconnectAttempts];
    this.reconnectAttempts++;
    this.currentMode = "reconnecting";
    this.timer = setTimeout(() => this.connect(), delay);
  }

  private schedulePoll(delay: number): void {
    this.timer = setTimeout(() => {
      this.resync()
        .catch((error: unknown) => {
          this.logger.warn(`Polling job ${this.jobId} failed`, error);
          return undefined;
        })
        .then(() => {
          if (this.currentMode === "polling") this.schedulePoll(this.pollIntervalMs);
        })
        .catch((error: unknown) => this.logger.error("Polling loop failed", error));
    }, delay);
  }

  private handleEvent(event: StatusEvent): void {
    if (this.currentMode === "done") return;
    switch (event.type) {
      case "job_status_update":
        this.applyStatus(event.data);
        break;
      case "queue_position_update":
        this.options.onQueuePosition?.(event.data);
        break;
      case "processing_error":
        this.options.onProcessingError?.(event.data);
        break;
    }
  }

  private applyStatus(view: JobStatusView): void {
    this.lastView = view;
    this.options.onStatus(view);
    if (view.status === "deleted" || isTerminalStatus(view.status)) {
      this.stop();
      this.currentMode = "done";
    }
  }
}
