import { JobNotFoundError } from "../errors";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import type { JobStore } from "../store/job-store";
import { toStatusView } from "../types";
import type { JobStatusView, StatusEvent } from "../types";

/** A push transport for one client (SSE response, socket, test double). */
export interface SubscriberChannel {
  readonly id: string;
  send(event: StatusEvent): void;
}

/**
 * Fan-out of job events to subscribed channels. Holds no durable state: after
 * a restart, or whenever a client reconnects, the client calls `snapshot`.
 */
export class StatusBroadcaster {
  private readonly subscribers = new Map<string, Set<SubscriberChannel>>();
  private readonly store: JobStore;
  private readonly logger: Logger;

  constructor(store: JobStore, logger: Logger = silentLogger) {
    this.store = store;
    this.logger = logger;
  }

  subscribe(jobId: string, channel: SubscriberChannel): void {
    let channels = this.subscribers.get(jobId);
    if (!channels) {
      channels = new Set();
      this.subscribers.set(jobId, channels);
    }
    channels.add(channel);
    this.logger.debug(`Channel ${channel.id} subscribed to job ${jobId}`);
  }

  unsubscribe(jobId: string, channel: SubscriberChannel): boolean {
    const channels = this.subscribers.get(jobId);
    if (!channels) return false;
    const removed = channels.delete(channel);
    if (channels.size === 0) this.subscribers.delete(jobId);
    if (removed) this.logger.debug(`Channel ${channel.id} unsubscribed from job ${jobId}`);
    return removed;
  }

  /** Delivers the event to every current subscriber and returns how many received it. */
  publish(jobId: string, event: StatusEvent): number {
    const channels = this.subscribers.get(jobId);
    if (!channels) return 0;

    let delivered = 0;
    for (const channel of [...channels]) {
      try {
        channel.send(event);
        delivered++;
      } catch (error) {
        this.logger.warn(`Dropping channel ${channel.id} for job ${jobId}`, error);
        this.unsubscribe(jobId, channel);
      }
    }
    return delivered;
  }

  async snapshot(jobId: string): Promise<JobStatusView> {
    const job = await this.store.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return toStatusView(job);
  }

  subscriberCount(jobId: string): number {
    return this.subscribers.get(jobId)?.size ?? 0;
  }
}
