import { StaleTransitionError, suggestedActionsFor } from "../errors";
import type { ArtifactStore } from "../artifacts";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import type { JobStore } from "../store/job-store";
import { TERMINAL_STATUSES, toStatusView } from "../types";
import type { StatusBroadcaster } from "./status-broadcaster";

export interface RetentionSweeperOptions {
  store: JobStore;
  artifacts: ArtifactStore;
  intervalMs: number;
  /** Retention granted to jobs failed by stuck-job recovery. */
  failedRetentionMs: number;
  broadcaster?: StatusBroadcaster;
  now?: () => Date;
  logger?: Logger;
}

export interface SweepReport {
  deleted: string[];
  recovered: string[];
}

const STUCK_JOB_MESSAGE = "Processing stopped responding and was abandoned.";

export class RetentionSweeper {
  private readonly options: RetentionSweeperOptions;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private timer?: NodeJS.Timeout;
  private current?: Promise<void>;

  constructor(options: RetentionSweeperOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /** Soft-deletes expired terminal jobs after removing their files. */
  async sweep(now: Date = this.now()): Promise<string[]> {
    const { store, artifacts } = this.options;
    const expired = await store.list({ status: TERMINAL_STATUSES, expiresBefore: now });
    const deleted: string[] = [];

    for (const job of expired) {
      try {
        await artifacts.removeAll(job);
        await store.transition(job.id, { from: job.status, to: "deleted", now });
        deleted.push(job.id);
      } catch (error) {
        if (error instanceof StaleTransitionError) {
          this.logger.debug(`Skipped job ${job.id}: ${error.message}`);
          continue;
        }
        this.logger.error(`Failed to remove expired job ${job.id}`, error);
      }
    }

    if (deleted.length > 0) this.logger.info(`Removed ${deleted.length} expired jobs`);
    return deleted;
  }

  /** Fails processing jobs whose worker lease ran out (crashed or restarted worker). */
  async recoverStuckJobs(now: Date = this.now()): Promise<string[]> {
    const { store, broadcaster, failedRetentionMs } = this.options;
    const stuck = await store.list({ status: "processing", leaseExpiredBefore: now });
    const recovered: string[] = [];

    for (const job of stuck) {
      try {
        const failed = await store.transition(job.id, {
          from: "processing",
          to: "failed",
          errorKind: "Timeout",
          errorMessage: STUCK_JOB_MESSAGE,
          processingPhase: "Failed",
          expiresAt: new Date(now.getTime() + failedRetentionMs),
          now
        });
        recovered.push(job.id);
        broadcaster?.publish(job.id, { type: "job_status_update", data: toStatusView(failed) });
        broadcaster?.publish(job.id, {
          type: "processing_error",
          data: {
            id: job.id,
            errorKind: "Timeout",
            errorMessage: STUCK_JOB_MESSAGE,
            suggestedActions: suggestedActionsFor("Timeout")
          }
        });
      } catch (error) {
        if (error instanceof StaleTransitionError) {
          this.logger.debug(`Skipped job ${job.id}: ${error.message}`);
          continue;
        }
        this.logger.error(`Failed to recover job ${job.id}`, error);
      }
    }

    if (recovered.length > 0) this.logger.warn(`Recovered ${recovered.length} stuck jobs`);
    return recovered;
  }

  async runOnce(now: Date = this.now()): Promise<SweepReport> {
    const recovered = await this.recoverStuckJobs(now);
    const deleted = await this.sweep(now);
    return { deleted, recovered };
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.options.intervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
    await this.current;
  }

  private tick(): void {
    // A slow sweep is never overlapped by the next tick.
    if (this.current) return;
    this.current = this.runOnce()
      .then(() => undefined)
      .catch((error: unknown) => {
        this.logger.error("Retention sweep failed", error);
      })
      .finally(() => {
        this.current = undefined;
      });
  }
}
