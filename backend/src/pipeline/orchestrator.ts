import { setTimeout as delay } from "node:timers/promises";
import { v4 as uuidv4 } from "uuid";
import {
  JobNotFoundError,
  StaleTransitionError,
  TimeoutError,
  ValidationError,
  classifyFailure,
  suggestedActionsFor
} from "../errors";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import type { ProviderResult, TranscriptionProviderAdapter } from "../provider/provider";
import type { JobStore } from "../store/job-store";
import { normalizeProviderResult } from "../transcript/normalize";
import { toStatusView } from "../types";
import type { Job, Transcript } from "../types";
import { createRetryPolicy } from "./retry-policy";
import type { RetryPolicy } from "./retry-policy";
import type { StatusBroadcaster } from "./status-broadcaster";

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface OrchestratorOptions {
  store: JobStore;
  adapter: TranscriptionProviderAdapter;
  broadcaster: StatusBroadcaster;
  retryPolicy?: RetryPolicy;
  concurrency?: number;
  jobTimeoutMs?: number;
  progressMinIntervalMs?: number;
  defaultProcessingEstimateSeconds?: number;
  retention?: { completedMs: number; failedMs: number };
  language?: string;
  diarization?: boolean;
  sleep?: SleepFn;
  now?: () => Date;
  logger?: Logger;
}

interface WorkerSlot {
  id: string;
  jobId?: string;
}

type AttemptOutcome =
  | { type: "success"; result: ProviderResult }
  | { type: "failure"; error: unknown }
  | { type: "abandoned" };

// Lease outlives the watchdog so the worker, not the sweeper, records the timeout.
const LEASE_GRACE_MS = 60_000;

const PROGRESS_STARTING = 5;
const PROGRESS_PROVIDER_FLOOR = 10;
const PROGRESS_PROVIDER_SPAN = 80;
const PROGRESS_FINALIZING = 95;

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Fixed pool of workers over a FIFO queue. Each worker owns one job at a time,
 * claimed through a CAS `uploaded -> processing` with a fresh owner token, so
 * a late result from an abandoned or cancelled run can never land.
 */
export class ProcessingOrchestrator {
  private readonly store: JobStore;
  private readonly adapter: TranscriptionProviderAdapter;
  private readonly broadcaster: StatusBroadcaster;
  private readonly retryPolicy: RetryPolicy;
  private readonly jobTimeoutMs: number;
  private readonly progressMinIntervalMs: number;
  private readonly retention: { completedMs: number; failedMs: number };
  private readonly language?: string;
  private readonly diarization: boolean;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;
  private readonly logger: Logger;

  private readonly queue: string[] = [];
  private readonly workers: WorkerSlot[];
  private readonly inFlight = new Set<Promise<void>>();
  private readonly bookkeeping = new Set<Promise<void>>();
  private readonly lastProgressAt = new Map<string, number>();
  private readonly progressHighWater = new Map<string, number>();
  private running = false;

  private completedCount = 0;
  private completedSeconds = 0;
  private readonly defaultEstimateSeconds: number;

  constructor(options: OrchestratorOptions) {
    this.store = options.store;
    this.adapter = options.adapter;
    this.broadcaster = options.broadcaster;
    this.retryPolicy = options.retryPolicy ?? createRetryPolicy();
    this.jobTimeoutMs = options.jobTimeoutMs ?? 60 * 60 * 1000;
    this.progressMinIntervalMs = options.progressMinIntervalMs ?? 2000;
    this.defaultEstimateSeconds = options.defaultProcessingEstimateSeconds ?? 300;
    this.retention = options.retention ?? { completedMs: 7 * 24 * 3_600_000, failedMs: 24 * 3_600_000 };
    this.language = options.language;
    this.diarization = options.diarization ?? true;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;

    const concurrency = options.concurrency ?? 5;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    this.workers = Array.from({ length: concurrency }, (_, index) => ({ id: `worker-${index + 1}` }));
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.logger.info(`Started with ${this.workers.length} workers`);
    this.dispatch();
  }

  /** Stops dispatching new jobs and waits for the ones in flight. */
  async stop(): Promise<void> {
    this.running = false;
    await this.whenIdle();
    this.logger.info("Stopped");
  }

  /** Resolves when no job is being processed and all status bookkeeping has settled. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0 || this.bookkeeping.size > 0) {
      await Promise.allSettled([...this.inFlight, ...this.bookkeeping]);
    }
  }

  queueDepth(): number {
    return this.queue.length;
  }

  activeJobs(): string[] {
    return this.workers.flatMap((worker) => (worker.jobId ? [worker.jobId] : []));
  }

  async enqueue(jobId: string): Promise<void> {
    const job = await this.store.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    if (job.status !== "uploaded") {
      throw new ValidationError(`Job ${jobId} is ${job.status} and cannot be queued.`, "not_queueable");
    }
    if (this.queue.includes(jobId) || this.activeJobs().includes(jobId)) return;

    this.queue.push(jobId);
    this.logger.info(`Job ${jobId} queued (depth ${this.queue.length})`);
    this.dispatch();
    this.track(this.refreshQueuePositions());
  }

  /** CAS `{uploaded, processing} -> cancelled`. Returns false when the job already moved on. */
  async cancel(jobId: string): Promise<boolean> {
    const now = this.now();
    let job: Job;
    try {
      job = await this.store.transition(jobId, {
        from: ["uploaded", "processing"],
        to: "cancelled",
        processingPhase: "Cancelled",
        expiresAt: new Date(now.getTime() + this.retention.failedMs),
        now
      });
    } catch (error) {
      if (error instanceof StaleTransitionError) {
        this.logger.debug(`Cancel of job ${jobId} ignored: ${error.message}`);
        return false;
      }
      throw error;
    }

    const index = this.queue.indexOf(jobId);
    if (index >= 0) {
      this.queue.splice(index, 1);
      this.track(this.refreshQueuePositions());
    }
    this.logger.info(`Job ${jobId} cancelled`);
    this.publishStatus(job);
    return true;
  }

  private dispatch(): void {
    if (!this.running) return;
    let dequeued = false;

    for (const worker of this.workers) {
      if (worker.jobId !== undefined) continue;
      const jobId = this.queue.shift();
      if (jobId === undefined) break;
      dequeued = true;
      worker.jobId = jobId;

      const task: Promise<void> = this.runJob(worker, jobId)
        .catch((error: unknown) => {
          this.logger.error(`Worker ${worker.id} crashed on job ${jobId}`, error);
        })
        .finally(() => {
          worker.jobId = undefined;
          this.inFlight.delete(task);
          this.dispatch();
        });
      this.inFlight.add(task);
    }

    if (dequeued) this.track(this.refreshQueuePositions());
  }

  private async runJob(worker: WorkerSlot, jobId: string): Promise<void> {
    const owner = `${worker.id}:${uuidv4()}`;
    let job: Job;
    try {
      job = await this.store.transition(jobId, {
        from: "uploaded",
        to: "processing",
        owner,
        leaseMs: this.jobTimeoutMs + LEASE_GRACE_MS,
        processingPhase: "Starting",
        now: this.now()
      });
    } catch (error) {
      if (error instanceof StaleTransitionError || error instanceof JobNotFoundError) {
        this.logger.debug(`Worker ${worker.id} skipped job ${jobId}: ${error.message}`);
        return;
      }
      throw error;
    }

    this.logger.info(`Worker ${worker.id} processing job ${jobId}`);
    this.publishStatus(job);
    await this.reportProgress(jobId, owner, PROGRESS_STARTING, "Starting");

    const controller = new AbortController();
    const timeoutError = new TimeoutError(`Processing exceeded ${Math.round(this.jobTimeoutMs / 1000)}s.`);
    const timer = setTimeout(() => controller.abort(timeoutError), this.jobTimeoutMs);
    const watchdog = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => reject(timeoutError), { once: true });
    });
    // The watchdog is only observed through Promise.race.
    watchdog.catch(() => undefined);

    try {
      const outcome = await this.attemptWithRetry(job, owner, controller.signal, watchdog);
      if (outcome.type === "abandoned") {
        this.logger.info(`Job ${jobId} no longer owned by ${worker.id}; result discarded`);
      } else if (outcome.type === "success") {
        await this.complete(job, owner, outcome.result);
      } else {
        await this.fail(jobId, owner, outcome.error);
      }
    } finally {
      clearTimeout(timer);
      this.lastProgressAt.delete(jobId);
      this.progressHighWater.delete(jobId);
    }
  }

  private async attemptWithRetry(
    job: Job,
    owner: string,
    signal: AbortSignal,
    watchdog: Promise<never>
  ): Promise<AttemptOutcome> {
    const { maxAttempts } = this.retryPolicy;
    let lastError: unknown = new Error("No attempt was made.");

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      // Cancellation checkpoint.
      if (!(await this.stillOwned(job.id, owner))) return { type: "abandoned" };
      try {
        await this.store.updateProgress(job.id, { expected: "processing", owner, patch: { attempts: attempt } });
      } catch (error) {
        if (error instanceof StaleTransitionError) return { type: "abandoned" };
        throw error;
      }

      try {
        const call = this.adapter.transcribe(job.audioRef, {
          jobId: job.id,
          language: this.language,
          diarization: this.diarization,
          signal,
          onProgress: (update) => {
            const progress = PROGRESS_PROVIDER_FLOOR + Math.max(0, Math.min(1, update.fraction)) * PROGRESS_PROVIDER_SPAN;
            this.track(this.reportProgress(job.id, owner, progress, update.stage));
          }
        });
        call.catch((error: unknown) => {
          if (signal.aborted) this.logger.debug(`Abandoned provider call for job ${job.id} settled`, error);
        });
        const result = await Promise.race([call, watchdog]);
        return { type: "success", result };
      } catch (error) {
        if (signal.aborted) return { type: "failure", error: signal.reason };
        lastError = error;
        const { kind, message } = classifyFailure(error);
        if (!this.retryPolicy.isRetryable(error) || attempt >= maxAttempts) {
          this.logger.warn(`Job ${job.id} attempt ${attempt}/${maxAttempts} failed (${kind}): ${message}`);
          return { type: "failure", error };
        }

        const waitMs = this.retryPolicy.backoff(attempt);
        this.logger.info(`Job ${job.id} attempt ${attempt}/${maxAttempts} failed (${kind}); retrying in ${waitMs}ms`);
        await this.reportProgress(job.id, owner, PROGRESS_PROVIDER_FLOOR, `Retrying (attempt ${attempt + 1}/${maxAttempts})`);
        try {
          await Promise.race([this.sleep(waitMs, signal), watchdog]);
        } catch (sleepError) {
          if (signal.aborted) return { type: "failure", error: signal.reason };
          throw sleepError;
        }
      }
    }

    return { type: "failure", error: lastError };
  }

  private async complete(job: Job, owner: string, result: ProviderResult): Promise<void> {
    await this.reportProgress(job.id, owner, PROGRESS_FINALIZING, "Finalizing");

    const now = this.now();
    const startedAt = job.startedAt ?? now;
    const processingDurationSeconds = (now.getTime() - startedAt.getTime()) / 1000;

    let transcript: Transcript;
    try {
      transcript = normalizeProviderResult(result, {
        processingDurationSeconds,
        fallbackLanguage: this.language
      });
    } catch (error) {
      await this.fail(job.id, owner, error);
      return;
    }

    let completed: Job;
    try {
      completed = await this.store.transition(job.id, {
        from: "processing",
        to: "completed",
        owner,
        transcript,
        processingPhase: "Completed",
        expiresAt: new Date(now.getTime() + this.retention.completedMs),
        now
      });
    } catch (error) {
      if (error instanceof StaleTransitionError) {
        this.logger.info(`Job ${job.id} changed while finishing; result discarded`);
        return;
      }
      throw error;
    }

    this.completedCount++;
    this.completedSeconds += processingDurationSeconds;
    this.logger.info(
      `Job ${job.id} completed: ${transcript.segments.length} segments, ${transcript.speakers.length} speakers`
    );
    this.publishStatus(completed);
  }

  private async fail(jobId: string, owner: string, error: unknown): Promise<void> {
    const { kind, message } = classifyFailure(error);
    const now = this.now();
    let failed: Job;
    try {
      failed = await this.store.transition(jobId, {
        from: "processing",
        to: "failed",
        owner,
        errorKind: kind,
        errorMessage: message,
        processingPhase: "Failed",
        expiresAt: new Date(now.getTime() + this.retention.failedMs),
        now
      });
    } catch (transitionError) {
      if (transitionError instanceof StaleTransitionError) {
        this.logger.info(`Job ${jobId} changed before its failure was recorded; discarded`);
        return;
      }
      throw transitionError;
    }

    this.logger.warn(`Job ${jobId} failed (${kind}): ${message}`);
    this.publishStatus(failed);
    this.broadcaster.publish(jobId, {
      type: "processing_error",
      data: { id: jobId, errorKind: kind, errorMessage: message, suggestedActions: suggestedActionsFor(kind) }
    });
  }

  private async stillOwned(jobId: string, owner: string): Promise<boolean> {
    const job = await this.store.get(jobId);
    return job?.status === "processing" && job.lease?.owner === owner;
  }

  /** Rate limited per job; a skipped update reaches neither the store nor subscribers. */
  private async reportProgress(jobId: string, owner: string, progress: number, phase: string): Promise<void> {
    const nowMs = this.now().getTime();
    const last = this.lastProgressAt.get(jobId);
    if (last !== undefined && nowMs - last < this.progressMinIntervalMs) return;
    this.lastProgressAt.set(jobId, nowMs);

    const value = Math.max(Math.round(progress), this.progressHighWater.get(jobId) ?? 0);
    this.progressHighWater.set(jobId, value);

    try {
      const job = await this.store.updateProgress(jobId, {
        expected: "processing",
        owner,
        patch: { progress: value, processingPhase: phase }
      });
      this.publishStatus(job);
    } catch (error) {
      if (error instanceof StaleTransitionError) {
        this.logger.debug(`Progress for job ${jobId} dropped: ${error.message}`);
        return;
      }
      this.logger.warn(`Progress update for job ${jobId} failed`, error);
    }
  }

  private async refreshQueuePositions(): Promise<void> {
    const snapshot = [...this.queue];
    const averageSeconds = this.completedCount > 0 ? this.completedSeconds / this.completedCount : this.defaultEstimateSeconds;

    for (const [index, jobId] of snapshot.entries()) {
      const queuePosition = index + 1;
      try {
        const job = await this.store.updateProgress(jobId, {
          expected: "uploaded",
          patch: { queuePosition, processingPhase: "Queued" }
        });
        this.broadcaster.publish(jobId, {
          type: "queue_position_update",
          data: {
            id: jobId,
            queuePosition,
            estimatedWaitSeconds: Math.round(Math.ceil(queuePosition / this.workers.length) * averageSeconds)
          }
        });
        this.publishStatus(job);
      } catch (error) {
        if (error instanceof StaleTransitionError || error instanceof JobNotFoundError) continue;
        this.logger.warn(`Queue position update for job ${jobId} failed`, error);
      }
    }
  }

  private publishStatus(job: Job): void {
    this.broadcaster.publish(job.id, { type: "job_status_update", data: toStatusView(job) });
  }

  private track(promise: Promise<void>): void {
    const tracked = promise
      .catch((error: unknown) => {
        this.logger.warn("Background status update failed", error);
      })
      .finally(() => {
        this.bookkeeping.delete(tracked);
      });
    this.bookkeeping.add(tracked);
  }
}
