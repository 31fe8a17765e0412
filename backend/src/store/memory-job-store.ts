import { v4 as uuidv4 } from "uuid";
import { JobNotFoundError, StaleTransitionError, ValidationError } from "../errors";
import { isTerminalStatus } from "../types";
import type { Job, JobStatus, Speaker, Transcript } from "../types";
import { assertTransition } from "./lifecycle";
import type { JobFilter, JobStore, NewJob, ProgressUpdate, TransitionRequest } from "./job-store";

const MAX_SPEAKER_LABEL_LENGTH = 100;

export interface JobStoreState {
  jobs: Job[];
  transcripts: Record<string, Transcript>;
}

function cloneJob(job: Job): Job {
  return { ...job, lease: job.lease ? { ...job.lease } : undefined };
}

function asList(statuses: JobStatus | readonly JobStatus[]): readonly JobStatus[] {
  return typeof statuses === "string" ? [statuses] : statuses;
}

function clampProgress(value: number): number {
  return Math.max(0, Math.min(100, Math.round(value)));
}

/** A pending mutation: the job as it will be stored, and what happens to its transcript. */
export interface JobChange {
  job: Job;
  /** `null` drops the stored transcript; absent leaves it as is. */
  transcript?: Transcript | null;
}

/**
 * Map-backed store. Mutations run one at a time: each checks the current
 * state, builds the next version of the job, commits the resulting state and
 * only then makes it visible. A failed commit leaves the store unchanged.
 */
export class InMemoryJobStore implements JobStore {
  protected readonly jobs = new Map<string, Job>();
  protected readonly transcripts = new Map<string, Transcript>();
  private mutations: Promise<void> = Promise.resolve();

  create(input: NewJob): Promise<Job> {
    return this.exclusive(() => this.createNow(input));
  }

  private async createNow(input: NewJob): Promise<Job> {
    const id = input.id ?? uuidv4();
    if (this.jobs.has(id)) {
      throw new ValidationError(`Job ${id} already exists.`, "duplicate_job");
    }
    const job: Job = {
      id,
      status: "uploaded",
      progress: 0,
      audioRef: input.audioRef,
      originalFilename: input.originalFilename,
      createdAt: input.now ?? new Date(),
      expiresAt: input.expiresAt,
      attempts: 0
    };
    return this.apply({ job });
  }

  async get(id: string): Promise<Job | undefined> {
    const job = this.jobs.get(id);
    return job ? cloneJob(job) : undefined;
  }

  async list(filter: JobFilter = {}): Promise<Job[]> {
    const statuses = filter.status ? asList(filter.status) : undefined;
    const result: Job[] = [];
    for (const job of this.jobs.values()) {
      if (statuses && !statuses.includes(job.status)) continue;
      if (filter.expiresBefore && !(job.expiresAt < filter.expiresBefore)) continue;
      if (filter.leaseExpiredBefore && !(job.lease && job.lease.expiresAt < filter.leaseExpiredBefore)) continue;
      result.push(cloneJob(job));
    }
    return result.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  transition(id: string, request: TransitionRequest): Promise<Job> {
    return this.exclusive(() => this.transitionNow(id, request));
  }

  private async transitionNow(id: string, request: TransitionRequest): Promise<Job> {
    const job = cloneJob(this.requireJob(id));
    const change: JobChange = { job };
    const expected = asList(request.from);
    for (const from of expected) {
      assertTransition(from, request.to);
    }
    if (!expected.includes(job.status)) {
      throw new StaleTransitionError(id, expected, job.status);
    }

    const now = request.now ?? new Date();
    if (job.status === "processing" && job.lease && request.owner !== undefined) {
      const held = job.lease.owner !== request.owner && job.lease.expiresAt > now;
      if (held) {
        throw new StaleTransitionError(id, expected, job.status, `Job ${id} is owned by another worker.`);
      }
    }

    switch (request.to) {
      case "processing":
        if (!request.owner) {
          throw new ValidationError("An owner is required to start processing.", "owner_required");
        }
        job.lease = { owner: request.owner, expiresAt: new Date(now.getTime() + (request.leaseMs ?? 0)) };
        job.startedAt = now;
        job.queuePosition = undefined;
        break;
      case "completed":
        if (!request.transcript) {
          throw new ValidationError("A completed job needs a transcript.", "transcript_required");
        }
        change.transcript = structuredClone(request.transcript);
        job.progress = 100;
        break;
      case "deleted":
        change.transcript = null;
        break;
      default:
        break;
    }

    job.status = request.to;
    if (isTerminalStatus(request.to)) {
      job.completedAt = now;
      job.lease = undefined;
      job.queuePosition = undefined;
    }
    if (request.errorKind !== undefined) job.errorKind = request.errorKind;
    if (request.errorMessage !== undefined) job.errorMessage = request.errorMessage;
    if (request.expiresAt !== undefined) job.expiresAt = request.expiresAt;
    if (request.processingPhase !== undefined) job.processingPhase = request.processingPhase;

    return this.apply(change);
  }

  updateProgress(id: string, update: ProgressUpdate): Promise<Job> {
    return this.exclusive(() => this.updateProgressNow(id, update));
  }

  private async updateProgressNow(id: string, update: ProgressUpdate): Promise<Job> {
    const job = cloneJob(this.requireJob(id));
    if (job.status !== update.expected) {
      throw new StaleTransitionError(id, [update.expected], job.status);
    }
    const now = update.now ?? new Date();
    if (job.lease && update.owner !== undefined && job.lease.owner !== update.owner && job.lease.expiresAt > now) {
      throw new StaleTransitionError(id, [update.expected], job.status, `Job ${id} is owned by another worker.`);
    }

    const { patch } = update;
    if (patch.progress !== undefined) job.progress = clampProgress(patch.progress);
    if (patch.processingPhase !== undefined) job.processingPhase = patch.processingPhase;
    if (patch.queuePosition !== undefined) job.queuePosition = patch.queuePosition ?? undefined;
    if (patch.attempts !== undefined) job.attempts = patch.attempts;

    return this.apply({ job });
  }

  async getTranscript(id: string): Promise<Transcript | undefined> {
    const transcript = this.transcripts.get(id);
    return transcript ? structuredClone(transcript) : undefined;
  }

  renameSpeaker(jobId: string, speakerId: string, label: string): Promise<Speaker> {
    return this.exclusive(() => this.renameSpeakerNow(jobId, speakerId, label));
  }

  private async renameSpeakerNow(jobId: string, speakerId: string, label: string): Promise<Speaker> {
    const trimmed = label.trim();
    if (!trimmed || trimmed.length > MAX_SPEAKER_LABEL_LENGTH) {
      throw new ValidationError(`Speaker label must be 1-${MAX_SPEAKER_LABEL_LENGTH} characters.`, "invalid_label");
    }
    const job = this.requireJob(jobId);
    const stored = this.transcripts.get(jobId);
    if (job.status !== "completed" || !stored) {
      throw new ValidationError(`Job ${jobId} has no transcript.`, "transcript_unavailable");
    }
    const transcript = structuredClone(stored);
    const speaker = transcript.speakers.find((candidate) => candidate.speakerId === speakerId);
    if (!speaker) {
      throw new ValidationError(`Speaker ${speakerId} not found in job ${jobId}.`, "speaker_not_found");
    }
    speaker.label = trimmed;
    await this.apply({ job: cloneJob(job), transcript });
    return { ...speaker };
  }

  /** Whole-store state with `change` applied on top of what is currently visible. */
  protected snapshotState(change?: JobChange): JobStoreState {
    const jobs = new Map(this.jobs);
    const transcripts = new Map(this.transcripts);
    if (change) {
      jobs.set(change.job.id, change.job);
      if (change.transcript === null) transcripts.delete(change.job.id);
      else if (change.transcript) transcripts.set(change.job.id, change.transcript);
    }
    return {
      jobs: [...jobs.values()].map(cloneJob),
      transcripts: Object.fromEntries(transcripts)
    };
  }

  protected restoreState(state: JobStoreState): void {
    this.jobs.clear();
    this.transcripts.clear();
    for (const job of state.jobs) this.jobs.set(job.id, cloneJob(job));
    for (const [id, transcript] of Object.entries(state.transcripts)) this.transcripts.set(id, transcript);
  }

  /** Receives the state a mutation is about to publish; durable subclasses persist it here. */
  protected async commit(_state: JobStoreState): Promise<void> {}

  /** Resolves once every mutation issued so far has settled. */
  protected settled(): Promise<void> {
    return this.mutations;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.mutations.then(task);
    this.mutations = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async apply(change: JobChange): Promise<Job> {
    await this.commit(this.snapshotState(change));
    const { job } = change;
    this.jobs.set(job.id, job);
    if (change.transcript === null) this.transcripts.delete(job.id);
    else if (change.transcript) this.transcripts.set(job.id, change.transcript);
    return cloneJob(job);
  }

  private requireJob(id: string): Job {
    const job = this.jobs.get(id);
    if (!job) throw new JobNotFoundError(id);
    return job;
  }
}
