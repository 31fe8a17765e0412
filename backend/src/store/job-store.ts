import type { Job, JobErrorKind, JobStatus, Speaker, Transcript } from "../types";

export interface NewJob {
  id?: string;
  audioRef: string;
  originalFilename: string;
  expiresAt: Date;
  now?: Date;
}

export interface TransitionRequest {
  /** Status (or statuses) the caller believes the job is in. */
  from: JobStatus | readonly JobStatus[];
  to: JobStatus;
  /** Processing owner token. Required to enter `processing`. */
  owner?: string;
  /** Lease length granted when entering `processing`. */
  leaseMs?: number;
  /** Required when entering `completed`. */
  transcript?: Transcript;
  errorKind?: JobErrorKind;
  errorMessage?: string;
  expiresAt?: Date;
  processingPhase?: string;
  now?: Date;
}

export interface ProgressPatch {
  progress?: number;
  processingPhase?: string;
  queuePosition?: number | null;
  attempts?: number;
}

export interface ProgressUpdate {
  expected: JobStatus;
  owner?: string;
  patch: ProgressPatch;
  now?: Date;
}

export interface JobFilter {
  status?: JobStatus | readonly JobStatus[];
  expiresBefore?: Date;
  leaseExpiredBefore?: Date;
}

/**
 * Source of truth for job state. Every status change goes through
 * `transition`, a compare-and-swap on the stored status.
 */
export interface JobStore {
  create(input: NewJob): Promise<Job>;
  get(id: string): Promise<Job | undefined>;
  list(filter?: JobFilter): Promise<Job[]>;
  transition(id: string, request: TransitionRequest): Promise<Job>;
  updateProgress(id: string, update: ProgressUpdate): Promise<Job>;
  getTranscript(id: string): Promise<Transcript | undefined>;
  renameSpeaker(jobId: string, speakerId: string, label: string): Promise<Speaker>;
}
