export type JobStatus = "uploaded" | "processing" | "completed" | "failed" | "cancelled" | "deleted";

export type TerminalStatus = "completed" | "failed" | "cancelled";

export const TERMINAL_STATUSES: readonly TerminalStatus[] = ["completed", "failed", "cancelled"];

export type ProviderErrorKind = "Transient" | "AuthError" | "InvalidAudio" | "QuotaExceeded" | "Unknown";

export type JobErrorKind = ProviderErrorKind | "Timeout";

export interface ProcessingLease {
  owner: string;
  expiresAt: Date;
}

export interface Job {
  id: string;
  status: JobStatus;
  progress: number;
  processingPhase?: string;
  audioRef: string;
  originalFilename: string;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  expiresAt: Date;
  errorKind?: JobErrorKind;
  errorMessage?: string;
  queuePosition?: number;
  attempts: number;
  lease?: ProcessingLease;
}

export interface Speaker {
  speakerId: string;
  label: string;
  totalSpeakingSeconds: number;
  segmentCount: number;
}

export interface Segment {
  speakerId: string;
  startTime: number | null;
  endTime: number | null;
  text: string;
  confidence: number;
  order: number;
}

export interface Transcript {
  rawProviderPayload: unknown;
  speakers: Speaker[];
  segments: Segment[];
  confidenceScore: number;
  languageDetected: string;
  processingDurationSeconds: number;
  warnings: string[];
}

/** Shape shared by the polling endpoint and `job_status_update` push events. */
export interface JobStatusView {
  id: string;
  status: JobStatus;
  progress: number;
  processingPhase?: string;
  queuePosition?: number;
  errorKind?: JobErrorKind;
  errorMessage?: string;
}

export interface QueuePositionUpdate {
  id: string;
  queuePosition: number;
  estimatedWaitSeconds: number;
}

export interface ProcessingErrorNotice {
  id: string;
  errorKind: JobErrorKind;
  errorMessage: string;
  suggestedActions: string[];
}

export type StatusEvent =
  | { type: "job_status_update"; data: JobStatusView }
  | { type: "queue_position_update"; data: QueuePositionUpdate }
  | { type: "processing_error"; data: ProcessingErrorNotice };

export function isTerminalStatus(status: JobStatus): status is TerminalStatus {
  return status === "completed" || status === "failed" || status === "cancelled";
}

export function toStatusView(job: Job): JobStatusView {
  const view: JobStatusView = {
    id: job.id,
    status: job.status,
    progress: job.progress
  };
  if (job.processingPhase !== undefined) view.processingPhase = job.processingPhase;
  if (job.queuePosition !== undefined) view.queuePosition = job.queuePosition;
  if (job.errorKind !== undefined) view.errorKind = job.errorKind;
  if (job.errorMessage !== undefined) view.errorMessage = job.errorMessage;
  return view;
}
