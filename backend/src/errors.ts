import type { JobErrorKind, JobStatus, ProviderErrorKind } from "./types";

export class PipelineError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends PipelineError {
  constructor(message: string, code = "validation_error") {
    super(message, code);
  }
}

export class JobNotFoundError extends ValidationError {
  readonly jobId: string;

  constructor(jobId: string) {
    super(`Job ${jobId} not found.`, "job_not_found");
    this.jobId = jobId;
  }
}

// Expected outcome of losing a CAS race; never reported as a failure.
export class StaleTransitionError extends PipelineError {
  readonly jobId: string;
  readonly expected: readonly JobStatus[];
  readonly actual: JobStatus;

  constructor(jobId: string, expected: readonly JobStatus[], actual: JobStatus, reason?: string) {
    super(
      reason ?? `Job ${jobId} is ${actual}, expected ${expected.join(" or ")}.`,
      "stale_transition"
    );
    this.jobId = jobId;
    this.expected = expected;
    this.actual = actual;
  }
}

export class InvalidTransitionError extends PipelineError {
  constructor(from: JobStatus, to: JobStatus) {
    super(`Transition ${from} -> ${to} is not allowed.`, "invalid_transition");
  }
}

/** The job exists but is not in a status that allows the request. */
export class JobStateError extends PipelineError {
  readonly status: JobStatus;

  constructor(jobId: string, status: JobStatus, action: string) {
    super(`Job ${jobId} is ${status}; cannot ${action}.`, "job_not_ready");
    this.status = status;
  }
}

export class ProviderError extends PipelineError {
  readonly kind: ProviderErrorKind;
  readonly statusCode?: number;

  constructor(kind: ProviderErrorKind, message: string, statusCode?: number) {
    super(message, "provider_error");
    this.kind = kind;
    this.statusCode = statusCode;
  }
}

export class TimeoutError extends PipelineError {
  constructor(message: string) {
    super(message, "timeout");
  }
}

export type ExportErrorKind = "MissingTimingData" | "UnsupportedFormat";

export class ExportError extends PipelineError {
  readonly kind: ExportErrorKind;

  constructor(kind: ExportErrorKind, message: string) {
    super(message, kind === "MissingTimingData" ? "missing_timing_data" : "unsupported_format");
    this.kind = kind;
  }
}

export interface ClassifiedFailure {
  kind: JobErrorKind;
  message: string;
}

/** Reduces anything a worker caught to the kind/message pair stored on the job. */
export function classifyFailure(error: unknown): ClassifiedFailure {
  if (error instanceof ProviderError) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof TimeoutError) {
    return { kind: "Timeout", message: error.message };
  }
  const message = error instanceof Error ? error.message : "Unknown transcription failure.";
  return { kind: "Unknown", message };
}

const SUGGESTED_ACTIONS: Record<JobErrorKind, string[]> = {
  Transient: [
    "The transcription service is temporarily unavailable.",
    "Upload the file again in a few minutes."
  ],
  AuthError: ["Contact the administrator: the transcription service rejected our credentials."],
  InvalidAudio: [
    "Check that the file plays correctly and contains speech.",
    "Convert the recording to WAV, MP3, FLAC, M4A or OGG and upload it again."
  ],
  QuotaExceeded: ["The transcription quota has been reached. Try again later or contact the administrator."],
  Timeout: [
    "The recording took too long to process.",
    "Split long recordings into shorter parts and upload them separately."
  ],
  Unknown: ["Upload the file again. If the problem persists, contact support with the job id."]
};

export function suggestedActionsFor(kind: JobErrorKind): string[] {
  return [...SUGGESTED_ACTIONS[kind]];
}
