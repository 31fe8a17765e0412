import { InvalidTransitionError } from "../errors";
import type { JobStatus } from "../types";

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  uploaded: ["processing", "cancelled"],
  processing: ["completed", "failed", "cancelled"],
  completed: ["deleted"],
  failed: ["deleted"],
  cancelled: ["deleted"],
  deleted: []
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}
