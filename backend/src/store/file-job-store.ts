import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parseTranscript } from "../transcript-schema";
import type { Job, Transcript } from "../types";
import { InMemoryJobStore } from "./memory-job-store";
import type { JobStoreState } from "./memory-job-store";

const jobSchema = z.object({
  id: z.string().min(1),
  status: z.enum(["uploaded", "processing", "completed", "failed", "cancelled", "deleted"]),
  progress: z.number().min(0).max(100),
  processingPhase: z.string().optional(),
  audioRef: z.string(),
  originalFilename: z.string(),
  createdAt: z.coerce.date(),
  startedAt: z.coerce.date().optional(),
  completedAt: z.coerce.date().optional(),
  expiresAt: z.coerce.date(),
  errorKind: z.enum(["Transient", "AuthError", "InvalidAudio", "QuotaExceeded", "Unknown", "Timeout"]).optional(),
  errorMessage: z.string().optional(),
  queuePosition: z.number().int().positive().optional(),
  attempts: z.number().int().nonnegative().default(0),
  lease: z.object({ owner: z.string(), expiresAt: z.coerce.date() }).optional()
});

const stateSchema = z.object({
  version: z.literal(1),
  jobs: z.array(jobSchema),
  transcripts: z.record(z.unknown())
});

/**
 * JobStore persisted as a single JSON document. Each mutation is written to a
 * temp file that is renamed over the previous state before it becomes visible.
 */
export class FileJobStore extends InMemoryJobStore {
  private readonly filePath: string;

  private constructor(filePath: string) {
    super();
    this.filePath = filePath;
  }

  static async open(filePath: string): Promise<FileJobStore> {
    const store = new FileJobStore(filePath);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });

    let raw: string | undefined;
    try {
      raw = await fs.promises.readFile(filePath, "utf-8");
    } catch (error) {
      if (!isMissingFile(error)) throw error;
    }
    if (raw !== undefined) {
      store.restoreState(decodeState(raw));
    }
    return store;
  }

  /** Resolves once every write issued so far has reached disk or failed. */
  flush(): Promise<void> {
    return this.settled();
  }

  protected override async commit(state: JobStoreState): Promise<void> {
    const document = JSON.stringify({ version: 1, ...state });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.promises.writeFile(tmpPath, document, "utf-8");
    await fs.promises.rename(tmpPath, this.filePath);
  }
}

function decodeState(raw: string): JobStoreState {
  const parsed = stateSchema.parse(JSON.parse(raw));
  const jobs: Job[] = parsed.jobs;
  const transcripts: Record<string, Transcript> = {};
  for (const [id, value] of Object.entries(parsed.transcripts)) {
    transcripts[id] = parseTranscript(value);
  }
  return { jobs, transcripts };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
