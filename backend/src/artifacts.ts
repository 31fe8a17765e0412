import fs from "node:fs";
import path from "node:path";
import { EXPORT_FORMATS } from "./export";
import type { ExportFormat } from "./export";
import type { Job } from "./types";

/** Files that belong to a job outside the JobStore: the upload and cached exports. */
export interface ArtifactStore {
  removeAudio(audioRef: string): Promise<void>;
  readExport(jobId: string, format: ExportFormat): Promise<Buffer | undefined>;
  writeExport(jobId: string, format: ExportFormat, body: Buffer): Promise<string>;
  removeExports(jobId: string): Promise<void>;
  removeAll(job: Job): Promise<void>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FsArtifactStore implements ArtifactStore {
  private readonly uploadsDir: string;
  private readonly outputsDir: string;

  constructor(uploadsDir: string, outputsDir: string) {
    this.uploadsDir = path.resolve(uploadsDir);
    this.outputsDir = path.resolve(outputsDir);
  }

  exportPath(jobId: string, format: ExportFormat): string {
    return path.join(this.outputsDir, `${jobId}.${format}`);
  }

  async removeAudio(audioRef: string): Promise<void> {
    const resolved = path.resolve(this.uploadsDir, audioRef);
    if (path.dirname(resolved) !== this.uploadsDir) {
      throw new Error(`Refusing to remove ${audioRef}: outside the uploads directory.`);
    }
    await fs.promises.rm(resolved, { force: true });
  }

  async readExport(jobId: string, format: ExportFormat): Promise<Buffer | undefined> {
    try {
      return await fs.promises.readFile(this.exportPath(jobId, format));
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
  }

  async writeExport(jobId: string, format: ExportFormat, body: Buffer): Promise<string> {
    const target = this.exportPath(jobId, format);
    const temp = `${target}.${process.pid}.tmp`;
    await fs.promises.writeFile(temp, body);
    await fs.promises.rename(temp, target);
    return path.basename(target);
  }

  async removeExports(jobId: string): Promise<void> {
    await Promise.all(EXPORT_FORMATS.map((format) => fs.promises.rm(this.exportPath(jobId, format), { force: true })));
  }

  async removeAll(job: Job): Promise<void> {
    await this.removeAudio(job.audioRef);
    await this.removeExports(job.id);
  }
}
