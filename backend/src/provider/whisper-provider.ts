import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { spawn } from "node:child_process";
import { z } from "zod";
import { ProviderError } from "../errors";
import type { ProviderErrorKind } from "../types";
import type { ProviderResult, ProviderSegment, TranscriptionConfig, TranscriptionProviderAdapter } from "./provider";

export interface WhisperConfig {
  whisperPath: string;
  modelPath: string;
  language: string;
  ffmpegPath?: string;
  chunkSeconds?: number;
}

const DEFAULT_CHUNK_SECONDS = 120;

const whisperOutputSchema = z.object({
  result: z.object({ language: z.string() }).partial().optional(),
  transcription: z.array(
    z.object({
      offsets: z.object({ from: z.number(), to: z.number() }),
      text: z.string()
    })
  )
});

export interface WhisperChunkOutput {
  language?: string;
  segments: ProviderSegment[];
}

/** Reads one whisper-cli `-oj` document; offsets are milliseconds within the chunk. */
export function parseWhisperJson(raw: string, chunkOffsetSeconds: number): WhisperChunkOutput {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ProviderError("Unknown", "whisper-cli produced invalid JSON.");
  }
  const parsed = whisperOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProviderError("Unknown", "whisper-cli output has an unexpected shape.");
  }

  const segments: ProviderSegment[] = [];
  for (const entry of parsed.data.transcription) {
    const text = entry.text.trim();
    if (!text) continue;
    segments.push({
      start: chunkOffsetSeconds + entry.offsets.from / 1000,
      end: chunkOffsetSeconds + entry.offsets.to / 1000,
      text
    });
  }
  return { language: parsed.data.result?.language, segments };
}

function runCommand(
  command: string,
  args: string[],
  failureKind: ProviderErrorKind,
  errPrefix: string,
  signal: AbortSignal
): Promise<void> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { signal });

    let stderr = "";
    proc.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    proc.on("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "ENOENT") {
        reject(new ProviderError("Unknown", `${errPrefix}: ${command} not found`));
        return;
      }
      reject(new ProviderError(err.name === "AbortError" ? "Transient" : failureKind, `${errPrefix}: ${err.message}`));
    });

    proc.on("close", (code) => {
      if (code !== 0) {
        reject(new ProviderError(failureKind, `${errPrefix}: exit code ${code}. ${stderr.slice(-500)}`.trim()));
        return;
      }
      resolve();
    });
  });
}

const CHUNK_FILE = /^chunk_(\d+)\.wav$/;

/** Chunk files ffmpeg wrote, ordered by their numeric index. */
export function orderChunkFiles(names: readonly string[]): string[] {
  return names
    .flatMap((name) => {
      const match = CHUNK_FILE.exec(name);
      return match ? [{ name, index: Number(match[1]) }] : [];
    })
    .sort((a, b) => a.index - b.index)
    .map((chunk) => chunk.name);
}

/**
 * Local provider: ffmpeg normalizes and splits the audio into fixed-length
 * chunks, whisper-cli transcribes them two at a time. No diarization, so
 * every segment belongs to a single speaker.
 */
export class WhisperCliProvider implements TranscriptionProviderAdapter {
  readonly name = "whisper";
  private readonly config: WhisperConfig;

  constructor(config: WhisperConfig) {
    this.config = config;
  }

  async transcribe(audioRef: string, options: TranscriptionConfig): Promise<ProviderResult> {
    const { signal, onProgress } = options;
    const ffmpeg = this.config.ffmpegPath ?? "ffmpeg";
    const chunkSeconds = this.config.chunkSeconds ?? DEFAULT_CHUNK_SECONDS;
    const language = options.language ?? this.config.language;

    const workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), `whisper-${options.jobId}-`));
    const normalizedInput = path.join(workDir, "normalized.wav");
    const chunksDir = path.join(workDir, "chunks");
    const partialDir = path.join(workDir, "partial");

    try {
      await fs.promises.mkdir(chunksDir, { recursive: true });
      await fs.promises.mkdir(partialDir, { recursive: true });

      onProgress?.({ stage: "Normalizing audio", fraction: 0.05 });
      await runCommand(
        ffmpeg,
        ["-y", "-i", audioRef, "-ac", "1", "-ar", "16000", normalizedInput],
        "InvalidAudio",
        "ffmpeg could not decode the audio",
        signal
      );

      onProgress?.({ stage: "Splitting audio", fraction: 0.1 });
      const chunkPattern = path.join(chunksDir, "chunk_%03d.wav");
      const splitArgs = ["-y", "-i", normalizedInput, "-f", "segment", "-segment_time", String(chunkSeconds)];
      await runCommand(
        ffmpeg,
        [...splitArgs, "-c:a", "pcm_s16le", "-ar", "16000", "-ac", "1", chunkPattern],
        "InvalidAudio",
        "ffmpeg could not split the audio",
        signal
      );

      const chunks = orderChunkFiles(await fs.promises.readdir(chunksDir)).map((name) => path.join(chunksDir, name));
      if (chunks.length === 0) {
        throw new ProviderError("InvalidAudio", "No audio chunks were produced.");
      }

      const outputs: WhisperChunkOutput[] = new Array(chunks.length);
      const rawParts: unknown[] = new Array(chunks.length);
      const concurrency = Math.max(1, Math.min(chunks.length, 2));
      const threadsPerProcess = Math.max(4, Math.floor(os.cpus().length / concurrency));
      const queue = [...chunks.keys()];
      let completedChunks = 0;

      const worker = async () => {
        while (queue.length > 0) {
          const index = queue.shift();
          if (index === undefined) break;

          const partBase = path.join(partialDir, `part_${String(index).padStart(3, "0")}`);
          const args = ["-m", this.config.modelPath, "-l", language, "-t", String(threadsPerProcess)];
          args.push("-f", chunks[index], "-oj", "-of", partBase);
          await runCommand(this.config.whisperPath, args, "Transient", `whisper-cli failed on chunk ${index + 1}`, signal);

          const raw = await fs.promises.readFile(`${partBase}.json`, "utf-8");
          outputs[index] = parseWhisperJson(raw, index * chunkSeconds);
          rawParts[index] = JSON.parse(raw);

          completedChunks++;
          onProgress?.({
            stage: `Transcribing (${completedChunks}/${chunks.length})`,
            fraction: 0.1 + (completedChunks / chunks.length) * 0.85
          });
        }
      };

      await Promise.all(Array.from({ length: concurrency }, () => worker()));

      return {
        payload: { engine: "whisper-cli", chunkSeconds, chunks: rawParts },
        languageDetected: outputs.find((output) => output.language)?.language ?? language,
        segments: outputs.flatMap((output) => output.segments)
      };
    } finally {
      await fs.promises.rm(workDir, { recursive: true, force: true });
    }
  }
}
