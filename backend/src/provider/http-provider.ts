import fs from "node:fs";
import path from "node:path";
import axios from "axios";
import type { AxiosInstance } from "axios";
import { z } from "zod";
import { ProviderError } from "../errors";
import { classifyHttpStatus, isTransientNetworkCode } from "./provider";
import type { ProviderResult, TranscriptionConfig, TranscriptionProviderAdapter } from "./provider";

export interface HttpProviderOptions {
  url: string;
  apiKey?: string;
  requestTimeoutMs?: number;
  client?: AxiosInstance;
}

const responseSchema = z.object({
  language: z.string().optional(),
  truncated: z.boolean().optional(),
  segments: z.array(
    z.object({
      speaker: z.union([z.string(), z.number()]).optional(),
      start: z.number().nullable().optional(),
      end: z.number().nullable().optional(),
      text: z.string(),
      confidence: z.number().optional()
    })
  )
});

const errorBodySchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional()
  })
});

/** Speech-to-text over HTTP: the audio is posted as the raw request body. */
export class HttpTranscriptionProvider implements TranscriptionProviderAdapter {
  readonly name = "http";
  private readonly options: HttpProviderOptions;
  private readonly client: AxiosInstance;

  constructor(options: HttpProviderOptions) {
    this.options = options;
    this.client = options.client ?? axios.create();
  }

  async transcribe(audioRef: string, config: TranscriptionConfig): Promise<ProviderResult> {
    const stat = await fs.promises.stat(audioRef).catch(() => undefined);
    if (!stat?.isFile()) {
      throw new ProviderError("InvalidAudio", `Audio file not found: ${path.basename(audioRef)}`);
    }

    config.onProgress?.({ stage: "Uploading audio", fraction: 0.1 });

    let data: unknown;
    try {
      const response = await this.client.post<unknown>(this.options.url, fs.createReadStream(audioRef), {
        headers: {
          "Content-Type": "application/octet-stream",
          "Content-Length": String(stat.size),
          ...(this.options.apiKey ? { Authorization: `Bearer ${this.options.apiKey}` } : {})
        },
        params: {
          language: config.language ?? "auto",
          diarization: config.diarization
        },
        timeout: this.options.requestTimeoutMs ?? 10 * 60 * 1000,
        maxBodyLength: Infinity,
        signal: config.signal
      });
      data = response.data;
    } catch (error) {
      throw toProviderError(error);
    }

    config.onProgress?.({ stage: "Reading provider result", fraction: 0.9 });

    const parsed = responseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError("Unknown", `Unexpected provider response: ${parsed.error.issues[0]?.message ?? "invalid body"}`);
    }

    return {
      payload: data,
      languageDetected: parsed.data.language,
      truncated: parsed.data.truncated,
      segments: parsed.data.segments.map((segment) => ({
        speakerTag: segment.speaker,
        start: segment.start,
        end: segment.end,
        text: segment.text,
        confidence: segment.confidence
      }))
    };
  }
}

export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;

  if (axios.isAxiosError(error)) {
    if (error.response) {
      const status = error.response.status;
      const body = errorBodySchema.safeParse(error.response.data);
      const code = body.success ? body.data.error.code : undefined;
      const message = body.success && body.data.error.message ? body.data.error.message : `HTTP ${status}`;
      return new ProviderError(classifyHttpStatus(status, code), `Provider error: ${message}`, status);
    }
    if (isTransientNetworkCode(error.code)) {
      return new ProviderError("Transient", `Provider unreachable: ${error.message}`);
    }
    return new ProviderError("Unknown", `Provider request failed: ${error.message}`);
  }

  const message = error instanceof Error ? error.message : "Unknown provider failure.";
  return new ProviderError("Unknown", message);
}
