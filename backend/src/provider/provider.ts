import type { ProviderErrorKind } from "../types";

export interface ProviderSegment {
  speakerTag?: string | number;
  start?: number | null;
  end?: number | null;
  text: string;
  confidence?: number;
}

export interface ProviderResult {
  /** Untouched provider response, kept on the transcript for audit. */
  payload: unknown;
  segments: ProviderSegment[];
  languageDetected?: string;
  /** Set when the provider reports that the transcript stops short of the audio. */
  truncated?: boolean;
}

export interface TranscriptionProgress {
  stage: string;
  /** 0..1 share of the provider work already done. */
  fraction: number;
}

export interface TranscriptionConfig {
  jobId: string;
  language?: string;
  diarization: boolean;
  signal: AbortSignal;
  onProgress?: (update: TranscriptionProgress) => void;
}

/**
 * Boundary to the speech-to-text service. Implementations reject with a
 * ProviderError carrying one of the provider error kinds; they are the only
 * code that knows provider status codes.
 */
export interface TranscriptionProviderAdapter {
  readonly name: string;
  transcribe(audioRef: string, config: TranscriptionConfig): Promise<ProviderResult>;
}

export function classifyHttpStatus(status: number, errorCode?: string): ProviderErrorKind {
  if (errorCode === "quota_exceeded" || status === 402) return "QuotaExceeded";
  if (status === 429 || status === 408 || status >= 500) return "Transient";
  if (status === 401 || status === 403) return "AuthError";
  if (status === 400 || status === 413 || status === 415 || status === 422) return "InvalidAudio";
  return "Unknown";
}

const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNABORTED",
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "ERR_NETWORK"
]);

export function isTransientNetworkCode(code: string | undefined): boolean {
  return code !== undefined && TRANSIENT_NETWORK_CODES.has(code);
}
