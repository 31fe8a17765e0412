import { ProviderError } from "../errors";
import type { ProviderResult, ProviderSegment } from "../provider/provider";
import type { Segment, Speaker, Transcript } from "../types";

export const PARTIAL_RESULT_WARNING = "partial_result";

const DEFAULT_SPEAKER_TAG = "1";
// Smallest cue length kept when a provider reports end <= start.
const MIN_SEGMENT_SECONDS = 0.001;

interface NormalizeOptions {
  processingDurationSeconds: number;
  fallbackLanguage?: string;
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function clampUnit(value: number): number {
  return Math.max(0, Math.min(1, value));
}

function toTime(value: number | null | undefined): number | null {
  if (value === null || value === undefined || !Number.isFinite(value)) return null;
  return round3(Math.max(0, value));
}

function hasStart(segment: ProviderSegment): boolean {
  return toTime(segment.start) !== null;
}

/**
 * Turns a provider result into the canonical transcript: empty segments are
 * dropped, timed results are ordered by start time, orders run 1..n and
 * speakers are labelled "Speaker N" in order of first appearance.
 */
export function normalizeProviderResult(result: ProviderResult, options: NormalizeOptions): Transcript {
  const usable = result.segments.filter((segment) => segment.text.trim().length > 0);
  if (usable.length === 0) {
    throw new ProviderError("InvalidAudio", "The provider returned no speech for this audio.");
  }

  // Array.prototype.sort is stable, so equal starts keep provider order.
  const ordered = usable.every(hasStart)
    ? [...usable].sort((a, b) => (toTime(a.start) ?? 0) - (toTime(b.start) ?? 0))
    : usable;

  const speakers = new Map<string, Speaker>();
  const segments: Segment[] = [];
  const confidences: number[] = [];

  ordered.forEach((source, index) => {
    const speakerId = String(source.speakerTag ?? DEFAULT_SPEAKER_TAG);
    let speaker = speakers.get(speakerId);
    if (!speaker) {
      speaker = {
        speakerId,
        label: `Speaker ${speakers.size + 1}`,
        totalSpeakingSeconds: 0,
        segmentCount: 0
      };
      speakers.set(speakerId, speaker);
    }

    const startTime = toTime(source.start);
    let endTime = toTime(source.end);
    if (startTime !== null && endTime !== null && endTime <= startTime) {
      endTime = round3(startTime + MIN_SEGMENT_SECONDS);
    }

    const confidence = source.confidence === undefined ? 0 : clampUnit(source.confidence);
    if (source.confidence !== undefined) confidences.push(confidence);

    speaker.segmentCount += 1;
    if (startTime !== null && endTime !== null) {
      speaker.totalSpeakingSeconds = round3(speaker.totalSpeakingSeconds + (endTime - startTime));
    }

    segments.push({
      speakerId,
      startTime,
      endTime,
      text: source.text.trim(),
      confidence,
      order: index + 1
    });
  });

  const confidenceScore = confidences.length
    ? round3(confidences.reduce((sum, value) => sum + value, 0) / confidences.length)
    : 0;

  return {
    rawProviderPayload: result.payload,
    speakers: [...speakers.values()],
    segments,
    confidenceScore,
    languageDetected: result.languageDetected ?? options.fallbackLanguage ?? "unknown",
    processingDurationSeconds: round3(Math.max(0, options.processingDurationSeconds)),
    warnings: result.truncated ? [PARTIAL_RESULT_WARNING] : []
  };
}
