import { z } from "zod";
import type { Transcript } from "./types";

const unitInterval = z.number().min(0).max(1);

export const speakerSchema = z.object({
  speakerId: z.string().min(1),
  label: z.string().min(1),
  totalSpeakingSeconds: z.number().nonnegative(),
  segmentCount: z.number().int().nonnegative()
});

export const segmentSchema = z.object({
  speakerId: z.string().min(1),
  startTime: z.number().nonnegative().nullable(),
  endTime: z.number().nonnegative().nullable(),
  text: z.string(),
  confidence: unitInterval,
  order: z.number().int().positive()
});

export const transcriptSchema = z.object({
  rawProviderPayload: z.unknown(),
  speakers: z.array(speakerSchema),
  segments: z.array(segmentSchema),
  confidenceScore: unitInterval,
  languageDetected: z.string(),
  processingDurationSeconds: z.number().nonnegative(),
  warnings: z.array(z.string()).default([])
});

/** Validates an untrusted value into a Transcript. Throws a ZodError on mismatch. */
export function parseTranscript(value: unknown): Transcript {
  const parsed = transcriptSchema.parse(value);
  return {
    rawProviderPayload: parsed.rawProviderPayload,
    speakers: parsed.speakers,
    segments: parsed.segments,
    confidenceScore: parsed.confidenceScore,
    languageDetected: parsed.languageDetected,
    processingDurationSeconds: parsed.processingDurationSeconds,
    warnings: parsed.warnings
  };
}
