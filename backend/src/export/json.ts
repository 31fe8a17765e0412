import { ZodError } from "zod";
import { ValidationError } from "../errors";
import { parseTranscript } from "../transcript-schema";
import type { Transcript } from "../types";

export function renderJson(transcript: Transcript): string {
  return `${JSON.stringify(transcript, null, 2)}\n`;
}

/** Reads a JSON export back into a Transcript. */
export function parseTranscriptJson(text: string): Transcript {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    throw new ValidationError("Transcript export is not valid JSON.", "invalid_transcript");
  }
  try {
    return parseTranscript(value);
  } catch (error) {
    if (error instanceof ZodError) {
      const issue = error.issues[0];
      throw new ValidationError(
        `Transcript export is malformed at ${issue.path.join(".") || "<root>"}: ${issue.message}`,
        "invalid_transcript"
      );
    }
    throw error;
  }
}
