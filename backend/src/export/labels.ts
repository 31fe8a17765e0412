import type { Segment, Transcript } from "../types";

export function speakerLabels(transcript: Transcript): Map<string, string> {
  return new Map(transcript.speakers.map((speaker) => [speaker.speakerId, speaker.label]));
}

export function labelFor(labels: Map<string, string>, speakerId: string): string {
  return labels.get(speakerId) ?? speakerId;
}

export function segmentsInOrder(transcript: Transcript): Segment[] {
  return [...transcript.segments].sort((a, b) => a.order - b.order);
}
