import type { Transcript } from "../types";
import { labelFor, segmentsInOrder, speakerLabels } from "./labels";

const HEADER = ["order", "speaker", "start", "end", "confidence", "text"];
const NEEDS_QUOTES = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  return NEEDS_QUOTES.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function decimal(value: number | null): string {
  return value === null ? "" : value.toFixed(3);
}

export function renderCsv(transcript: Transcript): string {
  const labels = speakerLabels(transcript);
  const rows = segmentsInOrder(transcript).map((segment) => [
    String(segment.order),
    labelFor(labels, segment.speakerId),
    decimal(segment.startTime),
    decimal(segment.endTime),
    decimal(segment.confidence),
    segment.text
  ]);
  return [HEADER, ...rows].map((row) => `${row.map(escapeCsvField).join(",")}\r\n`).join("");
}
