import type { Transcript } from "../types";
import { labelFor, segmentsInOrder, speakerLabels } from "./labels";

/** One paragraph per run of consecutive segments from the same speaker. */
export function renderTxt(transcript: Transcript): string {
  const labels = speakerLabels(transcript);
  const paragraphs: { speakerId: string; texts: string[] }[] = [];

  for (const segment of segmentsInOrder(transcript)) {
    const last = paragraphs[paragraphs.length - 1];
    if (last && last.speakerId === segment.speakerId) {
      last.texts.push(segment.text);
    } else {
      paragraphs.push({ speakerId: segment.speakerId, texts: [segment.text] });
    }
  }

  return paragraphs
    .map((paragraph) => `${labelFor(labels, paragraph.speakerId)}: ${paragraph.texts.join(" ")}\n`)
    .join("");
}
