import { ExportError } from "../errors";
import type { Transcript } from "../types";
import { labelFor, segmentsInOrder, speakerLabels } from "./labels";
import { formatTimecode } from "./timecode";
import type { TimecodeStyle } from "./timecode";
import { wrapText } from "./wrap";

export interface SubtitleOptions {
  maxLineLength: number;
  includeSpeakerLabels: boolean;
}

interface Cue {
  start: number;
  end: number;
  label: string;
  text: string;
}

function toCues(transcript: Transcript): Cue[] {
  const labels = speakerLabels(transcript);
  return segmentsInOrder(transcript).map((segment) => {
    if (segment.startTime === null || segment.endTime === null) {
      throw new ExportError(
        "MissingTimingData",
        `Segment ${segment.order} has no ${segment.startTime === null ? "start" : "end"} time; subtitles need timing for every segment.`
      );
    }
    return {
      start: segment.startTime,
      end: segment.endTime,
      label: labelFor(labels, segment.speakerId),
      text: segment.text
    };
  });
}

const TIMING_ARROW = /-->/g;

/** A cue line containing "-->" would be read as a timing line. */
function withoutArrows(text: string): string {
  return text.replace(TIMING_ARROW, "->");
}

export function escapeVttText(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function cueTiming(cue: Cue, style: TimecodeStyle): string {
  return `${formatTimecode(cue.start, style)} --> ${formatTimecode(cue.end, style)}`;
}

export function renderSrt(transcript: Transcript, options: SubtitleOptions): string {
  return toCues(transcript)
    .map((cue, index) => {
      const text = options.includeSpeakerLabels ? `${cue.label}: ${cue.text}` : cue.text;
      const lines = wrapText(withoutArrows(text), options.maxLineLength);
      return [String(index + 1), cueTiming(cue, "srt"), ...lines].join("\n") + "\n";
    })
    .join("\n");
}

export function renderVtt(transcript: Transcript, options: SubtitleOptions): string {
  const cues = toCues(transcript).map((cue) => {
    // Wrap before escaping so entities do not count toward the line length.
    const lines = wrapText(withoutArrows(cue.text), options.maxLineLength).map(escapeVttText);
    if (options.includeSpeakerLabels && lines.length > 0) {
      lines[0] = `<v ${escapeVttText(cue.label)}>${lines[0]}`;
    }
    return [cueTiming(cue, "vtt"), ...lines].join("\n") + "\n";
  });
  return ["WEBVTT\n", ...cues].join("\n");
}
