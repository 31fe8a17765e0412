import { ExportError } from "../errors";
import type { Transcript } from "../types";
import { renderCsv } from "./csv";
import { renderJson } from "./json";
import { renderSrt, renderVtt } from "./subtitles";
import { renderTxt } from "./txt";

export { parseTranscriptJson } from "./json";

export const EXPORT_FORMATS = ["txt", "json", "srt", "vtt", "csv"] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface ExportOptions {
  /** Code points per subtitle line. */
  maxLineLength?: number;
  includeSpeakerLabels?: boolean;
}

export interface RenderedExport {
  body: Buffer;
  contentType: string;
  extension: ExportFormat;
}

const CONTENT_TYPES: Record<ExportFormat, string> = {
  txt: "text/plain; charset=utf-8",
  json: "application/json; charset=utf-8",
  srt: "application/x-subrip; charset=utf-8",
  vtt: "text/vtt; charset=utf-8",
  csv: "text/csv; charset=utf-8"
};

export const DEFAULT_MAX_LINE_LENGTH = 42;

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

export function contentTypeFor(format: ExportFormat): string {
  return CONTENT_TYPES[format];
}

function renderText(transcript: Transcript, format: ExportFormat, options: ExportOptions): string {
  const subtitleOptions = {
    maxLineLength: options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH,
    includeSpeakerLabels: options.includeSpeakerLabels ?? true
  };
  switch (format) {
    case "txt":
      return renderTxt(transcript);
    case "json":
      return renderJson(transcript);
    case "srt":
      return renderSrt(transcript, subtitleOptions);
    case "vtt":
      return renderVtt(transcript, subtitleOptions);
    case "csv":
      return renderCsv(transcript);
  }
}

/** Pure: the same transcript, format and options always give the same bytes. */
export function renderTranscript(transcript: Transcript, format: string, options: ExportOptions = {}): RenderedExport {
  if (!isExportFormat(format)) {
    throw new ExportError("UnsupportedFormat", `Unsupported export format "${format}". Use one of: ${EXPORT_FORMATS.join(", ")}.`);
  }
  return {
    body: Buffer.from(renderText(transcript, format, options), "utf-8"),
    contentType: CONTENT_TYPES[format],
    extension: format
  };
}
