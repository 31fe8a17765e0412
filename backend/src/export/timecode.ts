export type TimecodeStyle = "srt" | "vtt";

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/** `HH:MM:SS,mmm` for SubRip, `HH:MM:SS.mmm` for WebVTT. */
export function formatTimecode(seconds: number, style: TimecodeStyle): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const secs = Math.floor((totalMs % 60_000) / 1000);
  const millis = totalMs % 1000;
  const separator = style === "srt" ? "," : ".";
  return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(secs, 2)}${separator}${pad(millis, 3)}`;
}
