import { describe, expect, it } from "vitest";
import { ExportError, ValidationError } from "../../errors";
import { isExportFormat, parseTranscriptJson, renderTranscript } from "..";
import { escapeCsvField } from "../csv";
import { formatTimecode } from "../timecode";
import { wrapText } from "../wrap";
import { sampleTranscript } from "../../__tests__/fixtures";
import type { Transcript } from "../../types";

const text = (transcript: Transcript, format: string, options = {}) =>
  renderTranscript(transcript, format, options).body.toString("utf-8");

describe("renderTranscript", () => {
  it("renders TXT paragraphs per speaker", () => {
    expect(text(sampleTranscript(), "txt")).toBe("Speaker 1: Hello\nSpeaker 2: World\n");
  });

  it("joins consecutive segments of the same speaker", () => {
    const transcript = sampleTranscript();
    transcript.segments.push({ speakerId: "B", startTime: 5, endTime: 6, text: "again", confidence: 0.7, order: 3 });
    transcript.segments.push({ speakerId: "A", startTime: 6, endTime: 7, text: "Bye", confidence: 0.7, order: 4 });
    expect(text(transcript, "txt")).toBe("Speaker 1: Hello\nSpeaker 2: World again\nSpeaker 1: Bye\n");
  });

  it("renders SRT cues with comma timecodes", () => {
    expect(text(sampleTranscript(), "srt")).toBe(
      "1\n00:00:00,000 --> 00:00:02,500\nSpeaker 1: Hello\n\n" + "2\n00:00:02,500 --> 00:00:05,000\nSpeaker 2: World\n"
    );
  });

  it("renders WebVTT with voice tags", () => {
    expect(text(sampleTranscript(), "vtt")).toBe(
      "WEBVTT\n\n" +
        "00:00:00.000 --> 00:00:02.500\n<v Speaker 1>Hello\n\n" +
        "00:00:02.500 --> 00:00:05.000\n<v Speaker 2>World\n"
    );
  });

  it("escapes markup in WebVTT text and voice tags", () => {
    const transcript = sampleTranscript();
    transcript.segments[0].text = "Tom & Jerry <laughs>";
    transcript.speakers[1].label = "Dr. <B>";
    expect(text(transcript, "vtt")).toBe(
      "WEBVTT\n\n" +
        "00:00:00.000 --> 00:00:02.500\n<v Speaker 1>Tom &amp; Jerry &lt;laughs&gt;\n\n" +
        "00:00:02.500 --> 00:00:05.000\n<v Dr. &lt;B&gt;>World\n"
    );
  });

  it("keeps timing arrows out of cue text", () => {
    const transcript = sampleTranscript();
    transcript.segments[0].text = "go to step 2 --> then 3";
    transcript.speakers[1].label = "A-->B";
    expect(text(transcript, "srt")).toBe(
      "1\n00:00:00,000 --> 00:00:02,500\nSpeaker 1: go to step 2 -> then 3\n\n" +
        "2\n00:00:02,500 --> 00:00:05,000\nA->B: World\n"
    );
    expect(text(transcript, "vtt").split("\n")[3]).toBe("<v Speaker 1>go to step 2 -&gt; then 3");
  });

  it("omits speaker labels on request", () => {
    expect(text(sampleTranscript(), "srt", { includeSpeakerLabels: false })).toBe(
      "1\n00:00:00,000 --> 00:00:02,500\nHello\n\n2\n00:00:02,500 --> 00:00:05,000\nWorld\n"
    );
  });

  it("uses renamed speaker labels", () => {
    const transcript = sampleTranscript();
    transcript.speakers[1].label = "Bruna";
    expect(text(transcript, "txt")).toBe("Speaker 1: Hello\nBruna: World\n");
  });

  it("fails subtitles when a segment has no end time", () => {
    const transcript = sampleTranscript();
    transcript.segments[1].endTime = null;
    for (const format of ["srt", "vtt"]) {
      try {
        renderTranscript(transcript, format);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ExportError);
        expect(error).toMatchObject({ kind: "MissingTimingData", code: "missing_timing_data" });
      }
    }
    expect(text(transcript, "txt")).toBe("Speaker 1: Hello\nSpeaker 2: World\n");
  });

  it("rejects unknown formats", () => {
    expect(() => renderTranscript(sampleTranscript(), "docx")).toThrow(ExportError);
    expect(isExportFormat("docx")).toBe(false);
    expect(isExportFormat("vtt")).toBe(true);
  });

  it("renders CSV with CRLF rows and fixed decimals", () => {
    expect(text(sampleTranscript(), "csv")).toBe(
      "order,speaker,start,end,confidence,text\r\n" +
        "1,Speaker 1,0.000,2.500,0.900,Hello\r\n" +
        "2,Speaker 2,2.500,5.000,0.800,World\r\n"
    );
  });

  it("quotes CSV fields and leaves missing times empty", () => {
    const transcript = sampleTranscript();
    transcript.segments = [
      { speakerId: "A", startTime: null, endTime: null, text: 'She said "hi", then left', confidence: 0.5, order: 1 }
    ];
    expect(text(transcript, "csv")).toBe(
      'order,speaker,start,end,confidence,text\r\n1,Speaker 1,,,0.500,"She said ""hi"", then left"\r\n'
    );
    expect(escapeCsvField("line\nbreak")).toBe('"line\nbreak"');
    expect(escapeCsvField("plain")).toBe("plain");
  });

  it("wraps long cues to the line length", () => {
    const transcript = sampleTranscript();
    transcript.segments[0].text = "the quick brown fox jumps over the lazy dog";
    const srt = text(transcript, "srt", { maxLineLength: 20 });
    expect(srt.split("\n").slice(0, 6)).toEqual([
      "1",
      "00:00:00,000 --> 00:00:02,500",
      "Speaker 1: the quick",
      "brown fox jumps over",
      "the lazy dog",
      ""
    ]);
  });

  it("sets content type and extension", () => {
    const rendered = renderTranscript(sampleTranscript(), "vtt");
    expect(rendered.contentType).toBe("text/vtt; charset=utf-8");
    expect(rendered.extension).toBe("vtt");
  });

  it("is deterministic", () => {
    expect(renderTranscript(sampleTranscript(), "json").body.equals(renderTranscript(sampleTranscript(), "json").body)).toBe(true);
  });
});

describe("JSON export", () => {
  it("reads back into the same transcript", () => {
    const transcript = sampleTranscript();
    transcript.warnings = ["partial_result"];
    transcript.segments[0].text = "Olá, 世界 🎙️";
    expect(parseTranscriptJson(text(transcript, "json"))).toEqual(transcript);
  });

  it("rejects malformed documents", () => {
    expect(() => parseTranscriptJson("{not json")).toThrow(ValidationError);
    expect(() => parseTranscriptJson(JSON.stringify({ speakers: [] }))).toThrow(ValidationError);
  });
});

describe("formatTimecode", () => {
  it("formats hours, minutes, seconds and milliseconds", () => {
    expect(formatTimecode(3661.5, "srt")).toBe("01:01:01,500");
    expect(formatTimecode(3661.5, "vtt")).toBe("01:01:01.500");
    expect(formatTimecode(59.9999, "vtt")).toBe("00:01:00.000");
    expect(formatTimecode(0, "srt")).toBe("00:00:00,000");
  });
});

describe("wrapText", () => {
  it("wraps greedily on word boundaries", () => {
    expect(wrapText("the quick brown fox jumps over the lazy dog", 10)).toEqual([
      "the quick",
      "brown fox",
      "jumps over",
      "the lazy",
      "dog"
    ]);
  });

  it("counts code points and splits overlong words", () => {
    expect(wrapText("日本語のテキスト", 3)).toEqual(["日本語", "のテキ", "スト"]);
    expect(wrapText("😀😀 ok", 4)).toEqual(["😀😀", "ok"]);
  });
});
