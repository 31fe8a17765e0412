import { describe, expect, it } from "vitest";
import { ProviderError } from "../../errors";
import { orderChunkFiles, parseWhisperJson } from "../whisper-provider";

describe("parseWhisperJson", () => {
  it("offsets chunk timestamps and skips silent entries", () => {
    const raw = JSON.stringify({
      result: { language: "en" },
      transcription: [
        { offsets: { from: 0, to: 1500 }, text: " Hello there" },
        { offsets: { from: 1500, to: 3000 }, text: "   " },
        { offsets: { from: 3000, to: 4250 }, text: "again" }
      ]
    });
    expect(parseWhisperJson(raw, 120)).toEqual({
      language: "en",
      segments: [
        { start: 120, end: 121.5, text: "Hello there" },
        { start: 123, end: 124.25, text: "again" }
      ]
    });
  });

  it("reports malformed output as an unknown provider failure", () => {
    expect(() => parseWhisperJson("{", 0)).toThrow(ProviderError);
    try {
      parseWhisperJson(JSON.stringify({ transcription: "nope" }), 0);
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ kind: "Unknown" });
    }
  });
});

describe("orderChunkFiles", () => {
  it("orders chunks by index and ignores other files", () => {
    expect(orderChunkFiles(["chunk_010.wav", "chunk_002.wav", "notes.txt", "chunk_1000.wav", "chunk_001.wav.json"])).toEqual([
      "chunk_002.wav",
      "chunk_010.wav",
      "chunk_1000.wav"
    ]);
  });
});
