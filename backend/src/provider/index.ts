import type { ProviderSettings } from "../config";
import { HttpTranscriptionProvider } from "./http-provider";
import type { TranscriptionProviderAdapter } from "./provider";
import { WhisperCliProvider } from "./whisper-provider";

export function createProvider(settings: ProviderSettings): TranscriptionProviderAdapter {
  switch (settings.type) {
    case "http":
      return new HttpTranscriptionProvider({ url: settings.url, apiKey: settings.apiKey });
    case "whisper":
      return new WhisperCliProvider({
        whisperPath: settings.whisperPath,
        modelPath: settings.modelPath,
        language: settings.language
      });
  }
}
