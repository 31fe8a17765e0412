import type { SubscriberChannel } from "../pipeline/status-broadcaster";
import type { ProviderResult, TranscriptionConfig, TranscriptionProviderAdapter } from "../provider/provider";
import type { StatusEvent, Transcript } from "../types";

export function sampleTranscript(): Transcript {
  return {
    rawProviderPayload: { provider: "fake", segments: 2 },
    speakers: [
      { speakerId: "A", label: "Speaker 1", totalSpeakingSeconds: 2.5, segmentCount: 1 },
      { speakerId: "B", label: "Speaker 2", totalSpeakingSeconds: 2.5, segmentCount: 1 }
    ],
    segments: [
      { speakerId: "A", startTime: 0, endTime: 2.5, text: "Hello", confidence: 0.9, order: 1 },
      { speakerId: "B", startTime: 2.5, endTime: 5, text: "World", confidence: 0.8, order: 2 }
    ],
    confidenceScore: 0.85,
    languageDetected: "en",
    processingDurationSeconds: 1.2,
    warnings: []
  };
}

export function sampleResult(): ProviderResult {
  return {
    payload: { id: "provider-run-1" },
    languageDetected: "en",
    segments: [
      { speakerTag: "A", start: 0, end: 2.5, text: "Hello", confidence: 0.9 },
      { speakerTag: "B", start: 2.5, end: 5, text: "World", confidence: 0.8 }
    ]
  };
}

type Behaviour = (attempt: number, config: TranscriptionConfig) => Promise<ProviderResult>;

/** Adapter whose every call is scripted by attempt number. */
export class FakeAdapter implements TranscriptionProviderAdapter {
  readonly name = "fake";
  readonly calls: { audioRef: string; config: TranscriptionConfig }[] = [];
  private readonly behaviour: Behaviour;

  constructor(behaviour: Behaviour) {
    this.behaviour = behaviour;
  }

  async transcribe(audioRef: string, config: TranscriptionConfig): Promise<ProviderResult> {
    this.calls.push({ audioRef, config });
    return this.behaviour(this.calls.length, config);
  }
}

export interface RecordingChannel extends SubscriberChannel {
  events: StatusEvent[];
}

export function recordingChannel(id = "channel-1"): RecordingChannel {
  const events: StatusEvent[] = [];
  return {
    id,
    events,
    send: (event) => {
      events.push(event);
    }
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export const noSleep = async (): Promise<void> => {};

export const HOUR_MS = 60 * 60 * 1000;
