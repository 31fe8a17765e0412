export * from "./types";
export * from "./errors";
export { createLogger, silentLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
export { loadConfig, ConfigError } from "./config";
export type { AppConfig, ProviderSettings } from "./config";
export type { JobStore, JobFilter, NewJob, ProgressPatch, ProgressUpdate, TransitionRequest } from "./store/job-store";
export { InMemoryJobStore } from "./store/memory-job-store";
export { FileJobStore } from "./store/file-job-store";
export { canTransition } from "./store/lifecycle";
export type { ProviderResult, ProviderSegment, TranscriptionConfig, TranscriptionProviderAdapter } from "./provider/provider";
export { HttpTranscriptionProvider } from "./provider/http-provider";
export { WhisperCliProvider } from "./provider/whisper-provider";
export { createProvider } from "./provider";
export { normalizeProviderResult } from "./transcript/normalize";
export { ProcessingOrchestrator } from "./pipeline/orchestrator";
export type { OrchestratorOptions } from "./pipeline/orchestrator";
export { StatusBroadcaster } from "./pipeline/status-broadcaster";
export type { SubscriberChannel } from "./pipeline/status-broadcaster";
export { createRetryPolicy, exponentialBackoff } from "./pipeline/retry-policy";
export type { RetryPolicy } from "./pipeline/retry-policy";
export { RetentionSweeper } from "./pipeline/retention-sweeper";
export { EXPORT_FORMATS, isExportFormat, parseTranscriptJson, renderTranscript } from "./export";
export type { ExportFormat, ExportOptions, RenderedExport } from "./export";
export { FsArtifactStore } from "./artifacts";
export type { ArtifactStore } from "./artifacts";
export { createApp } from "./app";
export { JobStatusFollower, createSseConnector, parseSseChunk } from "./client/status-client";
export type { FollowerOptions, PushConnector } from "./client/status-client";
