import path from "node:path";
import { z } from "zod";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const configSchema = z
  .object({
    PORT: positiveInt(3001),
    UPLOADS_DIR: z.string().min(1).default("uploads"),
    OUTPUTS_DIR: z.string().min(1).default("outputs"),
    DATA_FILE: z.string().min(1).optional(),
    MAX_UPLOAD_MB: positiveInt(500),
    WORKER_CONCURRENCY: positiveInt(5),
    JOB_TIMEOUT_SECONDS: positiveInt(3600),
    RETRY_MAX_ATTEMPTS: positiveInt(3),
    RETRY_BASE_DELAY_MS: positiveInt(2000),
    PROGRESS_MIN_INTERVAL_MS: z.coerce.number().int().nonnegative().default(2000),
    DEFAULT_PROCESSING_ESTIMATE_SECONDS: positiveInt(300),
    RETENTION_COMPLETED_HOURS: positiveInt(168),
    RETENTION_FAILED_HOURS: positiveInt(24),
    RETENTION_SWEEP_INTERVAL_MINUTES: positiveInt(60),
    PROVIDER: z.enum(["http", "whisper"]).default("http"),
    PROVIDER_URL: z.string().url().optional(),
    PROVIDER_API_KEY: z.string().min(1).optional(),
    WHISPER_PATH: z.string().min(1).default("whisper-cli"),
    WHISPER_MODEL: z.string().min(1).optional(),
    WHISPER_LANGUAGE: z.string().min(1).default("auto"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info")
  })
  .superRefine((env, ctx) => {
    if (env.PROVIDER === "http" && !env.PROVIDER_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["PROVIDER_URL"],
        message: "PROVIDER_URL is required when PROVIDER=http"
      });
    }
    if (env.PROVIDER === "whisper" && !env.WHISPER_MODEL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["WHISPER_MODEL"],
        message: "WHISPER_MODEL is required when PROVIDER=whisper"
      });
    }
  });

export type ProviderSettings =
  | { type: "http"; url: string; apiKey?: string }
  | { type: "whisper"; whisperPath: string; modelPath: string; language: string };

export interface AppConfig {
  port: number;
  uploadsDir: string;
  outputsDir: string;
  dataFile?: string;
  maxUploadBytes: number;
  concurrency: number;
  jobTimeoutMs: number;
  retry: { maxAttempts: number; baseDelayMs: number };
  progressMinIntervalMs: number;
  defaultProcessingEstimateSeconds: number;
  retention: { completedMs: number; failedMs: number; sweepIntervalMs: number };
  provider: ProviderSettings;
  logLevel: "debug" | "info" | "warn" | "error" | "silent";
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const HOUR_MS = 60 * 60 * 1000;

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  // Empty strings in .env files mean "unset".
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const parsed = configSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const values = parsed.data;

  let provider: ProviderSettings;
  if (values.PROVIDER === "whisper" && values.WHISPER_MODEL) {
    provider = {
      type: "whisper",
      whisperPath: values.WHISPER_PATH,
      modelPath: values.WHISPER_MODEL,
      language: values.WHISPER_LANGUAGE
    };
  } else if (values.PROVIDER === "http" && values.PROVIDER_URL) {
    provider = { type: "http", url: values.PROVIDER_URL, apiKey: values.PROVIDER_API_KEY };
  } else {
    throw new ConfigError([`provider ${values.PROVIDER} is not fully configured`]);
  }

  return {
    port: values.PORT,
    uploadsDir: path.resolve(cwd, values.UPLOADS_DIR),
    outputsDir: path.resolve(cwd, values.OUTPUTS_DIR),
    dataFile: values.DATA_FILE ? path.resolve(cwd, values.DATA_FILE) : undefined,
    maxUploadBytes: values.MAX_UPLOAD_MB * 1024 * 1024,
    concurrency: values.WORKER_CONCURRENCY,
    jobTimeoutMs: values.JOB_TIMEOUT_SECONDS * 1000,
    retry: { maxAttempts: values.RETRY_MAX_ATTEMPTS, baseDelayMs: values.RETRY_BASE_DELAY_MS },
    progressMinIntervalMs: values.PROGRESS_MIN_INTERVAL_MS,
    defaultProcessingEstimateSeconds: values.DEFAULT_PROCESSING_ESTIMATE_SECONDS,
    retention: {
      completedMs: values.RETENTION_COMPLETED_HOURS * HOUR_MS,
      failedMs: values.RETENTION_FAILED_HOURS * HOUR_MS,
      sweepIntervalMs: values.RETENTION_SWEEP_INTERVAL_MINUTES * 60 * 1000
    },
    provider,
    logLevel: values.LOG_LEVEL
  };
}
