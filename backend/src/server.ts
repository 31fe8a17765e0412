import fs from "node:fs";
import dotenv from "dotenv";
import { createApp } from "./app";
import { FsArtifactStore } from "./artifacts";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { ProcessingOrchestrator } from "./pipeline/orchestrator";
import { RetentionSweeper } from "./pipeline/retention-sweeper";
import { createRetryPolicy } from "./pipeline/retry-policy";
import { StatusBroadcaster } from "./pipeline/status-broadcaster";
import { createProvider } from "./provider";
import { FileJobStore } from "./store/file-job-store";
import { InMemoryJobStore } from "./store/memory-job-store";
import type { JobStore } from "./store/job-store";

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger("transcript-pipeline", config.logLevel);
  const log = (scope: string) => logger.child(scope);

  fs.mkdirSync(config.uploadsDir, { recursive: true });
  fs.mkdirSync(config.outputsDir, { recursive: true });

  let store: JobStore;
  let flush = async () => {};
  if (config.dataFile) {
    const fileStore = await FileJobStore.open(config.dataFile);
    flush = () => fileStore.flush();
    store = fileStore;
    logger.info(`Job state persisted to ${config.dataFile}`);
  } else {
    store = new InMemoryJobStore();
    logger.warn("DATA_FILE not set; job state is kept in memory only");
  }

  const adapter = createProvider(config.provider);
  const broadcaster = new StatusBroadcaster(store, log("Broadcaster"));
  const artifacts = new FsArtifactStore(config.uploadsDir, config.outputsDir);
  const orchestrator = new ProcessingOrchestrator({
    store,
    adapter,
    broadcaster,
    retryPolicy: createRetryPolicy(config.retry),
    concurrency: config.concurrency,
    jobTimeoutMs: config.jobTimeoutMs,
    progressMinIntervalMs: config.progressMinIntervalMs,
    defaultProcessingEstimateSeconds: config.defaultProcessingEstimateSeconds,
    retention: config.retention,
    logger: log("Orchestrator")
  });
  const sweeper = new RetentionSweeper({
    store,
    artifacts,
    broadcaster,
    intervalMs: config.retention.sweepIntervalMs,
    failedRetentionMs: config.retention.failedMs,
    logger: log("Sweeper")
  });

  // Uploads accepted before a restart are queued again; stale processing leases are the sweeper's.
  for (const job of await store.list({ status: "uploaded" })) {
    await orchestrator.enqueue(job.id);
  }
  await sweeper.runOnce();
  orchestrator.start();
  sweeper.start();

  const app = createApp({
    store,
    orchestrator,
    broadcaster,
    artifacts,
    uploadsDir: config.uploadsDir,
    outputsDir: config.outputsDir,
    maxUploadBytes: config.maxUploadBytes,
    uploadRetentionMs: config.retention.failedMs,
    logger: log("Http")
  });

  const server = app.listen(config.port, () => {
    logger.info(`Listening on port ${config.port} (provider: ${adapter.name})`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, draining`);
    server.close();
    server.closeAllConnections();
    await sweeper.stop();
    await orchestrator.stop();
    await flush();
    logger.info("Shutdown complete");
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error("Shutdown failed", error);
          process.exit(1);
        });
    });
  }
}

main().catch((error: unknown) => {
  console.error("[Server]", error instanceof Error ? error.message : error);
  process.exit(1);
});
