import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FsArtifactStore } from "../../artifacts";
import type { ArtifactStore } from "../../artifacts";
import { InMemoryJobStore } from "../../store/memory-job-store";
import type { Job } from "../../types";
import { RetentionSweeper } from "../retention-sweeper";
import { StatusBroadcaster } from "../status-broadcaster";
import { HOUR_MS, recordingChannel, sampleTranscript } from "../../__tests__/fixtures";

const NOW = new Date("2026-03-01T12:00:00Z");
const ago = (ms: number) => new Date(NOW.getTime() - ms);

describe("RetentionSweeper", () => {
  let dir: string;
  let uploadsDir: string;
  let outputsDir: string;
  let store: InMemoryJobStore;
  let artifacts: FsArtifactStore;

  const completeJob = async (id: string, expiresAt: Date) => {
    const audioRef = path.join(uploadsDir, `${id}.wav`);
    fs.writeFileSync(audioRef, "audio");
    await store.create({ id, audioRef, originalFilename: `${id}.wav`, expiresAt, now: ago(10 * HOUR_MS) });
    await store.transition(id, { from: "uploaded", to: "processing", owner: "w1", leaseMs: 1000, now: ago(9 * HOUR_MS) });
    await store.transition(id, { from: "processing", to: "completed", owner: "w1", transcript: sampleTranscript(), expiresAt, now: ago(9 * HOUR_MS) });
    await artifacts.writeExport(id, "srt", Buffer.from("1\n"));
    return audioRef;
  };

  const sweeper = (overrides: Partial<ConstructorParameters<typeof RetentionSweeper>[0]> = {}) =>
    new RetentionSweeper({ store, artifacts, intervalMs: HOUR_MS, failedRetentionMs: 24 * HOUR_MS, ...overrides });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "sweeper-"));
    uploadsDir = path.join(dir, "uploads");
    outputsDir = path.join(dir, "outputs");
    fs.mkdirSync(uploadsDir);
    fs.mkdirSync(outputsDir);
    store = new InMemoryJobStore();
    artifacts = new FsArtifactStore(uploadsDir, outputsDir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("deletes the files of expired completed jobs and marks them deleted", async () => {
    const expiredAudio = await completeJob("old", ago(1000));
    const freshAudio = await completeJob("fresh", new Date(NOW.getTime() + HOUR_MS));

    expect(await sweeper().sweep(NOW)).toEqual(["old"]);

    expect((await store.get("old"))?.status).toBe("deleted");
    expect(await store.getTranscript("old")).toBeUndefined();
    expect(fs.existsSync(expiredAudio)).toBe(false);
    expect(fs.existsSync(path.join(outputsDir, "old.srt"))).toBe(false);

    expect((await store.get("fresh"))?.status).toBe("completed");
    expect(fs.existsSync(freshAudio)).toBe(true);
    expect(fs.existsSync(path.join(outputsDir, "fresh.srt"))).toBe(true);
  });

  it("never touches jobs that are still in flight", async () => {
    await store.create({ id: "queued", audioRef: path.join(uploadsDir, "q.wav"), originalFilename: "q.wav", expiresAt: ago(HOUR_MS) });
    expect(await sweeper().sweep(NOW)).toEqual([]);
    expect((await store.get("queued"))?.status).toBe("uploaded");
  });

  it("keeps going when one job cannot be cleaned up", async () => {
    await completeJob("bad", ago(1000));
    await completeJob("good", ago(1000));
    const flaky: ArtifactStore = {
      removeAudio: (ref) => artifacts.removeAudio(ref),
      readExport: (id, format) => artifacts.readExport(id, format),
      writeExport: (id, format, body) => artifacts.writeExport(id, format, body),
      removeExports: (id) => artifacts.removeExports(id),
      removeAll: async (job: Job) => {
        if (job.id === "bad") throw new Error("permission denied");
        await artifacts.removeAll(job);
      }
    };

    expect(await sweeper({ artifacts: flaky }).sweep(NOW)).toEqual(["good"]);
    expect((await store.get("bad"))?.status).toBe("completed");
  });

  it("fails processing jobs whose lease ran out", async () => {
    const broadcaster = new StatusBroadcaster(store);
    const channel = recordingChannel();
    broadcaster.subscribe("stuck", channel);
    await store.create({ id: "stuck", audioRef: path.join(uploadsDir, "s.wav"), originalFilename: "s.wav", expiresAt: NOW });
    await store.transition("stuck", { from: "uploaded", to: "processing", owner: "w1", leaseMs: 1000, now: ago(HOUR_MS) });
    await store.create({ id: "alive", audioRef: path.join(uploadsDir, "l.wav"), originalFilename: "l.wav", expiresAt: NOW });
    await store.transition("alive", { from: "uploaded", to: "processing", owner: "w2", leaseMs: 2 * HOUR_MS, now: ago(HOUR_MS) });

    const report = await sweeper({ broadcaster }).runOnce(NOW);

    expect(report).toEqual({ recovered: ["stuck"], deleted: [] });
    expect(await store.get("stuck")).toMatchObject({ status: "failed", errorKind: "Timeout", expiresAt: new Date(NOW.getTime() + 24 * HOUR_MS) });
    expect((await store.get("alive"))?.status).toBe("processing");
    expect(channel.events.map((event) => event.type)).toEqual(["job_status_update", "processing_error"]);
  });
});
