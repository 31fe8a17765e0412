import { beforeEach, describe, expect, it, vi } from "vitest";
import { JobNotFoundError, ProviderError, suggestedActionsFor } from "../../errors";
import { InMemoryJobStore } from "../../store/memory-job-store";
import type { ProviderResult } from "../../provider/provider";
import { ProcessingOrchestrator } from "../orchestrator";
import type { OrchestratorOptions } from "../orchestrator";
import { createRetryPolicy } from "../retry-policy";
import { StatusBroadcaster } from "../status-broadcaster";
import { FakeAdapter, HOUR_MS, deferred, noSleep, recordingChannel, sampleResult } from "../../__tests__/fixtures";
import type { RecordingChannel } from "../../__tests__/fixtures";

function statusProgress(channel: RecordingChannel): number[] {
  return channel.events.flatMap((event) => (event.type === "job_status_update" ? [event.data.progress] : []));
}

describe("ProcessingOrchestrator", () => {
  let store: InMemoryJobStore;
  let broadcaster: StatusBroadcaster;

  const build = (adapter: FakeAdapter, overrides: Partial<OrchestratorOptions> = {}) => {
    const orchestrator = new ProcessingOrchestrator({
      store,
      adapter,
      broadcaster,
      retryPolicy: createRetryPolicy({ baseDelayMs: 1 }),
      sleep: noSleep,
      progressMinIntervalMs: 0,
      ...overrides
    });
    orchestrator.start();
    return orchestrator;
  };

  const upload = (id: string) =>
    store.create({ id, audioRef: `/tmp/${id}.wav`, originalFilename: `${id}.wav`, expiresAt: new Date(Date.now() + HOUR_MS) });

  beforeEach(() => {
    store = new InMemoryJobStore();
    broadcaster = new StatusBroadcaster(store);
  });

  it("retries transient failures and completes", async () => {
    const adapter = new FakeAdapter(async (attempt) => {
      if (attempt < 3) throw new ProviderError("Transient", "Provider busy");
      return sampleResult();
    });
    const orchestrator = build(adapter);
    await upload("job-1");
    await orchestrator.enqueue("job-1");
    await orchestrator.whenIdle();

    const job = await store.get("job-1");
    expect(job).toMatchObject({ status: "completed", progress: 100, attempts: 3 });
    expect(adapter.calls).toHaveLength(3);
    expect(job && job.completedAt && job.expiresAt.getTime() - job.completedAt.getTime()).toBe(168 * HOUR_MS);

    const transcript = await store.getTranscript("job-1");
    expect(transcript?.speakers.map((speaker) => speaker.label)).toEqual(["Speaker 1", "Speaker 2"]);
    expect(transcript?.segments.map((segment) => segment.order)).toEqual([1, 2]);
    expect(transcript?.rawProviderPayload).toEqual({ id: "provider-run-1" });
  });

  it("backs off exponentially between attempts", async () => {
    const waits: number[] = [];
    const adapter = new FakeAdapter(async () => {
      throw new ProviderError("Transient", "Provider busy");
    });
    const orchestrator = build(adapter, {
      retryPolicy: createRetryPolicy({ baseDelayMs: 2000 }),
      sleep: async (ms) => {
        waits.push(ms);
      }
    });
    await upload("job-1");
    await orchestrator.enqueue("job-1");
    await orchestrator.whenIdle();

    expect(waits).toEqual([2000, 4000]);
  });

  it("stops retrying a job cancelled during the backoff wait", async () => {
    const adapter = new FakeAdapter(async () => {
      throw new ProviderError("Transient", "Provider busy");
    });
    const cancelled: boolean[] = [];
    const orchestrator: ProcessingOrchestrator = build(adapter, {
      sleep: async () => {
        cancelled.push(await orchestrator.cancel("job-1"));
      }
    });
    await upload("job-1");
    await orchestrator.enqueue("job-1");
    await orchestrator.whenIdle();

    expect(cancelled).toEqual([true]);
    expect(adapter.calls).toHaveLength(1);
    expect(await store.get("job-1")).toMatchObject({ status: "cancelled", attempts: 1 });
  });

  it("fails after exactly three transient attempts and pushes suggested actions", async () => {
    const adapter = new FakeAdapter(async () => {
      throw new ProviderError("Transient", "Provider busy");
    });
    const orchestrator = build(adapter);
    const channel = recordingChannel();
    await upload("job-1");
    broadcaster.subscribe("job-1", channel);
    await orchestrator.enqueue("job-1");
    await orchestrator.whenIdle();

    expect(adapter.calls).toHaveLength(3);
    const job = await store.get("job-1");
    expect(job).toMatchObject({ status: "failed", errorKind: "Transient", errorMessage: "Provider busy", attempts: 3 });
    expect(job && job.completedAt && job.expiresAt.getTime() - job.completedAt.getTime()).toBe(24 * HOUR_MS);
    expect(channel.events.at(-1)).toEqual({
      type: "processing_error",
      data: {
        id: "job-1",
        errorKind: "Transient",
        errorMessage: "Provider busy",
        suggestedActions: suggestedActionsFor("Transient")
      }
    });
  });

  it("does not retry authentication errors", async () => {
    const adapter = new FakeAdapter(async () => {
      throw new ProviderError("AuthError", "Invalid API key", 401);
    });
    const orchestrator = build(adapter);
    await upload("job-1");
    await orchestrator.enqueue("job-1");
    await orchestrator.whenIdle();

    expect(adapter.calls).toHaveLength(1);
    expect(await store.get("job-1")).toMatchObject({ status: "failed", errorKind: "AuthError", attempts: 1 });
  });

  it("fails a job that exceeds the hard timeout and aborts the provider call", async () => {
    const adapter = new FakeAdapter(() => new Promise<ProviderResult>(() => undefined));
    const orchestrator = build(adapter, { jobTimeoutMs: 20 });
    await upload("job-1");
    await orchestrator.enqueue("job-1");
    await orchestrator.whenIdle();

    expect(await store.get("job-1")).toMatchObject({ status: "failed", errorKind: "Timeout" });
    expect(adapter.calls[0].config.signal.aborted).toBe(true);
  });

  it("discards the result of a job cancelled mid-call", async () => {
    const call = deferred<ProviderResult>();
    const adapter = new FakeAdapter(() => call.promise);
    const orchestrator = build(adapter);
    await upload("job-1");
    await orchestrator.enqueue("job-1");
    await vi.waitFor(() => expect(adapter.calls).toHaveLength(1));

    expect(await orchestrator.cancel("job-1")).toBe(true);
    call.resolve(sampleResult());
    await orchestrator.whenIdle();

    expect((await store.get("job-1"))?.status).toBe("cancelled");
    expect(await store.getTranscript("job-1")).toBeUndefined();
    expect(await orchestrator.cancel("job-1")).toBe(false);
  });

  it("tracks queue positions and removes cancelled jobs from the queue", async () => {
    const call = deferred<ProviderResult>();
    const adapter = new FakeAdapter(() => call.promise);
    const orchestrator = build(adapter, { concurrency: 1 });
    const channel = recordingChannel();
    for (const id of ["job-1", "job-2", "job-3"]) await upload(id);
    broadcaster.subscribe("job-3", channel);

    for (const id of ["job-1", "job-2", "job-3"]) await orchestrator.enqueue(id);
    expect(orchestrator.queueDepth()).toBe(2);
    await vi.waitFor(async () => expect((await store.get("job-3"))?.queuePosition).toBe(2));
    expect((await store.get("job-2"))?.queuePosition).toBe(1);

    expect(await orchestrator.cancel("job-2")).toBe(true);
    expect(orchestrator.queueDepth()).toBe(1);
    await vi.waitFor(async () => expect((await store.get("job-3"))?.queuePosition).toBe(1));

    call.resolve(sampleResult());
    await orchestrator.whenIdle();

    expect(adapter.calls.map((entry) => entry.config.jobId)).toEqual(["job-1", "job-3"]);
    expect((await store.get("job-2"))?.status).toBe("cancelled");
    expect((await store.get("job-3"))?.status).toBe("completed");
    expect(channel.events.flatMap((event) => (event.type === "queue_position_update" ? [event.data] : []))).toEqual([
      { id: "job-3", queuePosition: 2, estimatedWaitSeconds: 600 },
      { id: "job-3", queuePosition: 1, estimatedWaitSeconds: 300 }
    ]);
  });

  it("pushes progress checkpoints that match the polled snapshot", async () => {
    const adapter = new FakeAdapter(async (_attempt, config) => {
      config.onProgress?.({ stage: "Transcribing", fraction: 0.5 });
      return sampleResult();
    });
    const orchestrator = build(adapter);
    const channel = recordingChannel();
    await upload("job-1");
    broadcaster.subscribe("job-1", channel);
    await orchestrator.enqueue("job-1");
    await orchestrator.whenIdle();

    expect(statusProgress(channel)).toEqual([0, 5, 50, 95, 100]);
    const pushed = channel.events.filter((event) => event.type === "job_status_update").at(-1);
    expect(pushed?.data).toEqual(await broadcaster.snapshot("job-1"));
  });

  it("rate limits progress without letting the store and subscribers disagree", async () => {
    const fixedNow = new Date("2026-01-01T10:00:00Z");
    const seenDuringCall: number[] = [];
    const adapter = new FakeAdapter(async (_attempt, config) => {
      config.onProgress?.({ stage: "Transcribing", fraction: 0.5 });
      seenDuringCall.push((await store.get("job-1"))?.progress ?? -1);
      return sampleResult();
    });
    const orchestrator = build(adapter, { progressMinIntervalMs: 60_000, now: () => fixedNow });
    const channel = recordingChannel();
    await upload("job-1");
    broadcaster.subscribe("job-1", channel);
    await orchestrator.enqueue("job-1");
    await orchestrator.whenIdle();

    expect(seenDuringCall).toEqual([5]);
    expect(statusProgress(channel)).toEqual([0, 5, 100]);
  });

  it("completes truncated results with a warning", async () => {
    const adapter = new FakeAdapter(async () => ({ ...sampleResult(), truncated: true }));
    const orchestrator = build(adapter);
    await upload("job-1");
    await orchestrator.enqueue("job-1");
    await orchestrator.whenIdle();

    expect((await store.get("job-1"))?.status).toBe("completed");
    expect((await store.getTranscript("job-1"))?.warnings).toEqual(["partial_result"]);
  });

  it("fails with InvalidAudio when the provider returns no speech", async () => {
    const adapter = new FakeAdapter(async () => ({ payload: {}, truncated: true, segments: [{ text: "  " }] }));
    const orchestrator = build(adapter);
    await upload("job-1");
    await orchestrator.enqueue("job-1");
    await orchestrator.whenIdle();

    expect(await store.get("job-1")).toMatchObject({ status: "failed", errorKind: "InvalidAudio", attempts: 1 });
  });

  it("never runs more jobs than it has workers", async () => {
    let active = 0;
    let peak = 0;
    const adapter = new FakeAdapter(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 10));
      active--;
      return sampleResult();
    });
    const orchestrator = build(adapter, { concurrency: 2 });
    for (const id of ["a", "b", "c", "d", "e"]) {
      await upload(id);
      await orchestrator.enqueue(id);
    }
    await orchestrator.whenIdle();

    expect(peak).toBe(2);
    expect((await store.list({ status: "completed" })).map((job) => job.id)).toEqual(["a", "b", "c", "d", "e"]);
  });

  it("validates what it is asked to queue", async () => {
    const orchestrator = build(new FakeAdapter(async () => sampleResult()));
    await expect(orchestrator.enqueue("missing")).rejects.toBeInstanceOf(JobNotFoundError);

    await upload("job-1");
    await store.transition("job-1", { from: "uploaded", to: "cancelled" });
    await expect(orchestrator.enqueue("job-1")).rejects.toMatchObject({ code: "not_queueable" });
  });

  it("holds queued jobs until started", async () => {
    const adapter = new FakeAdapter(async () => sampleResult());
    const orchestrator = new ProcessingOrchestrator({ store, adapter, broadcaster, sleep: noSleep });
    await upload("job-1");
    await orchestrator.enqueue("job-1");
    await orchestrator.whenIdle();
    expect(adapter.calls).toHaveLength(0);
    expect(orchestrator.queueDepth()).toBe(1);

    orchestrator.start();
    await orchestrator.stop();
    expect((await store.get("job-1"))?.status).toBe("completed");
  });
});
