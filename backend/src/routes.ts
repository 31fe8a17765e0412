import path from "node:path";
import { Router } from "express";
import multer from "multer";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { ArtifactStore } from "./artifacts";
import { ExportError, JobNotFoundError, JobStateError, ValidationError } from "./errors";
import { EXPORT_FORMATS, contentTypeFor, isExportFormat, renderTranscript } from "./export";
import type { ExportOptions } from "./export";
import { asyncHandler } from "./http/error-handler";
import { KeyedLock } from "./http/keyed-lock";
import { SseChannel } from "./http/sse-channel";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type { ProcessingOrchestrator } from "./pipeline/orchestrator";
import type { StatusBroadcaster } from "./pipeline/status-broadcaster";
import type { JobStore } from "./store/job-store";

export interface RouteDeps {
  store: JobStore;
  orchestrator: ProcessingOrchestrator;
  broadcaster: StatusBroadcaster;
  artifacts: ArtifactStore;
  uploadsDir: string;
  maxUploadBytes: number;
  /** Expiry stamped on new uploads; replaced when the job reaches a terminal status. */
  uploadRetentionMs: number;
  heartbeatMs?: number;
  logger?: Logger;
}

export const AUDIO_EXTENSIONS = [".wav", ".mp3", ".m4a", ".aac", ".flac", ".ogg", ".opus", ".webm", ".mp4"];

const renameSpeakerBody = z.object({ label: z.string() });

const exportQuery = z.object({
  maxLineLength: z.coerce.number().int().min(10).max(200).optional(),
  speakers: z.enum(["true", "false"]).optional()
});

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return `${issue.path.join(".") || "body"}: ${issue.message}`;
}

export function buildRoutes(deps: RouteDeps): Router {
  const router = Router();
  const logger = deps.logger ?? silentLogger;
  const heartbeatMs = deps.heartbeatMs ?? 25_000;
  // Exports and speaker renames of one job run in turn, so a cached export never predates a rename.
  const jobLocks = new KeyedLock();

  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => cb(null, deps.uploadsDir),
    filename: (_req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase() || ".wav";
      cb(null, `${uuidv4()}${ext}`);
    }
  });

  const upload = multer({
    storage,
    limits: { fileSize: deps.maxUploadBytes },
    fileFilter: (_req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase();
      if (ext && !AUDIO_EXTENSIONS.includes(ext)) {
        cb(new ValidationError(`Unsupported audio type "${ext}". Use one of: ${AUDIO_EXTENSIONS.join(", ")}.`, "unsupported_audio"));
        return;
      }
      cb(null, true);
    }
  });

  router.post(
    "/jobs",
    upload.single("audio"),
    asyncHandler(async (req, res) => {
      if (!req.file) {
        throw new ValidationError("An audio file is required in the 'audio' field.", "audio_required");
      }

      const job = await deps.store.create({
        audioRef: req.file.path,
        originalFilename: req.file.originalname,
        expiresAt: new Date(Date.now() + deps.uploadRetentionMs)
      });
      await deps.orchestrator.enqueue(job.id);
      logger.info(`Job ${job.id} created for ${req.file.originalname}`);

      res.status(202).json({ id: job.id, statusUrl: `/api/jobs/${job.id}` });
    })
  );

  router.get(
    "/jobs/:id",
    asyncHandler(async (req, res) => {
      res.status(200).json(await deps.broadcaster.snapshot(req.params.id));
    })
  );

  router.post(
    "/jobs/:id/cancel",
    asyncHandler(async (req, res) => {
      const success = await deps.orchestrator.cancel(req.params.id);
      res.status(200).json({ success });
    })
  );

  router.get(
    "/jobs/:id/events",
    asyncHandler(async (req, res) => {
      const jobId = req.params.id;
      const snapshot = await deps.broadcaster.snapshot(jobId);

      const channel = new SseChannel(res);
      channel.open();
      channel.send({ type: "job_status_update", data: snapshot });
      deps.broadcaster.subscribe(jobId, channel);

      const heartbeat = setInterval(() => channel.heartbeat(), heartbeatMs);
      req.on("close", () => {
        clearInterval(heartbeat);
        deps.broadcaster.unsubscribe(jobId, channel);
        channel.close();
      });
    })
  );

  router.get(
    "/jobs/:id/transcript",
    asyncHandler(async (req, res) => {
      const job = await deps.store.get(req.params.id);
      if (!job) throw new JobNotFoundError(req.params.id);
      const transcript = job.status === "completed" ? await deps.store.getTranscript(job.id) : undefined;
      if (!transcript) throw new JobStateError(job.id, job.status, "read the transcript");

      const { rawProviderPayload: _payload, ...view } = transcript;
      res.status(200).json({ id: job.id, originalFilename: job.originalFilename, ...view });
    })
  );

  router.patch(
    "/jobs/:id/speakers/:speakerId",
    asyncHandler(async (req, res) => {
      const body = renameSpeakerBody.safeParse(req.body);
      if (!body.success) throw new ValidationError(firstIssue(body.error), "invalid_label");

      const { id, speakerId } = req.params;
      const speaker = await jobLocks.run(id, async () => {
        const renamed = await deps.store.renameSpeaker(id, speakerId, body.data.label);
        await deps.artifacts.removeExports(id);
        return renamed;
      });
      res.status(200).json(speaker);
    })
  );

  router.get(
    "/jobs/:id/export/:format",
    asyncHandler(async (req, res) => {
      const { id, format } = req.params;
      if (!isExportFormat(format)) {
        throw new ExportError("UnsupportedFormat", `Unsupported export format "${format}". Use one of: ${EXPORT_FORMATS.join(", ")}.`);
      }
      const query = exportQuery.safeParse(req.query);
      if (!query.success) throw new ValidationError(firstIssue(query.error), "invalid_export_options");

      const options: ExportOptions = {};
      if (query.data.maxLineLength !== undefined) options.maxLineLength = query.data.maxLineLength;
      if (query.data.speakers !== undefined) options.includeSpeakerLabels = query.data.speakers === "true";
      const cacheable = Object.keys(options).length === 0;

      const body = await jobLocks.run(id, async () => {
        const job = await deps.store.get(id);
        if (!job) throw new JobNotFoundError(id);
        const transcript = job.status === "completed" ? await deps.store.getTranscript(id) : undefined;
        if (!transcript) throw new JobStateError(id, job.status, "export");

        const cached = cacheable ? await deps.artifacts.readExport(id, format) : undefined;
        if (cached) return cached;
        const rendered = renderTranscript(transcript, format, options).body;
        if (cacheable) await deps.artifacts.writeExport(id, format, rendered);
        return rendered;
      });

      res.setHeader("Content-Type", contentTypeFor(format));
      res.setHeader("Content-Disposition", `attachment; filename="${id}.${format}"`);
      res.status(200).send(body);
    })
  );

  router.get("/queue", (_req, res) => {
    res.status(200).json({ depth: deps.orchestrator.queueDepth() });
  });

  return router;
}
