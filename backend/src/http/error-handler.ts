import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import multer from "multer";
import { ExportError, JobNotFoundError, JobStateError, PipelineError, ValidationError } from "../errors";
import type { Logger } from "../logger";

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/** Express 4 does not await handlers; forward rejections to the error middleware. */
export function asyncHandler(route: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    route(req, res, next).catch(next);
  };
}

interface HttpFailure {
  status: number;
  code: string;
  message: string;
}

export function toHttpFailure(error: unknown): HttpFailure {
  if (error instanceof JobNotFoundError) {
    return { status: 404, code: error.code, message: error.message };
  }
  if (error instanceof ExportError) {
    return { status: error.kind === "MissingTimingData" ? 422 : 400, code: error.code, message: error.message };
  }
  if (error instanceof JobStateError) {
    return { status: 409, code: error.code, message: error.message };
  }
  if (error instanceof ValidationError) {
    return { status: 400, code: error.code, message: error.message };
  }
  if (error instanceof multer.MulterError) {
    const status = error.code === "LIMIT_FILE_SIZE" ? 413 : 400;
    return { status, code: "upload_rejected", message: error.message };
  }
  return { status: 500, code: "internal_error", message: "Internal server error." };
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const failure = toHttpFailure(error);
    if (failure.status >= 500) {
      logger.error(`${req.method} ${req.originalUrl} failed`, error);
    } else if (error instanceof PipelineError) {
      logger.debug(`${req.method} ${req.originalUrl} -> ${failure.status} ${error.code}`);
    }
    res.status(failure.status).json({ error: failure.message, code: failure.code });
  };
}
