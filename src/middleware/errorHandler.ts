import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../config/logger';
import { PipelineError, PipelineErrorCode } from '../errors/pipeline.errors';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = 'AppError';
  }
}

const PIPELINE_STATUS: Record<PipelineErrorCode, number> = {
  INCOMPLETE_SPEECH: 409,
  SEGMENT_SEQUENCE: 409,
  TEXT_NOT_FOUND: 404,
  EXTERNAL_CALL_TIMEOUT: 504,
  ALIGNMENT_FAILED: 502,
  MIXING_FAILED: 500,
  PIPELINE_CANCELLED: 409,
};

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/** Forward rejections from async route handlers to the error middleware. */
export const asyncHandler =
  (fn: AsyncRoute): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  // Express recognizes error middleware by arity
  _next: NextFunction
): void => {
  let statusCode = 500;
  let code: string | undefined;

  if (err instanceof AppError) {
    statusCode = err.statusCode;
  } else if (err instanceof PipelineError) {
    statusCode = PIPELINE_STATUS[err.code];
    code = err.code;
  }

  if (statusCode >= 500) {
    logger.error('Request failed', {
      method: req.method,
      path: req.path,
      error: err.message,
      stack: err.stack,
    });
  } else {
    logger.warn('Request rejected', { method: req.method, path: req.path, statusCode, error: err.message });
  }

  res.status(statusCode).json({
    success: false,
    error: {
      message: statusCode >= 500 && !code ? 'Internal server error' : err.message,
      ...(code ? { code } : {}),
    },
  });
};
