import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { PipelineError, type PipelineErrorCode } from '../errors';
import { logger } from '../logger';

const STATUS_BY_CODE: Record<PipelineErrorCode, number> = {
  PARSE_FAILED: 422,
  RECOVERY_FAILED: 422,
  ASSEMBLY_FAILED: 422,
  PROVIDERS_EXHAUSTED: 502,
  UPLOAD_FAILED: 502
};

export function statusFor(err: Error, current: number): number {
  if (err instanceof PipelineError) return STATUS_BY_CODE[err.code];
  // body-parser and http-errors set their own status
  if ('status' in err && typeof err.status === 'number' && err.status >= 400) return err.status;
  return current >= 400 ? current : 500;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (res.headersSent) return;
  const message = err.message || 'Internal server error';
  const status = statusFor(err, res.statusCode);

  logger.error('Request error', err, { status, path: req.path });

  res.status(status).json({
    error: config.isProd && status === 500 ? 'Internal server error' : message,
    ...(err instanceof PipelineError ? { code: err.code } : {})
  });
}
