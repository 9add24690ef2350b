/**
 * Maps typed errors to HTTP responses.
 */

import type { NextFunction, Request, Response } from 'express';
import { ApiError, DataValidationError, NotFoundError, getErrorMessage } from '../../errors/index.js';
import { createLogger } from '../../helpers/logger.js';

const log = createLogger('Server');

export function statusFor(error: unknown): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof DataValidationError) return 400;
  if (error instanceof ApiError) return 502;
  return 500;
}

const ERROR_LABELS: Record<number, string> = {
  400: 'Invalid request',
  404: 'Not found',
  502: 'Upstream service unavailable',
  500: 'Internal server error',
};

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const status = statusFor(err);
  if (status >= 500) {
    log.error('Request failed:', err);
  }

  res.status(status).json({
    error: ERROR_LABELS[status],
    message: getErrorMessage(err),
    ...(err instanceof ApiError ? { platform: err.platform } : {}),
    ...(err instanceof DataValidationError ? { field: err.field } : {}),
  });
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found' });
}
