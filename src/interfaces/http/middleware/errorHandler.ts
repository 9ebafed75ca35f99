/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Last in the chain. Express 5 forwards rejected async handlers here too.
 *
 *   - Operational AppError: logged at warn, its statusCode and message go
 *     back to the client.
 *   - Anything else: logged at error, the client gets a generic 500.
 *
 * Because the traffic logger's scope is still open while this runs, both
 * log lines carry the caller's UserName, IP and UserAgent.
 *
 * Express only treats it as an error handler because it takes four
 * parameters.
 */
import { logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError && err.isOperational) {
    logger.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
    });
    return;
  }

  const statusCode = statusOf(err);
  if (statusCode !== undefined && statusCode < 500) {
    logger.warn({ statusCode, message: err.message }, 'Request rejected');
    res.status(statusCode).json({ status: 'error', message: err.message });
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
}

/** http-errors style status from body-parser and friends (413, 400, ...). */
function statusOf(err: Error): number | undefined {
  const candidate: unknown = 'status' in err ? err.status : undefined;
  return typeof candidate === 'number' && candidate >= 400 && candidate < 600 ? candidate : undefined;
}
