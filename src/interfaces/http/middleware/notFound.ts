import { NotFoundError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

/** Catch-all for unmatched routes; hands a 404 to the error handler. */
export function notFound(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError('Route', `${req.method} ${req.path}`));
}
