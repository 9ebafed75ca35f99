/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps the moment a request enters the pipeline. Registered first so the
 * traffic logger's ElapsedMs covers body buffering and every middleware
 * after it.
 */
import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}
