/**
 * Diagnostics Routes
 * Layer: Interfaces (HTTP)
 *
 * Endpoints for checking what the traffic logger records, end to end:
 *
 *   POST /api/v1/diagnostics/echo    → the request body back, same content type
 *   GET  /api/v1/diagnostics/stream  → chunked text, no Content-Length
 *   GET  /api/v1/diagnostics/fail    → throws; the error handler answers 500
 */
import { logger } from '@core/logger';
import { Router } from 'express';

const router = Router();

router.post('/echo', (req, res) => {
  const body = req.rawBody ?? Buffer.alloc(0);
  logger.debug({ bytes: body.length }, 'Echoing request body');
  res.status(200).type(req.get('content-type') ?? 'application/octet-stream').send(body);
});

router.get('/stream', (_req, res) => {
  res.status(200).type('text/plain');
  res.write('chunk-1\n');
  res.write('chunk-2\n');
  res.end();
});

router.get('/fail', () => {
  throw new Error('Diagnostic failure');
});

export { router as diagnosticsRoutes };
