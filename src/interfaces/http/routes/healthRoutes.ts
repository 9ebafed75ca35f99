/**
 * Health Check Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/v1/health  →  { status: 'ok', uptime, timestamp, capture: { request, response } }
 *
 * Liveness only: it says the process is serving and which capture phases
 * are switched on, nothing about downstream dependencies.
 */
import { config } from '@core/config';
import { Router } from 'express';

const router = Router();

router.get('/health', (_req, res) => {
  res.status(200).json({
    status: 'ok',
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
    capture: {
      request: config.capture.requestCaptureEnabled,
      response: config.capture.responseCaptureEnabled,
    },
  });
});

export { router as healthRoutes };
