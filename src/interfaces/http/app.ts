/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a fresh app per call: one per cluster worker, one per test file.
 *
 * Middleware order is the contract the traffic logger depends on. Nothing
 * ahead of it may end a request, or that request goes unlogged:
 *   1. requestTimer    — stamps req.requestStartTime for ElapsedMs.
 *   2. helmet()        — security headers.
 *   3. compression()   — outside the traffic logger, so it compresses the
 *                        bytes the logger releases and the log sees plain text.
 *   4. authentication  — optional host hook that sets req.user.
 *   5. trafficLogger   — ambient scope + request/response capture; runs the
 *                        body parsers itself (req.rawBody, req.body).
 *   6. cors()          — preflights answered here are logged like any other.
 *   7. Routes, then notFound and errorHandler (last).
 */
import type { TrafficLogger } from '@application/services/TrafficLogger';
import { config } from '@core/config';
import { container } from '@core/container';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { bodyBuffering } from '@interfaces/http/middleware/bodyBuffering';
import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { notFound } from '@interfaces/http/middleware/notFound';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { trafficLogger } from '@interfaces/http/middleware/trafficLogger';
import { diagnosticsRoutes } from '@interfaces/http/routes/diagnosticsRoutes';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import type { RequestHandler } from 'express';
import helmet from 'helmet';

export interface AppOptions {
  /** Host authentication step; whatever it puts on req.user is logged as UserName. */
  authentication?: RequestHandler;
}

export function createApp(options: AppOptions = {}): express.Express {
  const app = express();
  const interceptor = container.resolve<TrafficLogger>(TOKENS.TrafficLogger);
  const logger = container.resolve<Logger>(TOKENS.Logger);

  // Request timing (must be first)
  app.use(requestTimer);

  // Security & compression
  app.use(helmet());
  app.use(compression());

  if (options.authentication) {
    app.use(options.authentication);
  }

  // Traffic logging, body parsing included
  app.use(
    trafficLogger(interceptor, logger, {
      bodyParsers: bodyBuffering(config.http.bodyLimit),
      responseCaptureEnabled: config.capture.responseCaptureEnabled,
      responseMaxBytes: config.capture.responseMaxBytes,
    }),
  );

  app.use(cors());

  // Routes
  app.use('/api/v1', healthRoutes);
  app.use('/api/v1/diagnostics', diagnosticsRoutes);

  app.use(notFound);

  // Global error handler (must be registered last)
  app.use(errorHandler);

  return app;
}
