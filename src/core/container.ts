/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The one place where tokens meet implementations. `reflect-metadata` must
 * load before any @injectable class is evaluated.
 *
 *   - `useValue` for process-wide singletons built here (logger, scope,
 *     capture config, buffer pool)
 *   - `useClass` + Lifecycle.Singleton for the stateless services, so the
 *     whole app shares one TrafficLogger and one pool behind it
 */
import 'reflect-metadata';
import { container, Lifecycle } from 'tsyringe';

import { CapturePolicy } from '@application/policies/CapturePolicy';
import { BodyCaptureService } from '@application/services/BodyCaptureService';
import { LogEventEmitter } from '@application/services/LogEventEmitter';
import { TrafficLogger } from '@application/services/TrafficLogger';
import { BufferPool } from '@infrastructure/buffers/BufferPool';
import { logScope } from '@infrastructure/logging/LogScope';
import { PinoLogEventSink } from '@infrastructure/logging/PinoLogEventSink';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.LogScope, { useValue: logScope });
container.register(TOKENS.CaptureConfig, { useValue: config.capture });
container.register(TOKENS.BufferPool, { useValue: new BufferPool(config.bufferPool) });

container.register(TOKENS.LogEventSink, { useClass: PinoLogEventSink }, { lifecycle: Lifecycle.Singleton });
container.register(TOKENS.CapturePolicy, { useClass: CapturePolicy }, { lifecycle: Lifecycle.Singleton });
container.register(TOKENS.LogEventEmitter, { useClass: LogEventEmitter }, { lifecycle: Lifecycle.Singleton });
container.register(
  TOKENS.BodyCaptureService,
  { useClass: BodyCaptureService },
  { lifecycle: Lifecycle.Singleton },
);
container.register(TOKENS.TrafficLogger, { useClass: TrafficLogger }, { lifecycle: Lifecycle.Singleton });

export { container };
