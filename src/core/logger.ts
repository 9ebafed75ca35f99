/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per line in production; pino-pretty in development.
 *
 * The `mixin` hook merges the ambient LogScope into every line, so anything
 * logged while a request is in flight carries that request's UserName, IP
 * and UserAgent without passing them around. Fields given at the call site
 * take precedence over the ambient ones.
 */
import { logScope } from '@infrastructure/logging/LogScope';
import pino from 'pino';

import { config } from './config';

export const logger = pino({
  level: config.log.level,
  mixin: () => ({ ...logScope.current() }),
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;
