/**
 * Ambient Log Scope
 * Layer: Infrastructure
 *
 * Fields pushed here are attached to every line the app logger writes for
 * the rest of the current async call chain (core/logger.ts reads them via
 * pino's `mixin`). A scope lives exactly as long as the callback passed to
 * `run`: when the returned promise settles, resolved or rejected, the
 * previous fields are back in effect. Nested scopes see the outer fields,
 * with inner values winning on key clashes.
 *
 * Backed by AsyncLocalStorage, so concurrent requests never see each
 * other's fields.
 */
import { AsyncLocalStorage } from 'node:async_hooks';

import type { LogFields } from '@domain/entities/LogEvent';

const EMPTY: LogFields = Object.freeze({});

export class LogScope {
  private readonly storage = new AsyncLocalStorage<LogFields>();

  current(): LogFields {
    return this.storage.getStore() ?? EMPTY;
  }

  run<T>(fields: LogFields, fn: () => Promise<T>): Promise<T> {
    const merged = Object.freeze({ ...this.current(), ...fields });
    return this.storage.run(merged, fn);
  }
}

export const logScope = new LogScope();
