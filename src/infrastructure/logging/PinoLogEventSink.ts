/**
 * Pino Log Event Sink
 * Layer: Infrastructure
 *
 * Writes traffic events through the app logger at info level. The event's
 * fields already include the ambient scope, so the mixin's copy of the same
 * keys is simply overwritten with identical values.
 */
import { TOKENS } from '@core/types';
import type { Logger } from '@core/logger';
import type { LogEvent } from '@domain/entities/LogEvent';
import type { ILogEventSink } from '@domain/interfaces/ILogEventSink';
import { inject, injectable } from 'tsyringe';

@injectable()
export class PinoLogEventSink implements ILogEventSink {
  constructor(@inject(TOKENS.Logger) private readonly logger: Logger) {}

  write(event: LogEvent): void {
    this.logger.info({ event: event.template, ...event.fields }, event.message);
  }
}
