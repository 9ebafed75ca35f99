/**
 * Log Event Emitter
 * Layer: Application
 *
 * Builds a LogEvent from a template id and its fields, folds in whatever the
 * ambient LogScope holds, renders the message template and hands the result
 * to the sink. A sink failure is reported on the app logger and goes no
 * further: traffic logging never fails a request.
 */
import { TOKENS } from '@core/types';
import type { Logger } from '@core/logger';
import type { LogEvent, LogFields, LogTemplateId } from '@domain/entities/LogEvent';
import { LOG_TEMPLATES } from '@domain/entities/LogEvent';
import type { ILogEventSink } from '@domain/interfaces/ILogEventSink';
import type { LogScope } from '@infrastructure/logging/LogScope';
import { inject, injectable } from 'tsyringe';

@injectable()
export class LogEventEmitter {
  constructor(
    @inject(TOKENS.LogEventSink) private readonly sink: ILogEventSink,
    @inject(TOKENS.LogScope) private readonly scope: LogScope,
    @inject(TOKENS.Logger) private readonly logger: Logger,
  ) {}

  emit(template: LogTemplateId, fields: LogFields): LogEvent {
    const merged = { ...this.scope.current(), ...fields };
    const event: LogEvent = Object.freeze({
      template,
      message: renderTemplate(LOG_TEMPLATES[template], merged),
      fields: Object.freeze(merged),
    });

    try {
      this.sink.write(event);
    } catch (err) {
      this.logger.warn({ err, event: template }, 'Traffic log event could not be written');
    }
    return event;
  }
}

/** Replaces `{Name}` tokens with field values; unknown tokens stay as written. */
export function renderTemplate(template: string, fields: LogFields): string {
  return template.replace(/\{(\w+)\}/g, (token, name: string) => {
    const value = fields[name];
    if (value === undefined) return token;
    return typeof value === 'object' ? JSON.stringify(value) : String(value);
  });
}
