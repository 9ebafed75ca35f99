/**
 * Recording Sink
 * Layer: Test Helpers
 *
 * An ILogEventSink that keeps every event in memory, in arrival order, so a
 * test can assert exactly which events a request produced.
 */
import type { LogEvent, LogTemplateId } from '@domain/entities/LogEvent';
import type { ILogEventSink } from '@domain/interfaces/ILogEventSink';

export class RecordingSink implements ILogEventSink {
  readonly events: LogEvent[] = [];

  write(event: LogEvent): void {
    this.events.push(event);
  }

  templates(): LogTemplateId[] {
    return this.events.map((event) => event.template);
  }
}
