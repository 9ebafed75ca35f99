import type { LogEvent } from '@domain/entities/LogEvent';

/** Where composed traffic events go. Delivery semantics belong to the sink. */
export interface ILogEventSink {
  write(event: LogEvent): void;
}
