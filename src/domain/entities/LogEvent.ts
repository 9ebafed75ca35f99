/**
 * Traffic Log Event
 * Layer: Domain
 *
 * One record per phase per request. The template id says which variant it
 * is; `fields` already contains the ambient scope (UserName, IP, UserAgent)
 * merged under the event's own fields, and `message` is the rendered
 * message template. Events are frozen once built and handed straight to the
 * sink.
 */
export const LOG_TEMPLATES = {
  RequestCaptured: 'HTTP Request: {RequestMethod} {RequestPath}',
  RequestSkipped: 'HTTP Request: {RequestMethod} {RequestPath} (Body Skipped)',
  ResponseCaptured: 'HTTP Response: {RequestMethod} {RequestPath} {StatusCode}',
  ResponseSkipped: 'HTTP Response: {RequestMethod} {RequestPath} {StatusCode} (Body Skipped)',
} as const;

export type LogTemplateId = keyof typeof LOG_TEMPLATES;

export type LogFieldValue = string | number | boolean | Readonly<Record<string, string>>;

export type LogFields = Readonly<Record<string, LogFieldValue>>;

export interface LogEvent {
  readonly template: LogTemplateId;
  readonly message: string;
  readonly fields: LogFields;
}

/** Property names shared by events, the ambient scope and the log sink. */
export const LOG_PROPERTIES = {
  UserName: 'UserName',
  IP: 'IP',
  UserAgent: 'UserAgent',
  RequestHeaders: 'RequestHeaders',
  RequestBody: 'RequestBody',
  ResponseBody: 'ResponseBody',
  RequestMethod: 'RequestMethod',
  RequestPath: 'RequestPath',
  StatusCode: 'StatusCode',
  ElapsedMs: 'ElapsedMs',
  Error: 'Error',
} as const;
