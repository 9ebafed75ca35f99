/**
 * Context Enricher
 * Layer: Application
 *
 * Turns the incoming request into a RequestContext and into the fields the
 * ambient log scope carries. Nothing here can fail: an unauthenticated
 * caller becomes '*', a missing User-Agent or peer address becomes ''.
 */
import type { RequestContext } from '@domain/entities/RequestContext';
import { ANONYMOUS_USER_NAME } from '@domain/entities/RequestContext';
import type { LogFields } from '@domain/entities/LogEvent';
import { LOG_PROPERTIES } from '@domain/entities/LogEvent';
import type { TrafficRequest } from '@domain/interfaces/IHttpExchange';

const USER_AGENT_HEADER = 'user-agent';

export function deriveRequestContext(request: TrafficRequest): RequestContext {
  const { principal } = request;
  const userName =
    principal?.isAuthenticated && principal.name ? principal.name : ANONYMOUS_USER_NAME;

  return Object.freeze({
    userName,
    ip: request.remoteAddress ?? '',
    userAgent: headerValue(request.headers, USER_AGENT_HEADER),
    method: request.method,
    path: request.path,
  });
}

export function toScopeFields(context: RequestContext): LogFields {
  return {
    [LOG_PROPERTIES.UserName]: context.userName,
    [LOG_PROPERTIES.IP]: context.ip,
    [LOG_PROPERTIES.UserAgent]: context.userAgent,
  };
}

/** Header multi-map → one string per header, repeated values joined by ','. */
export function flattenHeaders(
  headers: Readonly<Record<string, readonly string[]>>,
): Readonly<Record<string, string>> {
  const flat: Record<string, string> = {};
  for (const [name, values] of Object.entries(headers)) {
    flat[name] = values.join(',');
  }
  return flat;
}

function headerValue(headers: Readonly<Record<string, readonly string[]>>, name: string): string {
  const match = Object.keys(headers).find((key) => key.toLowerCase() === name);
  return match ? (headers[match] ?? []).join(',') : '';
}
