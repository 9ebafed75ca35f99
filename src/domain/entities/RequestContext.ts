/**
 * Request Context
 * Layer: Domain
 *
 * Who is calling and from where. Built once when a request enters the
 * TrafficLogger and never mutated; the three caller fields are what end up
 * in the ambient log scope, method/path label every traffic event.
 */
export interface RequestContext {
  /** Authenticated principal's name, or ANONYMOUS_USER_NAME. */
  readonly userName: string;
  /** String form of the peer address; empty when the socket is already gone. */
  readonly ip: string;
  /** Raw User-Agent header (multiple values joined by ','), or empty. */
  readonly userAgent: string;
  readonly method: string;
  readonly path: string;
}

export const ANONYMOUS_USER_NAME = '*';
