/**
 * HTTP Exchange Interface
 * Layer: Domain
 *
 * The host-neutral view of one request/response pair that the TrafficLogger
 * works against. The Express adapter (interfaces/http/middleware/trafficLogger.ts)
 * builds it from req/res; tests build it by hand.
 */
import type { ISeekableBody } from './ISeekableBody';

export interface Principal {
  readonly name?: string;
  readonly isAuthenticated: boolean;
}

export interface TrafficRequest {
  readonly method: string;
  readonly path: string;
  /** Header name → every value received for it. */
  readonly headers: Readonly<Record<string, readonly string[]>>;
  readonly contentLength?: number;
  readonly body: ISeekableBody;
  readonly principal?: Principal;
  readonly remoteAddress?: string;
}

export interface TrafficResponse {
  /** Read after the downstream chain returns, so it is a live value. */
  readonly statusCode: number;
  readonly contentLength?: number;
  readonly body: ISeekableBody;
}

export interface HttpExchange {
  readonly request: TrafficRequest;
  readonly response: TrafficResponse;
  /** Wall-clock ms at which the host accepted the request, when known. */
  readonly startedAt?: number;
}

/** The rest of the handler chain. */
export type NextHandler = () => Promise<void>;
