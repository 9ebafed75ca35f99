/**
 * Express / Node Request Augmentation
 * Layer: Shared (type declarations)
 *
 * requestStartTime: set by the requestTimer middleware, read by the traffic
 *   logger adapter to report ElapsedMs.
 * user: the authenticated principal, filled in by whatever authentication
 *   handler the host mounts ahead of the traffic logger.
 * rawBody: the exact request bytes, retained by the body parsers' `verify`
 *   hook. Declared on IncomingMessage because that is what `verify` receives.
 */
import type { Principal } from '@domain/interfaces/IHttpExchange';

declare global {
  namespace Express {
    interface Request {
      requestStartTime?: number;
      user?: Principal;
    }
  }
}

declare module 'http' {
  interface IncomingMessage {
    rawBody?: Buffer;
  }
}

export {};
