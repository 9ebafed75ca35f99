/**
 * Traffic Logger Middleware (Express adapter)
 * Layer: Interfaces (HTTP)
 *
 * Maps one Express req/res pair onto an HttpExchange and runs it through the
 * TrafficLogger. Mounted ahead of cors and routing so that every request
 * that reaches the app produces its pair of events.
 *
 * The body parsers run here, before the request phase, with their failures
 * held back: a malformed or oversized body is still logged (skipped when
 * no bytes were kept) and the parser's error is handed to the downstream
 * chain, where the error handler turns it into the 4xx the response phase
 * then logs. The request body is the bytes the parsers kept on req.rawBody.
 *
 * "The downstream chain returned" means the chain ended the response, which
 * is also when Express's error handler has turned a thrown error into a
 * 500, so handler failures are logged as ordinary responses.
 *
 * With response capture on, the response is held in a ResponseBuffer while
 * it can still be captured and goes out unchanged once the TrafficLogger is
 * done. With it off nothing is held. A client that hangs up mid-request is
 * reported at warn level; there is nothing left to send it.
 */
import type { TrafficLogger } from '@application/services/TrafficLogger';
import type { Logger } from '@core/logger';
import type { HttpExchange, TrafficResponse } from '@domain/interfaces/IHttpExchange';
import { MemoryBodyStream } from '@infrastructure/http/MemoryBodyStream';
import { ClientClosedError } from '@shared/errors/AppError';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

import { PassThroughResponse, ResponseBuffer } from './responseBuffering';
import type { ResponseTracker } from './responseBuffering';

export interface TrafficLoggerOptions {
  /** Run in order until one consumes the body; see bodyBuffering(). */
  bodyParsers: readonly RequestHandler[];
  responseCaptureEnabled: boolean;
  /** Exclusive ceiling; a response is only held in memory below it. */
  responseMaxBytes: number;
}

export function trafficLogger(
  interceptor: TrafficLogger,
  logger: Logger,
  options: TrafficLoggerOptions,
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const parseError = await parseBody(options.bodyParsers, req, res);
    const tracker: ResponseTracker = options.responseCaptureEnabled
      ? new ResponseBuffer(res, options.responseMaxBytes)
      : new PassThroughResponse(res);
    const exchange = toExchange(req, tracker);

    try {
      await interceptor.invoke(exchange, () => {
        if (parseError === undefined) next();
        else next(parseError);
        return tracker.ended();
      });
    } catch (err) {
      if (!(err instanceof ClientClosedError)) throw err;
      logger.warn({ method: req.method, path: req.path }, err.message);
    } finally {
      tracker.flush();
    }
  };
}

/** Runs the parsers in order; resolves with the first error instead of forwarding it. */
export async function parseBody(
  parsers: readonly RequestHandler[],
  req: Request,
  res: Response,
): Promise<unknown> {
  for (const parser of parsers) {
    const error = await new Promise<unknown>((resolve) => {
      try {
        void Promise.resolve(parser(req, res, (err?: unknown) => resolve(err))).catch(resolve);
      } catch (err) {
        resolve(err);
      }
    });
    if (error !== undefined && error !== null) return error;
  }
  return undefined;
}

export function toExchange(req: Request, tracker: ResponseTracker): HttpExchange {
  const response: TrafficResponse = {
    get statusCode() {
      return tracker.res.statusCode;
    },
    get contentLength() {
      return tracker.bodyHeld ? tracker.contentLength : undefined;
    },
    body: tracker.body,
  };

  return {
    request: {
      method: req.method,
      path: req.path,
      headers: distinctHeaders(req),
      contentLength: requestBodyLength(req),
      body: new MemoryBodyStream(req.rawBody ?? Buffer.alloc(0)),
      principal: req.user,
      remoteAddress: req.ip ?? req.socket.remoteAddress,
    },
    response,
    startedAt: req.requestStartTime,
  };
}

/**
 * The declared length, unless the parsers kept no bytes (the body was
 * refused) or inflated an encoded body, in which case the kept bytes are
 * what gets logged and their length is the one that counts.
 */
export function requestBodyLength(req: Request): number | undefined {
  const declared = parseContentLength(req.headers['content-length']);
  if (declared === undefined || declared === 0) return declared;
  if (req.rawBody === undefined) return undefined;
  return req.headers['content-encoding'] === undefined ? declared : req.rawBody.length;
}

function distinctHeaders(req: Request): Record<string, readonly string[]> {
  const headers: Record<string, readonly string[]> = {};
  for (const [name, values] of Object.entries(req.headersDistinct)) {
    if (values) headers[name] = values;
  }
  return headers;
}

export function parseContentLength(header: string | undefined): number | undefined {
  if (header === undefined || header.trim() === '') return undefined;
  const value = Number(header);
  return Number.isInteger(value) && value >= 0 ? value : undefined;
}
