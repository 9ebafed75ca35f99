/**
 * Body Capture Service
 * Layer: Application
 *
 * The two capture phases of the TrafficLogger. Each emits exactly one
 * event, Captured or Skipped, and leaves the body readable from offset 0
 * for whoever reads it next.
 *
 * Request phase: the declared length sizes a pooled buffer; the body is
 * read until that many bytes arrive or the stream reports its end. A short
 * read is logged as-is. Decoding is lossy UTF-8 (invalid sequences become
 * U+FFFD), so odd bytes never turn into an error.
 *
 * Response phase: the host has buffered the response, so it is rewound,
 * read to the end, and rewound again before the transport sees it.
 */
import { CapturePolicy } from '@application/policies/CapturePolicy';
import { TOKENS } from '@core/types';
import type { Logger } from '@core/logger';
import type { LogFields } from '@domain/entities/LogEvent';
import { LOG_PROPERTIES } from '@domain/entities/LogEvent';
import type { RequestContext } from '@domain/entities/RequestContext';
import type { IBufferPool } from '@domain/interfaces/IBufferPool';
import type { HttpExchange } from '@domain/interfaces/IHttpExchange';
import type { ISeekableBody } from '@domain/interfaces/ISeekableBody';
import { AppError } from '@shared/errors/AppError';
import { inject, injectable } from 'tsyringe';

import { flattenHeaders } from './ContextEnricher';
import { LogEventEmitter } from './LogEventEmitter';

const SYNTHETIC_FAILURE_STATUS = 500;

@injectable()
export class BodyCaptureService {
  constructor(
    @inject(TOKENS.CapturePolicy) private readonly policy: CapturePolicy,
    @inject(TOKENS.BufferPool) private readonly pool: IBufferPool,
    @inject(TOKENS.LogEventEmitter) private readonly emitter: LogEventEmitter,
    @inject(TOKENS.Logger) private readonly logger: Logger,
  ) {}

  async captureRequest(exchange: HttpExchange, context: RequestContext): Promise<void> {
    const { request } = exchange;
    const fields: LogFields = {
      [LOG_PROPERTIES.RequestHeaders]: flattenHeaders(request.headers),
      [LOG_PROPERTIES.RequestMethod]: context.method,
      [LOG_PROPERTIES.RequestPath]: context.path,
    };

    const length = request.contentLength;
    if (length === undefined || !this.policy.shouldCaptureRequest(length)) {
      this.emitter.emit('RequestSkipped', fields);
      return;
    }

    const text = await this.pool.use(length, async (buffer) => {
      const read = await this.readUpTo(request.body, buffer, length);
      return decodeUtf8(buffer, read);
    });

    this.emitter.emit('RequestCaptured', { ...fields, [LOG_PROPERTIES.RequestBody]: text });
  }

  async captureResponse(exchange: HttpExchange, context: RequestContext): Promise<void> {
    const { response } = exchange;
    const fields: LogFields = {
      [LOG_PROPERTIES.RequestMethod]: context.method,
      [LOG_PROPERTIES.RequestPath]: context.path,
      [LOG_PROPERTIES.StatusCode]: response.statusCode,
      ...elapsedField(exchange),
    };

    if (!this.policy.shouldCaptureResponse(response.contentLength)) {
      this.emitter.emit('ResponseSkipped', fields);
      return;
    }

    let text: string;
    try {
      response.body.seek(0);
      const content = await response.body.readToEnd();
      text = decodeUtf8(content, content.length);
    } catch (err) {
      this.logger.warn({ err }, 'Response body could not be read for logging');
      this.emitter.emit('ResponseSkipped', fields);
      return;
    } finally {
      rewind(response.body);
    }

    this.emitter.emit('ResponseCaptured', { ...fields, [LOG_PROPERTIES.ResponseBody]: text });
  }

  /**
   * Response phase for a downstream chain that threw. The body is never read.
   * The status is the AppError's own (499 for a client that hung up), else
   * the response's when it already signals an error, else a synthetic 500.
   */
  reportFailedResponse(exchange: HttpExchange, context: RequestContext, error: unknown): void {
    this.emitter.emit('ResponseSkipped', {
      [LOG_PROPERTIES.RequestMethod]: context.method,
      [LOG_PROPERTIES.RequestPath]: context.path,
      [LOG_PROPERTIES.StatusCode]: failureStatus(exchange.response.statusCode, error),
      [LOG_PROPERTIES.Error]: error instanceof Error ? error.message : String(error),
      ...elapsedField(exchange),
    });
  }

  /** Fills `buffer` with up to `count` bytes, stopping early at end of body. */
  private async readUpTo(body: ISeekableBody, buffer: Buffer, count: number): Promise<number> {
    let total = 0;
    try {
      while (total < count) {
        const read = await body.read(buffer, total, count - total);
        if (read <= 0) break;
        total += read;
      }
    } catch (err) {
      this.logger.warn({ err, bytesRead: total }, 'Request body read failed; logging partial body');
    } finally {
      rewind(body);
    }

    if (total < count) {
      this.logger.debug({ declared: count, bytesRead: total }, 'Short request body read');
    }
    return total;
  }
}

export function decodeUtf8(bytes: Buffer, length: number): string {
  return bytes.toString('utf8', 0, length);
}

function failureStatus(responseStatus: number, error: unknown): number {
  if (error instanceof AppError) return error.statusCode;
  return responseStatus >= 400 ? responseStatus : SYNTHETIC_FAILURE_STATUS;
}

function rewind(body: ISeekableBody): void {
  body.seek(0);
}

function elapsedField(exchange: HttpExchange): LogFields {
  return exchange.startedAt === undefined
    ? {}
    : { [LOG_PROPERTIES.ElapsedMs]: Date.now() - exchange.startedAt };
}
