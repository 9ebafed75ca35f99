/**
 * Response Tracking
 * Layer: Interfaces (HTTP)
 *
 * `ended()` is the host's notion of "the downstream chain returned": it
 * resolves once the chain has ended the response, and rejects with a
 * ClientClosedError when the client hangs up first.
 *
 * Two flavours:
 *
 *   ResponseBuffer       response capture on. Patched `res.write` / `res.end`
 *                        hold the body in memory until `flush()`, but only
 *                        while it can still be captured: once the declared
 *                        length is missing or reaches the ceiling, or the
 *                        bytes held reach it, everything held so far goes
 *                        out and the rest streams straight through.
 *   PassThroughResponse  response capture off. Nothing is patched; the
 *                        chain has returned when the response finishes.
 */
import { isWithinCeiling } from '@application/policies/CapturePolicy';
import { MemoryBodyStream } from '@infrastructure/http/MemoryBodyStream';
import { ClientClosedError } from '@shared/errors/AppError';
import type { Response } from 'express';

type WriteCallback = (error?: Error | null) => void;

export abstract class ResponseTracker {
  readonly body = new MemoryBodyStream();

  protected isEnded = false;
  protected isClosed = false;
  private waiters: Array<{ resolve: () => void; reject: (err: Error) => void }> = [];

  constructor(readonly res: Response) {
    res.once('close', () => {
      if (this.isEnded) return;
      this.isClosed = true;
      this.settle(new ClientClosedError());
    });
  }

  get contentLength(): number | undefined {
    const header = this.res.getHeader('content-length');
    const value = Array.isArray(header) ? header[0] : header;
    if (value === undefined) return undefined;
    const parsed = Number(value);
    return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
  }

  ended(): Promise<void> {
    if (this.isEnded) return Promise.resolve();
    if (this.isClosed) return Promise.reject(new ClientClosedError());
    return new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /** Whether `body` holds the whole response, i.e. it can be captured. */
  abstract get bodyHeld(): boolean;

  /** Called once the traffic logger is done with the response. */
  abstract flush(): void;

  protected markEnded(): void {
    if (this.isEnded) return;
    this.isEnded = true;
    this.settle();
  }

  private settle(error?: Error): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (error) waiter.reject(error);
      else waiter.resolve();
    }
  }
}

export class PassThroughResponse extends ResponseTracker {
  constructor(res: Response) {
    super(res);
    res.once('finish', () => this.markEnded());
  }

  get bodyHeld(): boolean {
    return false;
  }

  flush(): void {
    // nothing held back
  }
}

export class ResponseBuffer extends ResponseTracker {
  private readonly originalWrite: Response['write'];
  private readonly originalEnd: Response['end'];
  private readonly pendingCallbacks: WriteCallback[] = [];
  private isPassingThrough = false;
  private isFlushed = false;

  constructor(
    res: Response,
    private readonly maxBytes: number,
  ) {
    super(res);
    this.originalWrite = res.write;
    this.originalEnd = res.end;

    res.write = (
      chunk: unknown,
      encodingOrCallback?: BufferEncoding | WriteCallback,
      callback?: WriteCallback,
    ): boolean => {
      const encoding = typeof encodingOrCallback === 'string' ? encodingOrCallback : undefined;
      const cb = typeof encodingOrCallback === 'function' ? encodingOrCallback : callback;
      this.body.append(toBuffer(chunk, encoding));
      if (cb) this.pendingCallbacks.push(cb);
      if (this.isPastCeiling()) this.passThrough();
      return true;
    };

    res.end = (
      chunkOrCallback?: unknown,
      encodingOrCallback?: BufferEncoding | (() => void),
      callback?: () => void,
    ): Response => {
      const { chunk, cb } = endArguments(chunkOrCallback, encodingOrCallback, callback);

      if (this.isPassingThrough) {
        this.res.end = this.originalEnd;
        this.res.end(chunk, cb);
      } else {
        this.body.append(chunk);
        if (cb) this.pendingCallbacks.push(cb);
        if (this.isPastCeiling()) {
          this.passThrough();
          this.res.end = this.originalEnd;
          this.res.end();
        }
      }

      this.markEnded();
      return res;
    };
  }

  get bodyHeld(): boolean {
    return !this.isPassingThrough;
  }

  /** Restores the real write/end and, if the chain ended the response, sends it. */
  flush(): void {
    if (this.isFlushed) return;
    this.isFlushed = true;
    this.res.write = this.originalWrite;
    this.res.end = this.originalEnd;

    if (!this.isEnded || this.isClosed || this.isPassingThrough) return;

    const callbacks = this.pendingCallbacks.splice(0);
    this.res.end(this.body.toBuffer(), () => {
      for (const cb of callbacks) cb();
    });
  }

  private isPastCeiling(): boolean {
    return !isWithinCeiling(this.contentLength, this.maxBytes) || this.body.length >= this.maxBytes;
  }

  /** Sends what is held so far; later writes go straight to the socket. */
  private passThrough(): void {
    this.isPassingThrough = true;
    this.res.write = this.originalWrite;

    const held = this.body.toBuffer();
    const callbacks = this.pendingCallbacks.splice(0);
    if (held.length > 0) {
      this.res.write(held, () => {
        for (const cb of callbacks) cb();
      });
    } else {
      for (const cb of callbacks) cb();
    }
  }
}

function endArguments(
  chunkOrCallback: unknown,
  encodingOrCallback: BufferEncoding | (() => void) | undefined,
  callback: (() => void) | undefined,
): { chunk: Buffer; cb: (() => void) | undefined } {
  if (typeof chunkOrCallback === 'function') {
    return { chunk: Buffer.alloc(0), cb: () => chunkOrCallback() };
  }
  const encoding = typeof encodingOrCallback === 'string' ? encodingOrCallback : undefined;
  const cb = typeof encodingOrCallback === 'function' ? encodingOrCallback : callback;
  return { chunk: toBuffer(chunkOrCallback, encoding), cb };
}

function toBuffer(chunk: unknown, encoding: BufferEncoding | undefined): Buffer {
  if (chunk === undefined || chunk === null) return Buffer.alloc(0);
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk), encoding ?? 'utf8');
}
