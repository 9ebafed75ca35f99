/**
 * Buffer Pool — Size-Classed Free Lists
 * Layer: Infrastructure
 *
 * Capture buffers are leased per request and handed back right after the
 * body has been decoded, so the same few sizes are allocated over and over.
 * The pool keeps a free list per power-of-two size class (16 B up to
 * `maxClassBytes`) and serves a lease from the smallest class that fits.
 *
 *   lease(300)  → 512-byte buffer (reused if one is free, else allocUnsafe)
 *   release(b)  → back onto the 512 list, unless that list is full
 *
 * Leases above the largest class are exact one-off allocations and are
 * dropped on release. Buffers are never zeroed: a lessee reads back only
 * what it wrote.
 *
 * Every method is synchronous, so on the event loop a lease or release
 * runs to completion before any other request's code can touch the lists.
 * The `leased` set is what makes a double or foreign release detectable.
 */
import type { IBufferPool } from '@domain/interfaces/IBufferPool';
import { BufferPoolError } from '@shared/errors/AppError';

export interface BufferPoolOptions {
  maxClassBytes: number;
  maxPerClass: number;
}

export interface BufferPoolStats {
  leased: number;
  pooled: number;
}

export const MIN_CLASS_BYTES = 16;

export class BufferPool implements IBufferPool {
  private readonly freeLists = new Map<number, Buffer[]>();
  private readonly leased = new Set<Buffer>();
  private readonly maxClassBytes: number;
  private readonly maxPerClass: number;

  constructor(options: BufferPoolOptions) {
    this.maxClassBytes = sizeClassFor(Math.max(options.maxClassBytes, MIN_CLASS_BYTES));
    this.maxPerClass = options.maxPerClass;
  }

  lease(size: number): Buffer {
    if (!Number.isInteger(size) || size < 0) {
      throw new BufferPoolError(`Invalid lease size: ${size}`);
    }

    const sizeClass = sizeClassFor(size);
    const buffer =
      sizeClass > this.maxClassBytes
        ? Buffer.allocUnsafe(size)
        : (this.freeLists.get(sizeClass)?.pop() ?? Buffer.allocUnsafe(sizeClass));

    this.leased.add(buffer);
    return buffer;
  }

  release(buffer: Buffer): void {
    if (!this.leased.delete(buffer)) {
      throw new BufferPoolError('Buffer was not leased from this pool or was already released');
    }

    const sizeClass = buffer.length;
    if (sizeClass > this.maxClassBytes || sizeClassFor(sizeClass) !== sizeClass) return;

    let list = this.freeLists.get(sizeClass);
    if (!list) {
      list = [];
      this.freeLists.set(sizeClass, list);
    }
    if (list.length < this.maxPerClass) list.push(buffer);
  }

  async use<T>(size: number, fn: (buffer: Buffer) => Promise<T>): Promise<T> {
    const buffer = this.lease(size);
    try {
      return await fn(buffer);
    } finally {
      this.release(buffer);
    }
  }

  stats(): BufferPoolStats {
    let pooled = 0;
    for (const list of this.freeLists.values()) pooled += list.length;
    return { leased: this.leased.size, pooled };
  }
}

/** Smallest power of two ≥ size, never below MIN_CLASS_BYTES. */
export function sizeClassFor(size: number): number {
  let sizeClass = MIN_CLASS_BYTES;
  while (sizeClass < size) sizeClass *= 2;
  return sizeClass;
}
