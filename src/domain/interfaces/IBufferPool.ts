/**
 * Buffer Pool Interface
 * Layer: Domain
 *
 * A leased buffer belongs to the caller until it is released. Its length is
 * the pool's size class, which may exceed the requested size; callers only
 * read back the bytes they wrote themselves (buffers are not zeroed).
 */
export interface IBufferPool {
  lease(size: number): Buffer;
  release(buffer: Buffer): void;
  /** Lease, run `fn`, and release on every exit path. */
  use<T>(size: number, fn: (buffer: Buffer) => Promise<T>): Promise<T>;
}
