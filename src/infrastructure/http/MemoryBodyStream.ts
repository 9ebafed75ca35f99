/**
 * In-Memory Seekable Body
 * Layer: Infrastructure
 *
 * The buffered form of a request or response body. The Express adapter
 * wraps the raw request bytes in one, and appends every chunk the route
 * writes to another so the response can be rewound after the handler chain
 * has finished with it.
 */
import type { ISeekableBody } from '@domain/interfaces/ISeekableBody';

export class MemoryBodyStream implements ISeekableBody {
  private chunks: Buffer[] = [];
  private content: Buffer;
  private cursor = 0;

  constructor(initial: Buffer = Buffer.alloc(0)) {
    this.content = initial;
  }

  get length(): number {
    return this.contents().length;
  }

  get position(): number {
    return this.cursor;
  }

  /** Appends at the end; the read position is left where it was. */
  append(chunk: Buffer): void {
    if (chunk.length > 0) this.chunks.push(chunk);
  }

  async read(target: Buffer, offset: number, count: number): Promise<number> {
    const source = this.contents();
    const available = Math.max(0, Math.min(count, target.length - offset, source.length - this.cursor));
    if (available === 0) return 0;

    source.copy(target, offset, this.cursor, this.cursor + available);
    this.cursor += available;
    return available;
  }

  seek(position: number): void {
    if (!Number.isInteger(position) || position < 0) {
      throw new RangeError(`Invalid seek position: ${position}`);
    }
    this.cursor = Math.min(position, this.contents().length);
  }

  async readToEnd(): Promise<Buffer> {
    const source = this.contents();
    const rest = source.subarray(this.cursor);
    this.cursor = source.length;
    return Buffer.from(rest);
  }

  /** Everything written so far, independent of the read position. */
  toBuffer(): Buffer {
    return Buffer.from(this.contents());
  }

  private contents(): Buffer {
    if (this.chunks.length > 0) {
      this.content = Buffer.concat([this.content, ...this.chunks]);
      this.chunks = [];
    }
    return this.content;
  }
}
