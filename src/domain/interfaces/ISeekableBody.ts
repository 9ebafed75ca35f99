/**
 * Seekable Body Interface
 * Layer: Domain
 *
 * A request or response body the host has buffered so that it can be read,
 * rewound and read again. Reads are async because on a real host they are
 * I/O; `read` resolves with the number of bytes copied, 0 at end of body.
 */
export interface ISeekableBody {
  readonly length: number;
  readonly position: number;

  read(target: Buffer, offset: number, count: number): Promise<number>;
  seek(position: number): void;
  /** Reads from the current position to the end. */
  readToEnd(): Promise<Buffer>;
}
