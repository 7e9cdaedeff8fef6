/**
 * Streaming support: several top-level values back to back in one buffer.
 *
 * MessagePack values delimit themselves, so no length prefix is written
 * between them; any MessagePack reader can consume the stream value by value.
 */

import type { TypeHandler } from "./handlers";
import { Reader, type ReaderOptions } from "./reader";
import { Writer } from "./writer";
import { EndOfStreamError, StreamClosedError } from "./errors";

/** Default initial buffer capacity for stream writer. */
const DEFAULT_STREAM_BUFFER_CAPACITY = 4096;

/**
 * Options for StreamWriter configuration.
 */
export interface StreamWriterOptions {
  /** Initial buffer capacity. Default: 4096 */
  initialCapacity?: number;
}

/**
 * Options for StreamReader configuration.
 */
export type StreamReaderOptions = ReaderOptions;

/**
 * StreamWriter appends encoded values to a growable buffer.
 *
 * @example
 * ```typescript
 * const stream = new StreamWriter();
 * stream.write(Point, { x: 1, y: 2 });
 * stream.write(Point, { x: 3, y: 4 });
 * const data = stream.bytes();
 * ```
 */
export class StreamWriter {
  private writer: Writer;
  private closed: boolean;
  private written: number;

  constructor(options: StreamWriterOptions = {}) {
    this.writer = new Writer(options.initialCapacity ?? DEFAULT_STREAM_BUFFER_CAPACITY);
    this.closed = false;
    this.written = 0;
  }

  /**
   * Returns the current position (bytes written).
   */
  get position(): number {
    return this.writer.position;
  }

  /**
   * Returns the number of values written.
   */
  get count(): number {
    return this.written;
  }

  /**
   * Returns true if the writer is closed.
   */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Appends one value. A value that fails to encode leaves the stream
   * unchanged.
   *
   * @throws StreamClosedError if the writer is closed
   */
  write<T>(type: TypeHandler<T>, value: T): void {
    if (this.closed) {
      throw new StreamClosedError();
    }
    const scratch = new Writer();
    type.write(scratch, value);
    this.writer.writeBytes(scratch.bytes());
    this.written++;
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.writer.bytes();
  }

  /**
   * Resets the writer for reuse, clearing all written data.
   */
  reset(): void {
    this.writer.reset();
    this.closed = false;
    this.written = 0;
  }

  /**
   * Closes the writer. No more values can be written after closing.
   */
  close(): void {
    this.closed = true;
  }
}

/**
 * StreamReader reads values written by a {@link StreamWriter}.
 *
 * @example
 * ```typescript
 * const reader = new StreamReader(data);
 * for (const point of reader.values(Point)) {
 *   // ...
 * }
 * ```
 */
export class StreamReader {
  private readonly data: Uint8Array;
  private readonly options: StreamReaderOptions;
  private reader: Reader;

  constructor(data: Uint8Array, options: StreamReaderOptions = {}) {
    this.data = data;
    this.options = options;
    this.reader = new Reader(data, options);
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.reader.position;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.reader.remaining;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.reader.hasMore;
  }

  /**
   * Reads the next value, into `into` when given.
   *
   * @throws EndOfStreamError if the stream has no more values
   */
  read<T>(type: TypeHandler<T>, into?: T): T {
    if (!this.reader.hasMore) {
      throw new EndOfStreamError();
    }
    return type.read(this.reader, into);
  }

  /**
   * Reads the next value, or returns undefined at the end of the stream.
   */
  tryRead<T>(type: TypeHandler<T>): T | undefined {
    return this.reader.hasMore ? type.read(this.reader) : undefined;
  }

  /**
   * Skips the next value without decoding it.
   *
   * @returns The number of bytes skipped
   * @throws EndOfStreamError if there is no value to skip
   */
  skip(): number {
    if (!this.reader.hasMore) {
      throw new EndOfStreamError();
    }
    const start = this.reader.position;
    this.reader.discard();
    return this.reader.position - start;
  }

  /**
   * Returns an iterator over the remaining values.
   */
  *values<T>(type: TypeHandler<T>): IterableIterator<T> {
    while (this.reader.hasMore) {
      yield type.read(this.reader);
    }
  }

  /**
   * Resets the reader to the beginning of the buffer.
   */
  reset(): void {
    this.reader = new Reader(this.data, this.options);
  }
}
