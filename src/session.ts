import type { TypeHandler } from "./handlers";
import { Reader, type ReaderOptions } from "./reader";
import { Writer } from "./writer";

/**
 * Options for decode sessions.
 */
export type SessionOptions = ReaderOptions;

/**
 * Options for encoding into a growable buffer.
 */
export interface EncodeOptions {
  /** Initial buffer capacity. Default: 256 */
  initialCapacity?: number;
}

/**
 * Encodes `value` into the caller's fixed-capacity `buffer`.
 *
 * @returns the number of bytes written, starting at offset 0
 * @throws BufferTooSmallError if the encoding does not fit
 */
export function encodeToBuffer<T>(type: TypeHandler<T>, value: T, buffer: Uint8Array): number {
  const writer = new Writer(buffer);
  type.write(writer, value);
  return writer.position;
}

/**
 * Decodes one value from the start of `buffer` into `into`, or into a new
 * default value. Bytes after the value are ignored, so a zero-filled tail of
 * a fixed buffer is harmless.
 *
 * On failure `into` may already hold some decoded fields.
 *
 * @throws TruncatedInputError if the buffer ends inside the value
 */
export function decodeFromBuffer<T>(
  type: TypeHandler<T>,
  buffer: Uint8Array,
  into?: T,
  options: SessionOptions = {}
): T {
  const reader = new Reader(buffer, options);
  return type.read(reader, into);
}

/**
 * Encodes `value` into a new buffer sized to fit.
 */
export function encode<T>(type: TypeHandler<T>, value: T, options: EncodeOptions = {}): Uint8Array {
  const writer = new Writer(options.initialCapacity);
  type.write(writer, value);
  return writer.bytes().slice();
}

/**
 * Decodes one value from `data` into a new default value.
 */
export function decode<T>(type: TypeHandler<T>, data: Uint8Array, options: SessionOptions = {}): T {
  return decodeFromBuffer(type, data, undefined, options);
}

/**
 * Returns the number of bytes `value` encodes to.
 */
export function encodedSize<T>(type: TypeHandler<T>, value: T): number {
  const writer = new Writer();
  type.write(writer, value);
  return writer.position;
}
