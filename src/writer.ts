import { BufferTooSmallError, EncodeError } from "./errors";
import {
  FIXEXT_SIZES,
  Format,
  MaxFixArray,
  MaxFixMap,
  MaxFixStr,
  MaxInt64,
  MaxUint64,
  MinInt64,
  utf8PrefixLength,
} from "./types";

const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

// Module-level singleton to avoid repeated instantiation
const textEncoder = new TextEncoder();

/**
 * Writer encodes MessagePack values into a binary buffer.
 *
 * Constructed with a capacity, the writer grows as needed. Constructed over a
 * caller-supplied buffer, it never reallocates and throws
 * {@link BufferTooSmallError} instead.
 *
 * Multi-byte values are big-endian, as MessagePack requires.
 */
export class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private readonly fixed: boolean;

  constructor(target: Uint8Array | number = INITIAL_CAPACITY) {
    this.fixed = typeof target !== "number";
    this.buffer = typeof target === "number" ? new Uint8Array(target) : target;
    this.view = new DataView(this.buffer.buffer, this.buffer.byteOffset, this.buffer.byteLength);
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the total capacity of the underlying buffer.
   */
  get capacity(): number {
    return this.buffer.length;
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Ensures the buffer has room for `needed` more bytes.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }
    if (this.fixed) {
      throw new BufferTooSmallError(required, this.buffer.length);
    }

    let newCapacity = Math.max(this.buffer.length, 1) * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer.subarray(0, this.pos));
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * Writes raw bytes.
   */
  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  /**
   * Writes nil.
   */
  writeNil(): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = Format.Nil;
  }

  /**
   * Writes a boolean.
   */
  writeBool(value: boolean): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value ? Format.True : Format.False;
  }

  /**
   * Writes an unsigned integer in the smallest unsigned format.
   */
  writeUint(value: number | bigint): void {
    if (typeof value === "number" && !Number.isInteger(value)) {
      throw new EncodeError(`Value ${value} is not an integer`);
    }
    const n = BigInt(value);
    if (n < 0n || n > MaxUint64) {
      throw new EncodeError(`Value ${value} is out of range for uint64`);
    }

    if (n <= 0x7fn) {
      this.ensureCapacity(1);
      this.buffer[this.pos++] = Number(n);
    } else if (n <= 0xffn) {
      this.ensureCapacity(2);
      this.buffer[this.pos++] = Format.Uint8;
      this.buffer[this.pos++] = Number(n);
    } else if (n <= 0xffffn) {
      this.ensureCapacity(3);
      this.buffer[this.pos++] = Format.Uint16;
      this.view.setUint16(this.pos, Number(n));
      this.pos += 2;
    } else if (n <= 0xffffffffn) {
      this.ensureCapacity(5);
      this.buffer[this.pos++] = Format.Uint32;
      this.view.setUint32(this.pos, Number(n));
      this.pos += 4;
    } else {
      this.ensureCapacity(9);
      this.buffer[this.pos++] = Format.Uint64;
      this.view.setBigUint64(this.pos, n);
      this.pos += 8;
    }
  }

  /**
   * Writes a signed integer in the smallest signed format.
   *
   * Non-negative values use int 8/16/32/64 rather than positive fixint so
   * that the value reads back with an Integer tag.
   */
  writeInt(value: number | bigint): void {
    if (typeof value === "number" && !Number.isInteger(value)) {
      throw new EncodeError(`Value ${value} is not an integer`);
    }
    const n = BigInt(value);
    if (n < MinInt64 || n > MaxInt64) {
      throw new EncodeError(`Value ${value} is out of range for int64`);
    }

    if (n >= -32n && n < 0n) {
      this.ensureCapacity(1);
      this.buffer[this.pos++] = Number(n) & 0xff;
    } else if (n >= -0x80n && n <= 0x7fn) {
      this.ensureCapacity(2);
      this.buffer[this.pos++] = Format.Int8;
      this.view.setInt8(this.pos, Number(n));
      this.pos += 1;
    } else if (n >= -0x8000n && n <= 0x7fffn) {
      this.ensureCapacity(3);
      this.buffer[this.pos++] = Format.Int16;
      this.view.setInt16(this.pos, Number(n));
      this.pos += 2;
    } else if (n >= -0x80000000n && n <= 0x7fffffffn) {
      this.ensureCapacity(5);
      this.buffer[this.pos++] = Format.Int32;
      this.view.setInt32(this.pos, Number(n));
      this.pos += 4;
    } else {
      this.ensureCapacity(9);
      this.buffer[this.pos++] = Format.Int64;
      this.view.setBigInt64(this.pos, n);
      this.pos += 8;
    }
  }

  /**
   * Writes a 32-bit float (IEEE 754).
   */
  writeFloat32(value: number): void {
    this.ensureCapacity(5);
    this.buffer[this.pos++] = Format.Float32;
    this.view.setFloat32(this.pos, value);
    this.pos += 4;
  }

  /**
   * Writes a 64-bit float (IEEE 754).
   */
  writeFloat64(value: number): void {
    this.ensureCapacity(9);
    this.buffer[this.pos++] = Format.Float64;
    this.view.setFloat64(this.pos, value);
    this.pos += 8;
  }

  /**
   * Writes a UTF-8 string, truncated to at most `maxBytes` bytes on a code
   * point boundary.
   */
  writeString(value: string, maxBytes: number = Infinity): void {
    const encoded = textEncoder.encode(value);
    const bytes = encoded.subarray(0, utf8PrefixLength(encoded, maxBytes));
    const length = bytes.length;

    if (length <= MaxFixStr) {
      this.ensureCapacity(1 + length);
      this.buffer[this.pos++] = Format.FixStr | length;
    } else {
      this.writeLengthHeader(length, Format.Str8, Format.Str16, Format.Str32, length);
    }
    this.writeBytes(bytes);
  }

  /**
   * Writes a binary blob.
   */
  writeBinary(data: Uint8Array): void {
    this.writeLengthHeader(data.length, Format.Bin8, Format.Bin16, Format.Bin32, data.length);
    this.writeBytes(data);
  }

  /**
   * Writes an extension value: subtype byte plus raw payload.
   */
  writeExtension(type: number, data: Uint8Array): void {
    if (!Number.isInteger(type) || type < -128 || type > 127) {
      throw new EncodeError(`Extension type ${type} is out of range for int8`);
    }

    const fixIndex = FIXEXT_SIZES.findIndex((size) => size === data.length);
    if (fixIndex >= 0) {
      this.ensureCapacity(2 + data.length);
      this.buffer[this.pos++] = Format.FixExt1 + fixIndex;
    } else {
      this.writeLengthHeader(data.length, Format.Ext8, Format.Ext16, Format.Ext32, 1 + data.length);
    }
    this.view.setInt8(this.pos, type);
    this.pos += 1;
    this.writeBytes(data);
  }

  /**
   * Writes an array header announcing `count` elements.
   */
  writeArrayHeader(count: number): void {
    if (count <= MaxFixArray) {
      this.ensureCapacity(1);
      this.buffer[this.pos++] = Format.FixArray | count;
    } else {
      this.writeLengthHeader(count, undefined, Format.Array16, Format.Array32, 0);
    }
  }

  /**
   * Writes a map header announcing `count` key-value pairs.
   */
  writeMapHeader(count: number): void {
    if (count <= MaxFixMap) {
      this.ensureCapacity(1);
      this.buffer[this.pos++] = Format.FixMap | count;
    } else {
      this.writeLengthHeader(count, undefined, Format.Map16, Format.Map32, 0);
    }
  }

  /**
   * Writes a format byte followed by an 8, 16 or 32-bit length, reserving
   * `trailing` more bytes so a fixed buffer fails before anything is written.
   */
  private writeLengthHeader(
    length: number,
    format8: number | undefined,
    format16: number,
    format32: number,
    trailing: number
  ): void {
    if (length > 0xffffffff) {
      throw new EncodeError(`Length ${length} exceeds the 32-bit limit`);
    }

    if (format8 !== undefined && length <= 0xff) {
      this.ensureCapacity(2 + trailing);
      this.buffer[this.pos++] = format8;
      this.buffer[this.pos++] = length;
    } else if (length <= 0xffff) {
      this.ensureCapacity(3 + trailing);
      this.buffer[this.pos++] = format16;
      this.view.setUint16(this.pos, length);
      this.pos += 2;
    } else {
      this.ensureCapacity(5 + trailing);
      this.buffer[this.pos++] = format32;
      this.view.setUint32(this.pos, length);
      this.pos += 4;
    }
  }
}
