import {
  BufferTooSmallError,
  DecodeError,
  TruncatedInputError,
  TypeMismatchError,
} from "./errors";
import { Format, TypeTag, type WireTag } from "./types";

// Module-level singleton to avoid repeated instantiation
const textDecoder = new TextDecoder();

/**
 * Policy applied when a wire integer does not fit the target width.
 */
export type IntegerOverflowPolicy = "truncate" | "warn" | "error";

/**
 * Options for Reader configuration.
 */
export interface ReaderOptions {
  /** What to do when a wire integer is wider than its target. Default: "truncate" */
  integerOverflow?: IntegerOverflowPolicy;
}

/**
 * Reader decodes MessagePack values from a binary buffer.
 *
 * Every typed read consumes exactly one value. {@link Reader.peekTag} looks at
 * the next header without consuming it, so a caller can branch on the wire
 * shape and then read the value with the matching method.
 */
export class Reader {
  readonly options: Readonly<Required<ReaderOptions>>;
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private end: number;

  constructor(data: Uint8Array, options: ReaderOptions = {}) {
    this.options = { integerOverflow: options.integerOverflow ?? "truncate" };
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = 0;
    this.end = data.length;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  /**
   * Checks that `needed` bytes are available from `offset`.
   */
  private checkAvailable(needed: number, offset: number = this.pos): void {
    if (offset + needed > this.end) {
      throw new TruncatedInputError(offset + needed - this.pos, this.remaining);
    }
  }

  /**
   * Decodes the header at the current position without consuming it.
   */
  peekTag(): WireTag {
    this.checkAvailable(1);
    const format = this.buffer[this.pos];

    if (format <= 0x7f) {
      return scalar(TypeTag.UInt, format, 1, 0);
    }
    if (format <= 0x8f) {
      return { ...scalar(TypeTag.Map, format, 1, 0), count: format & 0x0f };
    }
    if (format <= 0x9f) {
      return { ...scalar(TypeTag.Array, format, 1, 0), count: format & 0x0f };
    }
    if (format <= 0xbf) {
      return scalar(TypeTag.String, format, 1, format & 0x1f);
    }
    if (format >= Format.NegativeFixInt) {
      return scalar(TypeTag.Integer, format, 1, 0);
    }

    switch (format) {
      case Format.Nil:
        return scalar(TypeTag.Nil, format, 1, 0);
      case Format.False:
      case Format.True:
        return scalar(TypeTag.Bool, format, 1, 0);
      case Format.Bin8:
        return scalar(TypeTag.Binary, format, 2, this.peekLength(1));
      case Format.Bin16:
        return scalar(TypeTag.Binary, format, 3, this.peekLength(2));
      case Format.Bin32:
        return scalar(TypeTag.Binary, format, 5, this.peekLength(4));
      case Format.Ext8:
        return this.extensionTag(format, 1, this.peekLength(1));
      case Format.Ext16:
        return this.extensionTag(format, 2, this.peekLength(2));
      case Format.Ext32:
        return this.extensionTag(format, 4, this.peekLength(4));
      case Format.Float32:
        return scalar(TypeTag.Float32, format, 1, 4);
      case Format.Float64:
        return scalar(TypeTag.Float64, format, 1, 8);
      case Format.Uint8:
        return scalar(TypeTag.UInt, format, 1, 1);
      case Format.Uint16:
        return scalar(TypeTag.UInt, format, 1, 2);
      case Format.Uint32:
        return scalar(TypeTag.UInt, format, 1, 4);
      case Format.Uint64:
        return scalar(TypeTag.UInt, format, 1, 8);
      case Format.Int8:
        return scalar(TypeTag.Integer, format, 1, 1);
      case Format.Int16:
        return scalar(TypeTag.Integer, format, 1, 2);
      case Format.Int32:
        return scalar(TypeTag.Integer, format, 1, 4);
      case Format.Int64:
        return scalar(TypeTag.Integer, format, 1, 8);
      case Format.FixExt1:
      case Format.FixExt2:
      case Format.FixExt4:
      case Format.FixExt8:
      case Format.FixExt16:
        return this.extensionTag(format, 0, 1 << (format - Format.FixExt1));
      case Format.Str8:
        return scalar(TypeTag.String, format, 2, this.peekLength(1));
      case Format.Str16:
        return scalar(TypeTag.String, format, 3, this.peekLength(2));
      case Format.Str32:
        return scalar(TypeTag.String, format, 5, this.peekLength(4));
      case Format.Array16:
        return { ...scalar(TypeTag.Array, format, 3, 0), count: this.peekLength(2) };
      case Format.Array32:
        return { ...scalar(TypeTag.Array, format, 5, 0), count: this.peekLength(4) };
      case Format.Map16:
        return { ...scalar(TypeTag.Map, format, 3, 0), count: this.peekLength(2) };
      case Format.Map32:
        return { ...scalar(TypeTag.Map, format, 5, 0), count: this.peekLength(4) };
      default:
        throw new DecodeError(`Invalid format byte 0x${format.toString(16)}`);
    }
  }

  /**
   * Consumes the header at the current position and returns it. The payload,
   * if any, is left for the caller.
   */
  readTag(): WireTag {
    const tag = this.peekTag();
    this.pos += tag.headerSize;
    return tag;
  }

  /**
   * Reads a header and checks its shape.
   */
  private expectTag(expected: TypeTag): WireTag {
    const tag = this.peekTag();
    if (tag.type !== expected) {
      throw new TypeMismatchError(expected, tag.type);
    }
    this.pos += tag.headerSize;
    return tag;
  }

  /**
   * Reads a big-endian length of `width` bytes that follows the format byte.
   */
  private peekLength(width: 1 | 2 | 4): number {
    this.checkAvailable(1 + width);
    const at = this.pos + 1;
    switch (width) {
      case 1:
        return this.view.getUint8(at);
      case 2:
        return this.view.getUint16(at);
      case 4:
        return this.view.getUint32(at);
    }
  }

  private extensionTag(format: number, lengthWidth: number, payloadSize: number): WireTag {
    const typeOffset = this.pos + 1 + lengthWidth;
    this.checkAvailable(1, typeOffset);
    return {
      ...scalar(TypeTag.Extension, format, 2 + lengthWidth, payloadSize),
      extType: this.view.getInt8(typeOffset),
    };
  }

  /**
   * Reads raw bytes.
   */
  readBytes(length: number): Uint8Array {
    this.checkAvailable(length);
    const bytes = this.buffer.subarray(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  /**
   * Skips raw bytes.
   */
  skip(length: number): void {
    this.checkAvailable(length);
    this.pos += length;
  }

  /**
   * Reads `length` bytes as UTF-8 text.
   */
  readUtf8(length: number): string {
    return textDecoder.decode(this.readBytes(length));
  }

  /**
   * Reads nil.
   */
  readNil(): null {
    this.expectTag(TypeTag.Nil);
    return null;
  }

  /**
   * Reads a boolean.
   */
  readBool(): boolean {
    return this.expectTag(TypeTag.Bool).format === Format.True;
  }

  /**
   * Reads an integer of either signedness.
   */
  readInt(): bigint {
    const tag = this.peekTag();
    if (tag.type !== TypeTag.Integer && tag.type !== TypeTag.UInt) {
      throw new TypeMismatchError(TypeTag.Integer, tag.type);
    }
    this.pos += tag.headerSize;
    return this.readIntegerPayload(tag);
  }

  /**
   * Reads a non-negative integer. A negative wire value is a type mismatch.
   */
  readUint(): bigint {
    const tag = this.peekTag();
    if (tag.type !== TypeTag.Integer && tag.type !== TypeTag.UInt) {
      throw new TypeMismatchError(TypeTag.UInt, tag.type);
    }
    this.pos += tag.headerSize;
    const value = this.readIntegerPayload(tag);
    if (value < 0n) {
      throw new TypeMismatchError(TypeTag.UInt, TypeTag.Integer);
    }
    return value;
  }

  private readIntegerPayload(tag: WireTag): bigint {
    const { format } = tag;
    if (format <= 0x7f) {
      return BigInt(format);
    }
    if (format >= Format.NegativeFixInt) {
      return BigInt(format - 0x100);
    }

    this.checkAvailable(tag.payloadSize);
    const at = this.pos;
    this.pos += tag.payloadSize;
    switch (format) {
      case Format.Uint8:
        return BigInt(this.view.getUint8(at));
      case Format.Uint16:
        return BigInt(this.view.getUint16(at));
      case Format.Uint32:
        return BigInt(this.view.getUint32(at));
      case Format.Uint64:
        return this.view.getBigUint64(at);
      case Format.Int8:
        return BigInt(this.view.getInt8(at));
      case Format.Int16:
        return BigInt(this.view.getInt16(at));
      case Format.Int32:
        return BigInt(this.view.getInt32(at));
      default:
        return this.view.getBigInt64(at);
    }
  }

  /**
   * Reads a 32-bit float (IEEE 754).
   */
  readFloat32(): number {
    const tag = this.peekTag();
    if (tag.type !== TypeTag.Float32) {
      throw new TypeMismatchError(TypeTag.Float32, tag.type);
    }
    this.checkAvailable(5);
    const value = this.view.getFloat32(this.pos + 1);
    this.pos += 5;
    return value;
  }

  /**
   * Reads a 64-bit float (IEEE 754).
   */
  readFloat64(): number {
    const tag = this.peekTag();
    if (tag.type !== TypeTag.Float64) {
      throw new TypeMismatchError(TypeTag.Float64, tag.type);
    }
    this.checkAvailable(9);
    const value = this.view.getFloat64(this.pos + 1);
    this.pos += 9;
    return value;
  }

  /**
   * Reads a UTF-8 string of at most `maxBytes` encoded bytes.
   */
  readString(maxBytes: number = Infinity): string {
    const tag = this.peekTag();
    if (tag.type !== TypeTag.String) {
      throw new TypeMismatchError(TypeTag.String, tag.type);
    }
    if (tag.payloadSize > maxBytes) {
      throw new BufferTooSmallError(tag.payloadSize, maxBytes);
    }
    this.checkAvailable(tag.headerSize + tag.payloadSize);
    this.pos += tag.headerSize;
    return this.readUtf8(tag.payloadSize);
  }

  /**
   * Reads a binary blob. The result is a copy, independent of the input buffer.
   */
  readBinary(): Uint8Array {
    const tag = this.expectTag(TypeTag.Binary);
    return this.readBytes(tag.payloadSize).slice();
  }

  /**
   * Reads an extension value whose payload holds at most `maxBytes` bytes.
   * The payload is a copy, independent of the input buffer.
   */
  readExtension(maxBytes: number = Infinity): { type: number; data: Uint8Array } {
    const tag = this.peekTag();
    if (tag.type !== TypeTag.Extension) {
      throw new TypeMismatchError(TypeTag.Extension, tag.type);
    }
    if (tag.payloadSize > maxBytes) {
      throw new BufferTooSmallError(tag.payloadSize, maxBytes);
    }
    this.checkAvailable(tag.headerSize + tag.payloadSize);
    this.pos += tag.headerSize;
    return { type: tag.extType, data: this.readBytes(tag.payloadSize).slice() };
  }

  /**
   * Reads an array header and returns its element count.
   */
  readArrayHeader(): number {
    return this.expectTag(TypeTag.Array).count;
  }

  /**
   * Reads a map header and returns its pair count.
   */
  readMapHeader(): number {
    return this.expectTag(TypeTag.Map).count;
  }

  /**
   * Skips one complete value, including everything nested in it.
   */
  discard(): void {
    let pending = 1;
    while (pending > 0) {
      const tag = this.readTag();
      pending--;
      switch (tag.type) {
        case TypeTag.Array:
          pending += tag.count;
          break;
        case TypeTag.Map:
          pending += tag.count * 2;
          break;
        default:
          this.skip(tag.payloadSize);
      }
    }
  }
}

function scalar(type: TypeTag, format: number, headerSize: number, payloadSize: number): WireTag {
  return { type, format, headerSize, payloadSize, count: 0, extType: 0 };
}
