import {
  ArrayLengthMismatchError,
  EncodeError,
  IntegerOverflowError,
  SchemaError,
} from "./errors";
import type { Reader } from "./reader";
import type { Writer } from "./writer";
import { TypeTag } from "./types";

/**
 * Encode/decode strategy for values of type `T`.
 *
 * Handlers are stateless and shared. Container handlers are built from the
 * handlers of their elements, so the handler for a declared type is assembled
 * once, where the type is declared, and resolution never happens at runtime.
 */
export interface TypeHandler<T> {
  /** Wire shape this handler writes. */
  readonly tag: TypeTag;
  /** Maximum UTF-8 length, for bounded string handlers. */
  readonly maxLength?: number;
  /** Whether a value peeked with `tag` can be read by this handler. */
  matches(tag: TypeTag): boolean;
  /** Returns a default-initialized value. */
  create(): T;
  write(writer: Writer, value: T): void;
  /**
   * Reads one value. `current` is the value held by the decode target, which
   * container and composite handlers read into.
   */
  read(reader: Reader, current?: T): T;
}

/**
 * Value type of a handler.
 */
export type ValueOf<H> = H extends TypeHandler<infer T> ? T : never;

function exactly(tag: TypeTag): (peeked: TypeTag) => boolean {
  return (peeked) => peeked === tag;
}

export function bool(): TypeHandler<boolean> {
  return {
    tag: TypeTag.Bool,
    matches: exactly(TypeTag.Bool),
    create: () => false,
    write: (writer, value) => writer.writeBool(value),
    read: (reader) => reader.readBool(),
  };
}

/**
 * Wraps a wire integer into `bits` bits, applying the reader's overflow policy.
 */
function narrow(reader: Reader, value: bigint, bits: number, signed: boolean): bigint {
  const wrapped = signed ? BigInt.asIntN(bits, value) : BigInt.asUintN(bits, value);
  if (wrapped === value) {
    return value;
  }

  switch (reader.options.integerOverflow) {
    case "error":
      throw new IntegerOverflowError(value, bits, signed);
    case "warn":
      console.warn(
        `shapepack: integer ${value} does not fit ${signed ? "int" : "uint"}${bits}, ` +
          `truncated to ${wrapped}`
      );
      break;
    case "truncate":
      break;
  }
  return wrapped;
}

function checkRange(value: number | bigint, bits: number, signed: boolean): void {
  if (typeof value === "number" && !Number.isInteger(value)) {
    throw new EncodeError(`Value ${value} is not an integer`);
  }
  const n = BigInt(value);
  const fits = signed ? BigInt.asIntN(bits, n) === n : BigInt.asUintN(bits, n) === n;
  if (!fits) {
    throw new EncodeError(`Value ${value} is out of range for ${signed ? "int" : "uint"}${bits}`);
  }
}

function integer(bits: 8 | 16 | 32, signed: boolean): TypeHandler<number> {
  const tag = signed ? TypeTag.Integer : TypeTag.UInt;
  return {
    tag,
    matches: exactly(tag),
    create: () => 0,
    write: (writer, value) => {
      checkRange(value, bits, signed);
      if (signed) {
        writer.writeInt(value);
      } else {
        writer.writeUint(value);
      }
    },
    read: (reader) =>
      Number(narrow(reader, signed ? reader.readInt() : reader.readUint(), bits, signed)),
  };
}

function integer64(signed: boolean): TypeHandler<bigint> {
  const tag = signed ? TypeTag.Integer : TypeTag.UInt;
  return {
    tag,
    matches: exactly(tag),
    create: () => 0n,
    write: (writer, value) => {
      checkRange(value, 64, signed);
      if (signed) {
        writer.writeInt(value);
      } else {
        writer.writeUint(value);
      }
    },
    read: (reader) => narrow(reader, signed ? reader.readInt() : reader.readUint(), 64, signed),
  };
}

export const uint8 = (): TypeHandler<number> => integer(8, false);
export const uint16 = (): TypeHandler<number> => integer(16, false);
export const uint32 = (): TypeHandler<number> => integer(32, false);
export const uint64 = (): TypeHandler<bigint> => integer64(false);
export const int8 = (): TypeHandler<number> => integer(8, true);
export const int16 = (): TypeHandler<number> => integer(16, true);
export const int32 = (): TypeHandler<number> => integer(32, true);
export const int64 = (): TypeHandler<bigint> => integer64(true);

export function float32(): TypeHandler<number> {
  return {
    tag: TypeTag.Float32,
    matches: exactly(TypeTag.Float32),
    create: () => 0,
    write: (writer, value) => writer.writeFloat32(value),
    read: (reader) => reader.readFloat32(),
  };
}

export function float64(): TypeHandler<number> {
  return {
    tag: TypeTag.Float64,
    matches: exactly(TypeTag.Float64),
    create: () => 0,
    write: (writer, value) => writer.writeFloat64(value),
    read: (reader) => reader.readFloat64(),
  };
}

/**
 * Options for string handlers.
 */
export interface StringOptions {
  /**
   * Maximum UTF-8 length in bytes. Longer values are truncated on write, and
   * longer wire strings fail to decode with BufferTooSmallError.
   */
  maxLength?: number;
}

export function string(options: StringOptions = {}): TypeHandler<string> {
  const { maxLength } = options;
  if (maxLength !== undefined && (!Number.isInteger(maxLength) || maxLength < 0)) {
    throw new SchemaError(`Invalid string maxLength: ${maxLength}`);
  }
  return {
    tag: TypeTag.String,
    maxLength,
    matches: exactly(TypeTag.String),
    create: () => "",
    write: (writer, value) => writer.writeString(value, maxLength),
    read: (reader) => reader.readString(maxLength),
  };
}

export function binary(): TypeHandler<Uint8Array> {
  return {
    tag: TypeTag.Binary,
    matches: exactly(TypeTag.Binary),
    create: () => new Uint8Array(0),
    write: (writer, value) => writer.writeBinary(value),
    read: (reader) => reader.readBinary(),
  };
}

/**
 * Fixed-capacity byte buffer tagged with a MessagePack extension subtype.
 */
export class Extension {
  readonly data: Uint8Array;

  constructor(
    public type: number,
    capacity: number
  ) {
    this.data = new Uint8Array(capacity);
  }

  get capacity(): number {
    return this.data.length;
  }
}

/**
 * Handler for {@link Extension} values of a declared capacity. New values
 * start with subtype `type`.
 */
export function extension(capacity: number, type: number = 0): TypeHandler<Extension> {
  if (!Number.isInteger(capacity) || capacity < 0) {
    throw new SchemaError(`Invalid extension capacity: ${capacity}`);
  }
  return {
    tag: TypeTag.Extension,
    matches: exactly(TypeTag.Extension),
    create: () => new Extension(type, capacity),
    write: (writer, value) => {
      if (value.capacity !== capacity) {
        throw new EncodeError(
          `Extension capacity ${value.capacity} does not match declared capacity ${capacity}`
        );
      }
      writer.writeExtension(value.type, value.data);
    },
    read: (reader) => {
      const wire = reader.readExtension(capacity);
      const result = new Extension(wire.type, capacity);
      result.data.set(wire.data);
      return result;
    },
  };
}

/**
 * Value or absence. Absence is written as nil.
 */
export function optional<T>(inner: TypeHandler<T>): TypeHandler<T | undefined> {
  return {
    tag: TypeTag.Nil,
    matches: (tag) => tag === TypeTag.Nil || inner.matches(tag),
    create: () => undefined,
    write: (writer, value) => {
      if (value === undefined) {
        writer.writeNil();
      } else {
        inner.write(writer, value);
      }
    },
    read: (reader, current) => {
      if (reader.peekTag().type === TypeTag.Nil) {
        reader.readNil();
        return undefined;
      }
      return inner.read(reader, current);
    },
  };
}

/**
 * Array of exactly `length` elements.
 */
export function fixedArray<T>(element: TypeHandler<T>, length: number): TypeHandler<T[]> {
  if (!Number.isInteger(length) || length < 0) {
    throw new SchemaError(`Invalid fixed array length: ${length}`);
  }
  return {
    tag: TypeTag.Array,
    matches: exactly(TypeTag.Array),
    create: () => Array.from({ length }, () => element.create()),
    write: (writer, value) => {
      if (value.length !== length) {
        throw new EncodeError(`Expected ${length} elements, got ${value.length}`);
      }
      writer.writeArrayHeader(length);
      for (const item of value) {
        element.write(writer, item);
      }
    },
    read: (reader, current) => {
      const count = reader.readArrayHeader();
      if (count !== length) {
        throw new ArrayLengthMismatchError(length, count);
      }
      return readElements(reader, element, count, current);
    },
  };
}

/**
 * Array of any length.
 */
export function array<T>(element: TypeHandler<T>): TypeHandler<T[]> {
  return {
    tag: TypeTag.Array,
    matches: exactly(TypeTag.Array),
    create: () => [],
    write: (writer, value) => {
      writer.writeArrayHeader(value.length);
      for (const item of value) {
        element.write(writer, item);
      }
    },
    read: (reader, current) => readElements(reader, element, reader.readArrayHeader(), current),
  };
}

// Elements already present in the target are read into.
function readElements<T>(
  reader: Reader,
  element: TypeHandler<T>,
  count: number,
  current: readonly T[] | undefined
): T[] {
  const result: T[] = [];
  for (let i = 0; i < count; i++) {
    result.push(element.read(reader, current?.[i]));
  }
  return result;
}

/**
 * Keyed mapping. Decoding merges wire entries into the current map.
 *
 * Entries are keyed as a JavaScript `Map` keys them, by identity for objects,
 * so a wire key decoded by a binary or composite handler never replaces an
 * existing entry. Use primitive-valued key handlers where merging matters.
 */
export function map<K, V>(key: TypeHandler<K>, value: TypeHandler<V>): TypeHandler<Map<K, V>> {
  return {
    tag: TypeTag.Map,
    matches: exactly(TypeTag.Map),
    create: () => new Map(),
    write: (writer, entries) => {
      writer.writeMapHeader(entries.size);
      for (const [k, v] of entries) {
        key.write(writer, k);
        value.write(writer, v);
      }
    },
    read: (reader, current) => {
      const result = current ?? new Map<K, V>();
      const count = reader.readMapHeader();
      for (let i = 0; i < count; i++) {
        const k = key.read(reader);
        result.set(k, value.read(reader));
      }
      return result;
    },
  };
}
