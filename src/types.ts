/**
 * Wire shapes a value can take in the MessagePack encoding.
 *
 * Handlers declare the shape they expect; the reader classifies a peeked
 * format byte into the same enumeration.
 */
export enum TypeTag {
  Nil = 0,
  Bool = 1,
  /** Negative fixint and int 8/16/32/64 */
  Integer = 2,
  /** Positive fixint and uint 8/16/32/64 */
  UInt = 3,
  Float32 = 4,
  Float64 = 5,
  String = 6,
  Binary = 7,
  Extension = 8,
  Array = 9,
  Map = 10,
  /** Tag of composite handlers; never produced by the reader. */
  CustomObject = 11,
}

/**
 * A decoded MessagePack header.
 */
export interface WireTag {
  type: TypeTag;
  /** Raw format byte */
  format: number;
  /** Bytes taken by the format byte, length fields and extension type */
  headerSize: number;
  /** Bytes following the header for scalars, strings, binaries and extensions */
  payloadSize: number;
  /** Elements of an array or pairs of a map */
  count: number;
  /** Extension subtype, 0 for other shapes */
  extType: number;
}

/**
 * MessagePack format bytes.
 *
 * Ranges: positive fixint 0x00-0x7f, fixmap 0x80-0x8f, fixarray 0x90-0x9f,
 * fixstr 0xa0-0xbf, negative fixint 0xe0-0xff.
 */
export const Format = {
  FixMap: 0x80,
  FixArray: 0x90,
  FixStr: 0xa0,
  Nil: 0xc0,
  Never: 0xc1,
  False: 0xc2,
  True: 0xc3,
  Bin8: 0xc4,
  Bin16: 0xc5,
  Bin32: 0xc6,
  Ext8: 0xc7,
  Ext16: 0xc8,
  Ext32: 0xc9,
  Float32: 0xca,
  Float64: 0xcb,
  Uint8: 0xcc,
  Uint16: 0xcd,
  Uint32: 0xce,
  Uint64: 0xcf,
  Int8: 0xd0,
  Int16: 0xd1,
  Int32: 0xd2,
  Int64: 0xd3,
  FixExt1: 0xd4,
  FixExt2: 0xd5,
  FixExt4: 0xd6,
  FixExt8: 0xd7,
  FixExt16: 0xd8,
  Str8: 0xd9,
  Str16: 0xda,
  Str32: 0xdb,
  Array16: 0xdc,
  Array32: 0xdd,
  Map16: 0xde,
  Map32: 0xdf,
  NegativeFixInt: 0xe0,
} as const;

/**
 * Largest element count of a fixarray/fixmap, and byte length of a fixstr.
 */
export const MaxFixArray = 0x0f;
export const MaxFixMap = 0x0f;
export const MaxFixStr = 0x1f;

/**
 * Integer bounds.
 */
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1
export const MaxUint64 = BigInt("0xffffffffffffffff");

/**
 * Payload sizes of the fixext formats, indexed from FixExt1.
 */
export const FIXEXT_SIZES = [1, 2, 4, 8, 16] as const;

/**
 * Returns the name of a type tag for messages.
 */
export function tagName(tag: TypeTag): string {
  return TypeTag[tag] ?? `Unknown(${tag})`;
}

/**
 * Returns the byte count of the longest prefix of `bytes` that holds at most
 * `maxBytes` bytes without splitting a UTF-8 sequence.
 */
export function utf8PrefixLength(bytes: Uint8Array, maxBytes: number): number {
  if (bytes.length <= maxBytes) {
    return bytes.length;
  }
  let end = Math.max(0, maxBytes);
  // Back off while the first dropped byte is a continuation byte
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) {
    end--;
  }
  return end;
}
