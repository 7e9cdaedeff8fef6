/**
 * shapepack - typed MessagePack codecs for TypeScript
 *
 * Declare a type's fields once; encode and decode it to and from MessagePack
 * without per-type marshaling code.
 *
 * @example
 * ```typescript
 * import { composite, int32, string, encode, decode } from "shapepack";
 *
 * interface Point { label: string; x: number; y: number }
 *
 * const Point = composite((): Point => ({ label: "", x: 0, y: 0 }), (field) => [
 *   field("label", string({ maxLength: 32 })),
 *   field("x", int32()),
 *   field("y", int32()),
 * ]);
 *
 * const data = encode(Point, { label: "origin", x: 0, y: 0 });
 * const point = decode(Point, data);
 * ```
 */

// Core types
export {
  TypeTag,
  Format,
  MaxFixArray,
  MaxFixMap,
  MaxFixStr,
  MinInt64,
  MaxInt64,
  MaxUint64,
  tagName,
  utf8PrefixLength,
} from "./types";
export type { WireTag } from "./types";

// Errors
export {
  ShapepackError,
  EncodeError,
  DecodeError,
  SchemaError,
  BufferTooSmallError,
  TruncatedInputError,
  TypeMismatchError,
  ExpectedMapError,
  NoMatchingVariantError,
  ArrayLengthMismatchError,
  IntegerOverflowError,
  EndOfStreamError,
  StreamClosedError,
} from "./errors";

// Wire codec
export { Writer } from "./writer";
export { Reader } from "./reader";
export type { ReaderOptions, IntegerOverflowPolicy } from "./reader";

// Handlers
export {
  bool,
  uint8,
  uint16,
  uint32,
  uint64,
  int8,
  int16,
  int32,
  int64,
  float32,
  float64,
  string,
  binary,
  Extension,
  extension,
  optional,
  fixedArray,
  array,
  map,
} from "./handlers";
export type { TypeHandler, ValueOf, StringOptions } from "./handlers";

// Composite types
export { accessorField, fieldBuilder, buildSchema } from "./schema";
export type {
  FieldConstraint,
  FieldDescriptor,
  FieldSchema,
  FieldOptions,
  FieldBuilder,
} from "./schema";
export { CompositeType, composite } from "./composite";

// Variants
export { variant } from "./variant";
export type { Variant, VariantCases, Alternatives } from "./variant";

// Sessions
export { encodeToBuffer, decodeFromBuffer, encode, decode, encodedSize } from "./session";
export type { SessionOptions, EncodeOptions } from "./session";

// Streaming support
export { StreamWriter, StreamReader } from "./stream";
export type { StreamWriterOptions, StreamReaderOptions } from "./stream";

/**
 * Library version.
 */
export const VERSION = "0.1.0";
