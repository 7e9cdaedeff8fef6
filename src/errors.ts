import { TypeTag, tagName } from "./types";

/**
 * Base error class for shapepack errors.
 */
export class ShapepackError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ShapepackError";
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends ShapepackError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends ShapepackError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when a schema or handler is declared with invalid arguments.
 */
export class SchemaError extends ShapepackError {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
  }
}

/**
 * Error thrown when a destination cannot hold the data: an encode past the
 * end of a fixed buffer, or a wire payload larger than a bounded decode target.
 */
export class BufferTooSmallError extends ShapepackError {
  constructor(
    readonly needed: number,
    readonly available: number
  ) {
    super(`Buffer too small: needed ${needed} bytes, only ${available} available`);
    this.name = "BufferTooSmallError";
  }
}

/**
 * Error thrown when the input ends before a value is fully read.
 */
export class TruncatedInputError extends DecodeError {
  constructor(
    readonly needed: number,
    readonly available: number
  ) {
    super(`Truncated input: needed ${needed} bytes, only ${available} available`);
    this.name = "TruncatedInputError";
  }
}

/**
 * Error thrown when the wire shape disagrees with the handler's expected shape.
 */
export class TypeMismatchError extends DecodeError {
  constructor(
    readonly expected: TypeTag,
    readonly actual: TypeTag
  ) {
    super(`Type mismatch: expected ${tagName(expected)}, got ${tagName(actual)}`);
    this.name = "TypeMismatchError";
  }
}

/**
 * Error thrown when a composite is decoded from something other than a map.
 */
export class ExpectedMapError extends DecodeError {
  constructor(readonly actual: TypeTag) {
    super(`Expected a map, got ${tagName(actual)}`);
    this.name = "ExpectedMapError";
  }
}

/**
 * Error thrown when no alternative of a variant accepts the wire shape.
 */
export class NoMatchingVariantError extends DecodeError {
  constructor(
    readonly actual: TypeTag,
    readonly alternatives: readonly string[]
  ) {
    super(`No variant alternative of [${alternatives.join(", ")}] matches ${tagName(actual)}`);
    this.name = "NoMatchingVariantError";
  }
}

/**
 * Error thrown when a fixed-size array is decoded from an array of another length.
 */
export class ArrayLengthMismatchError extends DecodeError {
  constructor(
    readonly expected: number,
    readonly actual: number
  ) {
    super(`Array length mismatch: expected ${expected} elements, got ${actual}`);
    this.name = "ArrayLengthMismatchError";
  }
}

/**
 * Error thrown under the "error" overflow policy when a wire integer does not
 * fit the target width.
 */
export class IntegerOverflowError extends DecodeError {
  constructor(
    readonly value: bigint,
    readonly bits: number,
    readonly signed: boolean
  ) {
    super(`Integer ${value} does not fit ${signed ? "int" : "uint"}${bits}`);
    this.name = "IntegerOverflowError";
  }
}

/**
 * Error thrown when reading past the last value of a stream.
 */
export class EndOfStreamError extends DecodeError {
  constructor() {
    super("Unexpected end of stream");
    this.name = "EndOfStreamError";
  }
}

/**
 * Error thrown when writing to a closed stream.
 */
export class StreamClosedError extends ShapepackError {
  constructor() {
    super("Stream is closed");
    this.name = "StreamClosedError";
  }
}
