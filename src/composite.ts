import { ExpectedMapError, TypeMismatchError } from "./errors";
import type { TypeHandler } from "./handlers";
import type { Reader } from "./reader";
import {
  buildSchema,
  fieldBuilder,
  type FieldBuilder,
  type FieldDescriptor,
  type FieldSchema,
} from "./schema";
import type { Writer } from "./writer";
import { TypeTag } from "./types";

const textEncoder = new TextEncoder();

/**
 * Handler for a composite type: an object encoded as a map from field name to
 * field value.
 *
 * Encoding writes every field in schema order, so equal values always produce
 * identical bytes. Decoding matches keys by name in any order; unknown keys are
 * skipped and fields without a key keep their default.
 */
export class CompositeType<T> implements TypeHandler<T> {
  readonly tag = TypeTag.CustomObject;
  readonly schema: FieldSchema<T>;
  /** UTF-8 length of the longest field name; longer wire keys are skipped unread. */
  readonly maxKeyLength: number;
  private readonly byName: ReadonlyMap<string, FieldDescriptor<T>>;

  constructor(
    private readonly factory: () => T,
    fields: readonly FieldDescriptor<T>[]
  ) {
    this.schema = buildSchema(fields);
    this.byName = new Map(this.schema.map((field) => [field.name, field]));
    this.maxKeyLength = this.schema.reduce(
      (max, field) => Math.max(max, textEncoder.encode(field.name).length),
      0
    );
  }

  matches(tag: TypeTag): boolean {
    return tag === TypeTag.Map;
  }

  /**
   * Returns a new default-initialized instance.
   */
  create(): T {
    return this.factory();
  }

  write(writer: Writer, value: T): void {
    writer.writeMapHeader(this.schema.length);
    for (const field of this.schema) {
      writer.writeString(field.name);
      field.write(writer, value);
    }
  }

  /**
   * Reads a map into `current`, or into a new default instance.
   */
  read(reader: Reader, current?: T): T {
    const head = reader.peekTag();
    if (head.type !== TypeTag.Map) {
      throw new ExpectedMapError(head.type);
    }
    const count = reader.readMapHeader();
    const target = current ?? this.create();

    for (let i = 0; i < count; i++) {
      const field = this.readKey(reader);
      if (field) {
        field.read(reader, target);
      } else {
        reader.discard();
      }
    }
    return target;
  }

  /**
   * Reads a key and returns its field, or undefined for a key that names no
   * field.
   */
  private readKey(reader: Reader): FieldDescriptor<T> | undefined {
    const tag = reader.peekTag();
    if (tag.type !== TypeTag.String) {
      throw new TypeMismatchError(TypeTag.String, tag.type);
    }
    reader.readTag();
    if (tag.payloadSize > this.maxKeyLength) {
      reader.skip(tag.payloadSize);
      return undefined;
    }
    return this.byName.get(reader.readUtf8(tag.payloadSize));
  }
}

/**
 * Declares a composite type.
 *
 * `create` returns a default-initialized instance; `fields` lists the fields
 * to encode, in wire order.
 *
 * @example
 * ```typescript
 * interface Point { x: number; y: number }
 *
 * const Point = composite((): Point => ({ x: 0, y: 0 }), (field) => [
 *   field("x", int32()),
 *   field("y", int32()),
 * ]);
 * ```
 */
export function composite<T>(
  create: () => T,
  fields: (field: FieldBuilder<T>) => readonly FieldDescriptor<T>[]
): CompositeType<T> {
  return new CompositeType(create, fields(fieldBuilder<T>()));
}
