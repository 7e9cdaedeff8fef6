import { SchemaError } from "./errors";
import type { TypeHandler } from "./handlers";
import type { Reader } from "./reader";
import type { Writer } from "./writer";
import type { TypeTag } from "./types";

/**
 * Per-field constraint.
 */
export interface FieldConstraint {
  /** Maximum UTF-8 length of a string member. */
  maxLength: number;
}

/**
 * Binds a wire name to one member of a composite type `T`.
 *
 * The member's value type is captured by `read` and `write`, so descriptors of
 * differently typed members share one type and fit in one schema.
 */
export interface FieldDescriptor<T> {
  readonly name: string;
  /** Wire shape of the member's handler. */
  readonly tag: TypeTag;
  readonly constraint?: FieldConstraint;
  /** Writes the member's current value. */
  write(writer: Writer, target: T): void;
  /** Reads one value into the member. */
  read(reader: Reader, target: T): void;
}

/**
 * Ordered, immutable list of the fields of a composite type.
 */
export type FieldSchema<T> = readonly FieldDescriptor<T>[];

/**
 * Options for a property field.
 */
export interface FieldOptions {
  /** Wire name, when it differs from the property key. */
  name?: string;
}

/**
 * Builds a descriptor from a handler and a get/set pair.
 */
export function accessorField<T, V>(
  name: string,
  handler: TypeHandler<V>,
  get: (target: T) => V,
  set: (target: T, value: V) => void
): FieldDescriptor<T> {
  return {
    name,
    tag: handler.tag,
    constraint: handler.maxLength === undefined ? undefined : { maxLength: handler.maxLength },
    write: (writer, target) => handler.write(writer, get(target)),
    read: (reader, target) => set(target, handler.read(reader, get(target))),
  };
}

/**
 * Field factory bound to a composite type. The handler must produce exactly
 * the property's type.
 */
export interface FieldBuilder<T> {
  <K extends keyof T & string>(key: K, handler: TypeHandler<T[K]>, options?: FieldOptions): FieldDescriptor<T>;
  /** A field backed by custom accessors instead of a property. */
  accessor<V>(
    name: string,
    handler: TypeHandler<V>,
    get: (target: T) => V,
    set: (target: T, value: V) => void
  ): FieldDescriptor<T>;
}

/**
 * Returns a {@link FieldBuilder} for `T`.
 */
export function fieldBuilder<T>(): FieldBuilder<T> {
  const property = <K extends keyof T & string>(
    key: K,
    handler: TypeHandler<T[K]>,
    options: FieldOptions = {}
  ): FieldDescriptor<T> =>
    accessorField<T, T[K]>(
      options.name ?? key,
      handler,
      (target) => target[key],
      (target, value) => {
        target[key] = value;
      }
    );
  return Object.assign(property, {
    accessor: <V>(
      name: string,
      handler: TypeHandler<V>,
      get: (target: T) => V,
      set: (target: T, value: V) => void
    ) => accessorField(name, handler, get, set),
  });
}

/**
 * Validates and freezes a list of descriptors. Names must be unique, since
 * decoding matches wire keys to fields by name.
 */
export function buildSchema<T>(fields: readonly FieldDescriptor<T>[]): FieldSchema<T> {
  const seen = new Set<string>();
  for (const field of fields) {
    if (seen.has(field.name)) {
      throw new SchemaError(`Duplicate field name: ${field.name}`);
    }
    seen.add(field.name);
  }
  return Object.freeze(fields.map((field) => Object.freeze({ ...field })));
}
