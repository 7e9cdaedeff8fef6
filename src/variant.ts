import { NoMatchingVariantError, SchemaError } from "./errors";
import type { TypeHandler } from "./handlers";
import type { Reader } from "./reader";
import type { Writer } from "./writer";
import type { TypeTag } from "./types";

/**
 * Each alternative of `V` as a `{ kind, value }` case.
 */
export type VariantCases<V> = { [K in keyof V]: { readonly kind: K; readonly value: V[K] } };

/**
 * Tagged union over the alternatives of `V`, keyed by alternative name.
 */
export type Variant<V> = VariantCases<V>[Extract<keyof V, string>];

/**
 * One handler per alternative of `V`.
 */
export type Alternatives<V> = { [K in keyof V]: TypeHandler<V[K]> };

const INTEGER_KEY = /^(0|[1-9]\d*)$/;

function makeCase<V, K extends keyof V>(kind: K, value: V[K]): VariantCases<V>[K] {
  return { kind, value };
}

/**
 * Declares a tagged union.
 *
 * Alternatives are tried in declaration order when decoding: the first whose
 * handler accepts the peeked wire tag reads the value. No discriminant is
 * written, so alternatives sharing a wire shape (two composite types, both
 * maps) always decode as the first of them.
 *
 * Alternative names must not look like array indices, since JavaScript would
 * move such keys to the front of the declaration order.
 *
 * @example
 * ```typescript
 * const Reading = variant({ flag: bool(), level: float64() });
 * // { kind: "flag"; value: boolean } | { kind: "level"; value: number }
 * ```
 */
export function variant<V extends Record<string, unknown>>(
  alternatives: Alternatives<V>
): TypeHandler<Variant<V>> {
  const kinds: Extract<keyof V, string>[] = [];
  for (const kind in alternatives) {
    if (INTEGER_KEY.test(kind)) {
      throw new SchemaError(`Variant alternative name must not be an integer: ${kind}`);
    }
    kinds.push(kind);
  }
  if (kinds.length === 0) {
    throw new SchemaError("A variant needs at least one alternative");
  }
  const first = kinds[0];

  function writeCase<K extends Extract<keyof V, string>>(writer: Writer, value: VariantCases<V>[K]): void {
    alternatives[value.kind].write(writer, value.value);
  }

  return {
    tag: alternatives[first].tag,
    matches: (tag: TypeTag) => kinds.some((kind) => alternatives[kind].matches(tag)),
    create: () => makeCase<V, Extract<keyof V, string>>(first, alternatives[first].create()),
    write: (writer, value) => writeCase(writer, value),
    read: (reader: Reader) => {
      const tag = reader.peekTag().type;
      for (const kind of kinds) {
        const handler = alternatives[kind];
        if (handler.matches(tag)) {
          return makeCase<V, Extract<keyof V, string>>(kind, handler.read(reader));
        }
      }
      throw new NoMatchingVariantError(tag, kinds);
    },
  };
}
