import { describe, it, expect } from "vitest";
import { composite } from "./composite";
import { array, int32, string, uint8 } from "./handlers";
import { Reader } from "./reader";
import { Writer } from "./writer";
import { decode, decodeFromBuffer, encode } from "./session";
import { TypeTag } from "./types";
import {
  ExpectedMapError,
  SchemaError,
  TruncatedInputError,
  TypeMismatchError,
} from "./errors";

interface Inner {
  x: number;
  y: number;
}

interface Outer {
  name: string;
  inner: Inner;
}

const Inner = composite((): Inner => ({ x: 0, y: 0 }), (field) => [
  field("x", int32()),
  field("y", int32()),
]);

const Outer = composite((): Outer => ({ name: "", inner: Inner.create() }), (field) => [
  field("name", string()),
  field("inner", Inner),
]);

const INNER_1_2 = [0x82, 0xa1, 0x78, 0xd0, 0x01, 0xa1, 0x79, 0xd0, 0x02];

function bytesOf(write: (writer: Writer) => void): Uint8Array {
  const writer = new Writer();
  write(writer);
  return writer.bytes();
}

describe("composite", () => {
  describe("schema", () => {
    it("lists fields in declaration order", () => {
      expect(Outer.schema.map((f) => f.name)).toEqual(["name", "inner"]);
      expect(Outer.schema[1].tag).toBe(TypeTag.CustomObject);
    });

    it("derives the longest key length", () => {
      expect(Inner.maxKeyLength).toBe(1);
      expect(Outer.maxKeyLength).toBe(5);
    });

    it("carries string bounds as constraints", () => {
      interface Label {
        text: string;
        size: number;
      }
      const Label = composite((): Label => ({ text: "", size: 0 }), (field) => [
        field("text", string({ maxLength: 8 })),
        field("size", uint8()),
      ]);
      expect(Label.schema[0].constraint).toEqual({ maxLength: 8 });
      expect(Label.schema[1].constraint).toBeUndefined();
    });

    it("rejects duplicate names", () => {
      expect(() =>
        composite((): Inner => ({ x: 0, y: 0 }), (field) => [
          field("x", int32()),
          field("y", int32(), { name: "x" }),
        ])
      ).toThrow(SchemaError);
    });

    it("is frozen", () => {
      expect(Object.isFrozen(Outer.schema)).toBe(true);
      expect(Object.isFrozen(Outer.schema[0])).toBe(true);
    });
  });

  describe("encode", () => {
    it("writes a map of fields in schema order", () => {
      expect(encode(Inner, { x: 1, y: 2 })).toEqual(new Uint8Array(INNER_1_2));
    });

    it("nests composites", () => {
      const bytes = encode(Outer, { name: "a", inner: { x: 1, y: 2 } });
      expect(bytes).toEqual(
        new Uint8Array([
          0x82,
          0xa4, 0x6e, 0x61, 0x6d, 0x65,
          0xa1, 0x61,
          0xa5, 0x69, 0x6e, 0x6e, 0x65, 0x72,
          ...INNER_1_2,
        ])
      );
    });

    it("uses the wire name option", () => {
      interface Person {
        name: string;
      }
      const Person = composite((): Person => ({ name: "" }), (field) => [
        field("name", string(), { name: "Name" }),
      ]);
      expect(encode(Person, { name: "b" })).toEqual(
        new Uint8Array([0x81, 0xa4, 0x4e, 0x61, 0x6d, 0x65, 0xa1, 0x62])
      );
      expect(decode(Person, encode(Person, { name: "b" }))).toEqual({ name: "b" });
    });
  });

  describe("decode", () => {
    it("reproduces a nested value", () => {
      const value = decode(Outer, encode(Outer, { name: "a", inner: { x: 1, y: 2 } }));
      expect(value.name).toBe("a");
      expect(value.inner.x).toBe(1);
      expect(value.inner.y).toBe(2);
    });

    it("matches keys in any order", () => {
      const bytes = bytesOf((w) => {
        w.writeMapHeader(2);
        w.writeString("y");
        w.writeInt(4);
        w.writeString("x");
        w.writeInt(3);
      });
      expect(decode(Inner, bytes)).toEqual({ x: 3, y: 4 });
    });

    it("skips unknown keys", () => {
      const bytes = bytesOf((w) => {
        w.writeMapHeader(4);
        w.writeString("x");
        w.writeInt(1);
        w.writeString("extra");
        w.writeArrayHeader(2);
        w.writeString("p");
        w.writeString("q");
        w.writeString("z");
        w.writeMapHeader(1);
        w.writeString("x");
        w.writeInt(99);
        w.writeString("y");
        w.writeInt(2);
      });
      expect(decode(Inner, bytes)).toEqual({ x: 1, y: 2 });
    });

    it("keeps defaults for missing keys", () => {
      interface Settings {
        retries: number;
        label: string;
      }
      const Settings = composite((): Settings => ({ retries: 3, label: "none" }), (field) => [
        field("retries", uint8()),
        field("label", string()),
      ]);
      const bytes = bytesOf((w) => {
        w.writeMapHeader(1);
        w.writeString("label");
        w.writeString("primary");
      });
      expect(decode(Settings, bytes)).toEqual({ retries: 3, label: "primary" });
    });

    it("matches keys case-sensitively", () => {
      const bytes = bytesOf((w) => {
        w.writeMapHeader(1);
        w.writeString("X");
        w.writeInt(5);
      });
      expect(decode(Inner, bytes)).toEqual({ x: 0, y: 0 });
    });

    it("reads into the given object", () => {
      const into: Inner = { x: 5, y: 6 };
      const bytes = bytesOf((w) => {
        w.writeMapHeader(1);
        w.writeString("y");
        w.writeInt(9);
      });
      const result = decodeFromBuffer(Inner, bytes, into);
      expect(result).toBe(into);
      expect(into).toEqual({ x: 5, y: 9 });
    });

    it("rejects a non-map value", () => {
      expect(() => decode(Inner, new Uint8Array([0x92, 0x01, 0x02]))).toThrow(ExpectedMapError);
    });

    it("rejects a non-map nested value", () => {
      const bytes = bytesOf((w) => {
        w.writeMapHeader(1);
        w.writeString("inner");
        w.writeArrayHeader(0);
      });
      expect(() => decode(Outer, bytes)).toThrow(ExpectedMapError);
    });

    it("rejects a non-string key", () => {
      expect(() => decode(Inner, new Uint8Array([0x81, 0x01, 0x01]))).toThrow(TypeMismatchError);
    });

    it("leaves earlier fields decoded when a later one fails", () => {
      const full = encode(Outer, { name: "a", inner: { x: 1, y: 2 } });
      const into = Outer.create();
      expect(() => decodeFromBuffer(Outer, full.subarray(0, full.length - 1), into)).toThrow(
        TruncatedInputError
      );
      expect(into.name).toBe("a");
      expect(into.inner.x).toBe(1);
    });
  });

  describe("accessor fields", () => {
    interface Span {
      start: number;
      end: number;
    }

    const Span = composite((): Span => ({ start: 0, end: 0 }), (field) => [
      field("start", int32()),
      field.accessor(
        "length",
        int32(),
        (span) => span.end - span.start,
        (span, length) => {
          span.end = span.start + length;
        }
      ),
    ]);

    it("encodes the derived value", () => {
      const reader = new Reader(encode(Span, { start: 2, end: 5 }));
      expect(reader.readMapHeader()).toBe(2);
      expect(reader.readString()).toBe("start");
      expect(reader.readInt()).toBe(2n);
      expect(reader.readString()).toBe("length");
      expect(reader.readInt()).toBe(3n);
    });

    it("decodes through the setter", () => {
      expect(decode(Span, encode(Span, { start: 2, end: 5 }))).toEqual({ start: 2, end: 5 });
    });
  });

  describe("collections of composites", () => {
    interface Group {
      members: Inner[];
    }
    const Group = composite((): Group => ({ members: [] }), (field) => [
      field("members", array(Inner)),
    ]);

    it("round-trips", () => {
      const value: Group = {
        members: [
          { x: 1, y: 2 },
          { x: -3, y: 4 },
        ],
      };
      expect(decode(Group, encode(Group, value))).toEqual(value);
    });
  });
});
