import { afterEach, describe, it, expect, vi } from "vitest";
import { decode, decodeFromBuffer, encode, encodedSize, encodeToBuffer } from "./session";
import { composite } from "./composite";
import {
  array,
  binary,
  bool,
  extension,
  Extension,
  fixedArray,
  float32,
  float64,
  int16,
  int64,
  map,
  optional,
  string,
  uint8,
  uint64,
} from "./handlers";
import { BufferTooSmallError, IntegerOverflowError, TruncatedInputError } from "./errors";

interface Inner {
  x: number;
  y: number;
}

interface Outer {
  name: string;
  inner: Inner;
}

const Inner = composite((): Inner => ({ x: 0, y: 0 }), (field) => [
  field("x", int16()),
  field("y", int16()),
]);

const Outer = composite((): Outer => ({ name: "", inner: Inner.create() }), (field) => [
  field("name", string()),
  field("inner", Inner),
]);

const sample: Outer = { name: "a", inner: { x: 1, y: 2 } };

interface Telemetry {
  active: boolean;
  level: number;
  gain: number;
  sequence: bigint;
  offset: bigint;
  station: string;
  raw: Uint8Array;
  stamp: Extension;
  axes: number[];
  tags: string[];
  counters: Map<string, number>;
  note: string | undefined;
}

const Telemetry = composite(
  (): Telemetry => ({
    active: false,
    level: 0,
    gain: 0,
    sequence: 0n,
    offset: 0n,
    station: "",
    raw: new Uint8Array(0),
    stamp: new Extension(-1, 8),
    axes: [0, 0, 0],
    tags: [],
    counters: new Map(),
    note: undefined,
  }),
  (field) => [
    field("active", bool()),
    field("level", float64()),
    field("gain", float32()),
    field("sequence", uint64()),
    field("offset", int64()),
    field("station", string({ maxLength: 16 })),
    field("raw", binary()),
    field("stamp", extension(8, -1)),
    field("axes", fixedArray(float32(), 3)),
    field("tags", array(string())),
    field("counters", map(string(), uint8())),
    field("note", optional(string())),
  ]
);

describe("session", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("encodeToBuffer", () => {
    it("returns the bytes written", () => {
      const buffer = new Uint8Array(23);
      expect(encodeToBuffer(Outer, sample, buffer)).toBe(23);
      expect(buffer[0]).toBe(0x82);
    });

    it("throws when the buffer is one byte short", () => {
      try {
        encodeToBuffer(Outer, sample, new Uint8Array(22));
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(BufferTooSmallError);
        expect(e).toMatchObject({ needed: 23, available: 22 });
      }
    });
  });

  describe("encodedSize", () => {
    it("matches the encoded length", () => {
      expect(encodedSize(Outer, sample)).toBe(23);
      expect(encode(Outer, sample).length).toBe(23);
    });
  });

  describe("decodeFromBuffer", () => {
    it("ignores bytes after the value", () => {
      const buffer = new Uint8Array(64);
      encodeToBuffer(Outer, sample, buffer);
      expect(decodeFromBuffer(Outer, buffer)).toEqual(sample);
    });

    it("throws on every truncated prefix", () => {
      const bytes = encode(Outer, sample);
      for (let length = 0; length < bytes.length; length++) {
        expect(() => decode(Outer, bytes.subarray(0, length))).toThrow(TruncatedInputError);
      }
    });

    it("passes the overflow policy to handlers", () => {
      const bytes = encode(Inner, { x: 0, y: 0 });
      // y: int8 0 -> int32 70000
      const wide = new Uint8Array([...bytes.subarray(0, 7), 0xd2, 0x00, 0x01, 0x11, 0x70]);
      expect(decode(Inner, wide)).toEqual({ x: 0, y: 4464 });
      expect(() => decode(Inner, wide, { integerOverflow: "error" })).toThrow(IntegerOverflowError);

      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      expect(decodeFromBuffer(Inner, wide, undefined, { integerOverflow: "warn" })).toEqual({
        x: 0,
        y: 4464,
      });
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });

  describe("round trip", () => {
    it("reproduces every kind of field", () => {
      const stamp = new Extension(-1, 8);
      stamp.data.set([1, 2, 3, 4, 5, 6, 7, 8]);
      const value: Telemetry = {
        active: true,
        level: 0.1,
        gain: 1.25,
        sequence: 2n ** 64n - 1n,
        offset: -(2n ** 40n),
        station: "north-ridge",
        raw: new Uint8Array([0xde, 0xad]),
        stamp,
        axes: [0.5, 1.25, -2],
        tags: ["a", "bb", ""],
        counters: new Map([
          ["ok", 200],
          ["fail", 3],
        ]),
        note: "héllo",
      };

      const decoded = decode(Telemetry, encode(Telemetry, value));
      expect(decoded.active).toBe(true);
      expect(decoded.level).toBe(0.1);
      expect(decoded.gain).toBe(1.25);
      expect(decoded.sequence).toBe(2n ** 64n - 1n);
      expect(decoded.offset).toBe(-(2n ** 40n));
      expect(decoded.station).toBe("north-ridge");
      expect(decoded.raw).toEqual(new Uint8Array([0xde, 0xad]));
      expect(decoded.stamp.type).toBe(-1);
      expect(decoded.stamp.data).toEqual(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]));
      expect(decoded.axes).toEqual([0.5, 1.25, -2]);
      expect(decoded.tags).toEqual(["a", "bb", ""]);
      expect(decoded.counters).toEqual(
        new Map([
          ["ok", 200],
          ["fail", 3],
        ])
      );
      expect(decoded.note).toBe("héllo");
    });

    it("reproduces an absent optional", () => {
      const value = Telemetry.create();
      expect(decode(Telemetry, encode(Telemetry, value)).note).toBeUndefined();
    });

    it("truncates an over-long bounded string on encode", () => {
      const value = Telemetry.create();
      value.station = "a-very-long-station-name";
      expect(decode(Telemetry, encode(Telemetry, value)).station).toBe("a-very-long-stat");
    });

    it("encodes equal values to identical bytes", () => {
      expect(encode(Outer, { name: "a", inner: { x: 1, y: 2 } })).toEqual(encode(Outer, sample));
    });
  });

  describe("encode", () => {
    it("returns a copy independent of the writer buffer", () => {
      const bytes = encode(Outer, sample, { initialCapacity: 4 });
      expect(bytes.length).toBe(23);
      expect(bytes.buffer.byteLength).toBe(23);
    });
  });
});
