import { afterEach, describe, expect, test, vi } from "vitest";
import { toMinimalBytes } from "../canonical/canonical";
import type { RlpValue } from "../rlp-value/rlp-value";
import { rlpBytes, rlpEquals, rlpList, rlpText } from "../rlp-value/rlp-value";
import { DEFAULT_MAX_DEPTH, RlpCodec, decode, decodeExact, encode } from "./rlp-codec";

function nest(depth: number): RlpValue {
  let value: RlpValue = rlpList([]);
  for (let i = 1; i < depth; i++) value = rlpList([value]);
  return value;
}

const samples: RlpValue[] = [
  rlpBytes([]),
  rlpBytes([0x00]),
  rlpBytes([0x7f]),
  rlpBytes([0x80]),
  rlpText("dog"),
  rlpText("x".repeat(55)),
  rlpText("x".repeat(56)),
  rlpBytes(new Uint8Array(1024).fill(0xab)),
  rlpList([]),
  rlpList([rlpText("cat"), rlpText("dog")]),
  rlpList([rlpList([]), rlpList([rlpList([])]), rlpList([rlpList([]), rlpList([rlpList([])])])]),
  rlpList(Array.from({ length: 20 }, () => rlpText("abc"))),
  rlpList([rlpBytes([]), rlpList([rlpBytes([0x01]), rlpList([rlpText("deep".repeat(30))])]), rlpBytes([0xff])]),
];

describe("RlpCodec", () => {
  describe("encode", () => {
    test("should encode the empty string as 0x80", () => {
      expect(Array.from(encode(rlpBytes([])))).toEqual([0x80]);
    });

    test("should let a single low byte encode as itself", () => {
      expect(Array.from(encode(rlpBytes([0x00])))).toEqual([0x00]);
      expect(Array.from(encode(rlpBytes([0x7f])))).toEqual([0x7f]);
    });

    test("should prefix a single high byte", () => {
      expect(Array.from(encode(rlpBytes([0x80])))).toEqual([0x81, 0x80]);
    });

    test("should encode short strings", () => {
      expect(Array.from(encode(rlpText("dog")))).toEqual([0x83, 0x64, 0x6f, 0x67]);
    });

    test("should encode long strings", () => {
      const encoded = encode(rlpText("x".repeat(56)));
      expect(encoded.length).toBe(58);
      expect(Array.from(encoded.subarray(0, 3))).toEqual([0xb8, 0x38, 0x78]);
    });

    test("should encode integers as minimal byte strings", () => {
      expect(Array.from(encode(rlpBytes(toMinimalBytes(0))))).toEqual([0x80]);
      expect(Array.from(encode(rlpBytes(toMinimalBytes(15))))).toEqual([0x0f]);
      expect(Array.from(encode(rlpBytes(toMinimalBytes(1024))))).toEqual([0x82, 0x04, 0x00]);
    });

    test("should encode the empty list as 0xc0", () => {
      expect(Array.from(encode(rlpList([])))).toEqual([0xc0]);
    });

    test("should concatenate list items behind the list header", () => {
      expect(Array.from(encode(rlpList([rlpText("cat"), rlpText("dog")])))).toEqual([
        0xc8, 0x83, 0x63, 0x61, 0x74, 0x83, 0x64, 0x6f, 0x67,
      ]);
    });

    test("should encode nested empty lists", () => {
      const value = rlpList([rlpList([]), rlpList([rlpList([])]), rlpList([rlpList([]), rlpList([rlpList([])])])]);
      expect(Array.from(encode(value))).toEqual([0xc7, 0xc0, 0xc1, 0xc0, 0xc3, 0xc0, 0xc1, 0xc0]);
    });

    test("should use the long form for lists above 55 bytes", () => {
      const encoded = encode(rlpList(Array.from({ length: 20 }, () => rlpText("abc"))));
      expect(encoded.length).toBe(82);
      expect(Array.from(encoded.subarray(0, 6))).toEqual([0xf8, 0x50, 0x83, 0x61, 0x62, 0x63]);
    });

    test("should encode structured values like lists", () => {
      const codec = new RlpCodec();
      const fields = [rlpText("cat"), rlpBytes([0x01])];
      expect(Array.from(codec.encodeStructured(fields))).toEqual(Array.from(codec.encodeList(fields)));
    });
  });

  describe("decode", () => {
    test("should decode a string and return the remainder", () => {
      const result = decode(Uint8Array.of(0x83, 0x64, 0x6f, 0x67, 0x01, 0x02));
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(rlpEquals(result.value, rlpText("dog"))).toBe(true);
      expect(Array.from(result.remainder)).toEqual([0x01, 0x02]);
    });

    test("should decode a self-encoded byte", () => {
      const result = decode(Uint8Array.of(0x05, 0x06));
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(rlpEquals(result.value, rlpBytes([0x05]))).toBe(true);
      expect(Array.from(result.remainder)).toEqual([0x06]);
    });

    test("should decode nested lists", () => {
      const result = decode(Uint8Array.of(0xc7, 0xc0, 0xc1, 0xc0, 0xc3, 0xc0, 0xc1, 0xc0));
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const expected = rlpList([rlpList([]), rlpList([rlpList([])]), rlpList([rlpList([]), rlpList([rlpList([])])])]);
      expect(rlpEquals(result.value, expected)).toBe(true);
      expect(result.remainder.length).toBe(0);
    });

    test("should return leaves that do not alias the input", () => {
      const input = Uint8Array.of(0x83, 0x64, 0x6f, 0x67);
      const result = decode(input);
      input[1] = 0x00;
      expect(result.ok).toBe(true);
      if (!result.ok || result.value.kind !== "bytes") return;
      expect(Array.from(result.value.bytes)).toEqual([0x64, 0x6f, 0x67]);
    });

    test("should reject a long-form header with a leading zero length", () => {
      const result = decode(Uint8Array.of(0xb8, 0x00, 0x61));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("NON_CANONICAL_ENCODING");
    });

    test("should reject the long form for a short payload", () => {
      const result = decode(Uint8Array.of(0xb8, 0x05, 0x61, 0x62, 0x63, 0x64, 0x65));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("NON_CANONICAL_ENCODING");
    });

    test("should reject a low single byte with an explicit header", () => {
      const result = decode(Uint8Array.of(0x81, 0x00));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("NON_CANONICAL_ENCODING");
    });

    test("should reject non-canonical elements inside a list", () => {
      const result = decode(Uint8Array.of(0xc3, 0x80, 0x81, 0x05));
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("NON_CANONICAL_ENCODING");
      expect(result.error.offset).toBe(2);
    });

    test("should fail when a list payload is cut short", () => {
      const result = decode(Uint8Array.of(0xc3, 0x83, 0x61));
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("INSUFFICIENT_BYTES");
      expect(result.error.offset).toBe(0);
    });

    test("should fail when an element runs past the end of its list", () => {
      const result = decode(Uint8Array.of(0xc2, 0x82, 0x61, 0x62));
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("INSUFFICIENT_BYTES");
      expect(result.error.offset).toBe(1);
    });

    test("should fail on empty input", () => {
      const result = decode(new Uint8Array(0));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("INSUFFICIENT_BYTES");
    });
  });

  describe("decodeExact", () => {
    test("should accept input holding exactly one value", () => {
      const result = decodeExact(Uint8Array.of(0xc0));
      expect(result.ok).toBe(true);
    });

    test("should reject trailing bytes", () => {
      const result = decodeExact(Uint8Array.of(0x05, 0x06));
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("TRAILING_DATA");
      expect(result.error.offset).toBe(1);
    });
  });

  describe("decodeBytes", () => {
    test("should return the payload of a string", () => {
      const result = new RlpCodec().decodeBytes(Uint8Array.of(0x82, 0x04, 0x00, 0xc0));
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(Array.from(result.value)).toEqual([0x04, 0x00]);
      expect(Array.from(result.remainder)).toEqual([0xc0]);
    });

    test("should reject a list", () => {
      const result = new RlpCodec().decodeBytes(Uint8Array.of(0xc0));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("TYPE_MISMATCH");
    });
  });

  describe("decodeList", () => {
    test("should return the items of a list", () => {
      const result = new RlpCodec().decodeList(Uint8Array.of(0xc8, 0x83, 0x63, 0x61, 0x74, 0x83, 0x64, 0x6f, 0x67));
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.length).toBe(2);
      expect(rlpEquals(result.value[0], rlpText("cat"))).toBe(true);
      expect(rlpEquals(result.value[1], rlpText("dog"))).toBe(true);
    });

    test("should reject a string", () => {
      const result = new RlpCodec().decodeList(Uint8Array.of(0x83, 0x64, 0x6f, 0x67));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("TYPE_MISMATCH");
    });
  });

  describe("decodeStructured", () => {
    const codec = new RlpCodec();
    const pair = codec.encodeStructured([rlpText("cat"), rlpText("dog")]);

    test("should accept the declared arity", () => {
      const result = codec.decodeStructured(pair, 2);
      expect(result.ok && result.value.length).toBe(2);
    });

    test("should reject fewer elements than declared", () => {
      const result = codec.decodeStructured(pair, 3);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("LENGTH_MISMATCH");
      expect(result.error.message).toBe("Invalid list length (expected: 3, actual: 2) (at byte 0)");
    });

    test("should reject more elements than declared", () => {
      const result = codec.decodeStructured(pair, 1);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("LENGTH_MISMATCH");
    });
  });

  describe("nesting depth", () => {
    test("should default to a depth of 1024", () => {
      expect(new RlpCodec().maxDepth).toBe(DEFAULT_MAX_DEPTH);
      expect(DEFAULT_MAX_DEPTH).toBe(1024);
    });

    test("should reject an invalid maxDepth", () => {
      expect(() => new RlpCodec({ maxDepth: 0 })).toThrow(RangeError);
      expect(() => new RlpCodec({ maxDepth: 2.5 })).toThrow(RangeError);
    });

    test("should accept nesting up to maxDepth", () => {
      const codec = new RlpCodec({ maxDepth: 3 });
      const result = codec.decode(Uint8Array.of(0xc2, 0xc1, 0xc0));
      expect(result.ok).toBe(true);
    });

    test("should reject nesting beyond maxDepth", () => {
      const codec = new RlpCodec({ maxDepth: 3 });
      const result = codec.decode(Uint8Array.of(0xc3, 0xc2, 0xc1, 0xc0));
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("DEPTH_LIMIT_EXCEEDED");
      expect(result.error.offset).toBe(3);
    });

    test("should handle very deep values without recursion", () => {
      const value = nest(5000);
      const encoded = encode(value);

      const limited = decode(encoded);
      expect(limited.ok).toBe(false);
      if (!limited.ok) expect(limited.error.code).toBe("DEPTH_LIMIT_EXCEEDED");

      const result = new RlpCodec({ maxDepth: 5000 }).decodeExact(encoded);
      expect(result.ok).toBe(true);
      if (result.ok) expect(rlpEquals(result.value, value)).toBe(true);
    });
  });

  describe("round trip", () => {
    test("should decode every encoding back to its value", () => {
      for (const value of samples) {
        const result = decode(encode(value));
        expect(result.ok).toBe(true);
        if (!result.ok) continue;
        expect(rlpEquals(result.value, value)).toBe(true);
        expect(result.remainder.length).toBe(0);
      }
    });

    test("should re-encode decoded input to the same bytes", () => {
      for (const value of samples) {
        const bytes = Uint8Array.from([...encode(value), 0xaa, 0xbb]);
        const result = decode(bytes);
        expect(result.ok).toBe(true);
        if (!result.ok) continue;
        const consumed = bytes.length - result.remainder.length;
        expect(Array.from(encode(result.value))).toEqual(Array.from(bytes.subarray(0, consumed)));
      }
    });
  });

  describe("logging", () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    test("should log decode failures when debug is enabled", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      new RlpCodec({ debug: true }).decode(new Uint8Array(0));
      expect(log).toHaveBeenCalledWith(
        "[RlpCodec] Decode failed with INSUFFICIENT_BYTES: Insufficient bytes: needed 1, got 0 (at byte 0)"
      );
    });

    test("should stay quiet by default", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      new RlpCodec().decode(new Uint8Array(0));
      expect(log).not.toHaveBeenCalled();
    });
  });
});
