import { fromMinimalBytes, toMinimalBytes } from "../../core/canonical/canonical";
import { RlpDecodeFailure, TypeMismatchError, UnsupportedValueError } from "../../core/errors/errors";
import { STRING_OFFSET, encodeHeader } from "../../core/header/header";
import { encode } from "../../core/rlp-codec/rlp-codec";
import type { RlpList, RlpValue } from "../../core/rlp-value/rlp-value";
import { rlpBytes, rlpList } from "../../core/rlp-value/rlp-value";

/**
 * A typed field descriptor.
 * Maps a host value onto the RLP value algebra and back.
 */
export type RlpField<T> = {
  /**
   * Converts a host value to its canonical RLP value.
   * @throws UnsupportedValueError if the value has no canonical form
   */
  toRlp(value: T): RlpValue;

  /**
   * Converts an RLP value back to the host type.
   * Decode failures carry offsets into the value's own encoding.
   */
  fromRlp(value: RlpValue): T;

  /**
   * Returns the nil value
   */
  toNil(): T;
};

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Payload of a leaf value; lists are rejected.
 */
export function leafBytes(value: RlpValue): Uint8Array {
  if (value.kind === "list") throw new TypeMismatchError("bytes", 0);
  return value.bytes;
}

/**
 * Runs `read`; a decode failure it raises is moved by `offset()` bytes.
 */
function relocated<T>(read: () => T, offset: () => number): T {
  try {
    return read();
  } catch (error) {
    if (error instanceof RlpDecodeFailure) throw error.shift(offset());
    throw error;
  }
}

function leafHeaderLength(bytes: Uint8Array): number {
  if (bytes.length === 1 && bytes[0] < STRING_OFFSET) return 0;
  return encodeHeader(bytes.length, false).length;
}

/** Leaf payload read as a canonical unsigned integer. */
function leafInteger(bytes: Uint8Array): bigint {
  return relocated(() => fromMinimalBytes(bytes), () => leafHeaderLength(bytes));
}

function itemOffset(list: RlpList, index: number): number {
  const sizes = list.items.map((item) => encode(item).length);
  const payload = sizes.reduce((sum, size) => sum + size, 0);

  let offset = encodeHeader(payload, true).length;
  for (let i = 0; i < index; i++) {
    offset += sizes[i];
  }
  return offset;
}

/**
 * Converts every item of a list. A decode failure inside an item is
 * reported at its position within the list's encoding.
 */
export function fromListItems<T>(list: RlpList, read: (item: RlpValue, index: number) => T): T[] {
  return list.items.map((item, index) =>
    relocated(() => read(item, index), () => itemOffset(list, index))
  );
}

/** UTF-8 bytes of `text`, which must not hold an unpaired surrogate. */
function utf8(text: string): Uint8Array {
  if (/\p{Cs}/u.test(text)) {
    throw new UnsupportedValueError(`Text contains an unpaired surrogate: ${JSON.stringify(text)}`);
  }
  return textEncoder.encode(text);
}

function checkWidth(bytes: Uint8Array, width: number, name: string): void {
  if (bytes.length > width) {
    throw new UnsupportedValueError(`${name} payload of ${bytes.length} bytes exceeds ${width} bytes`);
  }
}

function unsignedNumber(width: number, name: string): RlpField<number> {
  const max = 2 ** (width * 8) - 1;
  return {
    toRlp(v) {
      if (!Number.isInteger(v) || v < 0 || v > max) {
        throw new UnsupportedValueError(`${v} is not a valid ${name}`);
      }
      return rlpBytes(toMinimalBytes(v));
    },
    fromRlp(value) {
      const bytes = leafBytes(value);
      checkWidth(bytes, width, name);
      return Number(leafInteger(bytes));
    },
    toNil: () => 0,
  };
}

/**
 * Two's complement at `width` bytes for negatives, minimal bytes otherwise.
 */
function toSignedBytes(v: bigint, width: number, name: string): Uint8Array {
  const bits = BigInt(width * 8);
  const limit = 1n << (bits - 1n);
  if (v < -limit || v >= limit) {
    throw new UnsupportedValueError(`${v} is not a valid ${name}`);
  }
  return toMinimalBytes(v < 0n ? (1n << bits) + v : v);
}

/**
 * A full-width payload with its top bit set is negative;
 * any shorter payload is a non-negative value.
 */
function fromSignedBytes(bytes: Uint8Array, width: number, name: string): bigint {
  checkWidth(bytes, width, name);
  const unsigned = leafInteger(bytes);
  if (bytes.length === width && (bytes[0] & 0x80) !== 0) {
    return unsigned - (1n << BigInt(width * 8));
  }
  return unsigned;
}

function signedNumber(width: number, name: string): RlpField<number> {
  return {
    toRlp(v) {
      if (!Number.isInteger(v)) {
        throw new UnsupportedValueError(`${v} is not a valid ${name}`);
      }
      return rlpBytes(toSignedBytes(BigInt(v), width, name));
    },
    fromRlp: (value) => Number(fromSignedBytes(leafBytes(value), width, name)),
    toNil: () => 0,
  };
}

/**
 * Built-in field descriptors for common host types.
 *
 * Integers are written as big-endian bytes with no leading zero octet,
 * so zero is the empty byte string. Negative signed integers take the
 * full two's complement width of their type.
 */
export class RlpPrimitives {
  /** Boolean: false is the empty string, true is the single byte 0x01 */
  static readonly bool: RlpField<boolean> = {
    toRlp: (v) => rlpBytes(v ? [0x01] : []),
    fromRlp(value) {
      const bytes = leafBytes(value);
      if (bytes.length === 0) return false;
      if (bytes.length === 1 && bytes[0] === 0x01) return true;
      throw new UnsupportedValueError(`Invalid boolean payload of ${bytes.length} byte(s)`);
    },
    toNil: () => false,
  };

  /** Unsigned 8-bit integer */
  static readonly u8 = unsignedNumber(1, "u8");

  /** Unsigned 16-bit integer */
  static readonly u16 = unsignedNumber(2, "u16");

  /** Unsigned 32-bit integer */
  static readonly u32 = unsignedNumber(4, "u32");

  /** Unsigned 64-bit integer */
  static readonly u64: RlpField<bigint> = {
    toRlp(v) {
      if (v < 0n || v >= 1n << 64n) {
        throw new UnsupportedValueError(`${v} is not a valid u64`);
      }
      return rlpBytes(toMinimalBytes(v));
    },
    fromRlp(value) {
      const bytes = leafBytes(value);
      checkWidth(bytes, 8, "u64");
      return leafInteger(bytes);
    },
    toNil: () => 0n,
  };

  /** Unsigned integer of any size */
  static readonly uint: RlpField<bigint> = {
    toRlp: (v) => rlpBytes(toMinimalBytes(v)),
    fromRlp: (value) => leafInteger(leafBytes(value)),
    toNil: () => 0n,
  };

  /** Signed 8-bit integer */
  static readonly i8 = signedNumber(1, "i8");

  /** Signed 16-bit integer */
  static readonly i16 = signedNumber(2, "i16");

  /** Signed 32-bit integer */
  static readonly i32 = signedNumber(4, "i32");

  /** Signed 64-bit integer */
  static readonly i64: RlpField<bigint> = {
    toRlp: (v) => rlpBytes(toSignedBytes(v, 8, "i64")),
    fromRlp: (value) => fromSignedBytes(leafBytes(value), 8, "i64"),
    toNil: () => 0n,
  };

  /** A single Unicode code point, UTF-8 encoded */
  static readonly char: RlpField<string> = {
    toRlp(v) {
      if (Array.from(v).length !== 1) {
        throw new UnsupportedValueError(`Expected a single character, got ${JSON.stringify(v)}`);
      }
      return rlpBytes(utf8(v));
    },
    fromRlp(value) {
      const text = RlpPrimitives.string.fromRlp(value);
      if (Array.from(text).length !== 1) {
        throw new UnsupportedValueError(`Expected a single character, got ${JSON.stringify(text)}`);
      }
      return text;
    },
    toNil: () => "\0",
  };

  /** Text, UTF-8 encoded */
  static readonly string: RlpField<string> = {
    toRlp: (v) => rlpBytes(utf8(v)),
    fromRlp(value) {
      const bytes = leafBytes(value);
      try {
        return textDecoder.decode(bytes);
      } catch (error) {
        throw new UnsupportedValueError(`Payload is not valid UTF-8: ${error}`);
      }
    },
    toNil: () => "",
  };

  /** Raw bytes, unchanged */
  static readonly bytes: RlpField<Uint8Array> = {
    toRlp: (v) => rlpBytes(v),
    fromRlp: (value) => leafBytes(value).slice(),
    toNil: () => new Uint8Array(0),
  };

  /**
   * Homogeneous array stored as an RLP list.
   * @param item Field descriptor for each element
   *
   * @example
   * ```ts
   * const Scores = RlpPrimitives.list(RlpPrimitives.u16);
   * Scores.toRlp([1, 2, 300]);
   * ```
   */
  static list<T>(item: RlpField<T>): RlpField<T[]> {
    return {
      toRlp: (v) => rlpList(v.map((x) => item.toRlp(x))),
      fromRlp(value) {
        if (value.kind === "bytes") throw new TypeMismatchError("list", 0);
        return fromListItems(value, (x) => item.fromRlp(x));
      },
      toNil: () => [],
    };
  }
}
