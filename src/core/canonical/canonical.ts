import { NonCanonicalEncodingError, UnsupportedValueError } from "../errors/errors";

/**
 * Converts an unsigned integer to bigint, rejecting anything that is not one.
 */
function toUnsigned(value: number | bigint): bigint {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new UnsupportedValueError(`Expected a safe integer, got ${value}`);
    }
    value = BigInt(value);
  }
  if (value < 0n) {
    throw new UnsupportedValueError(`Expected an unsigned integer, got ${value}`);
  }
  return value;
}

/**
 * Number of octets needed to write `value` big-endian with no leading zero octet.
 * Zero needs none: the empty byte string is the canonical encoding of 0.
 *
 * @throws UnsupportedValueError for negative or non-integer input
 */
export function minimalByteLength(value: number | bigint): number {
  let v = toUnsigned(value);
  let length = 0;
  while (v > 0n) {
    v >>= 8n;
    length++;
  }
  return length;
}

/**
 * Big-endian octets of `value` with leading zero octets removed.
 *
 * @example
 * ```ts
 * toMinimalBytes(1024); // Uint8Array [0x04, 0x00]
 * toMinimalBytes(0);    // Uint8Array []
 * ```
 */
export function toMinimalBytes(value: number | bigint): Uint8Array {
  let v = toUnsigned(value);
  const out = new Uint8Array(minimalByteLength(v));
  for (let i = out.length - 1; i >= 0; i--) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return out;
}

/**
 * Reads a canonical big-endian unsigned integer.
 *
 * @throws NonCanonicalEncodingError if the first octet is zero
 */
export function fromMinimalBytes(bytes: Uint8Array): bigint {
  if (bytes.length > 0 && bytes[0] === 0) {
    throw new NonCanonicalEncodingError("integer has a leading zero octet", 0);
  }
  let v = 0n;
  for (const byte of bytes) {
    v = (v << 8n) | BigInt(byte);
  }
  return v;
}
