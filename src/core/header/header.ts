import { toMinimalBytes } from "../canonical/canonical";
import type { DecodeResult } from "../errors/errors";
import {
  InsufficientBytesError,
  NonCanonicalEncodingError,
  failure,
  success,
} from "../errors/errors";

/** Header offsets for byte strings and lists. */
export const STRING_OFFSET = 0x80;
export const LIST_OFFSET = 0xc0;

/** Longest payload that still fits a single-byte header. */
export const SHORT_PAYLOAD_MAX = 55;

/**
 * Parsed form of a header.
 * The payload occupies `payloadLength` bytes right after the
 * `headerLength` header bytes. A single self-encoded byte has
 * `headerLength` 0 and `payloadLength` 1: it is its own payload.
 */
export interface RlpHeader {
  isList: boolean;
  headerLength: number;
  payloadLength: number;
}

/**
 * Builds the canonical header for a payload of the given length.
 *
 * The single-byte self-encoding depends on the payload itself,
 * so callers handle it before asking for a header.
 */
export function encodeHeader(payloadLength: number, isList: boolean): Uint8Array {
  const offset = isList ? LIST_OFFSET : STRING_OFFSET;

  if (payloadLength <= SHORT_PAYLOAD_MAX) {
    return Uint8Array.of(offset + payloadLength);
  }

  const lengthBytes = toMinimalBytes(payloadLength);
  const header = new Uint8Array(1 + lengthBytes.length);
  header[0] = offset + SHORT_PAYLOAD_MAX + lengthBytes.length;
  header.set(lengthBytes, 1);
  return header;
}

/**
 * Parses the header at `start`, reading no further than `end`.
 *
 * Succeeds only when the header is canonical and the whole payload
 * lies before `end`. The result's remainder begins at the payload.
 * Error offsets are positions in `input`.
 */
export function parseHeader(
  input: Uint8Array,
  start = 0,
  end = input.length
): DecodeResult<RlpHeader> {
  const available = end - start;
  if (available <= 0) {
    return failure(new InsufficientBytesError(1, 0, start));
  }

  const prefix = input[start];
  let header: RlpHeader;

  if (prefix < STRING_OFFSET) {
    header = { isList: false, headerLength: 0, payloadLength: 1 };
  } else if (prefix <= STRING_OFFSET + SHORT_PAYLOAD_MAX) {
    header = { isList: false, headerLength: 1, payloadLength: prefix - STRING_OFFSET };
  } else if (prefix < LIST_OFFSET) {
    const result = readLongLength(input, start, end, prefix - STRING_OFFSET - SHORT_PAYLOAD_MAX);
    if (!result.ok) return result;
    header = { isList: false, headerLength: result.value.headerLength, payloadLength: result.value.payloadLength };
  } else if (prefix <= LIST_OFFSET + SHORT_PAYLOAD_MAX) {
    header = { isList: true, headerLength: 1, payloadLength: prefix - LIST_OFFSET };
  } else {
    const result = readLongLength(input, start, end, prefix - LIST_OFFSET - SHORT_PAYLOAD_MAX);
    if (!result.ok) return result;
    header = { isList: true, headerLength: result.value.headerLength, payloadLength: result.value.payloadLength };
  }

  const needed = header.headerLength + header.payloadLength;
  if (needed > available) {
    return failure(new InsufficientBytesError(needed, available, start));
  }

  if (!header.isList && header.headerLength === 1 && header.payloadLength === 1 && input[start + 1] < STRING_OFFSET) {
    return failure(new NonCanonicalEncodingError("single byte below 0x80 must encode as itself", start));
  }

  const payloadStart = start + header.headerLength;
  return success(header, input.subarray(payloadStart, end));
}

/**
 * Reads the big-endian length field of a long-form header.
 */
function readLongLength(
  input: Uint8Array,
  start: number,
  end: number,
  lengthOfLength: number
): DecodeResult<Omit<RlpHeader, "isList">> {
  const headerLength = 1 + lengthOfLength;
  if (headerLength > end - start) {
    return failure(new InsufficientBytesError(headerLength, end - start, start));
  }

  if (input[start + 1] === 0) {
    return failure(new NonCanonicalEncodingError("length field has a leading zero octet", start + 1));
  }

  let payloadLength = 0;
  for (let i = start + 1; i < start + headerLength; i++) {
    payloadLength = payloadLength * 256 + input[i];
  }

  if (payloadLength <= SHORT_PAYLOAD_MAX) {
    return failure(
      new NonCanonicalEncodingError(`long-form header used for a payload of ${payloadLength} bytes`, start)
    );
  }

  return success({ headerLength, payloadLength }, input.subarray(start + headerLength, end));
}
