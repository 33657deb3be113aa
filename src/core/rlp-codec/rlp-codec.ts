import type { DecodeResult, RlpDecodeError } from "../errors/errors";
import {
  DepthLimitExceededError,
  LengthMismatchError,
  TrailingDataError,
  TypeMismatchError,
  failure,
  success,
} from "../errors/errors";
import type { RlpHeader } from "../header/header";
import { STRING_OFFSET, encodeHeader, parseHeader } from "../header/header";
import type { RlpList, RlpValue } from "../rlp-value/rlp-value";
import { rlpBytes, rlpList } from "../rlp-value/rlp-value";

/**
 * Configuration for an {@link RlpCodec}.
 */
export interface RlpCodecConfig {
  /**
   * Maximum list nesting accepted by decode (default: 1024).
   * A top-level list is depth 1.
   */
  maxDepth?: number;

  /**
   * Enable debug logging
   */
  debug?: boolean;
}

export const DEFAULT_MAX_DEPTH = 1024;

/** An open list while encoding: its items and the encodings produced so far. */
type EncodeFrame = {
  items: readonly RlpValue[];
  index: number;
  parts: Uint8Array[];
  size: number;
};

/** An open list while decoding: items decoded so far and where its payload ends. */
type DecodeFrame = {
  items: RlpValue[];
  end: number;
};

/**
 * Encoder and strict decoder for RLP values.
 *
 * Nested lists are walked with an explicit stack instead of recursion,
 * so nesting depth never grows the call stack. Decode rejects anything
 * that is not the canonical encoding of its value.
 *
 * Instances only hold immutable configuration and can be shared.
 *
 * @example
 * ```ts
 * const codec = new RlpCodec({ maxDepth: 16 });
 *
 * const buf = codec.encode(rlpList([rlpText("cat"), rlpText("dog")]));
 * // Uint8Array [0xc8, 0x83, 0x63, 0x61, 0x74, 0x83, 0x64, 0x6f, 0x67]
 *
 * const result = codec.decode(buf);
 * if (result.ok) console.log(result.value, result.remainder.length);
 * else console.error(result.error.code);
 * ```
 */
export class RlpCodec {
  private readonly config: Required<RlpCodecConfig>;

  constructor(config: RlpCodecConfig = {}) {
    this.config = {
      maxDepth: config.maxDepth ?? DEFAULT_MAX_DEPTH,
      debug: config.debug ?? false,
    };

    if (!Number.isInteger(this.config.maxDepth) || this.config.maxDepth < 1) {
      throw new RangeError(`maxDepth must be a positive integer, got ${this.config.maxDepth}`);
    }
  }

  get maxDepth(): number {
    return this.config.maxDepth;
  }

  /**
   * Encodes any value. Total: never fails for a well-formed value.
   */
  encode(value: RlpValue): Uint8Array {
    return value.kind === "bytes" ? this.encodeBytes(value.bytes) : this.encodeList(value.items);
  }

  /**
   * Encodes a byte string. A single byte below 0x80 is its own encoding;
   * anything else gets a header.
   */
  encodeBytes(bytes: Uint8Array): Uint8Array {
    if (bytes.length === 1 && bytes[0] < STRING_OFFSET) {
      return Uint8Array.of(bytes[0]);
    }

    const header = encodeHeader(bytes.length, false);
    const out = new Uint8Array(header.length + bytes.length);
    out.set(header, 0);
    out.set(bytes, header.length);
    return out;
  }

  /**
   * Encodes a list: every item is encoded in order, the results are
   * concatenated, and the list header is prepended.
   */
  encodeList(items: readonly RlpValue[]): Uint8Array {
    const stack: EncodeFrame[] = [{ items, index: 0, parts: [], size: 0 }];

    while (true) {
      const frame = stack[stack.length - 1];

      if (frame.index === frame.items.length) {
        stack.pop();
        const encoded = joinWithListHeader(frame.parts, frame.size);
        if (stack.length === 0) return encoded;

        const parent = stack[stack.length - 1];
        parent.parts.push(encoded);
        parent.size += encoded.length;
        continue;
      }

      const item = frame.items[frame.index++];
      if (item.kind === "list") {
        stack.push({ items: item.items, index: 0, parts: [], size: 0 });
      } else {
        const encoded = this.encodeBytes(item.bytes);
        frame.parts.push(encoded);
        frame.size += encoded.length;
      }
    }
  }

  /**
   * Encodes the fields of a fixed-arity value in declaration order.
   * The wire form is the same as {@link encodeList}.
   */
  encodeStructured(fields: readonly RlpValue[]): Uint8Array {
    return this.encodeList(fields);
  }

  /**
   * Decodes exactly one value from the front of `input`.
   * Bytes after it are returned as `remainder`.
   */
  decode(input: Uint8Array): DecodeResult<RlpValue> {
    const header = parseHeader(input);
    if (!header.ok) return this.reject(header.error);

    if (header.value.isList) return this.decodeListBody(input, header.value);

    const end = header.value.headerLength + header.value.payloadLength;
    return success(rlpBytes(input.subarray(header.value.headerLength, end)), input.subarray(end));
  }

  /**
   * Like {@link decode}, but the value must span the whole input.
   */
  decodeExact(input: Uint8Array): DecodeResult<RlpValue> {
    const result = this.decode(input);
    if (!result.ok) return result;
    return this.requireConsumed(input, result);
  }

  /**
   * Decodes a byte string from the front of `input`.
   * The returned bytes are a copy, never a view into `input`.
   */
  decodeBytes(input: Uint8Array): DecodeResult<Uint8Array> {
    const header = parseHeader(input);
    if (!header.ok) return this.reject(header.error);
    if (header.value.isList) return this.reject(new TypeMismatchError("bytes", 0));

    const { headerLength, payloadLength } = header.value;
    const end = headerLength + payloadLength;
    return success(input.slice(headerLength, end), input.subarray(end));
  }

  /**
   * Decodes a list from the front of `input` and returns its items.
   */
  decodeList(input: Uint8Array): DecodeResult<readonly RlpValue[]> {
    const header = parseHeader(input);
    if (!header.ok) return this.reject(header.error);
    if (!header.value.isList) return this.reject(new TypeMismatchError("list", 0));

    const result = this.decodeListBody(input, header.value);
    if (!result.ok) return result;
    return success(result.value.items, result.remainder);
  }

  /**
   * Decodes a list that must hold exactly `arity` items.
   */
  decodeStructured(input: Uint8Array, arity: number): DecodeResult<readonly RlpValue[]> {
    const result = this.decodeList(input);
    if (!result.ok) return result;

    if (result.value.length !== arity) {
      return this.reject(new LengthMismatchError(arity, result.value.length, 0));
    }
    return result;
  }

  /**
   * Fails with a trailing-data error unless `result` consumed all of `input`.
   */
  requireConsumed<T>(input: Uint8Array, result: DecodeResult<T>): DecodeResult<T> {
    if (!result.ok || result.remainder.length === 0) return result;

    const consumed = input.length - result.remainder.length;
    return this.reject(new TrailingDataError(result.remainder.length, consumed));
  }

  private decodeListBody(input: Uint8Array, header: RlpHeader): DecodeResult<RlpList> {
    const stack: DecodeFrame[] = [{ items: [], end: header.headerLength + header.payloadLength }];
    let pos = header.headerLength;

    while (true) {
      const frame = stack[stack.length - 1];

      if (pos === frame.end) {
        stack.pop();
        const list = rlpList(frame.items);
        if (stack.length === 0) return success(list, input.subarray(pos));

        stack[stack.length - 1].items.push(list);
        continue;
      }

      // Elements are parsed against the enclosing payload only, so none
      // can straddle the end of its list.
      const child = parseHeader(input, pos, frame.end);
      if (!child.ok) return this.reject(child.error);

      const { isList, headerLength, payloadLength } = child.value;
      const childEnd = pos + headerLength + payloadLength;

      if (isList) {
        if (stack.length >= this.config.maxDepth) {
          return this.reject(new DepthLimitExceededError(this.config.maxDepth, pos));
        }
        stack.push({ items: [], end: childEnd });
        pos += headerLength;
      } else {
        frame.items.push(rlpBytes(input.subarray(pos + headerLength, childEnd)));
        pos = childEnd;
      }
    }
  }

  private reject<T>(error: RlpDecodeError): DecodeResult<T> {
    this.log(`Decode failed with ${error.code}: ${error.message}`);
    return failure(error);
  }

  /**
   * Debug logging
   */
  private log(message: string): void {
    if (this.config.debug) {
      console.log(`[RlpCodec] ${message}`);
    }
  }
}

function joinWithListHeader(parts: Uint8Array[], size: number): Uint8Array {
  const header = encodeHeader(size, true);
  const out = new Uint8Array(header.length + size);
  out.set(header, 0);

  let offset = header.length;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Shared codec with the default configuration.
 * Backs the module-level helpers below.
 */
export const defaultCodec = new RlpCodec();

export function encode(value: RlpValue): Uint8Array {
  return defaultCodec.encode(value);
}

export function decode(input: Uint8Array): DecodeResult<RlpValue> {
  return defaultCodec.decode(input);
}

export function decodeExact(input: Uint8Array): DecodeResult<RlpValue> {
  return defaultCodec.decodeExact(input);
}
