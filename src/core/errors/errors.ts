/**
 * Error codes carried by every {@link RlpError}.
 * Switch on `error.code` to tell failures apart without `instanceof`.
 */
export type RlpErrorCode =
  | "INSUFFICIENT_BYTES"
  | "NON_CANONICAL_ENCODING"
  | "TYPE_MISMATCH"
  | "LENGTH_MISMATCH"
  | "TRAILING_DATA"
  | "DEPTH_LIMIT_EXCEEDED"
  | "UNSUPPORTED_VALUE";

/**
 * Base class for all codec errors.
 */
export abstract class RlpError extends Error {
  abstract readonly code: RlpErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Base class for failures detected while reading encoded bytes.
 * `offset` is relative to the start of the buffer handed to the decode call.
 */
export abstract class RlpDecodeFailure extends RlpError {
  constructor(message: string, readonly offset: number) {
    super(`${message} (at byte ${offset})`);
  }

  /** The same failure, reported at another offset. */
  abstract at(offset: number): RlpDecodeFailure;

  /**
   * The same failure with its offset moved `by` bytes, for an error
   * raised inside a value that sits `by` bytes into a larger input.
   */
  shift(by: number): RlpDecodeFailure {
    return by === 0 ? this : this.at(this.offset + by);
  }
}

/** A header or payload runs past the available bytes. */
export class InsufficientBytesError extends RlpDecodeFailure {
  readonly code = "INSUFFICIENT_BYTES";

  constructor(readonly needed: number, readonly available: number, offset: number) {
    super(`Insufficient bytes: needed ${needed}, got ${available}`, offset);
  }

  at(offset: number): InsufficientBytesError {
    return new InsufficientBytesError(this.needed, this.available, offset);
  }
}

/** The input is valid RLP but not the shortest form of its value. */
export class NonCanonicalEncodingError extends RlpDecodeFailure {
  readonly code = "NON_CANONICAL_ENCODING";

  constructor(readonly reason: string, offset: number) {
    super(`Non-canonical encoding: ${reason}`, offset);
  }

  at(offset: number): NonCanonicalEncodingError {
    return new NonCanonicalEncodingError(this.reason, offset);
  }
}

/** A list was found where a byte string was expected, or the reverse. */
export class TypeMismatchError extends RlpDecodeFailure {
  readonly code = "TYPE_MISMATCH";

  constructor(readonly expected: "bytes" | "list", offset: number) {
    super(
      `Type mismatch: expected ${expected === "list" ? "a list" : "a byte string"}, got ${expected === "list" ? "a byte string" : "a list"}`,
      offset
    );
  }

  at(offset: number): TypeMismatchError {
    return new TypeMismatchError(this.expected, offset);
  }
}

/** A fixed-arity value decoded to the wrong number of fields. */
export class LengthMismatchError extends RlpDecodeFailure {
  readonly code = "LENGTH_MISMATCH";

  constructor(readonly expected: number, readonly actual: number, offset: number) {
    super(`Invalid list length (expected: ${expected}, actual: ${actual})`, offset);
  }

  at(offset: number): LengthMismatchError {
    return new LengthMismatchError(this.expected, this.actual, offset);
  }
}

/** Bytes are left over where the caller required the input to be fully consumed. */
export class TrailingDataError extends RlpDecodeFailure {
  readonly code = "TRAILING_DATA";

  constructor(readonly trailing: number, offset: number) {
    super(`Trailing data: ${trailing} unconsumed byte(s)`, offset);
  }

  at(offset: number): TrailingDataError {
    return new TrailingDataError(this.trailing, offset);
  }
}

/** Lists are nested deeper than the codec's configured `maxDepth`. */
export class DepthLimitExceededError extends RlpDecodeFailure {
  readonly code = "DEPTH_LIMIT_EXCEEDED";

  constructor(readonly maxDepth: number, offset: number) {
    super(`List nesting exceeds the maximum depth of ${maxDepth}`, offset);
  }

  at(offset: number): DepthLimitExceededError {
    return new DepthLimitExceededError(this.maxDepth, offset);
  }
}

/**
 * A host value has no canonical representation, or a payload does not fit
 * the typed field it is decoded into. Raised by the adapter layer only.
 */
export class UnsupportedValueError extends RlpError {
  readonly code = "UNSUPPORTED_VALUE";
}

/**
 * Every error a core decode operation can produce.
 */
export type RlpDecodeError =
  | InsufficientBytesError
  | NonCanonicalEncodingError
  | TypeMismatchError
  | LengthMismatchError
  | TrailingDataError
  | DepthLimitExceededError;

/**
 * Outcome of a decode call.
 * On success, `remainder` holds the bytes after the decoded value.
 */
export type DecodeResult<T> =
  | { ok: true; value: T; remainder: Uint8Array }
  | { ok: false; error: RlpDecodeError };

export function success<T>(value: T, remainder: Uint8Array): DecodeResult<T> {
  return { ok: true, value, remainder };
}

export function failure<T>(error: RlpDecodeError): DecodeResult<T> {
  return { ok: false, error };
}

/**
 * Returns the decoded value or throws the error carried by the result.
 */
export function unwrap<T>(result: DecodeResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
