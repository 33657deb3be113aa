/**
 * Leaf value: an opaque byte string.
 *
 * The wrapper is frozen but a typed array cannot be, so `bytes` must be
 * treated as read-only: writing to it changes what the value encodes to.
 */
export type RlpBytes = {
  readonly kind: "bytes";
  readonly bytes: Uint8Array;
};

/**
 * Node value: an ordered sequence of values, possibly empty.
 */
export type RlpList = {
  readonly kind: "list";
  readonly items: readonly RlpValue[];
};

/**
 * The complete value algebra of the codec.
 * Anything encodable decomposes into these two variants.
 */
export type RlpValue = RlpBytes | RlpList;

const textEncoder = new TextEncoder();

/**
 * Creates a byte-string value.
 *
 * The bytes are copied, so later writes to the caller's buffer
 * do not reach the value.
 */
export function rlpBytes(bytes: Uint8Array | ArrayLike<number>): RlpBytes {
  const value: RlpBytes = { kind: "bytes", bytes: Uint8Array.from(bytes) };
  return Object.freeze(value);
}

/**
 * Creates a list value. The items array is copied and frozen.
 */
export function rlpList(items: readonly RlpValue[]): RlpList {
  const value: RlpList = { kind: "list", items: Object.freeze(items.slice()) };
  return Object.freeze(value);
}

/** Byte-string value holding the UTF-8 encoding of `text`. */
export function rlpText(text: string): RlpBytes {
  const value: RlpBytes = { kind: "bytes", bytes: textEncoder.encode(text) };
  return Object.freeze(value);
}

export function isRlpBytes(value: RlpValue): value is RlpBytes {
  return value.kind === "bytes";
}

export function isRlpList(value: RlpValue): value is RlpList {
  return value.kind === "list";
}

/**
 * Structural equality of two values.
 * Walks both trees with an explicit stack, so deep nesting is safe.
 */
export function rlpEquals(a: RlpValue, b: RlpValue): boolean {
  const pending: Array<[RlpValue, RlpValue]> = [[a, b]];

  while (pending.length > 0) {
    const next = pending.pop();
    if (next === undefined) break;
    const [x, y] = next;

    if (x.kind === "bytes" || y.kind === "bytes") {
      if (x.kind !== "bytes" || y.kind !== "bytes") return false;
      if (!bytesEqual(x.bytes, y.bytes)) return false;
      continue;
    }

    if (x.items.length !== y.items.length) return false;
    for (let i = 0; i < x.items.length; i++) {
      pending.push([x.items[i], y.items[i]]);
    }
  }

  return true;
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
