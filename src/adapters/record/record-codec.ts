import { LengthMismatchError, TypeMismatchError, unwrap } from "../../core/errors/errors";
import type { RlpCodec } from "../../core/rlp-codec/rlp-codec";
import { defaultCodec } from "../../core/rlp-codec/rlp-codec";
import type { RlpList, RlpValue } from "../../core/rlp-value/rlp-value";
import { rlpList } from "../../core/rlp-value/rlp-value";
import type { RlpField } from "../primitives/primitives";
import { fromListItems } from "../primitives/primitives";

/**
 * Generic codec interface
 */
export interface Codec<T> {
  encode(value: T): Uint8Array;
  decode(buf: Uint8Array): T;
}

/**
 * A schema mapping record keys to field descriptors.
 * The order of iteration defines the field order on the wire.
 *
 * IMPORTANT:
 * Property order is respected as insertion order.
 * Do not rely on computed or dynamic keys.
 */
export type RecordSchema = Record<string, RlpField<unknown>>;

/**
 * Infer the record type from a schema definition
 */
export type InferRecord<S extends RecordSchema> = {
  [K in keyof S]: S[K] extends RlpField<infer V> ? V : never;
};

/**
 * Codec for fixed-arity records.
 *
 * A record travels as an RLP list holding one element per schema field,
 * in declaration order. Decoding requires exactly that many elements.
 * The codec is itself a field descriptor, so records nest inside other
 * records and lists.
 *
 * @template S Schema type
 */
export class RecordCodec<S extends RecordSchema> implements Codec<InferRecord<S>>, RlpField<InferRecord<S>> {
  /** Number of fields every encoded record carries */
  readonly arity: number;

  private readonly keys: Array<keyof S & string>;

  /**
   * @param schema Field descriptors in wire order
   * @param rlp Core codec used for the byte-level encoding
   */
  constructor(readonly schema: S, private readonly rlp: RlpCodec = defaultCodec) {
    this.keys = Object.keys(schema) as Array<keyof S & string>;
    this.arity = this.keys.length;
  }

  /**
   * Encode a record into bytes.
   */
  encode(value: InferRecord<S>): Uint8Array {
    return this.rlp.encodeStructured(this.toFields(value));
  }

  /**
   * Decode bytes holding exactly one record.
   *
   * @throws TypeMismatchError, LengthMismatchError, TrailingDataError or any
   * other core decode error. Field conversion errors propagate, with decode
   * failures reported at their offset in `buf`.
   */
  decode(buf: Uint8Array): InferRecord<S> {
    const fields = unwrap(this.rlp.requireConsumed(buf, this.rlp.decodeStructured(buf, this.arity)));
    return this.fromFields(rlpList(fields));
  }

  toRlp(value: InferRecord<S>): RlpValue {
    return rlpList(this.toFields(value));
  }

  fromRlp(value: RlpValue): InferRecord<S> {
    if (value.kind === "bytes") throw new TypeMismatchError("list", 0);
    if (value.items.length !== this.arity) {
      throw new LengthMismatchError(this.arity, value.items.length, 0);
    }
    return this.fromFields(value);
  }

  toNil(): InferRecord<S> {
    return this.build((key) => this.schema[key].toNil());
  }

  private toFields(value: InferRecord<S>): RlpValue[] {
    return this.keys.map((key) => this.schema[key].toRlp(value[key]));
  }

  private fromFields(list: RlpList): InferRecord<S> {
    const values = fromListItems(list, (item, index) => this.schema[this.keys[index]].fromRlp(item));
    let i = 0;
    return this.build(() => values[i++]);
  }

  private build(read: (key: keyof S & string) => unknown): InferRecord<S> {
    const target: Record<string, unknown> = {};
    for (const key of this.keys) {
      target[key] = read(key);
    }
    return target as InferRecord<S>;
  }
}
