import type { RlpCodec } from "../../core/rlp-codec/rlp-codec";
import type { InferRecord, RecordSchema } from "./record-codec";
import { RecordCodec } from "./record-codec";

/**
 * Configuration for defining a record type.
 * @template S The schema type describing the record's fields
 */
export interface RecordDefinition<S extends RecordSchema> {
  /** Field descriptors, in the order they appear on the wire */
  schema: S;
  /** Core codec to encode with (default: the shared default codec) */
  codec?: RlpCodec;
}

/**
 * Result of defineRecord - provides both the type and codec.
 * @template S The schema type
 */
export interface DefinedRecord<S extends RecordSchema> {
  /** The TypeScript type for this record (use with `typeof RecordName.type`) */
  type: InferRecord<S>;
  /** The codec instance for encoding/decoding this record */
  codec: RecordCodec<S>;
}

/**
 * Define a type-safe record with a fixed field count.
 *
 * The record's TypeScript type is derived from its schema, so the two
 * cannot drift apart. The codec rejects encodings whose element count
 * differs from the schema's.
 *
 * @example
 * ```ts
 * const Transfer = defineRecord({
 *   schema: {
 *     nonce: RlpPrimitives.u64,
 *     to: RlpPrimitives.bytes,
 *     amount: RlpPrimitives.uint,
 *     memo: RlpPrimitives.string,
 *   },
 * });
 *
 * type Transfer = typeof Transfer.type;
 *
 * const buf = Transfer.codec.encode({
 *   nonce: 7n,
 *   to: new Uint8Array([0xaa, 0xbb]),
 *   amount: 1000n,
 *   memo: "rent",
 * });
 * const decoded: Transfer = Transfer.codec.decode(buf);
 * ```
 */
export function defineRecord<S extends RecordSchema>(
  definition: RecordDefinition<S>
): DefinedRecord<S> {
  const codec = new RecordCodec(definition.schema, definition.codec);

  return {
    type: codec.toNil(), // Phantom value for inference
    codec,
  };
}
