/**
 * Adapter layer - typed host values on top of the core value algebra
 *
 * Field descriptors turn booleans, integers, text, arrays and records
 * into RLP values and back. The core codec never interprets payloads;
 * everything type-specific lives here.
 *
 * @example
 * ```ts
 * import { defineRecord, RlpPrimitives } from './adapters';
 *
 * const Point = defineRecord({
 *   schema: {
 *     x: RlpPrimitives.i32,
 *     y: RlpPrimitives.i32,
 *     label: RlpPrimitives.string,
 *   }
 * });
 *
 * const buf = Point.codec.encode({ x: -3, y: 12, label: "spawn" });
 * const point = Point.codec.decode(buf);
 * ```
 */

export * from "./primitives/primitives";
export * from "./record/record-codec";
export * from "./record/define-record";
