/**
 * rlpack
 *
 * Recursive Length Prefix encoding, including:
 * - A value algebra of byte strings and nested lists
 * - Canonical header encoding and strict decoding
 * - Minimal big-endian integer helpers
 * - Typed field descriptors and fixed-arity record codecs
 */

// Core codec
export * from "./core";

// Typed adapters
export * from "./adapters";
