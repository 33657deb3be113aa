export * from "./errors/errors";
export * from "./rlp-value/rlp-value";
export * from "./canonical/canonical";
export * from "./header/header";
export * from "./rlp-codec/rlp-codec";
