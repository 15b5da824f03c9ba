/**
 * schematree
 *
 * Typed, schema-driven object trees: build from descriptors, query by
 * name or path, check conformance, diff, and convert to JSON, YAML and
 * constructor source.
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./config.js";
export * from "./descriptor.js";
export * from "./node.js";
export * from "./registry.js";
export * from "./catalog.js";
export * from "./navigator.js";
export * from "./type-checker.js";
export * from "./diff.js";
export * from "./codec/index.js";
