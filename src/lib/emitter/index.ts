/**
 * Emitter module - plain-value conversion and row stream writers
 */
export * from "./types.js";
export * from "./plain-value.js";
export * from "./ndjson-writer.js";
export * from "./json-writer.js";
