/**
 * xmltab: tabular schema inference and typed row extraction for XML and HTML
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/tree/index.js";
export * from "./lib/analyzer/index.js";
export * from "./lib/detector/index.js";
export * from "./lib/inferencer/index.js";
export * from "./lib/extractor/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/reader/index.js";
export * from "./lib/pipeline/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
