// Core re-exports for the xmltab type system
// This file provides a single import point for all project types

export * from "./data-model.js";
export * from "./config.js";
export * from "../lib/tree/types.js";
export * from "../lib/analyzer/types.js";
export * from "../lib/detector/types.js";
export * from "../lib/inferencer/types.js";
export * from "../lib/extractor/types.js";
export * from "../lib/emitter/types.js";
export * from "../lib/reader/types.js";
