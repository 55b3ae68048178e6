/**
 * Tree module - document parsing and navigation
 */

export * from "./types.js";
export * from "./dom-adapter.js";
export * from "./selector.js";
export * from "./records.js";
export * from "./stats.js";
