/**
 * Analyzer module types
 */

import type { SchemaOptions } from "../../types/config.js";

export type AnalyzerOptions = Pick<SchemaOptions, "depthLimit" | "maxSamples">;
