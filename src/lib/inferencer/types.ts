/**
 * Inferencer module types
 */

import type { ColumnDescriptor, StructureAnalysis } from "../../types/data-model.js";
import type { SchemaOptions } from "../../types/config.js";
import type { DetectionOptions } from "../detector/types.js";

export type NestedTypeOptions = DetectionOptions &
  Pick<SchemaOptions, "forceList" | "textContentKey">;

/**
 * A record child considered for a column
 */
export interface FieldCandidate {
  name: string;
  occurrences: number; // Across all records
  maxPerInstance: number; // Within one record
  frequency: number; // Share of all sibling field occurrences
}

export interface InferencerResult {
  columns: ColumnDescriptor[];
  analysis: StructureAnalysis;
  metadata: {
    recordsAnalyzed: number;
    shapesFound: number;
    columnsInferred: number;
    prunedFields: string[];
    usedFallback: boolean;
  };
}
