/**
 * Analyzer module - structural pattern analysis below an anchor node
 */

import type { StructureAnalysis } from "../../types/data-model.js";
import { DEFAULT_SCHEMA_OPTIONS } from "../../types/config.js";
import type { TreeNode } from "../tree/types.js";
import type { AnalyzerOptions } from "./types.js";
import { ShapeAccumulator } from "./shape-accumulator.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";
export * from "./shape-accumulator.js";

const DEFAULT_OPTIONS: AnalyzerOptions = {
  depthLimit: DEFAULT_SCHEMA_OPTIONS.depthLimit,
  maxSamples: DEFAULT_SCHEMA_OPTIONS.maxSamples,
};

/**
 * Analyze the element children of `anchor` as records
 */
export function analyzeStructure(
  anchor: TreeNode,
  options: Partial<AnalyzerOptions> = {},
): StructureAnalysis {
  return analyzeRecords(anchor.children, anchor.name, options);
}

/**
 * Analyze an explicit record list, e.g. the matches of a record selector
 */
export function analyzeRecords(
  records: readonly TreeNode[],
  anchorName: string,
  options: Partial<AnalyzerOptions> = {},
): StructureAnalysis {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const accumulator = new ShapeAccumulator(opts);
  const recordNames: string[] = [];

  for (const record of records) {
    if (!recordNames.includes(record.name)) {
      recordNames.push(record.name);
    }
    accumulator.addRecord(record);
  }

  const shapes = accumulator.getShapes();
  logger.debug("Structure analysis complete", {
    anchorName,
    recordCount: records.length,
    shapesFound: shapes.size,
    depthLimit: opts.depthLimit,
  });

  return { anchorName, recordNames, recordCount: records.length, shapes };
}
