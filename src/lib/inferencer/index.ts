/**
 * Inferencer module - column schema inference from a parsed document
 */

import {
  isOpaqueType,
  listOf,
  scalar,
  type ColumnDescriptor,
  type SemanticType,
  type ShapeRecord,
  type StructureAnalysis,
} from "../../types/data-model.js";
import type { SchemaOptions } from "../../types/config.js";
import type { TreeDocument } from "../tree/types.js";
import type { FieldCandidate, InferencerResult } from "./types.js";
import { resolveRecords } from "../tree/records.js";
import { analyzeRecords } from "../analyzer/index.js";
import { inferScalarType } from "../detector/index.js";
import { inferNestedType, isNestedTypeFailure } from "./nested-type.js";
import { attributeColumnsFor } from "./attribute-columns.js";
import { resolveSchemaOptions } from "../../utils/config-loader.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";
export * from "./nested-type.js";
export * from "./semantic-type.js";
export * from "./attribute-columns.js";

/**
 * Columns used when the records expose nothing to type
 */
export function fallbackColumns(): ColumnDescriptor[] {
  return [
    {
      name: "filename",
      type: scalar("STRING"),
      isAttribute: false,
      selector: "#document",
      frequency: 1,
      repeated: false,
    },
    {
      name: "content",
      type: scalar("XML"),
      isAttribute: false,
      selector: ".",
      frequency: 1,
      repeated: false,
    },
  ];
}

/**
 * Child names of the record shapes with their occurrence statistics, in
 * first-seen order
 */
export function collectFieldCandidates(analysis: StructureAnalysis): FieldCandidate[] {
  const candidates = new Map<string, FieldCandidate>();

  for (const recordName of analysis.recordNames) {
    const shape = analysis.shapes.get(recordName);
    if (!shape) continue;
    for (const [name, count] of shape.childElementCounts) {
      const maxPerInstance = shape.childMaxPerInstance.get(name) ?? 0;
      const existing = candidates.get(name);
      if (existing) {
        existing.occurrences += count;
        existing.maxPerInstance = Math.max(existing.maxPerInstance, maxPerInstance);
      } else {
        candidates.set(name, { name, occurrences: count, maxPerInstance, frequency: 0 });
      }
    }
  }

  const list = Array.from(candidates.values());
  const total = list.reduce((sum, candidate) => sum + candidate.occurrences, 0);
  for (const candidate of list) {
    candidate.frequency = total > 0 ? candidate.occurrences / total : 0;
  }
  return list;
}

/**
 * Column type for a field shape: detected scalar for leaves, then the
 * structured, fragment and wrapped tiers for containers
 */
export function fieldColumnType(
  shape: ShapeRecord,
  shapes: ReadonlyMap<string, ShapeRecord>,
  options: SchemaOptions,
): SemanticType {
  if (!shape.hasChildren) {
    return shape.hasText ? inferScalarType(shape.sampleValues, options) : scalar("STRING");
  }
  const nested = inferNestedType(shape, shapes, options);
  if (!isNestedTypeFailure(nested)) {
    return nested;
  }
  return shape.attributeCounts.size === 0 ? scalar("XML_FRAGMENT") : scalar("XML");
}

function buildColumns(
  analysis: StructureAnalysis,
  options: SchemaOptions,
): { columns: ColumnDescriptor[]; pruned: string[] } {
  const candidates = collectFieldCandidates(analysis);
  const pruned: string[] = [];
  const fieldColumns: { column: ColumnDescriptor; shape: ShapeRecord }[] = [];

  for (const candidate of candidates) {
    const shape = analysis.shapes.get(candidate.name);
    if (!shape) continue;
    if (candidate.frequency < options.outlierThreshold) {
      pruned.push(candidate.name);
      continue;
    }

    let type = fieldColumnType(shape, analysis.shapes, options);
    const repeats =
      candidate.maxPerInstance > 1 || options.forceList.includes(candidate.name);
    const repeated = repeats && !isOpaqueType(type);
    if (repeated) {
      type = listOf(type);
    }

    fieldColumns.push({
      column: {
        name: candidate.name,
        type,
        isAttribute: false,
        selector: candidate.name,
        frequency: candidate.frequency,
        repeated,
      },
      shape,
    });
  }

  const columns: ColumnDescriptor[] = [];
  const used = new Set(fieldColumns.map(({ column }) => column.name));
  const addAttributeColumns = (candidates: ColumnDescriptor[]): void => {
    for (const column of candidates) {
      if (used.has(column.name)) continue;
      used.add(column.name);
      columns.push(column);
    }
  };

  for (const recordName of analysis.recordNames) {
    const shape = analysis.shapes.get(recordName);
    if (shape) {
      addAttributeColumns(attributeColumnsFor(shape, "", options));
    }
  }

  if (fieldColumns.length === 0) {
    // Leaf records: the record text is the only value
    const recordShapes = analysis.recordNames
      .map((name) => analysis.shapes.get(name))
      .filter((shape): shape is ShapeRecord => shape !== undefined);
    const samples = recordShapes.flatMap((shape) => shape.sampleValues);
    const first = recordShapes[0];
    if (first && samples.length > 0 && !used.has(first.name)) {
      columns.push({
        name: first.name,
        type: inferScalarType(samples, options),
        isAttribute: false,
        selector: ".",
        frequency: 1,
        repeated: false,
      });
    }
  }

  for (const { column, shape } of fieldColumns) {
    columns.push(column);
    addAttributeColumns(attributeColumnsFor(shape, column.selector, options));
  }

  return { columns, pruned };
}

/**
 * Infer the column schema of a document, with analysis metadata
 */
export function runInference(
  tree: TreeDocument,
  options: Partial<SchemaOptions> = {},
): InferencerResult {
  const opts = resolveSchemaOptions(options);
  const { anchorName, records } = resolveRecords(tree, opts);
  const analysis = analyzeRecords(records, anchorName, opts);

  logger.debug("Starting schema inference", {
    anchorName,
    recordCount: records.length,
    depthLimit: opts.depthLimit,
  });

  let columns: ColumnDescriptor[];
  let pruned: string[] = [];

  if (opts.depthLimit === 0) {
    columns = [
      {
        name: anchorName,
        type: scalar("XML"),
        isAttribute: false,
        selector: ".",
        frequency: 1,
        repeated: false,
      },
    ];
  } else {
    ({ columns, pruned } = buildColumns(analysis, opts));
  }

  const usedFallback = columns.length === 0;
  if (usedFallback) {
    columns = fallbackColumns();
  }

  if (pruned.length > 0) {
    logger.debug("Pruned outlier fields", { fields: pruned });
  }

  return {
    columns,
    analysis,
    metadata: {
      recordsAnalyzed: analysis.recordCount,
      shapesFound: analysis.shapes.size,
      columnsInferred: columns.length,
      prunedFields: pruned,
      usedFallback,
    },
  };
}

/**
 * Infer the column schema of a document
 */
export function inferSchema(
  tree: TreeDocument,
  options: Partial<SchemaOptions> = {},
): ColumnDescriptor[] {
  return runInference(tree, options).columns;
}

/**
 * Main inferencer class
 */
export class Inferencer {
  private options: SchemaOptions;

  constructor(options: Partial<SchemaOptions> = {}) {
    this.options = resolveSchemaOptions(options);
  }

  infer(tree: TreeDocument): InferencerResult {
    return runInference(tree, this.options);
  }
}
