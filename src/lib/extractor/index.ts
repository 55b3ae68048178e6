/**
 * Extractor module - typed row extraction against inferred or explicit columns
 */

import {
  NULL_VALUE,
  isScalarType,
  type ColumnDescriptor,
  type ExplicitColumn,
  type Row,
  type TypedValue,
} from "../../types/data-model.js";
import type { SchemaOptions } from "../../types/config.js";
import type { TreeDocument, TreeNode } from "../tree/types.js";
import type { ColumnSource, ExtractionResult } from "./types.js";
import { resolveRecords } from "../tree/records.js";
import { parseColumnSelector } from "./column-source.js";
import { convertToValue } from "./value-converter.js";
import { Materializer, childrenNamed, missingValue, nullRecord } from "./materializer.js";
import { resolveSchemaOptions } from "../../utils/config-loader.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { cleanText } from "../../utils/text.js";

export * from "./types.js";
export * from "./column-source.js";
export * from "./value-converter.js";
export * from "./materializer.js";

function extractColumn(
  materializer: Materializer,
  record: TreeNode,
  column: ColumnDescriptor,
  source: ColumnSource,
  documentName: string | undefined,
): TypedValue {
  const { type } = column;

  switch (source.kind) {
    case "document":
      return documentName === undefined ? NULL_VALUE : { type: "STRING", value: documentName };

    case "self":
      return materializer.extractValue(record, type);

    case "attribute": {
      const target = source.element === null ? record : childrenNamed(record, source.element)[0];
      const value = target?.attribute(source.attribute);
      return value === undefined ? NULL_VALUE : convertToValue(value, type);
    }

    case "attributes": {
      if (type.type !== "RECORD") {
        return NULL_VALUE;
      }
      const target = source.element === null ? record : childrenNamed(record, source.element)[0];
      if (!target) {
        return nullRecord(type);
      }
      return {
        type: "RECORD",
        fields: type.fields.map((field) => {
          const value = target.attribute(field.name);
          return {
            name: field.name,
            value: value === undefined ? NULL_VALUE : convertToValue(value, field.type),
          };
        }),
      };
    }

    case "element": {
      const matches = childrenNamed(record, source.element);
      if (column.repeated && type.type === "LIST") {
        return materializer.gatherList(matches, type.element);
      }
      const [first] = matches;
      return first ? materializer.extractValue(first, type) : missingValue(type);
    }
  }
}

/**
 * Extract one row per record against inferred column descriptors
 */
export function extractRows(
  tree: TreeDocument,
  columns: readonly ColumnDescriptor[],
  options: Partial<SchemaOptions> = {},
): Row[] {
  const opts = resolveSchemaOptions(options);
  const { records } = resolveRecords(tree, opts);
  const materializer = new Materializer(opts);
  const sources = columns.map((column) => parseColumnSelector(column.selector));

  const rows = records.map((record) =>
    columns.map((column, index) => {
      const source = sources[index] ?? parseColumnSelector(column.selector);
      return extractColumn(materializer, record, column, source, opts.documentName);
    }),
  );

  logger.debug("Extracted rows", { rows: rows.length, columns: columns.length });
  return rows;
}

function extractExplicitColumn(
  materializer: Materializer,
  record: TreeNode,
  column: ExplicitColumn,
  textContentKey: string,
): TypedValue {
  const { name, type } = column;

  const attribute = record.attribute(name);
  if (attribute !== undefined && isScalarType(type)) {
    return convertToValue(attribute, type);
  }

  const matches = childrenNamed(record, name);
  if (type.type === "LIST") {
    return materializer.extractListField(matches, type.element);
  }

  const [first] = matches;
  if (first) {
    return materializer.extractValue(first, type);
  }
  if (name === textContentKey && isScalarType(type)) {
    return convertToValue(cleanText(record.text), type);
  }
  return missingValue(type);
}

/**
 * Extract one row per record against caller-declared columns, skipping
 * analysis and inference
 *
 * @throws {ConfigError} When no columns are given
 */
export function extractRowsWithSchema(
  tree: TreeDocument,
  columns: readonly ExplicitColumn[],
  options: Partial<SchemaOptions> = {},
): Row[] {
  if (columns.length === 0) {
    throw new ConfigError("Explicit schema must declare at least one column");
  }
  const opts = resolveSchemaOptions(options);
  const { records } = resolveRecords(tree, opts);
  const materializer = new Materializer(opts);

  const rows = records.map((record) =>
    columns.map((column) =>
      extractExplicitColumn(materializer, record, column, opts.textContentKey),
    ),
  );

  logger.debug("Extracted rows with explicit schema", {
    rows: rows.length,
    columns: columns.length,
  });
  return rows;
}

/**
 * Main extractor class
 */
export class Extractor {
  private options: SchemaOptions;

  constructor(options: Partial<SchemaOptions> = {}) {
    this.options = resolveSchemaOptions(options);
  }

  extract(tree: TreeDocument, columns: readonly ColumnDescriptor[]): ExtractionResult {
    return {
      columnNames: columns.map((column) => column.name),
      rows: extractRows(tree, columns, this.options),
    };
  }

  extractWithSchema(tree: TreeDocument, columns: readonly ExplicitColumn[]): ExtractionResult {
    return {
      columnNames: columns.map((column) => column.name),
      rows: extractRowsWithSchema(tree, columns, this.options),
    };
  }
}
