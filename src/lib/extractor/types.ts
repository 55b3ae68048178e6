/**
 * Extractor module types
 */

import type { Row } from "../../types/data-model.js";
import type { SchemaOptions } from "../../types/config.js";

export type ExtractionOptions = Pick<
  SchemaOptions,
  | "emptyElements"
  | "textContentKey"
  | "maxRecursionDepth"
  | "documentName"
  | "rootSelector"
  | "recordSelector"
>;

/**
 * Where a column's value is read from, relative to a record node
 */
export type ColumnSource =
  | { kind: "document" }
  | { kind: "self" }
  | { kind: "element"; element: string }
  | { kind: "attribute"; element: string | null; attribute: string }
  | { kind: "attributes"; element: string | null };

export interface ExtractionResult {
  columnNames: string[];
  rows: Row[];
}
