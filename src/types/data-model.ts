/**
 * Core data model types for xmltab
 * These structures flow through the pipeline: tree → analysis → inference → extraction
 */

/**
 * Scalar semantic types. XML is an opaque serialization that keeps the
 * wrapping tag and its attributes; XML_FRAGMENT drops the wrapping tag.
 */
export type ScalarTypeName =
  | "BOOLEAN"
  | "INTEGER"
  | "BIGINT"
  | "DOUBLE"
  | "DATE"
  | "TIME"
  | "TIMESTAMP"
  | "STRING"
  | "XML"
  | "XML_FRAGMENT";

export const SCALAR_TYPE_NAMES: readonly ScalarTypeName[] = [
  "BOOLEAN",
  "INTEGER",
  "BIGINT",
  "DOUBLE",
  "DATE",
  "TIME",
  "TIMESTAMP",
  "STRING",
  "XML",
  "XML_FRAGMENT",
];

export interface ScalarType {
  type: ScalarTypeName;
}

export interface ListType {
  type: "LIST";
  element: SemanticType;
}

export interface RecordField {
  name: string;
  type: SemanticType;
}

export interface RecordType {
  type: "RECORD";
  fields: RecordField[];
}

export type SemanticType = ScalarType | ListType | RecordType;

export function isScalarType(type: SemanticType): type is ScalarType {
  return type.type !== "LIST" && type.type !== "RECORD";
}

export function isOpaqueType(type: SemanticType): boolean {
  return type.type === "XML" || type.type === "XML_FRAGMENT";
}

export function scalar(name: ScalarTypeName): ScalarType {
  return { type: name };
}

export function listOf(element: SemanticType): ListType {
  return { type: "LIST", element };
}

export function recordOf(fields: RecordField[]): RecordType {
  return { type: "RECORD", fields };
}

/**
 * TypedValue - one extracted cell
 */
export type TypedValue =
  | { type: "NULL" }
  | { type: "BOOLEAN"; value: boolean }
  | { type: "INTEGER"; value: number }
  | { type: "BIGINT"; value: bigint }
  | { type: "DOUBLE"; value: number }
  | { type: "DATE"; value: string } // YYYY-MM-DD
  | { type: "TIME"; value: string } // HH:MM:SS[.fff]
  | { type: "TIMESTAMP"; value: string } // YYYY-MM-DD HH:MM:SS[.fff]
  | { type: "STRING"; value: string }
  | { type: "XML"; value: string }
  | { type: "XML_FRAGMENT"; value: string }
  | { type: "LIST"; element: SemanticType; items: TypedValue[] }
  | { type: "RECORD"; fields: RecordEntry[] };

export interface RecordEntry {
  name: string;
  value: TypedValue;
}

export type Row = TypedValue[];

export const NULL_VALUE: TypedValue = Object.freeze({ type: "NULL" });

/**
 * ShapeRecord - aggregate statistics for one element name
 */
export interface ShapeRecord {
  name: string;
  occurrenceCount: number;
  hasText: boolean;
  sampleValues: string[]; // Cleaned direct text, capped
  attributeCounts: Map<string, number>;
  hasChildren: boolean;
  childElementCounts: Map<string, number>; // child name → total occurrences
  childMaxPerInstance: Map<string, number>; // child name → max occurrences in one instance
}

export type ShapeKind = "leaf" | "array" | "record" | "mixed";

/**
 * StructureAnalysis - output of the pattern analyzer
 */
export interface StructureAnalysis {
  anchorName: string;
  recordNames: string[]; // Distinct record element names, first-seen order
  recordCount: number;
  shapes: Map<string, ShapeRecord>;
}

/**
 * ColumnDescriptor - one inferred column
 *
 * Selectors are relative to a record node: "." (the record itself),
 * "title", "@id", "title/@lang", "@*" / "title/@*" (all attributes) and
 * "#document" (the document identifier).
 */
export interface ColumnDescriptor {
  readonly name: string;
  readonly type: SemanticType;
  readonly isAttribute: boolean;
  readonly selector: string;
  readonly frequency: number; // 0.0 to 1.0, share of all sibling field occurrences
  readonly repeated: boolean; // Collects every same-named sibling into a LIST
}

/**
 * ExplicitColumn - caller-supplied column for the explicit schema path
 */
export interface ExplicitColumn {
  name: string;
  type: SemanticType;
}
