/**
 * Schema options for inference and extraction
 */

export type AttributeMode = "columns" | "prefixed-columns" | "map" | "discard";
export type NamespaceMode = "strip" | "expand" | "keep";
export type EmptyElementPolicy = "null" | "empty-string" | "empty-record";
export type DocumentMode = "xml" | "html";

export const ATTRIBUTE_MODES: readonly AttributeMode[] = [
  "columns",
  "prefixed-columns",
  "map",
  "discard",
];
export const NAMESPACE_MODES: readonly NamespaceMode[] = ["strip", "expand", "keep"];
export const EMPTY_ELEMENT_POLICIES: readonly EmptyElementPolicy[] = [
  "null",
  "empty-string",
  "empty-record",
];

/**
 * SchemaOptions - immutable per call
 */
export interface SchemaOptions {
  depthLimit: number; // Levels below the anchor; records are level 1
  attributeMode: AttributeMode;
  attributePrefix: string;
  textContentKey: string; // RECORD field for direct text of mixed content
  namespaces: NamespaceMode;
  emptyElements: EmptyElementPolicy;
  rootSelector?: string;
  recordSelector?: string;
  forceList: string[];
  booleanDetection: boolean;
  numericDetection: boolean;
  temporalDetection: boolean;
  maxSamples: number;
  outlierThreshold: number; // 0.0 to 1.0
  majorityThreshold: number; // 0.0 to 1.0
  maxRecursionDepth: number;
  documentName?: string;
}

export const DEFAULT_SCHEMA_OPTIONS: Readonly<SchemaOptions> = Object.freeze({
  depthLimit: 10,
  attributeMode: "columns",
  attributePrefix: "",
  textContentKey: "text_content",
  namespaces: "strip",
  emptyElements: "null",
  forceList: [],
  booleanDetection: true,
  numericDetection: true,
  temporalDetection: true,
  maxSamples: 20,
  outlierThreshold: 0.1,
  majorityThreshold: 0.8,
  maxRecursionDepth: 256,
});
