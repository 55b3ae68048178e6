/**
 * Emitter module types
 */

export type OutputFormat = "ndjson" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["ndjson", "json"];

/**
 * JSON-safe form of a typed value
 */
export type PlainValue =
  | null
  | boolean
  | number
  | string
  | PlainValue[]
  | { [key: string]: PlainValue };

export type PlainRow = Record<string, PlainValue>;
