/**
 * CLI configuration types
 */

import type { SchemaOptions } from "../../types/config.js";

/**
 * One explicit column in a config or schema file, type in textual form
 */
export interface ColumnConfig {
  name: string;
  type: string;
}

/**
 * Document reading configuration
 */
export interface ReaderConfig {
  maximumFileSize?: number;
  ignoreErrors?: boolean;
  html?: boolean;
}

/**
 * Complete configuration file structure
 */
export interface XmlTabConfig {
  options?: Partial<Omit<SchemaOptions, "documentName">>;
  columns?: ColumnConfig[];
  reader?: ReaderConfig;
}

/**
 * Options shared by every command
 */
export interface CommonCommandOptions {
  html?: boolean;
  namespaces?: string;
  config?: string;
  maximumFileSize?: number;
  ignoreErrors?: boolean;
  logLevel?: string;
}

/**
 * Options of the infer and extract commands
 */
export interface SchemaCommandOptions extends CommonCommandOptions {
  depth?: number;
  root?: string;
  record?: string;
  attributes?: string;
  attributePrefix?: string;
  textKey?: string;
  emptyElements?: string;
  forceList?: string;
  boolean?: boolean;
  numeric?: boolean;
  temporal?: boolean;
  maxSamples?: number;
  outlierThreshold?: number;
  majorityThreshold?: number;
  maxRecursionDepth?: number;
}

export interface ExtractCommandOptions extends SchemaCommandOptions {
  columns?: string;
  schema?: string;
  format?: string;
  outputPath?: string;
}
