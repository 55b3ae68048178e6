/**
 * Schema option loading: defaults, config file section and CLI flags
 */

import {
  ATTRIBUTE_MODES,
  DEFAULT_SCHEMA_OPTIONS,
  EMPTY_ELEMENT_POLICIES,
  NAMESPACE_MODES,
  type AttributeMode,
  type EmptyElementPolicy,
  type NamespaceMode,
  type SchemaOptions,
} from "../types/config.js";
import { parseSelector } from "../lib/tree/selector.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

/**
 * CLI options that map onto SchemaOptions
 */
export interface SchemaCliOptions {
  depth?: number;
  root?: string;
  record?: string;
  attributes?: string;
  attributePrefix?: string;
  textKey?: string;
  namespaces?: string;
  emptyElements?: string;
  forceList?: string; // Comma-separated element names
  boolean?: boolean; // false when --no-boolean is given
  numeric?: boolean;
  temporal?: boolean;
  maxSamples?: number;
  outlierThreshold?: number;
  majorityThreshold?: number;
  maxRecursionDepth?: number;
}

function oneOf<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  flag: string,
): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new ConfigError(`Invalid ${flag}: ${value}. Expected one of ${allowed.join(", ")}`);
  }
  return match;
}

/**
 * Merge caller options over defaults and validate the result
 *
 * @throws ConfigError if any option is out of range
 */
export function resolveSchemaOptions(options: Partial<SchemaOptions> = {}): SchemaOptions {
  const defined = Object.fromEntries(
    Object.entries(options).filter(([, value]) => value !== undefined),
  );
  const resolved: SchemaOptions = {
    ...DEFAULT_SCHEMA_OPTIONS,
    forceList: [...DEFAULT_SCHEMA_OPTIONS.forceList],
    ...defined,
  };
  validateSchemaOptions(resolved);
  return resolved;
}

export function validateSchemaOptions(options: SchemaOptions): void {
  if (!Number.isInteger(options.depthLimit) || options.depthLimit < 0) {
    throw new ConfigError(`depthLimit must be a non-negative integer, got ${options.depthLimit}`);
  }
  if (!Number.isInteger(options.maxSamples) || options.maxSamples < 1) {
    throw new ConfigError(`maxSamples must be a positive integer, got ${options.maxSamples}`);
  }
  if (!Number.isInteger(options.maxRecursionDepth) || options.maxRecursionDepth < 1) {
    throw new ConfigError(
      `maxRecursionDepth must be a positive integer, got ${options.maxRecursionDepth}`,
    );
  }
  for (const key of ["outlierThreshold", "majorityThreshold"] as const) {
    const value = options[key];
    if (!(value >= 0 && value <= 1)) {
      throw new ConfigError(`${key} must be between 0.0 and 1.0, got ${value}`);
    }
  }
  oneOf(options.attributeMode, ATTRIBUTE_MODES, "attributeMode");
  oneOf(options.namespaces, NAMESPACE_MODES, "namespaces");
  oneOf(options.emptyElements, EMPTY_ELEMENT_POLICIES, "emptyElements");
  if (options.textContentKey.trim() === "") {
    throw new ConfigError("textContentKey must not be empty");
  }
  if (options.rootSelector !== undefined) {
    parseSelector(options.rootSelector);
  }
  if (options.recordSelector !== undefined) {
    parseSelector(options.recordSelector);
  }
}

/**
 * Load schema options from CLI flags and an optional config file section
 *
 * @example
 * const options = loadSchemaOptions({ depth: 3 }, { depthLimit: 5, attributeMode: "discard" });
 * // depthLimit: 3 (CLI takes precedence), attributeMode: "discard"
 */
export function loadSchemaOptions(
  cliOptions: SchemaCliOptions = {},
  configFile: Partial<SchemaOptions> = {},
): SchemaOptions {
  const forceList = cliOptions.forceList
    ? cliOptions.forceList
        .split(",")
        .map((name) => name.trim())
        .filter((name) => name !== "")
    : undefined;

  const attributeMode: AttributeMode | undefined = oneOf(
    cliOptions.attributes,
    ATTRIBUTE_MODES,
    "--attributes",
  );
  const namespaces: NamespaceMode | undefined = oneOf(
    cliOptions.namespaces,
    NAMESPACE_MODES,
    "--namespaces",
  );
  const emptyElements: EmptyElementPolicy | undefined = oneOf(
    cliOptions.emptyElements,
    EMPTY_ELEMENT_POLICIES,
    "--empty-elements",
  );

  // Build config with precedence: CLI > config file > defaults
  const options = resolveSchemaOptions({
    ...configFile,
    depthLimit: cliOptions.depth ?? configFile.depthLimit,
    rootSelector: cliOptions.root ?? configFile.rootSelector,
    recordSelector: cliOptions.record ?? configFile.recordSelector,
    attributeMode: attributeMode ?? configFile.attributeMode,
    attributePrefix: cliOptions.attributePrefix ?? configFile.attributePrefix,
    textContentKey: cliOptions.textKey ?? configFile.textContentKey,
    namespaces: namespaces ?? configFile.namespaces,
    emptyElements: emptyElements ?? configFile.emptyElements,
    forceList: forceList ?? configFile.forceList,
    booleanDetection: cliOptions.boolean === false ? false : configFile.booleanDetection,
    numericDetection: cliOptions.numeric === false ? false : configFile.numericDetection,
    temporalDetection: cliOptions.temporal === false ? false : configFile.temporalDetection,
    maxSamples: cliOptions.maxSamples ?? configFile.maxSamples,
    outlierThreshold: cliOptions.outlierThreshold ?? configFile.outlierThreshold,
    majorityThreshold: cliOptions.majorityThreshold ?? configFile.majorityThreshold,
    maxRecursionDepth: cliOptions.maxRecursionDepth ?? configFile.maxRecursionDepth,
  });

  logger.debug("Schema options loaded", {
    depthLimit: options.depthLimit,
    attributeMode: options.attributeMode,
    namespaces: options.namespaces,
    rootSelector: options.rootSelector,
    recordSelector: options.recordSelector,
  });

  return options;
}
