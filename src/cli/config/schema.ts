/**
 * JSON Schema validation of configuration files using Ajv
 */

import { Ajv, type ErrorObject, type ValidateFunction } from "ajv";
import {
  ATTRIBUTE_MODES,
  EMPTY_ELEMENT_POLICIES,
  NAMESPACE_MODES,
} from "../../types/config.js";
import type { ColumnConfig, XmlTabConfig } from "./types.js";

const COLUMN_SCHEMA = {
  type: "object",
  properties: {
    name: { type: "string", minLength: 1 },
    type: { type: "string", minLength: 1 },
  },
  required: ["name", "type"],
  additionalProperties: false,
};

const COLUMNS_SCHEMA = {
  type: "array",
  items: COLUMN_SCHEMA,
};

const FRACTION = { type: "number", minimum: 0, maximum: 1 };

export const CONFIG_SCHEMA = {
  type: "object",
  properties: {
    options: {
      type: "object",
      properties: {
        depthLimit: { type: "integer", minimum: 0 },
        attributeMode: { enum: ATTRIBUTE_MODES },
        attributePrefix: { type: "string" },
        textContentKey: { type: "string", minLength: 1 },
        namespaces: { enum: NAMESPACE_MODES },
        emptyElements: { enum: EMPTY_ELEMENT_POLICIES },
        rootSelector: { type: "string", minLength: 1 },
        recordSelector: { type: "string", minLength: 1 },
        forceList: { type: "array", items: { type: "string" } },
        booleanDetection: { type: "boolean" },
        numericDetection: { type: "boolean" },
        temporalDetection: { type: "boolean" },
        maxSamples: { type: "integer", minimum: 1 },
        outlierThreshold: FRACTION,
        majorityThreshold: FRACTION,
        maxRecursionDepth: { type: "integer", minimum: 1 },
      },
      additionalProperties: false,
    },
    columns: COLUMNS_SCHEMA,
    reader: {
      type: "object",
      properties: {
        maximumFileSize: { type: "integer", minimum: 1 },
        ignoreErrors: { type: "boolean" },
        html: { type: "boolean" },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

/**
 * Validator for configuration and column schema files
 */
export class ConfigValidator {
  private ajv: Ajv;
  private validateConfigFn: ValidateFunction<XmlTabConfig>;
  private validateColumnsFn: ValidateFunction<ColumnConfig[]>;

  constructor() {
    this.ajv = new Ajv({ allErrors: true });
    this.validateConfigFn = this.ajv.compile<XmlTabConfig>(CONFIG_SCHEMA);
    this.validateColumnsFn = this.ajv.compile<ColumnConfig[]>(COLUMNS_SCHEMA);
  }

  isConfig(data: unknown): data is XmlTabConfig {
    return this.validateConfigFn(data);
  }

  isColumnList(data: unknown): data is ColumnConfig[] {
    return this.validateColumnsFn(data);
  }

  /**
   * Messages for the last failed validation
   */
  getErrors(): string[] {
    const errors: ErrorObject[] = [
      ...(this.validateConfigFn.errors ?? []),
      ...(this.validateColumnsFn.errors ?? []),
    ];
    return errors.map((error) => `${error.instancePath || "/"} ${error.message ?? error.keyword}`);
  }
}
