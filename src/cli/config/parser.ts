/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { ExplicitColumn } from "../../types/data-model.js";
import type { ColumnConfig, XmlTabConfig } from "./types.js";
import { ConfigValidator } from "./schema.js";
import { parseSemanticType } from "../../lib/inferencer/semantic-type.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

function readStructuredFile(filePath: string): unknown {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, { filePath }, { cause: error });
  }

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  try {
    const parsed: unknown = isYaml ? parseYaml(content) : JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, { cause: error });
  }
}

/**
 * Parse and validate a configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): XmlTabConfig {
  logger.info("Parsing configuration file", { filePath });

  const data = readStructuredFile(filePath) ?? {};
  const validator = new ConfigValidator();
  if (!validator.isConfig(data)) {
    throw new ConfigError(`Invalid config file: ${filePath}`, {
      filePath,
      errors: validator.getErrors(),
    });
  }

  logger.info("Configuration file parsed successfully", {
    hasOptions: data.options !== undefined,
    columns: data.columns?.length ?? 0,
    hasReaderConfig: data.reader !== undefined,
  });
  return data;
}

/**
 * Parse a column schema file: a list of `{ name, type }`, or a config
 * file with a `columns` section
 */
export function parseColumnsFile(filePath: string): ExplicitColumn[] {
  const data = readStructuredFile(filePath);
  const validator = new ConfigValidator();

  if (validator.isColumnList(data)) {
    return toExplicitColumns(data);
  }
  if (validator.isConfig(data) && data.columns) {
    return toExplicitColumns(data.columns);
  }
  throw new ConfigError(`Invalid column schema file: ${filePath}`, {
    filePath,
    errors: validator.getErrors(),
  });
}

/**
 * Parse the `--columns "name:TYPE,..."` flag. Commas inside angle
 * brackets belong to the type.
 */
export function parseColumnsFlag(value: string): ExplicitColumn[] {
  const entries: string[] = [];
  let depth = 0;
  let current = "";
  for (const char of value) {
    if (char === "<" || char === "(") depth++;
    if (char === ">" || char === ")") depth--;
    if (char === "," && depth === 0) {
      entries.push(current);
      current = "";
      continue;
    }
    current += char;
  }
  entries.push(current);

  return toExplicitColumns(
    entries
      .map((entry) => entry.trim())
      .filter((entry) => entry !== "")
      .map((entry) => {
        const separator = entry.indexOf(":");
        if (separator <= 0) {
          throw new ConfigError(`Invalid column definition: "${entry}". Expected name:TYPE`);
        }
        return {
          name: entry.slice(0, separator).trim(),
          type: entry.slice(separator + 1).trim(),
        };
      }),
  );
}

export function toExplicitColumns(columns: readonly ColumnConfig[]): ExplicitColumn[] {
  return columns.map((column) => ({ name: column.name, type: parseSemanticType(column.type) }));
}
