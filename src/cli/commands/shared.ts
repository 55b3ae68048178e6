/**
 * Options and helpers shared by the CLI commands
 */

import { Command, InvalidArgumentError } from "commander";
import type { SchemaOptions } from "../../types/config.js";
import type { ReaderOptions } from "../../lib/reader/types.js";
import { DEFAULT_MAXIMUM_FILE_SIZE } from "../../lib/reader/index.js";
import type { CommonCommandOptions, SchemaCommandOptions, XmlTabConfig } from "../config/types.js";
import { parseConfigFile } from "../config/parser.js";
import { loadSchemaOptions } from "../../utils/config-loader.js";
import { ErrorCode, toXmlTabError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

export function parseFraction(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError("Must be a number between 0.0 and 1.0.");
  }
  return parsed;
}

/**
 * Document reading and config file options
 */
export function addCommonOptions(command: Command): Command {
  return command
    .option("--html", "Parse input leniently as HTML")
    .option("--namespaces <mode>", "Namespace handling: strip, expand, keep")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--maximum-file-size <bytes>", "Largest file to read, in bytes", parseInteger)
    .option("--ignore-errors", "Skip unreadable or malformed files instead of failing");
}

/**
 * Inference options
 */
export function addSchemaOptions(command: Command): Command {
  return addCommonOptions(command)
    .option("--depth <levels>", "Levels below the anchor to analyze (default: 10)", parseInteger)
    .option("--root <selector>", "Selector of the anchor element")
    .option("--record <selector>", "Selector of the record elements")
    .option("--attributes <mode>", "Attribute handling: columns, prefixed-columns, map, discard")
    .option("--attribute-prefix <prefix>", "Prefix for attribute column names")
    .option("--text-key <name>", "Field name for direct text of mixed content")
    .option("--empty-elements <policy>", "Empty element policy: null, empty-string, empty-record")
    .option("--force-list <names>", "Element names always typed as LIST (comma-separated)")
    .option("--no-boolean", "Disable BOOLEAN detection")
    .option("--no-numeric", "Disable INTEGER, BIGINT and DOUBLE detection")
    .option("--no-temporal", "Disable DATE, TIME and TIMESTAMP detection")
    .option("--max-samples <count>", "Sampled values per element (default: 20)", parseInteger)
    .option("--outlier-threshold <fraction>", "Prune fields rarer than this (default: 0.1)", parseFraction)
    .option("--majority-threshold <fraction>", "Share a type needs to win (default: 0.8)", parseFraction)
    .option("--max-recursion-depth <levels>", "Extraction recursion ceiling (default: 256)", parseInteger);
}

export interface CommandContext {
  config: XmlTabConfig;
  schemaOptions: SchemaOptions;
  readerOptions: ReaderOptions;
}

/**
 * Resolve configuration with precedence CLI > config file > defaults
 */
export function resolveCommandContext(
  options: SchemaCommandOptions | CommonCommandOptions,
): CommandContext {
  const config = options.config ? parseConfigFile(options.config) : {};
  const schemaOptions = loadSchemaOptions(options, config.options);
  const html = options.html ?? config.reader?.html ?? false;

  return {
    config,
    schemaOptions,
    readerOptions: {
      maximumFileSize:
        options.maximumFileSize ?? config.reader?.maximumFileSize ?? DEFAULT_MAXIMUM_FILE_SIZE,
      ignoreErrors: options.ignoreErrors ?? config.reader?.ignoreErrors ?? false,
      mode: html ? "html" : "xml",
      namespaces: schemaOptions.namespaces,
    },
  };
}

/**
 * Print the error response to stderr and exit: 2 for configuration
 * errors, 1 otherwise
 */
export function exitWithError(error: unknown, phase: string): never {
  const xmlTabError = toXmlTabError(error);
  logger.debug("Command failed", { phase, code: xmlTabError.code });
  console.error(JSON.stringify(xmlTabError.toResponse(phase), null, 2));
  process.exit(xmlTabError.code === ErrorCode.CONFIG_ERROR ? 2 : 1);
}
