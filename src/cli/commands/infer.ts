/**
 * Infer command - print the column schema inferred from a document
 */

import { Command } from "commander";
import type { SchemaCommandOptions } from "../config/types.js";
import { readDocuments } from "../../lib/reader/index.js";
import { formatSemanticType, runInference } from "../../lib/inferencer/index.js";
import { addSchemaOptions, exitWithError, resolveCommandContext } from "./shared.js";
import { ErrorCode, XmlTabError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Execute infer command. The schema comes from the first readable document.
 */
async function executeInfer(files: string[], options: SchemaCommandOptions): Promise<void> {
  const startTime = Date.now();

  try {
    const { schemaOptions, readerOptions } = resolveCommandContext(options);
    const { documents, skipped } = await readDocuments(files, readerOptions);
    const [first] = documents;
    if (!first) {
      throw new XmlTabError(ErrorCode.FILE_IO_ERROR, "No readable documents", {
        skipped: skipped.length,
      });
    }

    logger.info("Starting schema inference", { path: first.path });
    const { columns, metadata } = runInference(first.tree, {
      ...schemaOptions,
      documentName: first.path,
    });
    logger.info("Schema inference complete", metadata);

    const result = {
      status: "success",
      phase: "inference",
      source: first.path,
      schema: columns.map((column) => ({
        name: column.name,
        type: formatSemanticType(column.type),
        isAttribute: column.isAttribute,
        selector: column.selector,
      })),
      summary: {
        documentsRead: documents.length,
        documentsSkipped: skipped.length,
        recordsAnalyzed: metadata.recordsAnalyzed,
        columnsInferred: metadata.columnsInferred,
        prunedFields: metadata.prunedFields,
        usedFallback: metadata.usedFallback,
        durationMs: Date.now() - startTime,
      },
    };

    console.log(JSON.stringify(result, null, 2));
  } catch (error) {
    exitWithError(error, "inference");
  }
}

/**
 * Create infer command
 */
export function createInferCommand(): Command {
  const command = new Command("infer");

  addSchemaOptions(command)
    .description("Infer a tabular schema from XML or HTML documents")
    .argument("<files...>", "Documents to read")
    .action(executeInfer);

  return command;
}
