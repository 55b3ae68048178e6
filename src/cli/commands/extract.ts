/**
 * Extract command - write typed rows as NDJSON or a JSON array
 */

import { Command } from "commander";
import { Readable, pipeline } from "stream";
import { createWriteStream } from "fs";
import { promisify } from "util";
import type { ColumnDescriptor, ExplicitColumn, Row } from "../../types/data-model.js";
import type { ExtractCommandOptions } from "../config/types.js";
import type { LoadedDocument } from "../../lib/reader/types.js";
import { readDocuments } from "../../lib/reader/index.js";
import { inferSchema } from "../../lib/inferencer/index.js";
import { extractRows, extractRowsWithSchema } from "../../lib/extractor/index.js";
import { createJSONWriter, createNDJSONWriter, OUTPUT_FORMATS } from "../../lib/emitter/index.js";
import { parseColumnsFile, parseColumnsFlag, toExplicitColumns } from "../config/parser.js";
import { addSchemaOptions, exitWithError, resolveCommandContext } from "./shared.js";
import { ConfigError, ErrorCode, XmlTabError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const pipelineAsync = promisify(pipeline);

type ColumnPlan =
  | { kind: "explicit"; columns: ExplicitColumn[] }
  | { kind: "inferred"; columns: ColumnDescriptor[] };

/**
 * Execute extract command. Without explicit columns, the schema inferred
 * from the first document applies to every document.
 */
async function executeExtract(files: string[], options: ExtractCommandOptions): Promise<void> {
  const startTime = Date.now();

  try {
    const format = options.format ?? "ndjson";
    if (!OUTPUT_FORMATS.some((candidate) => candidate === format)) {
      throw new ConfigError(`Invalid --format: ${format}. Expected one of ${OUTPUT_FORMATS.join(", ")}`);
    }
    if (options.columns && options.schema) {
      throw new ConfigError("--columns and --schema cannot be used together");
    }

    const { config, schemaOptions, readerOptions } = resolveCommandContext(options);
    const explicit = options.columns
      ? parseColumnsFlag(options.columns)
      : options.schema
        ? parseColumnsFile(options.schema)
        : config.columns
          ? toExplicitColumns(config.columns)
          : undefined;

    const { documents, skipped } = await readDocuments(files, readerOptions);
    const [first] = documents;
    if (!first) {
      throw new XmlTabError(ErrorCode.FILE_IO_ERROR, "No readable documents", {
        skipped: skipped.length,
      });
    }

    const plan: ColumnPlan = explicit
      ? { kind: "explicit", columns: explicit }
      : {
          kind: "inferred",
          columns: inferSchema(first.tree, { ...schemaOptions, documentName: first.path }),
        };
    const columnNames = plan.columns.map((column) => column.name);

    let rowCount = 0;
    function* rowsOf(docs: readonly LoadedDocument[]): Generator<Row> {
      for (const doc of docs) {
        const docOptions = { ...schemaOptions, documentName: doc.path };
        const rows =
          plan.kind === "explicit"
            ? extractRowsWithSchema(doc.tree, plan.columns, docOptions)
            : extractRows(doc.tree, plan.columns, docOptions);
        rowCount += rows.length;
        yield* rows;
      }
    }

    const outputPath = options.outputPath ?? "stdout";
    const outputStream = outputPath === "stdout" ? process.stdout : createWriteStream(outputPath);
    const formatWriter =
      format === "json" ? createJSONWriter(columnNames) : createNDJSONWriter(columnNames);

    await pipelineAsync(Readable.from(rowsOf(documents)), formatWriter, outputStream);

    const summary = {
      documentsRead: documents.length,
      documentsSkipped: skipped.length,
      columns: columnNames.length,
      rows: rowCount,
      schema: plan.kind,
      durationMs: Date.now() - startTime,
    };
    if (outputPath === "stdout") {
      logger.info("Extraction complete", summary);
    } else {
      console.log(
        JSON.stringify({ status: "success", phase: "extraction", output: { format, path: outputPath }, summary }, null, 2),
      );
    }
  } catch (error) {
    exitWithError(error, "extraction");
  }
}

/**
 * Create extract command
 */
export function createExtractCommand(): Command {
  const command = new Command("extract");

  addSchemaOptions(command)
    .description("Extract typed rows from XML or HTML documents")
    .argument("<files...>", "Documents to read")
    .option("--columns <definitions>", 'Explicit columns, e.g. "id:INTEGER,tags:LIST<STRING>"')
    .option("--schema <path>", "Explicit columns file (JSON/YAML list of { name, type })")
    .option("--format <format>", "Output format: ndjson, json", "ndjson")
    .option("--output-path <path>", 'Output path (or "stdout")', "stdout")
    .action(executeExtract);

  return command;
}
