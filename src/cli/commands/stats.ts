/**
 * Stats command - print per-document statistics
 */

import { Command } from "commander";
import type { CommonCommandOptions } from "../config/types.js";
import { readDocuments } from "../../lib/reader/index.js";
import { computeDocumentStats } from "../../lib/tree/stats.js";
import { addCommonOptions, exitWithError, resolveCommandContext } from "./shared.js";

async function executeStats(files: string[], options: CommonCommandOptions): Promise<void> {
  try {
    const { readerOptions } = resolveCommandContext(options);
    const { documents, skipped } = await readDocuments(files, readerOptions);

    const result = {
      status: "success",
      phase: "stats",
      documents: documents.map((doc) => ({
        path: doc.path,
        ...computeDocumentStats(doc.tree),
      })),
      skipped,
    };
    console.log(JSON.stringify(result, null, 2));
  } catch (error) {
    exitWithError(error, "stats");
  }
}

/**
 * Create stats command
 */
export function createStatsCommand(): Command {
  const command = new Command("stats");

  addCommonOptions(command)
    .description("Count elements, attributes, depth and namespaces per document")
    .argument("<files...>", "Documents to read")
    .action(executeStats);

  return command;
}
