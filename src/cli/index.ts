#!/usr/bin/env node

/**
 * xmltab CLI - tabular schema inference and typed row extraction for XML and HTML
 */

import { Command } from "commander";
import { createInferCommand } from "./commands/infer.js";
import { createExtractCommand } from "./commands/extract.js";
import { createStatsCommand } from "./commands/stats.js";
import { isLogLevel, logger } from "../utils/logger.js";

const pkg = {
  name: "xmltab",
  version: "0.1.0",
  description: "Infer tabular schemas from XML and HTML documents and extract typed rows",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug", "info")
    .hook("preAction", (_program, actionCommand) => {
      const level: unknown = actionCommand.optsWithGlobals().logLevel;
      if (isLogLevel(level)) {
        logger.setLevel(level);
      } else {
        logger.warn("Ignoring unknown log level", { level });
      }
    });

  program.addCommand(createInferCommand());
  program.addCommand(createExtractCommand());
  program.addCommand(createStatsCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify({ status: "error", error: { code: "UNEXPECTED_ERROR", message } }, null, 2),
  );
  process.exit(1);
});
