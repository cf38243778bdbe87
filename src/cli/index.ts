#!/usr/bin/env node

/**
 * apidoc-graph CLI
 * Loads producer graph documents, builds the unified documentation graph and
 * prints the result
 */

import { Command } from "commander";
import chalk from "chalk";
import { buildCommand, OUTPUT_FORMATS } from "./commands/build.js";
import { ApiDocGraphError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("apidoc-graph")
  .description("Merge, name and resolve inheritance over API documentation graphs")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("build")
  .description("Build the documentation graph from inspected and/or parsed graph documents")
  .option("-i, --inspected <file>", "Graph document produced by runtime inspection")
  .option("-p, --parsed <file>", "Graph document produced by source parsing")
  .option("-c, --config <file>", "Build configuration (JSON)")
  .option("-f, --format <format>", `Output format (${OUTPUT_FORMATS.join(", ")})`, "names")
  .option("-d, --depth <depth>", "Tree depth for --format tree", (value) => parseInt(value, 10), 2)
  .action(buildCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof ApiDocGraphError) {
    logger.error({ err: error, code: error.code }, "Build failed");
    console.error(chalk.red(`\nError [${error.code}]: ${error.message}`));
  } else if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
