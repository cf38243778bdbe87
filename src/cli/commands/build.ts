/**
 * build command - Merge, name and inherit over one or two graph documents
 */

import chalk from "chalk";
import { z } from "zod";
import { DocBuilder, pairRoots, type BuildResult } from "../../core/builder/index.js";
import { loadGraphDocument, type LoadedDocument } from "../../core/loader/index.js";
import { describeDoc } from "../../core/printer/index.js";
import { canonicalNameOf, DocGraph } from "../../core/model/index.js";
import { ConfigurationError } from "../../core/errors.js";
import { createLogger } from "../../utils/logger.js";
import { formatZodError, loadConfig, parseConfig, safeValidate } from "../../utils/validation.js";

const logger = createLogger("build");

export const OUTPUT_FORMATS = ["names", "tree", "json"] as const;

const OutputFormatSchema = z.enum(OUTPUT_FORMATS);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export interface BuildOptions {
  inspected?: string;
  parsed?: string;
  config?: string;
  format?: string;
  depth?: number;
}

/**
 * Build the documentation graph and print it
 */
export async function buildCommand(options: BuildOptions): Promise<void> {
  logger.info({ options }, "Building documentation graph");

  const format = parseFormat(options.format ?? "names");
  if (options.inspected === undefined && options.parsed === undefined) {
    throw new ConfigurationError("Nothing to build: pass --inspected and/or --parsed");
  }

  const config = options.config !== undefined ? await loadConfig(options.config) : parseConfig();
  const graph = new DocGraph();

  let inspected: LoadedDocument | undefined;
  let parsed: LoadedDocument | undefined;
  if (options.inspected !== undefined) inspected = await loadGraphDocument(graph, options.inspected);
  if (options.parsed !== undefined) parsed = await loadGraphDocument(graph, options.parsed);

  const result = new DocBuilder(graph, config).build(pairRoots(inspected, parsed));

  for (const advisory of result.advisories) {
    console.error(chalk.yellow(`warning: ${advisory.kind}: ${advisory.message}`));
  }
  console.log(renderBuild(graph, result, format, options.depth ?? 2));
}

export function parseFormat(value: string): OutputFormat {
  const result = safeValidate(OutputFormatSchema, value);
  if (!result.success) {
    throw new ConfigurationError(`Unknown output format "${value}": ${formatZodError(result.error).join("; ")}`, {
      format: value,
    });
  }
  return result.data;
}

/**
 * Renders a finished build in the requested format.
 */
export function renderBuild(graph: DocGraph, result: BuildResult, format: OutputFormat, depth = 2): string {
  switch (format) {
    case "names":
      return result.index
        .reachableValues()
        .map((value) => `${canonicalNameOf(value)?.key ?? "?"} (${value.kind})`)
        .join("\n");
    case "tree":
      return result.index.roots.map((root) => describeDoc(graph, root, { depth })).join("\n\n");
    case "json":
      return JSON.stringify(
        {
          roots: Object.fromEntries(
            [...result.roots].map(([name, id]): [string, string | null] => [
              name,
              canonicalNameOf(graph.getValue(id))?.key ?? null,
            ])
          ),
          values: result.index.reachableValues().map((value) => {
            const container =
              typeof value.canonicalContainer === "string" ? graph.getValue(value.canonicalContainer) : null;
            return {
              name: canonicalNameOf(value)?.key ?? null,
              kind: value.kind,
              container: container ? (canonicalNameOf(container)?.key ?? null) : null,
            };
          }),
          advisories: result.advisories.map(({ kind, message }) => ({ kind, message })),
        },
        null,
        2
      );
  }
}
