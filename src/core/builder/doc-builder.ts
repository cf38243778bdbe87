/**
 * Doc Builder
 *
 * Drives one documentation build over a DocGraph:
 * merge inspected/parsed pairs -> index and name -> inherit -> lay out.
 *
 * Every build gets its own diagnostics, merge visited-set, score table and
 * unreachable-name registry.
 *
 * @module
 */

import { Diagnostics, type Advisory } from "../diagnostics/diagnostics.js";
import { DocIndex } from "../indexer/doc-index.js";
import { DocInheriter } from "../inheritance/inheriter.js";
import { MroResolver } from "../inheritance/mro.js";
import { DocMerger } from "../merger/doc-merger.js";
import { Precedence, type PrecedenceTable } from "../merger/precedence.js";
import { layoutAll } from "../layout/layout.js";
import { UnreachableNames } from "../names/unreachable-names.js";
import type { LoadedDocument } from "../loader/graph-document.js";
import { isFieldName, type DocGraph, type DocId, type DocSource } from "../model/index.js";
import { createLogger } from "../../utils/logger.js";
import { parseConfig, type BuildConfig } from "../../utils/validation.js";

const logger = createLogger("doc-builder");

// =============================================================================
// Types
// =============================================================================

/**
 * One top-level item, as seen by either producer
 */
export interface BuildItem {
  name: string;
  inspected?: DocId;
  parsed?: DocId;
}

export interface BuildResult {
  index: DocIndex;
  /** Name -> root handle actually indexed */
  roots: Map<string, DocId>;
  advisories: readonly Advisory[];
}

// =============================================================================
// DocBuilder
// =============================================================================

export class DocBuilder {
  readonly config: BuildConfig;

  constructor(
    readonly graph: DocGraph,
    config: BuildConfig = parseConfig()
  ) {
    this.config = config;
  }

  build(items: BuildItem[]): BuildResult {
    const startTime = Date.now();
    const diagnostics = new Diagnostics();

    const merger = new DocMerger(this.graph, {
      diagnostics,
      precedence: new Precedence(
        this.config.defaultPrecedence,
        toPrecedenceTable(this.config.precedence)
      ),
    });

    const roots = new Map<string, DocId>();
    for (const item of items) {
      if (item.inspected !== undefined && item.parsed !== undefined) {
        roots.set(item.name, merger.merge(item.inspected, item.parsed));
      } else if (item.inspected !== undefined) {
        roots.set(item.name, item.inspected);
      } else if (item.parsed !== undefined) {
        roots.set(item.name, item.parsed);
      } else {
        logger.warn({ item: item.name }, "Skipping item with no documentation from either source");
      }
    }

    const index = new DocIndex(this.graph, roots, {
      diagnostics,
      unreachableNames: new UnreachableNames(),
    });

    if (this.config.inherit) {
      const inheriter = new DocInheriter(this.graph, {
        diagnostics,
        mro: new MroResolver(this.graph, {
          universalBase: this.config.universalBase,
          strategy: this.config.mroStrategy,
        }),
      });
      inheriter.resolveAll(index);
    }

    if (this.config.layout) {
      layoutAll(index);
    }

    logger.info(
      {
        roots: roots.size,
        reachable: index.reachable.size,
        advisories: diagnostics.size,
        durationMs: Date.now() - startTime,
      },
      "Built documentation graph"
    );

    return { index, roots, advisories: diagnostics.advisories };
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Pairs the roots of an inspected and a parsed document by name.
 */
export function pairRoots(inspected?: LoadedDocument, parsed?: LoadedDocument): BuildItem[] {
  const names = new Set([...(inspected?.roots.keys() ?? []), ...(parsed?.roots.keys() ?? [])]);
  return [...names].sort().map((name) => {
    const item: BuildItem = { name };
    const inspectedRoot = inspected?.roots.get(name);
    const parsedRoot = parsed?.roots.get(name);
    if (inspectedRoot !== undefined) item.inspected = inspectedRoot;
    if (parsedRoot !== undefined) item.parsed = parsedRoot;
    return item;
  });
}

function toPrecedenceTable(overrides: Record<string, DocSource>): PrecedenceTable {
  const table: PrecedenceTable = {};
  for (const [field, source] of Object.entries(overrides)) {
    if (isFieldName(field)) table[field] = source;
  }
  return table;
}
