/**
 * Documentation Index
 *
 * Indexes every record reachable from a set of named roots and, as a side
 * effect, finalizes identity over the graph:
 *
 * - Naming: every reachable value gets a canonical name. Producer-supplied
 *   names are kept; other values get the best-scoring variable path that
 *   reaches them, or a synthetic `??` name if no variable path does.
 * - Aliases: values that only proxy another (`importedFrom`) are joined with
 *   the value they stand for, or promoted when that value is not indexed.
 * - Containers: `canonicalContainer` is linked to the value named by the
 *   canonical name's container.
 *
 * Values are looked up by dotted name through `getValdoc` / `getVardoc`.
 *
 * @module
 */

import { DottedName } from "../names/dotted-name.js";
import { UnreachableNames } from "../names/unreachable-names.js";
import { Diagnostics } from "../diagnostics/diagnostics.js";
import { createLogger } from "../../utils/logger.js";
import {
  UNKNOWN,
  canonicalNameOf,
  isClassDoc,
  isKnown,
  isModuleDoc,
  isPresent,
  isPropertyDoc,
  isTrue,
  variableEntries,
  type DocGraph,
  type DocId,
  type ValueDoc,
  type VariableDoc,
} from "../model/index.js";

const logger = createLogger("doc-index");

// =============================================================================
// Types
// =============================================================================

/**
 * Score adjustments of the canonical naming walk. Higher is better.
 */
export const NAME_SCORES = {
  /** A name the producer supplied; never replaced */
  producer: Number.MAX_SAFE_INTEGER,
  /** Each variable step away from a root */
  variableStep: -1,
  importUnknown: -10,
  imported: -100,
  aliasUnknown: -10,
  alias: -1000,
  /** A top-level module reached only structurally keeps its own name */
  topLevelModule: -1000,
  /** Reached only through bases, subclasses, package or accessors */
  unreachable: -10000,
} as const;

export interface DocIndexOptions {
  /** Advisory sink; defaults to a fresh collector */
  diagnostics?: Diagnostics;
  /** Synthetic name registry shared by the build; defaults to a fresh one */
  unreachableNames?: UnreachableNames;
}

/**
 * Outcome of a name lookup
 */
export interface LookupHit {
  variable: DocId | null;
  value: DocId | null;
}

interface NameCandidate {
  name: DottedName;
  score: number;
}

const MISS: LookupHit = { variable: null, value: null };

// =============================================================================
// DocIndex
// =============================================================================

export class DocIndex {
  /** Root handles, shortest name first */
  readonly roots: DocId[];
  /** Values reached from the roots through non-imported variables */
  readonly contained = new Set<DocId>();
  /** Values reached from the roots by any path */
  readonly reachable = new Set<DocId>();
  readonly reachableVariables = new Set<DocId>();
  readonly diagnostics: Diagnostics;

  private readonly unreachableNames: UnreachableNames;
  private readonly scores = new Map<DocId, number>();
  private readonly lookupRoots: DocId[];
  private readonly reportedConflicts = new Set<DocId>();

  constructor(
    readonly graph: DocGraph,
    roots: Map<string, DocId>,
    options: DocIndexOptions = {}
  ) {
    this.diagnostics = options.diagnostics ?? new Diagnostics();
    this.unreachableNames = options.unreachableNames ?? new UnreachableNames();

    this.roots = this.prepareRoots(roots);
    this.lookupRoots = [...this.roots];

    for (const root of this.roots) {
      this.findContained(root);
      const rootName = canonicalNameOf(this.graph.getValue(root));
      if (rootName) this.assign(root, rootName, 0);
    }
    this.resolveAliases();
    this.refreshSets();
    this.linkContainers();

    logger.debug(
      {
        roots: this.roots.length,
        reachable: this.reachable.size,
        contained: this.contained.size,
        variables: this.reachableVariables.size,
      },
      "Indexed documentation graph"
    );
  }

  // ===========================================================================
  // Lookup
  // ===========================================================================

  /**
   * Value at `name`, or null when the index has none.
   */
  getValdoc(name: DottedName | string): DocId | null {
    return this.lookup(name).value;
  }

  /**
   * Variable at `name`, or null when `name` does not end at a variable.
   */
  getVardoc(name: DottedName | string): DocId | null {
    return this.lookup(name).variable;
  }

  lookup(name: DottedName | string): LookupHit {
    const query = typeof name === "string" ? new DottedName(name) : name;
    for (const rootId of this.lookupRoots) {
      const root = this.graph.getValue(rootId);
      const rootName = canonicalNameOf(root);
      if (!rootName || !rootName.dominates(query)) continue;
      const hit = this.walkFrom(root.id, query.parts.slice(rootName.length));
      if (hit.variable !== null || hit.value !== null) return hit;
    }
    return MISS;
  }

  /**
   * Reachable values ordered by canonical name.
   */
  reachableValues(): ValueDoc[] {
    return [...this.reachable]
      .map((id) => this.graph.getValue(id))
      .sort((a, b) => compareNames(canonicalNameOf(a), canonicalNameOf(b)));
  }

  private walkFrom(rootId: DocId, identifiers: readonly string[]): LookupHit {
    let variable: DocId | null = null;
    let value: DocId | null = rootId;

    for (const identifier of identifiers) {
      if (value === null) return MISS;
      const current = this.graph.getValue(value);

      const match = this.variablesOf(current).find((candidate) => candidate.name === identifier);
      if (match) {
        variable = match.id;
        value = isPresent(match.value) ? match.value : null;
        continue;
      }

      const submodule = this.findSubmodule(current, identifier);
      if (submodule === null) return MISS;
      variable = null;
      value = submodule;
    }

    return { variable, value: value === null ? null : this.graph.resolve(value) };
  }

  private findSubmodule(current: ValueDoc, identifier: string): DocId | null {
    if (!isModuleDoc(current) || !isKnown(current.submodules)) return null;
    const currentName = canonicalNameOf(current);
    if (!currentName) return null;
    const expected = currentName.concat(identifier);
    const found = current.submodules.find((id) =>
      expected.equals(canonicalNameOf(this.graph.getValue(id)))
    );
    return found ?? null;
  }

  // ===========================================================================
  // Roots & Containment
  // ===========================================================================

  private prepareRoots(roots: Map<string, DocId>): DocId[] {
    const prepared: Array<{ id: DocId; name: DottedName }> = [];
    for (const [key, handle] of roots) {
      const root = this.graph.getValue(handle);
      let name = canonicalNameOf(root);
      if (!name) {
        name = new DottedName(key);
        root.canonicalName = name;
      }
      prepared.push({ id: root.id, name });
    }
    return prepared.sort((a, b) => a.name.length - b.name.length).map((entry) => entry.id);
  }

  private findContained(valueId: DocId): void {
    const value = this.graph.getValue(valueId);
    if (this.contained.has(value.id)) return;
    this.contained.add(value.id);
    for (const variable of this.variablesOf(value)) {
      this.reachableVariables.add(variable.id);
      if (!isPresent(variable.value)) continue;
      // An import of unknown status still counts as a definition here.
      const imported = isKnown(variable.isImported) && isTrue(variable.isImported, "isImported");
      if (!imported) this.findContained(variable.value);
    }
  }

  private variablesOf(value: ValueDoc): VariableDoc[] {
    return variableEntries(value).map(([, id]) => this.graph.getVariable(id));
  }

  // ===========================================================================
  // Canonical Naming
  // ===========================================================================

  private assign(valueId: DocId, candidateName: DottedName, candidateScore: number): void {
    const value = this.graph.getValue(valueId);
    const recorded = this.scores.get(value.id);
    if (recorded !== undefined && candidateScore <= recorded) return;

    this.reachable.add(value.id);

    let name = candidateName;
    let score = candidateScore;
    const supplied = canonicalNameOf(value);
    if (recorded === undefined && supplied) {
      this.scores.set(value.id, NAME_SCORES.producer);
      name = supplied;
      score = 0;
    } else {
      value.canonicalName = name;
      this.scores.set(value.id, score);
    }

    for (const variable of this.variablesOf(value)) {
      this.reachableVariables.add(variable.id);
      if (!isKnown(variable.name) || !isPresent(variable.value)) continue;
      const variableName = name.concat(variable.name);
      if (this.shadowsItself(variable, variableName)) {
        this.fixSelfShadow(variable, variableName);
      }
      if (!isPresent(variable.value)) continue;
      this.assign(variable.value, variableName, score + variablePenalty(variable));
    }

    for (const target of this.structuralEdges(value)) {
      const candidate = this.structuralName(target);
      if (candidate) this.assign(target, candidate.name, candidate.score);
    }
  }

  /**
   * Values reachable without a variable: package, bases, subclasses, accessors.
   */
  private structuralEdges(value: ValueDoc): DocId[] {
    const edges: DocId[] = [];
    if (isModuleDoc(value) && isPresent(value.package)) edges.push(value.package);
    if (isClassDoc(value)) {
      if (isKnown(value.bases)) edges.push(...value.bases);
      if (isKnown(value.subclasses)) edges.push(...value.subclasses);
    }
    if (isPropertyDoc(value)) {
      for (const accessor of [value.fget, value.fset, value.fdel]) {
        if (isPresent(accessor)) edges.push(accessor);
      }
    }
    return edges;
  }

  /**
   * Name for a structurally reached value, or null when `assign` would not
   * apply it anyway. Synthetic names are minted only when they will be used.
   */
  private structuralName(targetId: DocId): NameCandidate | null {
    const target = this.graph.getValue(targetId);
    const ownName = canonicalNameOf(target);

    if (isModuleDoc(target) && ownName && ownName.length === 1 && target.package === null) {
      const clash = this.lookupRoots.find((root) =>
        ownName.equals(canonicalNameOf(this.graph.getValue(root)))
      );
      if (clash === undefined) {
        return { name: ownName, score: NAME_SCORES.topLevelModule };
      }
      if (!this.graph.same(clash, target.id) && !this.reportedConflicts.has(target.id)) {
        this.reportedConflicts.add(target.id);
        this.diagnostics.report("NameConflict", `Name conflict: ${ownName} is also a root`, {
          name: ownName.key,
          value: target.id,
          root: clash,
        });
      }
    }

    const recorded = this.scores.get(target.id);
    if (recorded === undefined && ownName !== null) {
      // First visit keeps the producer name; the walk still has to enter it.
      return { name: ownName, score: NAME_SCORES.unreachable };
    }
    if (recorded !== undefined && recorded >= NAME_SCORES.unreachable) return null;

    return { name: this.unreachableNames.mint(unreachableHint(target)), score: NAME_SCORES.unreachable };
  }

  // ===========================================================================
  // Self-Shadowing
  // ===========================================================================

  /**
   * True when the variable's prospective name strictly dominates the name its
   * value already carries (an imported variable hiding its value's home).
   */
  private shadowsItself(variable: VariableDoc, variableName: DottedName): boolean {
    if (!isPresent(variable.value)) return false;
    const existing = canonicalNameOf(this.graph.getValue(variable.value));
    return existing !== null && !existing.equals(variableName) && variableName.dominates(existing);
  }

  private fixSelfShadow(variable: VariableDoc, variableName: DottedName): void {
    if (!isPresent(variable.value)) return;
    const shadowed = this.graph.getValue(variable.value);
    const shadowedName = canonicalNameOf(shadowed);
    if (!shadowedName) return;

    for (let i = 1; i < shadowedName.length - 1; i++) {
      const primed = new DottedName(
        ...shadowedName.parts.map((identifier, j) => (j === i ? `${identifier}'` : identifier))
      );
      const alternate = this.getValdoc(primed);
      if (alternate !== null) {
        variable.value = alternate;
        this.diagnostics.report(
          "SelfShadow",
          `${variableName} shadows its own value; using ${primed} instead`,
          { variable: variable.id, name: variableName.key, replacement: primed.key }
        );
        return;
      }
    }

    shadowed.canonicalName = UNKNOWN;
    this.scores.delete(shadowed.id);
    this.diagnostics.report("SelfShadow", `${variableName} shadows itself`, {
      variable: variable.id,
      name: variableName.key,
      value: shadowed.id,
    });
  }

  // ===========================================================================
  // Aliases & Containers
  // ===========================================================================

  private resolveAliases(): void {
    for (const id of [...this.reachable]) {
      let current = this.graph.getValue(id);
      while (isPresent(current.importedFrom)) {
        const target = current.importedFrom;
        const found = this.getValdoc(target);

        if (found === null) {
          current.canonicalName = target;
          current.importedFrom = null;
          this.lookupRoots.push(current.id);
          logger.debug({ value: current.id, name: target.key }, "Promoted unresolved alias");
          break;
        }

        if (!this.graph.same(found, current.id)) {
          const owner = this.graph.join(found, current.id);
          logger.trace({ alias: id, target: owner }, "Joined alias with its target");
          current = this.graph.getValue(owner);
          continue;
        }

        current.importedFrom = null;
        this.diagnostics.report("SelfShadow", `Alias ${target} resolves to itself`, {
          value: current.id,
          name: target.key,
        });
        break;
      }
    }
  }

  private refreshSets(): void {
    for (const set of [this.contained, this.reachable, this.reachableVariables]) {
      const resolved = [...set].map((id) => this.graph.resolve(id));
      set.clear();
      for (const id of resolved) set.add(id);
    }
    for (let i = 0; i < this.roots.length; i++) {
      const root = this.roots[i];
      if (root !== undefined) this.roots[i] = this.graph.resolve(root);
    }
  }

  private linkContainers(): void {
    for (const id of this.reachable) {
      const value = this.graph.getValue(id);
      const parent = canonicalNameOf(value)?.container() ?? null;
      value.canonicalContainer = parent ? this.getValdoc(parent) : null;
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function variablePenalty(variable: VariableDoc): number {
  let penalty: number = NAME_SCORES.variableStep;
  if (!isKnown(variable.isImported)) penalty += NAME_SCORES.importUnknown;
  else if (isTrue(variable.isImported, "isImported")) penalty += NAME_SCORES.imported;
  if (!isKnown(variable.isAlias)) penalty += NAME_SCORES.aliasUnknown;
  else if (isTrue(variable.isAlias, "isAlias")) penalty += NAME_SCORES.alias;
  return penalty;
}

function unreachableHint(value: ValueDoc): DottedName | string | null {
  if (isPresent(value.importedFrom)) return value.importedFrom;
  if (isPresent(value.rawValue) && value.rawValue.name !== undefined) return value.rawValue.name;
  return null;
}

function compareNames(a: DottedName | null, b: DottedName | null): number {
  if (a && b) return a.compare(b);
  if (a) return -1;
  return b ? 1 : 0;
}
