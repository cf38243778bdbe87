/**
 * Cross-Source Merger
 *
 * Fuses a record produced by runtime inspection with the record static
 * parsing produced for the same entity. Attributes are combined one by one:
 *
 * - known on one side only: both sides take it
 * - unknown on both: stays unknown
 * - known on both: the attribute's combinator, else the precedence table
 *
 * Afterwards both handles resolve to one shared record. Merging recurses
 * through variables, values, bases and defaults; a visited-pair set keeps
 * cyclic graphs finite.
 *
 * @module
 */

import { Diagnostics } from "../diagnostics/diagnostics.js";
import { createLogger } from "../../utils/logger.js";
import { Precedence } from "./precedence.js";
import {
  areRelatedKinds,
  canonicalNameOf,
  isClassDoc,
  isKnown,
  isModuleDoc,
  isNamespaceDoc,
  isPresent,
  isPropertyDoc,
  isRoutineDoc,
  isSubkind,
  isUnknown,
  isValueDoc,
  isVariableDoc,
  type APIDoc,
  type DocGraph,
  type DocId,
  type DocSource,
  type FieldName,
  type Maybe,
  type RoutineDoc,
  type VariableMap,
} from "../model/index.js";

const logger = createLogger("doc-merger");

/** Parameter list an inspector reports when the real signature is unavailable */
export const PLACEHOLDER_POSARGS: readonly string[] = ["..."];

type Combine<V> = (inspected: V, parsed: V, precedence: DocSource) => V;

export interface DocMergerOptions {
  diagnostics?: Diagnostics;
  precedence?: Precedence;
}

export class DocMerger {
  readonly diagnostics: Diagnostics;
  readonly precedence: Precedence;
  private readonly visited = new Set<string>();

  constructor(
    private readonly graph: DocGraph,
    options: DocMergerOptions = {}
  ) {
    this.diagnostics = options.diagnostics ?? new Diagnostics();
    this.precedence = options.precedence ?? new Precedence();
  }

  /**
   * Merges the inspected and parsed records of one entity.
   *
   * @returns the surviving handle; when the two records are incompatible,
   *   the handle of the side the default precedence prefers, with neither
   *   record touched
   */
  merge(inspectId: DocId, parseId: DocId): DocId {
    const pair = `${inspectId}|${parseId}`;
    if (this.visited.has(pair)) return this.graph.resolve(inspectId);
    this.visited.add(pair);

    if (this.graph.same(inspectId, parseId)) return this.graph.resolve(inspectId);

    const mismatch = this.findMismatch(this.graph.get(inspectId), this.graph.get(parseId));
    if (mismatch !== null) {
      this.diagnostics.report("MergeConflict", `Not merging ${inspectId} and ${parseId}: ${mismatch}`, {
        inspect: inspectId,
        parse: parseId,
      });
      const winner = this.precedence.fallback === "inspect" ? inspectId : parseId;
      return this.graph.resolve(winner);
    }

    this.specializeToCommonKind(inspectId, parseId);
    const inspected = this.graph.get(inspectId);
    const parsed = this.graph.get(parseId);

    if (isRoutineDoc(inspected) && isRoutineDoc(parsed)) {
      this.couplePosargs(inspected, parsed);
    }
    this.mergeRecords(inspected, parsed);

    const owner = this.graph.join(inspectId, parseId);
    logger.trace({ inspect: inspectId, parse: parseId, kind: inspected.kind }, "Merged records");
    return owner;
  }

  // ===========================================================================
  // Compatibility
  // ===========================================================================

  private findMismatch(inspected: APIDoc, parsed: APIDoc): string | null {
    if (!areRelatedKinds(inspected.kind, parsed.kind)) {
      return `kinds do not match (${inspected.kind} vs ${parsed.kind})`;
    }
    if (isValueDoc(inspected) && isValueDoc(parsed)) {
      if (
        isPresent(inspected.rawValue) &&
        isPresent(parsed.rawValue) &&
        !Object.is(inspected.rawValue.ref, parsed.rawValue.ref)
      ) {
        return "raw values do not match";
      }
      const inspectedName = canonicalNameOf(inspected);
      const parsedName = canonicalNameOf(parsed);
      if (inspectedName && parsedName && !inspectedName.equals(parsedName)) {
        return `canonical names do not match (${inspectedName} vs ${parsedName})`;
      }
    }
    return null;
  }

  private specializeToCommonKind(inspectId: DocId, parseId: DocId): void {
    const inspected = this.graph.get(inspectId);
    const parsed = this.graph.get(parseId);
    if (inspected.kind === parsed.kind || !isValueDoc(inspected) || !isValueDoc(parsed)) return;
    if (isSubkind(inspected.kind, parsed.kind)) {
      this.graph.specialize(parseId, inspected.kind);
    } else {
      this.graph.specialize(inspectId, parsed.kind);
    }
  }

  // ===========================================================================
  // Attributes
  // ===========================================================================

  private mergeRecords(inspected: APIDoc, parsed: APIDoc): void {
    for (const field of ["docstring", "descr", "summary", "metadata"] as const) {
      this.mergeAttribute(inspected, parsed, field);
    }

    if (isVariableDoc(inspected) && isVariableDoc(parsed)) {
      for (const field of ["container", "name", "isImported", "isInstvar", "isAlias", "isPublic", "typeDescr"] as const) {
        this.mergeAttribute(inspected, parsed, field);
      }
      this.mergeAttribute(inspected, parsed, "value", (a, b, p) => this.mergeReference(a, b, p));
      this.mergeAttribute(inspected, parsed, "overrides", (a, b, p) => this.mergeReference(a, b, p));
      return;
    }

    if (!isValueDoc(inspected) || !isValueDoc(parsed)) return;

    for (const field of ["canonicalName", "canonicalContainer", "rawValue", "repr"] as const) {
      this.mergeAttribute(inspected, parsed, field);
    }
    this.mergeAttribute(inspected, parsed, "importedFrom", () => null);

    if (isNamespaceDoc(inspected) && isNamespaceDoc(parsed)) {
      for (const field of ["sortedVariables", "sortSpec", "groupSpecs", "groups", "groupNames"] as const) {
        this.mergeAttribute(inspected, parsed, field);
      }
      this.mergeAttribute(inspected, parsed, "variables", (a, b) => this.mergeVariables(a, b));
    }

    if (isModuleDoc(inspected) && isModuleDoc(parsed)) {
      for (const field of ["package", "docformat", "submodules", "isPackage", "filename"] as const) {
        this.mergeAttribute(inspected, parsed, field);
      }
    }

    if (isClassDoc(inspected) && isClassDoc(parsed)) {
      this.mergeAttribute(inspected, parsed, "localVariables", (a, b) => this.mergeVariables(a, b));
      this.mergeAttribute(inspected, parsed, "subclasses");
      this.mergeAttribute(inspected, parsed, "bases", (a, b, p) =>
        this.mergeBases(a, b, p, inspected.id)
      );
    }

    if (isRoutineDoc(inspected) && isRoutineDoc(parsed)) {
      for (const field of [
        "posargs",
        "vararg",
        "kwarg",
        "argDescrs",
        "argTypes",
        "returnDescr",
        "returnType",
        "exceptionDescrs",
      ] as const) {
        this.mergeAttribute(inspected, parsed, field);
      }
      this.mergeAttribute(inspected, parsed, "posargDefaults", (a, b, p) => this.mergeDefaults(a, b, p));
    }

    if (isPropertyDoc(inspected) && isPropertyDoc(parsed)) {
      for (const field of ["fget", "fset", "fdel"] as const) {
        this.mergeAttribute(inspected, parsed, field, (a, b, p) => this.mergeReference(a, b, p));
      }
    }
  }

  private mergeAttribute<T extends APIDoc, K extends keyof T & FieldName>(
    inspected: T,
    parsed: T,
    field: K,
    combine?: Combine<T[K]>
  ): void {
    const a = inspected[field];
    const b = parsed[field];
    if (isUnknown(a) && isUnknown(b)) return;
    if (isUnknown(a)) {
      inspected[field] = b;
      return;
    }
    if (isUnknown(b)) {
      parsed[field] = a;
      return;
    }
    const precedence = this.precedence.of(field);
    const merged = combine ? combine(a, b, precedence) : precedence === "inspect" ? a : b;
    inspected[field] = merged;
    parsed[field] = merged;
  }

  // ===========================================================================
  // Combinators
  // ===========================================================================

  private mergeVariables(a: Maybe<VariableMap>, b: Maybe<VariableMap>): Maybe<VariableMap> {
    if (!isKnown(a)) return b;
    if (!isKnown(b)) return a;
    for (const [name, inspectedVar] of a) {
      const parsedVar = b.get(name);
      if (parsedVar === undefined) continue;
      const merged = this.merge(inspectedVar, parsedVar);
      a.set(name, merged);
      b.set(name, merged);
    }
    for (const [name, parsedVar] of b) {
      if (!a.has(name)) a.set(name, parsedVar);
    }
    return a;
  }

  /**
   * Handle-valued attributes: null on one side defers to precedence,
   * two handles merge recursively.
   */
  private mergeReference(
    a: Maybe<DocId | null>,
    b: Maybe<DocId | null>,
    precedence: DocSource
  ): Maybe<DocId | null> {
    if (a === null && b === null) return null;
    if (a === null || b === null) return precedence === "inspect" ? a : b;
    if (!isKnown(a)) return b;
    if (!isKnown(b)) return precedence === "inspect" ? a : b;
    return this.merge(a, b);
  }

  private mergeBases(
    a: Maybe<DocId[]>,
    b: Maybe<DocId[]>,
    precedence: DocSource,
    owner: DocId
  ): Maybe<DocId[]> {
    if (!isKnown(a)) return b;
    if (!isKnown(b)) return a;
    const preferred = precedence === "inspect" ? a : b;

    if (a.length !== b.length) {
      this.diagnostics.report(
        "MergeConflict",
        `Not merging base lists of ${owner}: lengths differ (${a.length} vs ${b.length})`,
        { value: owner, attribute: "bases" }
      );
      return preferred;
    }

    for (let i = 0; i < a.length; i++) {
      const inspectedBase = a[i];
      const parsedBase = b[i];
      if (inspectedBase === undefined || parsedBase === undefined) continue;
      const inspectedName = canonicalNameOf(this.graph.getValue(inspectedBase));
      const parsedName = canonicalNameOf(this.graph.getValue(parsedBase));
      if (inspectedName && parsedName && !inspectedName.equals(parsedName)) {
        this.diagnostics.report(
          "MergeConflict",
          `Not merging base lists of ${owner}: ${inspectedName} vs ${parsedName}`,
          { value: owner, attribute: "bases", index: i }
        );
        return preferred;
      }
    }

    const merged = a.map((inspectedBase, i) => {
      const parsedBase = b[i];
      return parsedBase === undefined ? inspectedBase : this.merge(inspectedBase, parsedBase);
    });
    a.splice(0, a.length, ...merged);
    b.splice(0, b.length, ...merged);
    return a;
  }

  private mergeDefaults(
    a: Maybe<Array<DocId | null>>,
    b: Maybe<Array<DocId | null>>,
    precedence: DocSource
  ): Maybe<Array<DocId | null>> {
    if (!isKnown(a)) return b;
    if (!isKnown(b)) return a;
    if (a.length !== b.length) return precedence === "inspect" ? a : b;
    return a.map((inspectedDefault, i) => {
      const parsedDefault = b[i] ?? null;
      if (inspectedDefault !== null && parsedDefault !== null) {
        return this.merge(inspectedDefault, parsedDefault);
      }
      return precedence === "inspect" ? inspectedDefault : parsedDefault;
    });
  }

  /**
   * Parameter names and their defaults are decided together: a `["..."]`
   * placeholder defers to the other side, any other disagreement goes to
   * the `posargs` precedence for both lists.
   */
  private couplePosargs(inspected: RoutineDoc, parsed: RoutineDoc): void {
    if (!isKnown(inspected.posargs) || !isKnown(parsed.posargs)) return;
    if (sameNames(inspected.posargs, parsed.posargs)) return;

    const inspectedPlaceholder = sameNames(inspected.posargs, PLACEHOLDER_POSARGS);
    const parsedPlaceholder = sameNames(parsed.posargs, PLACEHOLDER_POSARGS);

    if (inspectedPlaceholder && !parsedPlaceholder) {
      copySignature(parsed, inspected);
      return;
    }
    if (parsedPlaceholder && !inspectedPlaceholder) {
      copySignature(inspected, parsed);
      return;
    }

    this.diagnostics.report(
      "MergeConflict",
      `Not merging argument lists of ${inspected.id}: (${inspected.posargs.join(", ")}) vs (${parsed.posargs.join(", ")})`,
      { inspect: inspected.id, parse: parsed.id, attribute: "posargs" }
    );
    if (this.precedence.of("posargs") === "inspect") {
      copySignature(inspected, parsed);
    } else {
      copySignature(parsed, inspected);
    }
  }
}

function sameNames(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

function copySignature(from: RoutineDoc, to: RoutineDoc): void {
  to.posargs = from.posargs;
  to.posargDefaults = from.posargDefaults;
}
