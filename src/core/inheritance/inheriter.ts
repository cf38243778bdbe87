/**
 * Inherited Member Propagation
 *
 * Completes each class's `variables` with the members its ancestors define,
 * and links every locally redefined member to the member it overrides.
 *
 * @module
 */

import { Diagnostics } from "../diagnostics/diagnostics.js";
import { createLogger } from "../../utils/logger.js";
import { err, ok, type Result } from "../../types/result.js";
import type { InconsistentHierarchyError } from "../errors.js";
import type { DocIndex } from "../indexer/doc-index.js";
import { MroResolver } from "./mro.js";
import {
  isClassDoc,
  isKnown,
  isPresent,
  isUnknown,
  type ClassDoc,
  type DocGraph,
  type DocId,
  type VariableDoc,
  type VariableMap,
} from "../model/index.js";

const logger = createLogger("inheriter");

export interface DocInheriterOptions {
  diagnostics?: Diagnostics;
  mro?: MroResolver;
}

/**
 * `__name` without a trailing `__` is private to its defining class.
 */
export function isMangledName(name: string): boolean {
  return name.startsWith("__") && !name.endsWith("__");
}

export class DocInheriter {
  readonly diagnostics: Diagnostics;
  readonly mro: MroResolver;
  private readonly done = new Set<DocId>();

  constructor(
    private readonly graph: DocGraph,
    options: DocInheriterOptions = {}
  ) {
    this.diagnostics = options.diagnostics ?? new Diagnostics();
    this.mro = options.mro ?? new MroResolver(graph);
  }

  /**
   * Resolves inheritance for every reachable class, ancestors first.
   *
   * @returns the number of classes processed
   */
  resolveAll(index: DocIndex): number {
    let processed = 0;
    for (const id of index.reachable) {
      if (!isClassDoc(this.graph.getValue(id))) continue;
      processed += this.resolveWithAncestors(id, new Set());
    }
    logger.debug({ classes: processed }, "Resolved inheritance");
    return processed;
  }

  /**
   * Propagates inherited members into one class. An inconsistent hierarchy
   * leaves the class with its own variables and is returned as an error.
   */
  resolveClass(classId: DocId): Result<DocId[], InconsistentHierarchyError> {
    const cls = this.graph.getClass(classId);
    ensureVariables(cls);

    const order = this.mro.tryMro(cls.id);
    if (!order.ok) return err(order.error);

    for (const ancestorId of order.value.slice(1)) {
      const ancestor = this.graph.getValue(ancestorId);
      if (!isClassDoc(ancestor)) continue;
      const members = inheritableMembers(ancestor);
      if (!members) continue;
      for (const [name, memberId] of members) {
        if (isMangledName(name)) continue;
        this.adopt(cls, name, memberId);
      }
    }
    return ok(order.value);
  }

  private resolveWithAncestors(classId: DocId, inProgress: Set<DocId>): number {
    const id = this.graph.resolve(classId);
    if (this.done.has(id) || inProgress.has(id)) return 0;
    inProgress.add(id);

    let processed = 0;
    const order = this.mro.tryMro(id);
    if (order.ok) {
      for (const ancestorId of order.value.slice(1)) {
        if (isClassDoc(this.graph.getValue(ancestorId))) {
          processed += this.resolveWithAncestors(ancestorId, inProgress);
        }
      }
    }

    const result = this.resolveClass(id);
    if (!result.ok) {
      this.diagnostics.report("InconsistentHierarchy", result.error.message, {
        value: id,
        className: result.error.className,
      });
    }
    this.done.add(id);
    return processed + 1;
  }

  private adopt(cls: ClassDoc, name: string, memberId: DocId): void {
    if (!isKnown(cls.variables)) return;
    const existingId = cls.variables.get(name);
    if (existingId === undefined) {
      cls.variables.set(name, memberId);
      return;
    }
    if (this.graph.same(existingId, memberId)) return;

    const existing = this.graph.getVariable(existingId);
    if (!this.isLocal(cls, name, existing) || !isUnknown(existing.overrides)) return;

    existing.overrides = memberId;
    this.inheritDocs(existing, this.graph.getVariable(memberId));
  }

  private isLocal(cls: ClassDoc, name: string, variable: VariableDoc): boolean {
    if (isPresent(variable.container) && this.graph.same(variable.container, cls.id)) return true;
    if (!isKnown(cls.localVariables)) return false;
    const local = cls.localVariables.get(name);
    return local !== undefined && this.graph.same(local, variable.id);
  }

  /**
   * Copies `descr` and `summary` from the overridden member onto the
   * overriding variable and its value where those are missing.
   */
  private inheritDocs(variable: VariableDoc, overridden: VariableDoc): void {
    if (!isPresent(variable.descr)) variable.descr = overridden.descr;
    if (!isPresent(variable.summary)) variable.summary = overridden.summary;

    if (!isPresent(variable.value) || !isPresent(overridden.value)) return;
    const value = this.graph.getValue(variable.value);
    const source = this.graph.getValue(overridden.value);
    if (value.id === source.id) return;
    if (!isPresent(value.descr)) value.descr = source.descr;
    if (!isPresent(value.summary)) value.summary = source.summary;
  }
}

function ensureVariables(cls: ClassDoc): void {
  if (isKnown(cls.variables)) return;
  cls.variables = isKnown(cls.localVariables)
    ? new Map(cls.localVariables)
    : new Map<string, DocId>();
}

function inheritableMembers(ancestor: ClassDoc): VariableMap | null {
  if (isKnown(ancestor.variables)) return ancestor.variables;
  if (isKnown(ancestor.localVariables)) return ancestor.localVariables;
  return null;
}
