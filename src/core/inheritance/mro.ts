/**
 * Method Resolution Order
 *
 * Classes rooted at the universal base use the C3 linearization; other
 * ("legacy") classes use a depth-first, left-to-right walk that keeps the
 * first occurrence of each ancestor. The legacy order is best-effort and is
 * not a linearization in the C3 sense.
 *
 * @module
 */

import { DottedName } from "../names/dotted-name.js";
import { ErrorCode, InconsistentHierarchyError } from "../errors.js";
import { attempt, type Result } from "../../types/result.js";
import {
  canonicalNameOf,
  isClassDoc,
  isKnown,
  type DocGraph,
  type DocId,
} from "../model/index.js";

export type MroStrategy = "auto" | "c3" | "legacy";

export interface MroOptions {
  /** Name of the class every new-style class derives from */
  universalBase?: DottedName | string;
  strategy?: MroStrategy;
}

export class MroResolver {
  readonly universalBase: DottedName;
  readonly strategy: MroStrategy;
  private readonly cache = new Map<DocId, DocId[]>();
  /** C3 linearizations, shared by every class that reaches the same base */
  private readonly linearized = new Map<DocId, readonly DocId[]>();

  constructor(
    private readonly graph: DocGraph,
    options: MroOptions = {}
  ) {
    const base = options.universalBase ?? "object";
    this.universalBase = typeof base === "string" ? new DottedName(base) : base;
    this.strategy = options.strategy ?? "auto";
  }

  /**
   * True if the class is the universal base or has it among its ancestors.
   */
  isNewStyle(classId: DocId): boolean {
    const visited = new Set<DocId>();
    const search = (id: DocId): boolean => {
      const resolved = this.graph.resolve(id);
      if (visited.has(resolved)) return false;
      visited.add(resolved);
      if (this.universalBase.equals(canonicalNameOf(this.graph.getValue(resolved)))) return true;
      return this.basesOf(resolved).some(search);
    };
    return search(classId);
  }

  /**
   * The class followed by its ancestors in lookup order.
   *
   * @throws InconsistentHierarchyError when no C3 linearization exists or
   *   the class is its own ancestor
   */
  mro(classId: DocId): DocId[] {
    const id = this.graph.resolve(classId);
    const cached = this.cache.get(id);
    if (cached) return cached;

    const useC3 =
      this.strategy === "c3" || (this.strategy === "auto" && this.isNewStyle(id));
    const order = useC3 ? this.c3(id, new Set()) : this.legacy(id);
    this.cache.set(id, order);
    return order;
  }

  tryMro(classId: DocId): Result<DocId[], InconsistentHierarchyError> {
    return attempt(() => this.mro(classId), InconsistentHierarchyError);
  }

  /**
   * Depth-first, left-to-right; the first occurrence of an ancestor wins.
   */
  legacy(classId: DocId): DocId[] {
    const order: DocId[] = [];
    const seen = new Set<DocId>();
    const visit = (id: DocId): void => {
      const resolved = this.graph.resolve(id);
      if (seen.has(resolved)) return;
      seen.add(resolved);
      order.push(resolved);
      for (const base of this.basesOf(resolved)) visit(base);
    };
    visit(classId);
    return order;
  }

  private c3(classId: DocId, inProgress: Set<DocId>): DocId[] {
    const id = this.graph.resolve(classId);
    const done = this.linearized.get(id);
    if (done) return [...done];
    if (inProgress.has(id)) {
      throw new InconsistentHierarchyError(
        `Class ${this.describe(id)} is its own ancestor`,
        ErrorCode.CYCLIC_HIERARCHY,
        { className: this.describe(id) }
      );
    }
    inProgress.add(id);

    const bases = this.basesOf(id);
    const sequences = [...bases.map((base) => this.c3(base, inProgress)), bases].filter(
      (sequence) => sequence.length > 0
    );
    inProgress.delete(id);

    const order: DocId[] = [id];
    while (sequences.length > 0) {
      const head = sequences
        .map((sequence) => sequence[0])
        .find(
          (candidate) =>
            candidate !== undefined &&
            !sequences.some((sequence) => sequence.indexOf(candidate, 1) !== -1)
        );
      if (head === undefined) {
        throw new InconsistentHierarchyError(
          `Cannot create a consistent method resolution order for ${this.describe(id)}`,
          ErrorCode.INCONSISTENT_HIERARCHY,
          { className: this.describe(id) }
        );
      }
      order.push(head);
      for (let i = sequences.length - 1; i >= 0; i--) {
        const sequence = sequences[i];
        if (sequence === undefined) continue;
        if (sequence[0] === head) sequence.shift();
        if (sequence.length === 0) sequences.splice(i, 1);
      }
    }
    this.linearized.set(id, order);
    return [...order];
  }

  private basesOf(id: DocId): DocId[] {
    const value = this.graph.getValue(id);
    if (!isClassDoc(value) || !isKnown(value.bases)) return [];
    return value.bases.map((base) => this.graph.resolve(base));
  }

  private describe(id: DocId): string {
    return canonicalNameOf(this.graph.getValue(id))?.key ?? id;
  }
}
