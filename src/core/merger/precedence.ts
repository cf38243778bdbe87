/**
 * Which producer wins an attribute when both report a value and no
 * combinator applies.
 */

import type { DocSource, FieldName } from "../model/index.js";

export type PrecedenceTable = Partial<Record<FieldName, DocSource>>;

export const DEFAULT_PRECEDENCE: DocSource = "inspect";

export const MERGE_PRECEDENCE: Readonly<PrecedenceTable> = {
  repr: "parse",
  canonicalName: "inspect",
  isImported: "parse",
  isAlias: "parse",
  docformat: "parse",
  isPackage: "parse",
  sortSpec: "parse",
  submodules: "inspect",
  filename: "parse",
};

export class Precedence {
  private readonly table: PrecedenceTable;

  constructor(
    readonly fallback: DocSource = DEFAULT_PRECEDENCE,
    overrides: PrecedenceTable = {}
  ) {
    this.table = { ...MERGE_PRECEDENCE, ...overrides };
  }

  of(field: FieldName): DocSource {
    return this.table[field] ?? this.fallback;
  }
}
