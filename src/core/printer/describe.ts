/**
 * Debug rendering of records as an indented tree.
 *
 * Only fields holding a known, non-empty value are shown. Records referenced
 * from a field are expanded up to `depth` levels; a record already being
 * rendered further up is cut off with `...`.
 *
 * @module
 */

import { DottedName } from "../names/dotted-name.js";
import { Unknown, isVariableDoc, isKnown, type DocGraph, type DocId, type DocKind } from "../model/index.js";

export interface DescribeOptions {
  /** Levels of referenced records to expand; negative for no limit */
  depth?: number;
  /** Field names to leave out; `"id"` drops handles from headers */
  exclude?: readonly string[];
  /** Blank connector lines between fields */
  doubleSpace?: boolean;
}

const MAX_VALUE_LENGTH = 40;

const KIND_LABELS: Record<DocKind, string> = {
  variable: "VariableDoc",
  value: "ValueDoc",
  namespace: "NamespaceDoc",
  module: "ModuleDoc",
  class: "ClassDoc",
  property: "PropertyDoc",
  routine: "RoutineDoc",
  function: "FunctionDoc",
  instancemethod: "InstanceMethodDoc",
  classmethod: "ClassMethodDoc",
  staticmethod: "StaticMethodDoc",
};

/** Fields holding one handle */
const REFERENCE_FIELDS = new Set([
  "container",
  "value",
  "overrides",
  "canonicalContainer",
  "package",
  "fget",
  "fset",
  "fdel",
]);

/** Fields holding a list of handles (null holes allowed) */
const REFERENCE_LIST_FIELDS = new Set(["sortedVariables", "submodules", "bases", "subclasses", "posargDefaults"]);

/** Fields mapping names to handles, or to lists of handles */
const REFERENCE_MAP_FIELDS = new Set(["variables", "localVariables", "groups"]);

export function describeDoc(graph: DocGraph, id: DocId, options: DescribeOptions = {}): string {
  return new DocPrinter(graph, options).describe(id, options.depth ?? 2);
}

/**
 * Shortens a rendered value to at most 40 characters.
 */
export function truncateValue(text: string): string {
  return text.length <= MAX_VALUE_LENGTH ? text : `${text.slice(0, MAX_VALUE_LENGTH - 3)}...`;
}

class DocPrinter {
  private readonly active = new Set<DocId>();
  private readonly exclude: ReadonlySet<string>;
  private readonly doubleSpace: boolean;

  constructor(
    private readonly graph: DocGraph,
    options: DescribeOptions
  ) {
    this.exclude = new Set(options.exclude ?? []);
    this.doubleSpace = options.doubleSpace ?? false;
  }

  describe(id: DocId, depth: number): string {
    const doc = this.graph.get(id);
    if (this.active.has(doc.id) || depth === 0) {
      return isVariableDoc(doc) && isKnown(doc.name) ? `${doc.name}...` : "...";
    }

    this.active.add(doc.id);
    try {
      let text = this.exclude.has("id") ? KIND_LABELS[doc.kind] : `${KIND_LABELS[doc.kind]} ${doc.id}`;
      const fields = Object.entries(doc)
        .filter(([field, value]) => field !== "id" && field !== "kind" && !this.exclude.has(field) && isShown(value))
        .sort(([a], [b]) => Number(b === "name") - Number(a === "name"));

      fields.forEach(([field, value], i) => {
        const isLast = i === fields.length - 1;
        if (this.doubleSpace) text += "\n |";
        text += `\n +- ${field}`;
        text += this.renderField(field, value, depth, isLast);
      });
      return text;
    } finally {
      this.active.delete(doc.id);
    }
  }

  private renderField(field: string, value: unknown, depth: number, isLast: boolean): string {
    if (REFERENCE_FIELDS.has(field) && typeof value === "string") {
      return this.renderChild(value, depth, isLast);
    }
    if (REFERENCE_LIST_FIELDS.has(field) && Array.isArray(value)) {
      const items: unknown[] = value;
      return this.renderList(
        items.map((item) => (typeof item === "string" ? this.describe(item, depth - 1) : renderScalar(item))),
        isLast
      );
    }
    if (REFERENCE_MAP_FIELDS.has(field) && value instanceof Map) {
      const entries: Array<[unknown, unknown]> = [...value.entries()];
      return this.renderList(
        entries
          .map(([key, item]): [string, string] => [String(key), this.renderMapValue(item, depth)])
          .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
          .map(([key, rendered]) => `${key} => ${rendered}`),
        isLast
      );
    }
    return ` = ${truncateValue(renderScalar(value))}`;
  }

  private renderMapValue(item: unknown, depth: number): string {
    if (typeof item === "string") return this.describe(item, depth - 1);
    if (Array.isArray(item)) {
      const members: unknown[] = item;
      return `[${members.map((member) => (typeof member === "string" ? this.describe(member, 0) : renderScalar(member))).join(", ")}]`;
    }
    return truncateValue(renderScalar(item));
  }

  private renderChild(id: DocId, depth: number, isLast: boolean): string {
    const line = isLast ? " " : "|";
    let text = "";
    if (this.doubleSpace) text += `\n ${line}  |  `;
    text += `\n ${line}  +- `;
    return text + this.describe(id, depth - 1).split("\n").join(`\n ${line}    `);
  }

  private renderList(rendered: string[], isLast: boolean): string {
    const line = isLast ? " " : "|";
    let text = "";
    rendered.forEach((item, i) => {
      const itemLine = i === rendered.length - 1 ? " " : "|";
      if (this.doubleSpace) text += `\n ${line}  |`;
      text += `\n ${line}  +- `;
      text += item.split("\n").join(`\n ${line}  ${itemLine} `);
    });
    return text;
  }
}

/**
 * Known and non-empty: not UNKNOWN, null, false, "", 0, or an empty list/map.
 */
function isShown(value: unknown): boolean {
  if (value instanceof Unknown || value === null || value === undefined) return false;
  if (value === false || value === "" || value === 0) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (value instanceof Map) return value.size > 0;
  return true;
}

function renderScalar(value: unknown, nesting = 0): string {
  if (value instanceof DottedName) return value.key;
  if (value === null) return "null";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") return String(value);
  if (typeof value === "function") return "<function>";
  if (typeof value === "symbol") return value.toString();
  if (nesting > 2) return "...";
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return `[${items.map((item) => renderScalar(item, nesting + 1)).join(", ")}]`;
  }
  if (value instanceof Map) {
    const entries: Array<[unknown, unknown]> = [...value.entries()];
    return `{${entries.map(([key, item]) => `${renderScalar(key, nesting + 1)}: ${renderScalar(item, nesting + 1)}`).join(", ")}}`;
  }
  if (typeof value === "object") {
    return `{${Object.entries(value)
      .map(([key, item]) => `${key}: ${renderScalar(item, nesting + 1)}`)
      .join(", ")}}`;
  }
  return String(value);
}
