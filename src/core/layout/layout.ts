/**
 * Variable Layout
 *
 * Display order (`sortedVariables`) and grouping (`groups`, `groupNames`)
 * of each namespace's variables. Sort and group specs list exact names or
 * `*` wildcard patterns.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import type { DocIndex } from "../indexer/doc-index.js";
import {
  isKnown,
  isNamespaceDoc,
  type DocId,
  type GroupSpec,
  type Maybe,
  type NamespaceDoc,
  type VariableMap,
} from "../model/index.js";

const logger = createLogger("layout");

/** The group every variable lands in unless a group spec claims it */
export const DEFAULT_GROUP = "";

export interface GroupLayout {
  groupNames: string[];
  groups: Map<string, DocId[]>;
}

export function isWildcard(spec: string): boolean {
  return spec.includes("*");
}

/**
 * Anchored pattern where each `*` matches any run of characters.
 */
export function wildcardPattern(spec: string): RegExp {
  const body = spec
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${body}$`);
}

function byName(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Entries named by `sortSpec` first, in spec order (a wildcard entry pulls
 * its matches alphabetically), then the rest alphabetically.
 */
export function sortVariables(
  variables: VariableMap,
  sortSpec: Maybe<string[]>
): Array<[string, DocId]> {
  const unsorted = new Map(variables);
  const sorted: Array<[string, DocId]> = [];

  const take = (name: string): void => {
    const id = unsorted.get(name);
    if (id === undefined) return;
    sorted.push([name, id]);
    unsorted.delete(name);
  };

  if (isKnown(sortSpec)) {
    for (const spec of sortSpec) {
      if (unsorted.has(spec)) {
        take(spec);
      } else if (isWildcard(spec)) {
        const pattern = wildcardPattern(spec);
        [...unsorted.keys()].filter((name) => pattern.test(name)).sort(byName).forEach(take);
      }
    }
  }

  [...unsorted.keys()].sort(byName).forEach(take);
  return sorted;
}

/**
 * Distributes sorted entries over `""` plus the groups of `groupSpecs`.
 * Exact names go to their group; wildcard patterns take entries no exact
 * name claimed; everything else stays in the default group.
 */
export function groupVariables(
  sorted: ReadonlyArray<[string, DocId]>,
  groupSpecs: Maybe<GroupSpec[]>
): GroupLayout {
  const specs = isKnown(groupSpecs) ? groupSpecs : [];
  const groupNames = [DEFAULT_GROUP];
  for (const [group] of specs) {
    if (!groupNames.includes(group)) groupNames.push(group);
  }
  const groups = new Map(groupNames.map((group): [string, DocId[]] => [group, []]));

  const exact = new Map<string, string>();
  const patterns: Array<[string, RegExp]> = [];
  for (const [group, members] of specs) {
    for (const member of members) {
      if (isWildcard(member)) patterns.push([group, wildcardPattern(member)]);
      else exact.set(member, group);
    }
  }

  for (const [name, id] of sorted) {
    const group =
      exact.get(name) ?? patterns.find(([, pattern]) => pattern.test(name))?.[0] ?? DEFAULT_GROUP;
    groups.get(group)?.push(id);
  }
  return { groupNames, groups };
}

/**
 * Sets `sortedVariables`, `groupNames` and `groups` on one namespace.
 * Namespaces whose variables are unknown are left alone.
 */
export function layoutNamespace(namespace: NamespaceDoc): boolean {
  if (!isKnown(namespace.variables)) return false;
  const sorted = sortVariables(namespace.variables, namespace.sortSpec);
  const { groupNames, groups } = groupVariables(sorted, namespace.groupSpecs);
  namespace.sortedVariables = sorted.map(([, id]) => id);
  namespace.groupNames = groupNames;
  namespace.groups = groups;
  return true;
}

/**
 * Lays out every reachable namespace of the index.
 */
export function layoutAll(index: DocIndex): number {
  let count = 0;
  for (const id of index.reachable) {
    const value = index.graph.getValue(id);
    if (isNamespaceDoc(value) && layoutNamespace(value)) count++;
  }
  logger.debug({ namespaces: count }, "Laid out namespaces");
  return count;
}
