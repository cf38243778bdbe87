/**
 * Variable Layout Tests
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_GROUP,
  groupVariables,
  isWildcard,
  layoutAll,
  layoutNamespace,
  sortVariables,
  wildcardPattern,
} from "../layout.js";
import { DocGraph } from "../../model/doc-graph.js";
import { UNKNOWN, type DocId } from "../../model/index.js";
import { DocIndex } from "../../indexer/doc-index.js";

function variables(...names: string[]): Map<string, DocId> {
  return new Map(names.map((name): [string, DocId] => [name, `var:${name}`]));
}

describe("wildcards", () => {
  it("match any run of characters and nothing else", () => {
    expect(isWildcard("get_*")).toBe(true);
    expect(isWildcard("get")).toBe(false);
    expect(wildcardPattern("get_*").test("get_value")).toBe(true);
    expect(wildcardPattern("get_*").test("forget_value")).toBe(false);
    expect(wildcardPattern("*.x").test("a.x")).toBe(true);
    expect(wildcardPattern("*.x").test("ax")).toBe(false);
  });
});

describe("sortVariables", () => {
  it("sorts alphabetically without a sort spec", () => {
    const sorted = sortVariables(variables("b", "c", "a"), UNKNOWN);
    expect(sorted.map(([name]) => name)).toEqual(["a", "b", "c"]);
  });

  it("puts sort spec names first, in spec order", () => {
    const sorted = sortVariables(variables("alpha", "beta", "gamma", "delta"), ["gamma", "missing", "alpha"]);
    expect(sorted.map(([name]) => name)).toEqual(["gamma", "alpha", "beta", "delta"]);
  });

  it("pulls wildcard matches alphabetically at the wildcard's position", () => {
    const sorted = sortVariables(variables("set_b", "run", "get_b", "get_a", "set_a"), ["set_*", "run"]);
    expect(sorted.map(([name]) => name)).toEqual(["set_a", "set_b", "run", "get_a", "get_b"]);
  });

  it("keeps each variable's handle", () => {
    expect(sortVariables(variables("x"), [])).toEqual([["x", "var:x"]]);
  });
});

describe("groupVariables", () => {
  it("puts everything in the default group without specs", () => {
    const { groupNames, groups } = groupVariables(sortVariables(variables("b", "a"), UNKNOWN), UNKNOWN);
    expect(groupNames).toEqual([DEFAULT_GROUP]);
    expect(groups.get(DEFAULT_GROUP)).toEqual(["var:a", "var:b"]);
  });

  it("lets exact names win over wildcard patterns", () => {
    const sorted = sortVariables(variables("get_a", "get_b", "helper", "main"), UNKNOWN);
    const { groupNames, groups } = groupVariables(sorted, [
      ["Accessors", ["get_*"]],
      ["Internals", ["get_b", "helper"]],
    ]);

    expect(groupNames).toEqual(["", "Accessors", "Internals"]);
    expect(groups.get("Accessors")).toEqual(["var:get_a"]);
    expect(groups.get("Internals")).toEqual(["var:get_b", "var:helper"]);
    expect(groups.get("")).toEqual(["var:main"]);
  });

  it("lists a repeated group name once", () => {
    const sorted = sortVariables(variables("a", "b"), UNKNOWN);
    const { groupNames, groups } = groupVariables(sorted, [
      ["G", ["a"]],
      ["G", ["b"]],
    ]);
    expect(groupNames).toEqual(["", "G"]);
    expect(groups.get("G")).toEqual(["var:a", "var:b"]);
    expect(groups.get("")).toEqual([]);
  });
});

describe("layoutNamespace", () => {
  it("stores sorted variables and groups on the record", () => {
    const graph = new DocGraph();
    const x = graph.createVariable({ name: "x", value: null });
    const y = graph.createVariable({ name: "y", value: null });
    const module = graph.createModule({
      variables: new Map([
        ["y", y.id],
        ["x", x.id],
      ]),
      groupSpecs: [["Coordinates", ["y"]]],
    });

    expect(layoutNamespace(module)).toBe(true);

    expect(module.sortedVariables).toEqual([x.id, y.id]);
    expect(module.groupNames).toEqual(["", "Coordinates"]);
    expect(module.groups).toEqual(
      new Map([
        ["", [x.id]],
        ["Coordinates", [y.id]],
      ])
    );
  });

  it("leaves namespaces with unknown variables alone", () => {
    const graph = new DocGraph();
    const cls = graph.createClass();
    expect(layoutNamespace(cls)).toBe(false);
    expect(cls.sortedVariables).toBe(UNKNOWN);
  });

  it("lays out every reachable namespace of an index", () => {
    const graph = new DocGraph();
    const cls = graph.createClass({ variables: new Map<string, DocId>() });
    const variable = graph.createVariable({ name: "K", value: cls.id, isImported: false, isAlias: false });
    const module = graph.createModule({ variables: new Map([["K", variable.id]]) });

    const count = layoutAll(new DocIndex(graph, new Map([["m", module.id]])));

    expect(count).toBe(2);
    expect(graph.getModule(module.id).sortedVariables).toEqual([variable.id]);
    expect(graph.getClass(cls.id).sortedVariables).toEqual([]);
  });
});
