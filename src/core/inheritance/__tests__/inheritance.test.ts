/**
 * MRO / DocInheriter Tests
 */

import { describe, it, expect } from "vitest";
import { MroResolver } from "../mro.js";
import { DocInheriter, isMangledName } from "../inheriter.js";
import { DocGraph } from "../../model/doc-graph.js";
import { isKnown, type DocId } from "../../model/index.js";
import { DocIndex } from "../../indexer/doc-index.js";
import { DottedName } from "../../names/dotted-name.js";
import { ErrorCode, InconsistentHierarchyError } from "../../errors.js";

function named(graph: DocGraph, name: string, bases: DocId[] = []): DocId {
  return graph.createClass({ canonicalName: new DottedName(name), bases }).id;
}

function namesOf(graph: DocGraph, ids: DocId[]): string[] {
  return ids.map((id) => {
    const name = graph.getValue(id).canonicalName;
    return name instanceof DottedName ? name.key : id;
  });
}

describe("MroResolver", () => {
  it("linearizes a new-style diamond with C3", () => {
    const graph = new DocGraph();
    const object = named(graph, "object");
    const base = named(graph, "Base", [object]);
    const a = named(graph, "A", [base]);
    const b = named(graph, "B", [base]);
    const c = named(graph, "C", [a, b]);
    const resolver = new MroResolver(graph);

    expect(resolver.isNewStyle(c)).toBe(true);
    expect(namesOf(graph, resolver.mro(c))).toEqual(["C", "A", "B", "Base", "object"]);
  });

  it("linearizes a deep chain of stacked diamonds", () => {
    const graph = new DocGraph();
    let top = named(graph, "object");
    for (let level = 1; level <= 40; level++) {
      const left = named(graph, `L${level}`, [top]);
      const right = named(graph, `R${level}`, [top]);
      top = named(graph, `T${level}`, [left, right]);
    }

    const order = namesOf(graph, new MroResolver(graph).mro(top));

    expect(order).toHaveLength(121);
    expect(order.slice(0, 5)).toEqual(["T40", "L40", "R40", "T39", "L39"]);
    expect(order.slice(-4)).toEqual(["T1", "L1", "R1", "object"]);
  });

  it("walks a legacy diamond depth-first", () => {
    const graph = new DocGraph();
    const base = named(graph, "Base");
    const a = named(graph, "A", [base]);
    const b = named(graph, "B", [base]);
    const c = named(graph, "C", [a, b]);
    const resolver = new MroResolver(graph);

    expect(resolver.isNewStyle(c)).toBe(false);
    expect(namesOf(graph, resolver.mro(c))).toEqual(["C", "A", "Base", "B"]);
  });

  it("can force either strategy", () => {
    const graph = new DocGraph();
    const base = named(graph, "Base");
    const a = named(graph, "A", [base]);
    const b = named(graph, "B", [base]);
    const c = named(graph, "C", [a, b]);

    expect(namesOf(graph, new MroResolver(graph, { strategy: "c3" }).mro(c))).toEqual(["C", "A", "B", "Base"]);
    expect(namesOf(graph, new MroResolver(graph, { strategy: "legacy" }).mro(c))).toEqual(["C", "A", "Base", "B"]);
  });

  it("uses the configured universal base", () => {
    const graph = new DocGraph();
    const root = named(graph, "builtins.object");
    const a = named(graph, "A", [root]);

    expect(new MroResolver(graph).isNewStyle(a)).toBe(false);
    expect(new MroResolver(graph, { universalBase: "builtins.object" }).isNewStyle(a)).toBe(true);
  });

  it("rejects hierarchies with no consistent order", () => {
    const graph = new DocGraph();
    const object = named(graph, "object");
    const a = named(graph, "A", [object]);
    const b = named(graph, "B", [object]);
    const x = named(graph, "X", [a, b]);
    const y = named(graph, "Y", [b, a]);
    const z = named(graph, "Z", [x, y]);
    const resolver = new MroResolver(graph);

    expect(() => resolver.mro(z)).toThrow(InconsistentHierarchyError);
    const result = resolver.tryMro(z);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.className).toBe("Z");
      expect(result.error.code).toBe(ErrorCode.INCONSISTENT_HIERARCHY);
    }
  });

  it("reports a class that is its own ancestor under C3", () => {
    const graph = new DocGraph();
    const a = graph.createClass({ canonicalName: new DottedName("A") });
    const b = graph.createClass({ canonicalName: new DottedName("B"), bases: [a.id] });
    a.bases = [b.id];

    const result = new MroResolver(graph, { strategy: "c3" }).tryMro(a.id);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe(ErrorCode.CYCLIC_HIERARCHY);
    expect(namesOf(graph, new MroResolver(graph).mro(a.id))).toEqual(["A", "B"]);
  });

  it("treats non-class bases as leaves", () => {
    const graph = new DocGraph();
    const opaque = graph.createValue({ canonicalName: new DottedName("ext.Thing") });
    const a = named(graph, "A", [opaque.id]);

    expect(namesOf(graph, new MroResolver(graph).mro(a))).toEqual(["A", "ext.Thing"]);
  });
});

describe("isMangledName", () => {
  it("matches class-private names only", () => {
    expect(isMangledName("__secret")).toBe(true);
    expect(isMangledName("__init__")).toBe(false);
    expect(isMangledName("_private")).toBe(false);
  });
});

/**
 * Module M: Base(object) defines f and __secret; A(Base) overrides f;
 * B(Base) defines g; C(A, B) defines h.
 */
function hierarchyFixture() {
  const graph = new DocGraph();
  const object = graph.createClass({ canonicalName: new DottedName("object") });

  const fnBase = graph.createRoutine({ descr: "Computes f.", summary: "Computes f." }, "instancemethod");
  const baseF = graph.createVariable({ name: "f", value: fnBase.id, descr: "Computes f." });
  const secret = graph.createVariable({ name: "__secret", value: null });
  const base = graph.createClass({
    bases: [object.id],
    localVariables: new Map([
      ["f", baseF.id],
      ["__secret", secret.id],
    ]),
  });

  const fnA = graph.createRoutine({ summary: "Faster f." }, "instancemethod");
  const aF = graph.createVariable({ name: "f", value: fnA.id });
  const a = graph.createClass({ bases: [base.id], localVariables: new Map([["f", aF.id]]) });

  const bG = graph.createVariable({ name: "g", value: null });
  const b = graph.createClass({ bases: [base.id], localVariables: new Map([["g", bG.id]]) });

  const cH = graph.createVariable({ name: "h", value: null });
  const c = graph.createClass({ bases: [a.id, b.id], localVariables: new Map([["h", cH.id]]) });

  const entries: Array<[string, DocId]> = [
    ["Base", base.id],
    ["A", a.id],
    ["B", b.id],
    ["C", c.id],
  ];
  const variables = new Map(
    entries.map(([name, id]): [string, DocId] => [
      name,
      graph.createVariable({ name, value: id, isImported: false, isAlias: false }).id,
    ])
  );
  const module = graph.createModule({ variables });

  return { graph, roots: new Map([["M", module.id]]), base, a, b, c, baseF, aF, bG, cH, fnA };
}

describe("DocInheriter", () => {
  it("adopts inherited members by reference", () => {
    const { graph, roots, b, baseF, bG } = hierarchyFixture();
    new DocInheriter(graph).resolveAll(new DocIndex(graph, roots));

    const variables = graph.getClass(b.id).variables;
    expect(variables).toEqual(
      new Map([
        ["g", bG.id],
        ["f", baseF.id],
      ])
    );
  });

  it("lets the nearest definition in the MRO win", () => {
    const { graph, roots, c, aF, bG, cH } = hierarchyFixture();
    new DocInheriter(graph).resolveAll(new DocIndex(graph, roots));

    const variables = graph.getClass(c.id).variables;
    expect(variables).toEqual(
      new Map([
        ["h", cH.id],
        ["f", aF.id],
        ["g", bG.id],
      ])
    );
  });

  it("does not inherit class-private names", () => {
    const { graph, roots, a, base } = hierarchyFixture();
    new DocInheriter(graph).resolveAll(new DocIndex(graph, roots));

    const own = graph.getClass(base.id).variables;
    const inherited = graph.getClass(a.id).variables;
    expect(isKnown(own) && own.has("__secret")).toBe(true);
    expect(isKnown(inherited) && inherited.has("__secret")).toBe(false);
  });

  it("links overrides and copies missing docs", () => {
    const { graph, roots, aF, baseF, fnA } = hierarchyFixture();
    new DocInheriter(graph).resolveAll(new DocIndex(graph, roots));

    const overriding = graph.getVariable(aF.id);
    expect(overriding.overrides).toBe(baseF.id);
    expect(overriding.descr).toBe("Computes f.");

    const method = graph.getValue(fnA.id);
    expect(method.descr).toBe("Computes f.");
    expect(method.summary).toBe("Faster f.");
  });

  it("processes ancestors before their subclasses", () => {
    const { graph, roots } = hierarchyFixture();
    expect(new DocInheriter(graph).resolveAll(new DocIndex(graph, roots))).toBe(5);
  });

  it("reports inconsistent hierarchies and keeps own variables", () => {
    const graph = new DocGraph();
    const object = graph.createClass({ canonicalName: new DottedName("object") });
    const a = graph.createClass({ bases: [object.id] });
    const b = graph.createClass({ bases: [object.id] });
    const x = graph.createClass({ bases: [a.id, b.id] });
    const y = graph.createClass({ bases: [b.id, a.id] });
    const own = graph.createVariable({ name: "own", value: null });
    const z = graph.createClass({ bases: [x.id, y.id], localVariables: new Map([["own", own.id]]) });
    const entries: Array<[string, DocId]> = [
      ["A", a.id],
      ["B", b.id],
      ["X", x.id],
      ["Y", y.id],
      ["Z", z.id],
    ];
    const module = graph.createModule({
      variables: new Map(
        entries.map(([name, id]): [string, DocId] => [
          name,
          graph.createVariable({ name, value: id, isImported: false, isAlias: false }).id,
        ])
      ),
    });
    const index = new DocIndex(graph, new Map([["M", module.id]]));
    const inheriter = new DocInheriter(graph, { diagnostics: index.diagnostics });

    inheriter.resolveAll(index);

    const advisories = index.diagnostics.ofKind("InconsistentHierarchy");
    expect(advisories).toHaveLength(1);
    expect(advisories[0]?.message).toBe("Cannot create a consistent method resolution order for M.Z");
    expect(graph.getClass(z.id).variables).toEqual(new Map([["own", own.id]]));
  });

  it("resolves a single class on request", () => {
    const { graph, a, base } = hierarchyFixture();
    const result = new DocInheriter(graph).resolveClass(a.id);

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value.slice(0, 2)).toEqual([a.id, base.id]);
  });
});
