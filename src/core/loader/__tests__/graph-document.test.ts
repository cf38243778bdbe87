/**
 * Graph Document Loader Tests
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { loadGraphDocument, parseGraphDocument } from "../graph-document.js";
import { DocGraph } from "../../model/doc-graph.js";
import { UNKNOWN } from "../../model/unknown.js";
import type { DocId } from "../../model/apidoc.js";
import { DottedName } from "../../names/dotted-name.js";
import {
  ConstructionError,
  ErrorCode,
  GraphDocumentError,
  IdentifierSyntaxError,
} from "../../errors.js";

const SAMPLE = {
  roots: { pkg: "m1" },
  docs: {
    m1: { kind: "module", docstring: null, variables: { f: "v1" }, isPackage: true },
    v1: { kind: "variable", name: "f", container: "m1", value: "f1", isImported: false },
    f1: {
      kind: "function",
      canonicalName: "pkg.f",
      posargs: ["x", "y"],
      posargDefaults: [null, "d1"],
      argTypes: { x: "int" },
      metadata: [{ tag: "since", body: "1.0" }],
    },
    d1: { kind: "value", repr: "None" },
  },
};

function handleOf(handles: Map<string, DocId>, key: string): DocId {
  const handle = handles.get(key);
  if (handle === undefined) throw new Error(`No handle for "${key}"`);
  return handle;
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof GraphDocumentError || error instanceof ConstructionError) return error.code;
    throw error;
  }
  return undefined;
}

describe("parseGraphDocument", () => {
  it("loads records and resolves local ids to handles", () => {
    const graph = new DocGraph();
    const loaded = parseGraphDocument(graph, SAMPLE);

    const rootId = handleOf(loaded.roots, "pkg");
    const variableId = handleOf(loaded.handles, "v1");
    const functionId = handleOf(loaded.handles, "f1");
    const defaultId = handleOf(loaded.handles, "d1");
    expect(rootId).toBe(handleOf(loaded.handles, "m1"));

    const module = graph.getModule(rootId);
    expect(module.variables).toEqual(new Map([["f", variableId]]));
    expect(module.isPackage).toBe(true);

    const variable = graph.getVariable(variableId);
    expect(variable.value).toBe(functionId);
    expect(variable.container).toBe(rootId);
    expect(variable.isPublic).toBe(true);

    const fn = graph.get(functionId);
    expect(fn.kind).toBe("function");
    if (fn.kind === "function") {
      expect(fn.canonicalName).toEqual(new DottedName("pkg.f"));
      expect(fn.posargs).toEqual(["x", "y"]);
      expect(fn.posargDefaults).toEqual([null, defaultId]);
      expect(fn.argTypes).toEqual(new Map([["x", "int"]]));
      expect(fn.metadata).toEqual([{ tag: "since", arg: null, body: "1.0" }]);
    }
  });

  it("distinguishes null from absent fields", () => {
    const graph = new DocGraph();
    const loaded = parseGraphDocument(graph, SAMPLE);
    const module = graph.getModule(handleOf(loaded.roots, "pkg"));
    expect(module.docstring).toBeNull();
    expect(module.summary).toBe(UNKNOWN);
  });

  it("keeps each document's local ids apart", () => {
    const graph = new DocGraph();
    const first = parseGraphDocument(graph, { roots: { m: "m" }, docs: { m: { kind: "module" } } });
    const second = parseGraphDocument(graph, { roots: { m: "m" }, docs: { m: { kind: "module" } } });

    expect(first.roots.get("m")).not.toBe(second.roots.get("m"));
    expect(graph.size).toBe(2);
  });

  it("normalizes root names", () => {
    const graph = new DocGraph();
    const loaded = parseGraphDocument(graph, { roots: { "a.b": "m" }, docs: { m: { kind: "module" } } });
    expect([...loaded.roots.keys()]).toEqual(["a.b"]);
    expect(() =>
      parseGraphDocument(new DocGraph(), { roots: { "a b": "m" }, docs: { m: { kind: "module" } } })
    ).toThrow(IdentifierSyntaxError);
  });

  it("rejects a document without the expected shape", () => {
    expect(() => parseGraphDocument(new DocGraph(), { roots: {}, docs: { a: { name: "x" } } })).toThrow(
      "Invalid graph document <memory>: docs.a.kind: Required"
    );
    expect(codeOf(() => parseGraphDocument(new DocGraph(), []))).toBe(ErrorCode.DOCUMENT_INVALID);
  });

  it("rejects fields of the wrong type", () => {
    expect(() =>
      parseGraphDocument(
        new DocGraph(),
        { roots: {}, docs: { v: { kind: "variable", isImported: "yes" } } },
        "inspected.json"
      )
    ).toThrow("Invalid graph document inspected.json: docs.v.isImported: Expected boolean, received string");
  });

  it("rejects fields the kind does not declare", () => {
    const document = { roots: {}, docs: { v: { kind: "variable", posargs: ["x"] } } };
    expect(codeOf(() => parseGraphDocument(new DocGraph(), document))).toBe(ErrorCode.UNDECLARED_ATTRIBUTE);
    expect(() => parseGraphDocument(new DocGraph(), document)).toThrow(ConstructionError);
  });

  it("rejects dangling references", () => {
    const document = { roots: {}, docs: { v: { kind: "variable", name: "x", value: "nope" } } };
    expect(() => parseGraphDocument(new DocGraph(), document)).toThrow(
      'Dangling reference in <memory>: docs.v.value -> "nope"'
    );
    expect(codeOf(() => parseGraphDocument(new DocGraph(), document))).toBe(
      ErrorCode.DOCUMENT_DANGLING_REFERENCE
    );
  });

  it("rejects dangling and variable roots", () => {
    expect(codeOf(() => parseGraphDocument(new DocGraph(), { roots: { m: "missing" }, docs: {} }))).toBe(
      ErrorCode.DOCUMENT_DANGLING_REFERENCE
    );
    expect(
      codeOf(() =>
        parseGraphDocument(new DocGraph(), { roots: { x: "v" }, docs: { v: { kind: "variable", name: "x" } } })
      )
    ).toBe(ErrorCode.DOCUMENT_INVALID);
  });

  it("rejects malformed names", () => {
    expect(() =>
      parseGraphDocument(new DocGraph(), { roots: {}, docs: { v: { kind: "variable", name: "not valid" } } })
    ).toThrow(IdentifierSyntaxError);
    expect(() =>
      parseGraphDocument(new DocGraph(), { roots: {}, docs: { c: { kind: "class", canonicalName: "a..b" } } })
    ).toThrow(IdentifierSyntaxError);
  });
});

describe("loadGraphDocument", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "apidoc-loader-test-"));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("reads a document from disk", async () => {
    const file = path.join(tempDir, "parsed.json");
    await fs.writeFile(file, JSON.stringify(SAMPLE));

    const loaded = await loadGraphDocument(new DocGraph(), file);

    expect(loaded.source).toBe(file);
    expect(loaded.handles.size).toBe(4);
  });

  it("wraps read failures", async () => {
    const file = path.join(tempDir, "absent.json");
    await expect(loadGraphDocument(new DocGraph(), file)).rejects.toMatchObject({
      code: ErrorCode.DOCUMENT_READ_FAILED,
    });
  });
});
