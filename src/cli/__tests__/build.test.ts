/**
 * build command Tests
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { buildCommand, parseFormat, renderBuild } from "../commands/build.js";
import { DocBuilder, pairRoots } from "../../core/builder/index.js";
import { parseGraphDocument } from "../../core/loader/index.js";
import { DocGraph } from "../../core/model/index.js";
import { ConfigurationError } from "../../core/errors.js";

const DOCUMENT = {
  roots: { shapes: "m" },
  docs: {
    m: { kind: "module", variables: { Circle: "v" } },
    v: { kind: "variable", name: "Circle", value: "c", isImported: false, isAlias: false },
    c: { kind: "class", docstring: "A round shape." },
  },
};

function build() {
  const graph = new DocGraph();
  const parsed = parseGraphDocument(graph, DOCUMENT);
  const result = new DocBuilder(graph).build(pairRoots(undefined, parsed));
  return { graph, result };
}

describe("parseFormat", () => {
  it("accepts the known formats", () => {
    expect(parseFormat("names")).toBe("names");
    expect(parseFormat("tree")).toBe("tree");
    expect(parseFormat("json")).toBe("json");
  });

  it("rejects anything else", () => {
    expect(() => parseFormat("html")).toThrow(ConfigurationError);
  });
});

describe("renderBuild", () => {
  it("lists canonical names", () => {
    const { graph, result } = build();
    expect(renderBuild(graph, result, "names")).toBe("shapes (module)\nshapes.Circle (class)");
  });

  it("summarizes the build as JSON", () => {
    const { graph, result } = build();
    expect(JSON.parse(renderBuild(graph, result, "json"))).toEqual({
      roots: { shapes: "shapes" },
      values: [
        { name: "shapes", kind: "module", container: null },
        { name: "shapes.Circle", kind: "class", container: "shapes" },
      ],
      advisories: [],
    });
  });

  it("renders each root as a tree", () => {
    const { graph, result } = build();
    const tree = renderBuild(graph, result, "tree", 1);
    expect(tree.split("\n")[0]).toBe(`ModuleDoc ${result.index.roots[0]}`);
  });
});

describe("buildCommand", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "apidoc-cli-test-"));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints the canonical names of a parsed document", async () => {
    const file = path.join(tempDir, "parsed.json");
    await fs.writeFile(file, JSON.stringify(DOCUMENT));
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await buildCommand({ parsed: file, format: "names" });

    expect(log).toHaveBeenCalledWith("shapes (module)\nshapes.Circle (class)");
  });

  it("requires at least one document", async () => {
    await expect(buildCommand({ format: "names" })).rejects.toThrow(
      "Nothing to build: pass --inspected and/or --parsed"
    );
  });
});
