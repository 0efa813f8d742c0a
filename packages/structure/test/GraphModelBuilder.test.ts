import { describe, it, expect, beforeAll } from "vitest";
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

import type { GraphModel, Structure } from "../src/core/model.js";
import { attributeNodeId, buildGraphModel } from "../src/core/services/GraphModelBuilder.js";
import { TreeSitterPythonParser } from "../src/infrastructure/parsers/TreeSitterPythonParser.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURES = join(__dirname, "fixtures");

describe("buildGraphModel", () => {
  let parser: TreeSitterPythonParser;

  beforeAll(() => {
    parser = new TreeSitterPythonParser();
  });

  async function extract(source: string, moduleName = "mod"): Promise<Structure> {
    const result = await parser.parseStructure(source, moduleName);
    if (!result.ok) {
      throw new Error(`unexpected parse failure: ${result.error.message}`);
    }
    return result.value;
  }

  function kindOf(model: GraphModel, id: string): string | undefined {
    return model.nodes.find((node) => node.id === id)?.kind;
  }

  it("links a method to an unresolved callee and a placeholder base to its class", async () => {
    const model = buildGraphModel(await extract("class A(B):\n    def m(self):\n        self.other()\n"));

    expect(model.edges).toContainEqual({ from: "mod.B", to: "mod.A", kind: "inherits" });
    expect(model.edges).toContainEqual({ from: "mod.A.m", to: "self.other", kind: "calls" });
    expect(kindOf(model, "mod.B")).toBe("base");
    expect(kindOf(model, "self.other")).toBe("external");
    expect(kindOf(model, "mod.A.m")).toBe("method");
  });

  it("links declared entities by containment", async () => {
    const model = buildGraphModel(await extract("def f():\n    pass\n\nclass C:\n    x = 1\n    def m(self):\n        pass\n"));

    expect(model.edges).toEqual([
      { from: "mod", to: "mod.f", kind: "contains" },
      { from: "mod", to: "mod.C", kind: "contains" },
      { from: "mod.C", to: "mod.C.x", kind: "has_attribute" },
      { from: "mod.C", to: "mod.C.m", kind: "contains_method" },
    ]);
    expect(model.clusters.map((cluster) => cluster.id)).toEqual(["module:mod", "class:mod.C"]);
  });

  it("resolves callees to functions, classes and methods declared in the module", async () => {
    const model = buildGraphModel(
      await extract("def helper():\n    pass\n\nclass Box:\n    def open(self):\n        pass\n\nhelper()\nBox()\nopen()\n"),
    );

    const calls = model.edges.filter((edge) => edge.kind === "calls");
    expect(calls).toEqual([
      { from: "mod", to: "mod.Box", kind: "calls" },
      { from: "mod", to: "mod.helper", kind: "calls" },
      { from: "mod", to: "mod.Box.open", kind: "calls" },
    ]);
  });

  it("never draws self-loops", async () => {
    const model = buildGraphModel(await extract("def recurse(n):\n    recurse(n)\n"));

    expect(model.edges.filter((edge) => edge.from === edge.to)).toEqual([]);
    expect(model.edges.filter((edge) => edge.kind === "calls")).toEqual([]);
  });

  it("adds a placeholder for callers without a node", async () => {
    const model = buildGraphModel(await extract("def outer():\n    def inner():\n        helper()\n"));

    expect(kindOf(model, "mod.outer.inner")).toBe("missing_caller");
    expect(model.edges).toContainEqual({ from: "mod.outer.inner", to: "helper", kind: "calls" });
  });

  it("draws loop and condition labels as control placeholders", async () => {
    const structure = await extract("for item in items:\n    pass\n");

    const withLabels = buildGraphModel(structure);
    expect(kindOf(withLabels, "For Loop: items")).toBe("control");
    expect(withLabels.edges).toContainEqual({ from: "mod", to: "For Loop: items", kind: "calls" });

    const withoutLabels = buildGraphModel(structure, { includeControlFlow: false });
    expect(kindOf(withoutLabels, "For Loop: items")).toBeUndefined();
    expect(withoutLabels.edges.filter((edge) => edge.kind === "calls")).toEqual([]);
  });

  it("keeps an attribute and a method of the same name apart", async () => {
    const model = buildGraphModel(
      await extract("class C:\n    x = 1\n    def x(self):\n        pass\n\nx()\n", "col"),
    );

    const members = model.nodes.filter((node) => node.id.startsWith("col.C.")).map((node) => [node.id, node.kind]);
    expect(members).toEqual([
      ["col.C.<attribute>.x", "attribute"],
      ["col.C.x", "method"],
    ]);
    expect(model.edges).toContainEqual({ from: "col.C", to: "col.C.<attribute>.x", kind: "has_attribute" });
    expect(model.edges).toContainEqual({ from: "col.C", to: "col.C.x", kind: "contains_method" });
    expect(model.edges).toContainEqual({ from: "col", to: "col.C.x", kind: "calls" });
  });

  it("does not route an external call onto a declared node with the same id", async () => {
    const model = buildGraphModel(await extract("def run():\n    pass\n\ndef main():\n    app.run()\n", "app"));

    expect(model.edges).toContainEqual({ from: "app.main", to: "<external>.app.run", kind: "calls" });
    expect(model.edges).not.toContainEqual({ from: "app.main", to: "app.run", kind: "calls" });
    expect(model.nodes).toContainEqual({ id: "<external>.app.run", kind: "external", label: "app.run" });
    expect(kindOf(model, "app.run")).toBe("function");
  });

  it("omits import nodes on request", async () => {
    const structure = await extract("import os\nfrom a import b\n");

    expect(buildGraphModel(structure).nodes.filter((node) => node.kind === "import").map((node) => node.id)).toEqual([
      "mod.<import>.os",
      "mod.<from>.a.b",
    ]);
    expect(buildGraphModel(structure, { includeImports: false }).nodes.map((node) => node.id)).toEqual(["mod"]);
  });

  describe("fixture", () => {
    let structure: Structure;
    let model: GraphModel;

    beforeAll(async () => {
      structure = await extract(readFileSync(join(FIXTURES, "sample.py"), "utf-8"), "sample");
      model = buildGraphModel(structure);
    });

    it("gives every node a unique id", () => {
      const ids = model.nodes.map((node) => node.id);
      expect(new Set(ids).size).toBe(ids.length);
    });

    it("only draws edges between existing nodes", () => {
      const ids = new Set(model.nodes.map((node) => node.id));
      for (const edge of model.edges) {
        expect(ids.has(edge.from)).toBe(true);
        expect(ids.has(edge.to)).toBe(true);
      }
    });

    it("has exactly one node per reported entity", () => {
      const count = (id: string): number => model.nodes.filter((node) => node.id === id).length;

      for (const fn of structure.functions) {
        expect(count(`sample.${fn.name}`)).toBe(1);
      }
      for (const cls of structure.classes) {
        expect(count(`sample.${cls.name}`)).toBe(1);
        for (const attribute of cls.attributes) {
          expect(count(attributeNodeId(`sample.${cls.name}`, cls, attribute.name))).toBe(1);
        }
        for (const method of cls.methods) {
          expect(count(`sample.${cls.name}.${method.name}`)).toBe(1);
        }
      }
      for (const variable of structure.globalVariables) {
        expect(count(`sample.<globals>.${variable.name}`)).toBe(1);
      }
      for (const name of structure.imports.direct) {
        expect(count(`sample.<import>.${name}`)).toBe(1);
      }
      for (const name of structure.imports.from) {
        expect(count(`sample.<from>.${name}`)).toBe(1);
      }
    });

    it("resolves calls across the module", () => {
      expect(model.edges).toContainEqual({ from: "sample.main", to: "sample.greet", kind: "calls" });
      expect(model.edges).toContainEqual({ from: "sample.main", to: "sample.Service", kind: "calls" });
      expect(model.edges).toContainEqual({ from: "sample.Service.start", to: "sample.greet", kind: "calls" });
      expect(model.edges).toContainEqual({ from: "sample", to: "sample.main", kind: "calls" });
      expect(model.edges).toContainEqual({ from: "sample.Base", to: "sample.Service", kind: "inherits" });
      expect(model.edges).toContainEqual({ from: "sample.mixins.Loggable", to: "sample.Service", kind: "inherits" });
    });

    it("builds the same model on every run", () => {
      expect(buildGraphModel(structure)).toEqual(model);
    });
  });
});
