import { describe, it, expect, beforeAll } from "vitest";
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

import { CallRegistry } from "../src/core/callRegistry.js";
import type { Structure } from "../src/core/model.js";
import { EMPTY_REPORT, fromImportText, renderStructure } from "../src/core/services/TextRenderer.js";
import { TreeSitterPythonParser } from "../src/infrastructure/parsers/TreeSitterPythonParser.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURES = join(__dirname, "fixtures");

function emptyStructure(moduleName: string): Structure {
  return {
    moduleName,
    globalVariables: [],
    functions: [],
    classes: [],
    imports: { direct: [], from: [] },
    calls: new CallRegistry(),
  };
}

describe("renderStructure", () => {
  it("renders a missing structure as a fixed message", () => {
    expect(renderStructure(null)).toBe(EMPTY_REPORT);
    expect(renderStructure(undefined)).toBe("No code structure to display.");
  });

  it("renders only the header for an empty module", () => {
    expect(renderStructure(emptyStructure("empty"))).toBe("--- Module: empty ---");
  });

  it("deduplicates and sorts imports", () => {
    const structure = emptyStructure("m");
    structure.imports.direct.push("sys", "os", "sys");
    structure.imports.from.push("typing.List", "sibling", "typing.List");

    expect(renderStructure(structure).split("\n")).toEqual([
      "--- Module: m ---",
      "",
      "--- Imports ---",
      "  - import os",
      "  - import sys",
      "  - from . import sibling",
      "  - from typing import List",
    ]);
  });

  it("shows only the first docstring line", () => {
    const structure = emptyStructure("m");
    structure.functions.push({
      name: "f",
      args: [],
      docstring: "Summary.\n\nDetails.",
      decorators: [],
      isAsync: false,
    });

    expect(renderStructure(structure)).toContain('  def f()\n    Doc: """Summary."""');
  });

  it("sorts callees", () => {
    const structure = emptyStructure("m");
    structure.calls.add("m", "zeta");
    structure.calls.add("m", "alpha");
    structure.calls.add("m", "Mid");

    expect(renderStructure(structure)).toBe(
      ["--- Module: m ---", "", "--- Module-Level Calls ---", "  - Mid", "  - alpha", "  - zeta"].join("\n"),
    );
  });

  it("leaves loop and condition labels out of the report", () => {
    const structure = emptyStructure("m");
    structure.functions.push({ name: "f", args: ["xs"], decorators: [], isAsync: false });
    structure.calls.add("m.f", "For Loop: xs");
    structure.calls.add("m.f", "g");
    structure.calls.add("m", "Condition: ready");
    structure.calls.add("m", "While Loop: running");

    expect(renderStructure(structure).split("\n")).toEqual([
      "--- Module: m ---",
      "",
      "--- Global Functions ---",
      "  def f(xs)",
      "    Calls:",
      "      - g",
    ]);
  });

  it("drops the Calls header when only labels were recorded", () => {
    const structure = emptyStructure("m");
    structure.functions.push({ name: "f", args: [], decorators: [], isAsync: false });
    structure.calls.add("m.f", "Condition: flag");

    expect(renderStructure(structure)).toBe(["--- Module: m ---", "", "--- Global Functions ---", "  def f()"].join("\n"));
  });

  describe("fixture", () => {
    let parser: TreeSitterPythonParser;

    beforeAll(() => {
      parser = new TreeSitterPythonParser();
    });

    it("renders every section in order", async () => {
      const source = readFileSync(join(FIXTURES, "sample.py"), "utf-8");
      const result = await parser.parseStructure(source, "sample");
      expect(result.ok).toBe(true);
      if (!result.ok) return;

      expect(renderStructure(result.value).split("\n")).toEqual([
        "--- Module: sample ---",
        "",
        "--- Imports ---",
        "  - import os",
        "  - import os.path",
        "  - from collections import *",
        "  - from pkg import helper",
        "  - from . import sibling",
        "  - from typing import List",
        "  - from typing import Optional",
        "",
        "--- Global Variables ---",
        '  - VERSION = "1.0"',
        "  - count: int = 0",
        "  - a = 1",
        "  - b = 1",
        "",
        "--- Global Functions ---",
        '  def greet(name: str, punctuation: str="!") -> str',
        '    Doc: """Greet someone."""',
        "    Calls:",
        "      - format_message",
        "  @cached",
        "  @app.route(...)",
        "  def fetch(limit=10)",
        "    Calls:",
        "      - app.route",
        "      - stream",
        "  def main()",
        "    Calls:",
        "      - Service",
        "      - greet",
        "",
        "--- Classes ---",
        "  class Base:",
        "  class Service(Base, mixins.Loggable):",
        '    Doc: """A service."""',
        "    --- Class Attributes ---",
        "    - retries = 3",
        "    - timeout: float = 1.5",
        "    --- Methods ---",
        "      def __init__(self, name)",
        "        Calls:",
        "          - self.start",
        "      @property",
        "      def label(self) -> str",
        "        Calls:",
        "          - self.name.upper",
        "      def start(self)",
        "        Calls:",
        "          - greet",
        "          - self.tick",
        "",
        "--- Module-Level Calls ---",
        "  - main",
        "  - print",
      ]);
    });
  });
});

describe("fromImportText", () => {
  it("splits at the first dot", () => {
    expect(fromImportText("os.path.join")).toBe("from os import path.join");
  });

  it("reads a bare name as a relative import", () => {
    expect(fromImportText("sibling")).toBe("from . import sibling");
  });
});
