import { Err, Ok, toError, type Result } from "@codeview/core";
import Parser from "tree-sitter";

import type { Structure } from "../../core/model.js";
import type { ParseFailure, StructureParser } from "../../core/ports/StructureParser.js";
import { findSyntaxProblem } from "./pythonSyntax.js";
import { extractStructure } from "./StructureExtractor.js";

type PythonGrammar = Parameters<Parser["setLanguage"]>[0];

/** The binding rejects string input larger than its buffer, which defaults to 32 KiB. */
function bufferSizeFor(source: string): number {
  return source.length * 2 + 1;
}

async function loadPythonGrammar(): Promise<PythonGrammar> {
  const mod = await import("tree-sitter-python");
  return mod.default;
}

/**
 * Tree-sitter based parser for Python sources.
 * The grammar is loaded on first use and shared by later parses.
 */
export class TreeSitterPythonParser implements StructureParser {
  private readonly parser: Parser;
  private grammar: Promise<PythonGrammar> | undefined;

  constructor() {
    this.parser = new Parser();
  }

  async parseStructure(source: string, moduleName: string): Promise<Result<Structure, ParseFailure>> {
    let tree: Parser.Tree;
    try {
      this.parser.setLanguage(await this.getGrammar());
      tree = this.parser.parse(source, undefined, { bufferSize: bufferSizeFor(source) });
    } catch (error) {
      return Err({ kind: "unknown", message: toError(error).message });
    }

    const problem = findSyntaxProblem(tree.rootNode);
    if (problem) {
      return Err({ kind: "syntax", message: problem.message, position: problem.position });
    }

    try {
      return Ok(extractStructure(tree.rootNode, moduleName));
    } catch (error) {
      return Err({ kind: "unknown", message: toError(error).message });
    }
  }

  private getGrammar(): Promise<PythonGrammar> {
    if (!this.grammar) {
      this.grammar = loadPythonGrammar().catch((error: unknown) => {
        this.grammar = undefined;
        throw error;
      });
    }
    return this.grammar;
  }
}
