/**
 * The subset of tree-sitter-python node kinds the extractor reacts to, as a
 * closed union. Every other node is "other" and is only descended into.
 */
import type Parser from "tree-sitter";

import type { SourcePosition } from "../../core/ports/StructureParser.js";

export type SyntaxNode = Parser.SyntaxNode;

export type PythonConstruct =
  | { kind: "class"; node: SyntaxNode }
  | { kind: "function"; node: SyntaxNode }
  | { kind: "decorated"; node: SyntaxNode; definition: SyntaxNode | null; decorators: SyntaxNode[] }
  | { kind: "assignment"; node: SyntaxNode }
  | { kind: "import"; node: SyntaxNode }
  | { kind: "import_from"; node: SyntaxNode; module: string }
  | { kind: "call"; node: SyntaxNode; callee: SyntaxNode | null }
  | { kind: "condition"; node: SyntaxNode; test: SyntaxNode | null }
  | { kind: "for_loop"; node: SyntaxNode; iterable: SyntaxNode | null }
  | { kind: "while_loop"; node: SyntaxNode; test: SyntaxNode | null }
  | { kind: "other"; node: SyntaxNode };

export function classify(node: SyntaxNode): PythonConstruct {
  switch (node.type) {
    case "class_definition":
      return { kind: "class", node };
    case "function_definition":
      return { kind: "function", node };
    case "decorated_definition":
      return {
        kind: "decorated",
        node,
        definition: node.childForFieldName("definition"),
        decorators: node.namedChildren.filter((child) => child.type === "decorator"),
      };
    case "assignment":
      // `a = b = 1` nests assignments; the outermost one speaks for the chain
      return node.parent?.type === "assignment" ? { kind: "other", node } : { kind: "assignment", node };
    case "import_statement":
      return { kind: "import", node };
    case "import_from_statement":
      return { kind: "import_from", node, module: fromModuleName(node.childForFieldName("module_name")) };
    case "future_import_statement":
      return { kind: "import_from", node, module: "__future__" };
    case "call":
      return { kind: "call", node, callee: node.childForFieldName("function") };
    case "if_statement":
    case "elif_clause":
      return { kind: "condition", node, test: node.childForFieldName("condition") };
    case "for_statement":
      return { kind: "for_loop", node, iterable: node.childForFieldName("right") };
    case "while_statement":
      return { kind: "while_loop", node, test: node.childForFieldName("condition") };
    default:
      return { kind: "other", node };
  }
}

/**
 * `from a.b import x` -> "a.b"; `from .pkg import x` -> "pkg"; `from . import x` -> "".
 */
function fromModuleName(moduleNode: SyntaxNode | null): string {
  if (!moduleNode) return "";
  if (moduleNode.type === "relative_import") {
    return moduleNode.namedChildren.find((child) => child.type === "dotted_name")?.text ?? "";
  }
  return moduleNode.text;
}

/**
 * Names bound by an import: the dotted name, never the alias.
 */
export function importedNames(node: SyntaxNode): string[] {
  const names: string[] = [];
  for (const nameNode of node.childrenForFieldName("name")) {
    if (nameNode.type === "aliased_import") {
      const original = nameNode.childForFieldName("name");
      if (original) names.push(original.text);
    } else {
      names.push(nameNode.text);
    }
  }
  if (node.namedChildren.some((child) => child.type === "wildcard_import")) {
    names.push("*");
  }
  return names;
}

export function isAsyncDefinition(node: SyntaxNode): boolean {
  return node.children.some((child) => child.type === "async");
}

/**
 * The expression after `@`.
 */
export function decoratorExpression(decorator: SyntaxNode): SyntaxNode | null {
  return decorator.namedChildren.find((child) => child.type !== "comment") ?? null;
}

// ============================================================================
// Docstrings
// ============================================================================

const STRING_LITERAL = /^([A-Za-z]*)("""|'''|"|')([\s\S]*)\2$/;

/**
 * The docstring of a class or function body: a plain string literal as the
 * first statement, cleaned like Python's inspect.cleandoc.
 */
export function docstringOf(definition: SyntaxNode): string | undefined {
  const body = definition.childForFieldName("body");
  if (!body) return undefined;

  const first = body.namedChildren.find((child) => child.type !== "comment");
  if (!first || first.type !== "expression_statement") return undefined;

  const expressions = first.namedChildren.filter((child) => child.type !== "comment");
  if (expressions.length !== 1 || expressions[0].type !== "string") return undefined;

  const match = STRING_LITERAL.exec(expressions[0].text);
  if (!match) return undefined;

  // b"" and f"" are not docstrings
  const prefix = match[1].toLowerCase();
  if (prefix.includes("b") || prefix.includes("f")) return undefined;

  return cleanDocstring(match[3]);
}

export function cleanDocstring(text: string): string {
  const lines = text.replace(/\t/g, "        ").split(/\r?\n/);

  let margin = Number.POSITIVE_INFINITY;
  for (const line of lines.slice(1)) {
    const content = line.trimStart();
    if (content.length > 0) {
      margin = Math.min(margin, line.length - content.length);
    }
  }

  const cleaned = [lines[0].trimStart()];
  for (const line of lines.slice(1)) {
    cleaned.push(Number.isFinite(margin) ? line.slice(margin) : line);
  }

  while (cleaned.length > 0 && cleaned[0].trim() === "") cleaned.shift();
  while (cleaned.length > 0 && cleaned[cleaned.length - 1].trim() === "") cleaned.pop();

  return cleaned.join("\n");
}

// ============================================================================
// Syntax errors
// ============================================================================

export interface SyntaxProblem {
  message: string;
  position: SourcePosition;
}

/** Python 2 statements the grammar still accepts. */
const LEGACY_STATEMENTS = new Set(["print_statement", "exec_statement"]);

/**
 * First ERROR, MISSING or legacy statement node in document order.
 */
export function findSyntaxProblem(root: SyntaxNode): SyntaxProblem | undefined {
  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (node.type === "ERROR" || node.isMissing || LEGACY_STATEMENTS.has(node.type)) {
      const position = { line: node.startPosition.row + 1, column: node.startPosition.column + 1 };
      const what = node.isMissing ? `missing '${node.type}'` : "invalid syntax";
      return { message: `${what} (line ${position.line}, column ${position.column})`, position };
    }

    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }
  return undefined;
}
