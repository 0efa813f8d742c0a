/**
 * Turns expression nodes into dotted text.
 *
 * Purely syntactic: no symbol table is consulted, so `self.other()` stays
 * `self.other(...)` and anything without a name shape becomes `<?>`.
 */
import type Parser from "tree-sitter";

type SyntaxNode = Parser.SyntaxNode;

export const UNRESOLVED = "<?>";

type ExpressionShape =
  | { kind: "name"; text: string }
  | { kind: "member"; object: SyntaxNode | null; member: SyntaxNode | null }
  | { kind: "call"; callee: SyntaxNode | null }
  | { kind: "literal"; text: string }
  | { kind: "wrapper"; inner: SyntaxNode | null }
  | { kind: "other" };

const LITERAL_TYPES = new Set(["integer", "float", "string", "true", "false", "none", "ellipsis"]);

function shapeOf(node: SyntaxNode): ExpressionShape {
  switch (node.type) {
    case "identifier":
      return { kind: "name", text: node.text };
    case "attribute":
      return {
        kind: "member",
        object: node.childForFieldName("object"),
        member: node.childForFieldName("attribute"),
      };
    case "member_type":
      // `a.b` in annotation position: type "." identifier
      return { kind: "member", object: node.namedChildren[0] ?? null, member: node.lastNamedChild };
    case "call":
      return { kind: "call", callee: node.childForFieldName("function") };
    case "type":
    case "parenthesized_expression":
      return { kind: "wrapper", inner: firstNamedNonComment(node) };
    case "unary_operator":
      // negative numbers: -1, -0.5
      return isNumber(node.childForFieldName("argument")) ? { kind: "literal", text: node.text } : { kind: "other" };
    default:
      if (LITERAL_TYPES.has(node.type)) {
        return { kind: "literal", text: node.text };
      }
      return { kind: "other" };
  }
}

export function resolveName(node: SyntaxNode | null | undefined): string {
  if (!node) return UNRESOLVED;

  const shape = shapeOf(node);
  switch (shape.kind) {
    case "name":
    case "literal":
      return shape.text;
    case "member":
      return `${resolveName(shape.object)}.${shape.member?.text ?? UNRESOLVED}`;
    case "call":
      return `${resolveName(shape.callee)}(...)`;
    case "wrapper":
      return resolveName(shape.inner);
    case "other":
      return UNRESOLVED;
    default:
      return assertNever(shape);
  }
}

/**
 * Only bare names and attribute chains count as dotted names
 * (base classes keep nothing else).
 */
export function isDottedName(node: SyntaxNode): boolean {
  return node.type === "identifier" || node.type === "attribute";
}

function firstNamedNonComment(node: SyntaxNode): SyntaxNode | null {
  return node.namedChildren.find((child) => child.type !== "comment") ?? null;
}

function isNumber(node: SyntaxNode | null): boolean {
  return node?.type === "integer" || node?.type === "float";
}

function assertNever(_shape: never): never {
  throw new Error("Unhandled expression shape");
}
