/**
 * One depth-first walk over a tree-sitter-python syntax tree that collects
 * declarations, imports and calls into a Structure.
 */
import { CallRegistry } from "../../core/callRegistry.js";
import { controlFlowLabel, type ControlFlowKind } from "../../core/controlFlow.js";
import type { ClassRecord, FunctionRecord, Structure, VariableRecord } from "../../core/model.js";
import { enterScope, innermostName, moduleScope, scopeId, type ScopeContext } from "../../core/scope.js";
import { isDottedName, resolveName } from "./NameResolver.js";
import {
  classify,
  decoratorExpression,
  docstringOf,
  importedNames,
  isAsyncDefinition,
  type SyntaxNode,
} from "./pythonSyntax.js";

export function extractStructure(root: SyntaxNode, moduleName: string): Structure {
  const structure: Structure = {
    moduleName,
    globalVariables: [],
    functions: [],
    classes: [],
    imports: { direct: [], from: [] },
    calls: new CallRegistry(),
  };
  new StructureWalker(structure).walk(root, moduleScope(moduleName));
  return structure;
}

class StructureWalker {
  constructor(private readonly structure: Structure) {}

  walk(node: SyntaxNode, scope: ScopeContext): void {
    const construct = classify(node);

    switch (construct.kind) {
      case "class":
        this.visitClass(construct.node, [], scope);
        return;
      case "function":
        this.visitFunction(construct.node, [], scope);
        return;
      case "decorated": {
        const definition = construct.definition;
        if (definition?.type === "class_definition") {
          this.visitClass(definition, construct.decorators, scope);
        } else if (definition?.type === "function_definition") {
          this.visitFunction(definition, construct.decorators, scope);
        } else {
          this.walkChildren(construct.node, scope);
        }
        return;
      }
      case "assignment":
        this.recordAssignment(construct.node, scope);
        break;
      case "import":
        this.structure.imports.direct.push(...importedNames(construct.node));
        break;
      case "import_from":
        for (const name of importedNames(construct.node)) {
          this.structure.imports.from.push(construct.module ? `${construct.module}.${name}` : name);
        }
        break;
      case "call":
        this.structure.calls.add(scopeId(scope), resolveName(construct.callee));
        break;
      case "condition":
        this.recordControlFlow("condition", construct.test, scope);
        break;
      case "for_loop":
        this.recordControlFlow("for_loop", construct.iterable, scope);
        break;
      case "while_loop":
        this.recordControlFlow("while_loop", construct.test, scope);
        break;
      case "other":
        break;
      default:
        return assertNever(construct);
    }

    this.walkChildren(construct.node, scope);
  }

  private walkChildren(node: SyntaxNode, scope: ScopeContext): void {
    for (const child of node.namedChildren) {
      this.walk(child, scope);
    }
  }

  /**
   * The class is registered before its body is walked so that methods and
   * attributes can find it by name.
   */
  private visitClass(node: SyntaxNode, decorators: SyntaxNode[], scope: ScopeContext): void {
    const name = node.childForFieldName("name")?.text ?? "";
    const bases = node.childForFieldName("superclasses")?.namedChildren.filter(isDottedName) ?? [];

    const record: ClassRecord = {
      name,
      bases: bases.map((base) => resolveName(base)),
      docstring: docstringOf(node),
      decorators: decoratorNames(decorators),
      attributes: [],
      methods: [],
    };
    this.structure.classes.push(record);

    this.walkDefinition(node, decorators, enterScope(scope, name));
  }

  private visitFunction(node: SyntaxNode, decorators: SyntaxNode[], scope: ScopeContext): void {
    const name = node.childForFieldName("name")?.text ?? "";
    const returnType = node.childForFieldName("return_type");

    const record: FunctionRecord = {
      name,
      args: renderParameters(node.childForFieldName("parameters")),
      docstring: docstringOf(node),
      returnAnnotation: returnType ? resolveName(returnType) : undefined,
      decorators: decoratorNames(decorators),
      isAsync: isAsyncDefinition(node),
    };

    const owner = this.findClass(innermostName(scope));
    if (owner) {
      owner.methods.push(record);
    } else {
      this.structure.functions.push(record);
    }

    this.walkDefinition(node, decorators, enterScope(scope, name));
  }

  private walkDefinition(node: SyntaxNode, decorators: SyntaxNode[], inner: ScopeContext): void {
    for (const decorator of decorators) {
      this.walk(decorator, inner);
    }
    this.walkChildren(node, inner);
  }

  private recordAssignment(node: SyntaxNode, scope: ScopeContext): void {
    const targets: SyntaxNode[] = [];
    let current: SyntaxNode | null = node;
    let value: SyntaxNode | null = null;
    while (current?.type === "assignment") {
      const left = current.childForFieldName("left");
      if (left) targets.push(left);
      value = current.childForFieldName("right");
      current = value;
    }

    // Annotations only occur on a single, unchained target
    const annotation = node.childForFieldName("type");

    const records: VariableRecord[] = targets
      .filter((target) => target.type === "identifier")
      .map((target) => ({
        name: target.text,
        annotation: annotation ? resolveName(annotation) : undefined,
        value: value ? resolveName(value) : undefined,
      }));
    if (records.length === 0) return;

    // NOTE: any non-empty scope counts as a class body when its innermost
    // name matches a known class, including functions nested in a method
    // that happen to share a class name.
    if (scope.path.length === 0) {
      this.structure.globalVariables.push(...records);
      return;
    }
    this.findClass(innermostName(scope))?.attributes.push(...records);
  }

  private recordControlFlow(kind: ControlFlowKind, expression: SyntaxNode | null, scope: ScopeContext): void {
    this.structure.calls.add(scopeId(scope), controlFlowLabel(kind, resolveName(expression)));
  }

  private findClass(name: string | undefined): ClassRecord | undefined {
    if (name === undefined) return undefined;
    return this.structure.classes.find((record) => record.name === name);
  }
}

function decoratorNames(decorators: SyntaxNode[]): string[] {
  return decorators.map((decorator) => resolveName(decoratorExpression(decorator)));
}

// ============================================================================
// Parameters
// ============================================================================

function renderParameters(parameters: SyntaxNode | null): string[] {
  if (!parameters) return [];

  const rendered: string[] = [];
  for (const parameter of parameters.namedChildren) {
    const text = renderParameter(parameter);
    if (text !== undefined) rendered.push(text);
  }
  return rendered;
}

/**
 * "name[: annotation][=default]"; star parameters, separators and tuple
 * patterns yield nothing.
 */
function renderParameter(parameter: SyntaxNode): string | undefined {
  switch (parameter.type) {
    case "identifier":
      return parameter.text;
    case "typed_parameter": {
      const target = parameter.namedChildren[0];
      if (target?.type !== "identifier") return undefined;
      return formatParameter(target.text, parameter.childForFieldName("type"), null);
    }
    case "default_parameter":
    case "typed_default_parameter": {
      const name = parameter.childForFieldName("name");
      if (name?.type !== "identifier") return undefined;
      return formatParameter(
        name.text,
        parameter.childForFieldName("type"),
        parameter.childForFieldName("value"),
      );
    }
    default:
      return undefined;
  }
}

function formatParameter(name: string, annotation: SyntaxNode | null, value: SyntaxNode | null): string {
  let text = name;
  if (annotation) text += `: ${resolveName(annotation)}`;
  if (value) text += `=${resolveName(value)}`;
  return text;
}

function assertNever(construct: never): never {
  throw new Error(`Unhandled construct: ${String(construct)}`);
}
