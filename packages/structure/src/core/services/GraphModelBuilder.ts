import { isControlFlowLabel } from "../controlFlow.js";
import type {
  ClassRecord,
  FunctionRecord,
  GraphBuildOptions,
  GraphCluster,
  GraphEdge,
  GraphEdgeKind,
  GraphModel,
  GraphNode,
  GraphNodeKind,
  Structure,
} from "../model.js";
import { basesText, fromImportText, signatureText, uniqueSorted, variableText } from "./TextRenderer.js";

/** Node kinds a callee descriptor may resolve to. */
const DECLARED_KINDS: ReadonlySet<GraphNodeKind> = new Set(["function", "class", "method", "attribute"]);

export function globalsNodeId(moduleName: string): string {
  return `${moduleName}.<globals>`;
}

export function importNodeId(moduleName: string, kind: "import" | "from", name: string): string {
  return `${moduleName}.<${kind}>.${name}`;
}

/** Placeholder for a callee whose descriptor equals a declared node's id. */
export function externalNodeId(descriptor: string): string {
  return `<external>.${descriptor}`;
}

/**
 * Attribute id inside a class. An attribute sharing its name with a method
 * moves aside, since the method's id doubles as its call scope id.
 */
export function attributeNodeId(classId: string, cls: ClassRecord, name: string): string {
  const base = `${classId}.${name}`;
  return cls.methods.some((method) => method.name === name) ? `${classId}.<attribute>.${name}` : base;
}

export function moduleClusterId(moduleName: string): string {
  return `module:${moduleName}`;
}

export function classClusterId(classId: string): string {
  return `class:${classId}`;
}

/**
 * Turn a Structure into nodes, edges and clusters.
 *
 * Declared entities get ids rooted at the module name (`m.f`, `m.C.x`), the
 * same shape as call scope ids, so callers resolve by lookup. Call targets
 * and base classes not declared in the module become placeholders.
 */
export function buildGraphModel(structure: Structure, options: GraphBuildOptions = {}): GraphModel {
  const includeImports = options.includeImports ?? true;
  const includeControlFlow = options.includeControlFlow ?? true;

  const graph = new GraphAccumulator(structure.moduleName);
  const moduleId = structure.moduleName;
  const moduleCluster = moduleClusterId(moduleId);

  graph.addCluster({ id: moduleCluster, kind: "module", label: `Module: ${moduleId}` });
  graph.addNode({ id: moduleId, kind: "module", label: `Module: ${moduleId}`, cluster: moduleCluster });

  // Globals
  if (structure.globalVariables.length > 0) {
    const globalsId = globalsNodeId(moduleId);
    graph.addNode({ id: globalsId, kind: "globals", label: "Global Variables", cluster: moduleCluster });
    graph.addEdge(moduleId, globalsId, "defines");
    for (const variable of structure.globalVariables) {
      const id = `${globalsId}.${variable.name}`;
      graph.addNode({ id, kind: "variable", label: `Variable: ${variableText(variable)}`, cluster: moduleCluster });
      graph.addEdge(globalsId, id, "defines");
    }
  }

  // Imports
  if (includeImports) {
    for (const name of uniqueSorted(structure.imports.direct)) {
      const id = importNodeId(moduleId, "import", name);
      graph.addNode({ id, kind: "import", label: `import ${name}`, cluster: moduleCluster });
      graph.addEdge(moduleId, id, "imports");
    }
    for (const name of uniqueSorted(structure.imports.from)) {
      const id = importNodeId(moduleId, "from", name);
      graph.addNode({ id, kind: "import", label: fromImportText(name), cluster: moduleCluster });
      graph.addEdge(moduleId, id, "imports");
    }
  }

  // Functions
  for (const fn of structure.functions) {
    const id = `${moduleId}.${fn.name}`;
    graph.addNode({ id, kind: "function", label: functionLabel("Function", fn), cluster: moduleCluster });
    graph.addEdge(moduleId, id, "contains");
  }

  // Classes
  for (const cls of structure.classes) {
    const classId = `${moduleId}.${cls.name}`;
    const cluster = classClusterId(classId);
    graph.addCluster({ id: cluster, kind: "class", label: `${decoratorLine(cls.decorators)}${classLabel(cls)}` });
    graph.addNode({ id: classId, kind: "class", label: classLabel(cls), cluster });
    graph.addEdge(moduleId, classId, "contains");

    for (const attribute of cls.attributes) {
      const id = attributeNodeId(classId, cls, attribute.name);
      graph.addNode({ id, kind: "attribute", label: `Attribute: ${variableText(attribute)}`, cluster });
      graph.addEdge(classId, id, "has_attribute");
    }
    for (const method of cls.methods) {
      const id = `${classId}.${method.name}`;
      graph.addNode({ id, kind: "method", label: functionLabel("Method", method), cluster });
      graph.addEdge(classId, id, "contains_method");
    }
  }

  // Calls
  for (const scope of structure.calls.scopes()) {
    const callees = structure.calls
      .sorted(scope)
      .filter((callee) => includeControlFlow || !isControlFlowLabel(callee));
    if (callees.length === 0) continue;

    if (!graph.hasNode(scope)) {
      graph.addNode({ id: scope, kind: "missing_caller", label: scope });
    }
    for (const callee of callees) {
      graph.addEdge(scope, resolveCallee(graph, structure, callee), "calls");
    }
  }

  // Inheritance
  for (const cls of structure.classes) {
    const classId = `${moduleId}.${cls.name}`;
    for (const base of cls.bases) {
      const baseId = `${moduleId}.${base}`;
      if (!graph.hasNode(baseId)) {
        graph.addNode({ id: baseId, kind: "base", label: base });
      }
      graph.addEdge(baseId, classId, "inherits");
    }
  }

  return graph.toModel();
}

/**
 * A declared function or class, then a method of the first class that has
 * one by that name, else a placeholder named after the descriptor. A
 * placeholder never reuses a declared node that happens to carry the same id.
 */
function resolveCallee(graph: GraphAccumulator, structure: Structure, callee: string): string {
  const moduleId = structure.moduleName;

  const direct = `${moduleId}.${callee}`;
  if (graph.isDeclared(direct)) return direct;

  for (const cls of structure.classes) {
    const member = `${moduleId}.${cls.name}.${callee}`;
    if (graph.isDeclared(member)) return member;
  }

  const kind: GraphNodeKind = isControlFlowLabel(callee) ? "control" : "external";
  const existing = graph.kindOf(callee);
  const id = existing === undefined || existing === kind ? callee : externalNodeId(callee);
  graph.addNode({ id, kind, label: callee });
  return id;
}

function functionLabel(title: "Function" | "Method", fn: FunctionRecord): string {
  return `${decoratorLine(fn.decorators)}${title}: ${signatureText(fn).replace("(", "(\n")}`;
}

function classLabel(cls: ClassRecord): string {
  return `Class: ${cls.name}${basesText(cls.bases)}`;
}

function decoratorLine(decorators: string[]): string {
  return decorators.length > 0 ? `Decorators: ${decorators.join(", ")}\n` : "";
}

/**
 * Nodes keep the first registration of an id; edges are unique per
 * (from, to, kind) and never loop back to their source.
 */
class GraphAccumulator {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly edges: GraphEdge[] = [];
  private readonly seenEdges = new Set<string>();
  private readonly clusters: GraphCluster[] = [];

  constructor(private readonly moduleName: string) {}

  addNode(node: GraphNode): void {
    if (!this.nodes.has(node.id)) {
      this.nodes.set(node.id, node);
    }
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  kindOf(id: string): GraphNodeKind | undefined {
    return this.nodes.get(id)?.kind;
  }

  isDeclared(id: string): boolean {
    const node = this.nodes.get(id);
    return node !== undefined && DECLARED_KINDS.has(node.kind);
  }

  addEdge(from: string, to: string, kind: GraphEdgeKind): void {
    if (from === to) return;
    const key = `${from}\u0000${to}\u0000${kind}`;
    if (this.seenEdges.has(key)) return;
    this.seenEdges.add(key);
    this.edges.push({ from, to, kind });
  }

  addCluster(cluster: GraphCluster): void {
    if (!this.clusters.some((existing) => existing.id === cluster.id)) {
      this.clusters.push(cluster);
    }
  }

  toModel(): GraphModel {
    return {
      moduleName: this.moduleName,
      nodes: [...this.nodes.values()],
      edges: [...this.edges],
      clusters: [...this.clusters],
    };
  }
}
