/**
 * Graphviz DOT source for a GraphModel.
 */
import type { GraphCluster, GraphEdgeKind, GraphModel, GraphNode, GraphNodeKind } from "../model.js";

type Attributes = Record<string, string>;

const GRAPH_ATTRIBUTES: Attributes = {
  rankdir: "LR",
  overlap: "false",
  splines: "true",
  bgcolor: "transparent",
};

const NODE_DEFAULTS: Attributes = { fontsize: "10", fontname: "Helvetica", shape: "box", style: "filled" };

const EDGE_DEFAULTS: Attributes = { fontsize: "8", fontname: "Helvetica" };

const NODE_STYLES: Record<GraphNodeKind, Attributes> = {
  module: { shape: "folder", style: "filled", fillcolor: "#ADD8E6" },
  globals: { shape: "note", style: "filled", fillcolor: "grey", fontcolor: "white" },
  variable: { shape: "rectangle", style: "filled", fillcolor: "#F5F5F5" },
  import: { shape: "cds", style: "filled", fillcolor: "#E6E6FA" },
  function: { shape: "ellipse", style: "filled", fillcolor: "#90EE90" },
  class: { shape: "component", style: "filled", fillcolor: "#FFD700" },
  attribute: { shape: "rectangle", style: "filled", fillcolor: "#D3D3D3" },
  method: { shape: "octagon", style: "filled", fillcolor: "#FFB6C1" },
  external: { shape: "box", style: "dashed", color: "gray", fillcolor: "white" },
  control: { shape: "diamond", style: "dashed", color: "gray", fillcolor: "white" },
  base: { shape: "box", style: "dashed", color: "grey", fillcolor: "white" },
  missing_caller: { shape: "box", style: "dashed", color: "red", fillcolor: "white" },
};

const EDGE_STYLES: Record<GraphEdgeKind, Attributes> = {
  contains: { label: "contains" },
  defines: { label: "defines" },
  imports: { label: "imports", style: "dotted" },
  has_attribute: { label: "has attribute" },
  contains_method: { label: "contains method" },
  calls: { label: "calls", color: "purple" },
  inherits: { label: "inherits", style: "dashed", arrowhead: "empty" },
};

const CLUSTER_STYLES: Record<GraphCluster["kind"], Attributes> = {
  module: { color: "blue", style: "rounded,filled", fillcolor: "#E0FFFF" },
  class: { color: "darkgreen", style: "rounded,filled", fillcolor: "#FFFACD" },
};

export function writeDot(model: GraphModel): string {
  const lines: string[] = [];
  lines.push(`// Code Structure of ${model.moduleName.replace(/[\r\n]/g, " ")}`);
  lines.push("digraph {");
  lines.push(`  graph ${attributeList(GRAPH_ATTRIBUTES)}`);
  lines.push(`  node ${attributeList(NODE_DEFAULTS)}`);
  lines.push(`  edge ${attributeList(EDGE_DEFAULTS)}`);

  const byCluster = new Map<string, GraphNode[]>();
  const loose: GraphNode[] = [];
  for (const node of model.nodes) {
    if (node.cluster) {
      const members = byCluster.get(node.cluster) ?? [];
      members.push(node);
      byCluster.set(node.cluster, members);
    } else {
      loose.push(node);
    }
  }

  model.clusters.forEach((cluster, index) => {
    lines.push(`  subgraph ${quote(`cluster_${index}_${cluster.kind}`)} {`);
    lines.push(`    graph ${attributeList({ label: cluster.label, ...CLUSTER_STYLES[cluster.kind] })}`);
    for (const node of byCluster.get(cluster.id) ?? []) {
      lines.push(`    ${nodeStatement(node)}`);
    }
    lines.push("  }");
    byCluster.delete(cluster.id);
  });

  // Nodes pointing at an unknown cluster are drawn outside any cluster
  for (const members of byCluster.values()) {
    loose.push(...members);
  }
  for (const node of loose) {
    lines.push(`  ${nodeStatement(node)}`);
  }

  for (const edge of model.edges) {
    lines.push(`  ${quote(edge.from)} -> ${quote(edge.to)} ${attributeList(EDGE_STYLES[edge.kind])}`);
  }

  lines.push("}");
  return `${lines.join("\n")}\n`;
}

function nodeStatement(node: GraphNode): string {
  return `${quote(node.id)} ${attributeList({ label: node.label, ...NODE_STYLES[node.kind] })}`;
}

function attributeList(attributes: Attributes): string {
  const pairs = Object.entries(attributes).map(([key, value]) => `${key}=${quote(value)}`);
  return `[${pairs.join(" ")}]`;
}

/**
 * DOT double-quoted string. Newlines become the `\n` escape, which Graphviz
 * renders as a centered line break.
 */
export function quote(text: string): string {
  const escaped = text
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\r?\n/g, "\\n");
  return `"${escaped}"`;
}
