/**
 * Core domain types for the structure package.
 */

import type { CallRegistry } from "./callRegistry.js";

/**
 * A name bound by assignment: a module global or a class attribute.
 */
export interface VariableRecord {
  name: string;
  annotation?: string;
  /** Best-effort text of the assigned value; absent for a bare annotation */
  value?: string;
}

export interface FunctionRecord {
  name: string;
  /** Rendered parameters: "name[: annotation][=default]" */
  args: string[];
  docstring?: string;
  returnAnnotation?: string;
  decorators: string[];
  isAsync: boolean;
}

export interface ClassRecord {
  name: string;
  bases: string[];
  docstring?: string;
  decorators: string[];
  attributes: VariableRecord[];
  methods: FunctionRecord[];
}

export interface ImportRecords {
  /** `import a.b` */
  direct: string[];
  /** `from a import b` recorded as "a.b" */
  from: string[];
}

/**
 * Everything one analysis pass learns about a single module.
 */
export interface Structure {
  moduleName: string;
  globalVariables: VariableRecord[];
  functions: FunctionRecord[];
  classes: ClassRecord[];
  imports: ImportRecords;
  calls: CallRegistry;
}

// ============================================================================
// Errors
// ============================================================================

export type AnalysisErrorKind =
  | "not_found"
  | "read_failure"
  | "syntax_failure"
  | "unknown_parse_failure"
  | "engine_missing"
  | "export_failure";

export interface AnalysisError {
  kind: AnalysisErrorKind;
  message: string;
}

export function analysisError(kind: AnalysisErrorKind, message: string): AnalysisError {
  return { kind, message };
}

export function engineMissing(executable: string): AnalysisError {
  return analysisError(
    "engine_missing",
    `Graphviz executable '${executable}' not found. Install Graphviz and make sure it is on PATH.`,
  );
}

export function exportFailure(cause: string): AnalysisError {
  return analysisError("export_failure", `Error generating graph: ${cause}`);
}

// ============================================================================
// Graph model
// ============================================================================

export type GraphNodeKind =
  | "module"
  | "globals"
  | "variable"
  | "import"
  | "function"
  | "class"
  | "attribute"
  | "method"
  /** Placeholder for a call target defined elsewhere */
  | "external"
  /** Placeholder for a loop or condition label */
  | "control"
  /** Placeholder for a base class defined elsewhere */
  | "base"
  /** Placeholder for a caller scope with no declared node */
  | "missing_caller";

export type GraphEdgeKind =
  | "contains"
  | "defines"
  | "imports"
  | "has_attribute"
  | "contains_method"
  | "calls"
  | "inherits";

export interface GraphNode {
  id: string;
  kind: GraphNodeKind;
  label: string;
  /** Id of the cluster (module or class) the node is drawn in */
  cluster?: string;
}

export interface GraphEdge {
  from: string;
  to: string;
  kind: GraphEdgeKind;
}

export interface GraphCluster {
  id: string;
  kind: "module" | "class";
  label: string;
}

export interface GraphModel {
  moduleName: string;
  nodes: GraphNode[];
  edges: GraphEdge[];
  clusters: GraphCluster[];
}

export interface GraphBuildOptions {
  /** Draw a node per import (default true) */
  includeImports?: boolean;
  /** Draw loop and condition labels (default true) */
  includeControlFlow?: boolean;
}

// ============================================================================
// Export
// ============================================================================

export const EXPORT_FORMATS = ["png", "svg", "pdf", "dot"] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

export interface ExportArtifact {
  /** Final path on disk; the extension follows the format */
  path: string;
  format: ExportFormat;
  bytes: number;
}
