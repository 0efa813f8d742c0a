/**
 * Plain-text report of a Structure.
 *
 * Imports and callees are sorted, everything else keeps definition order, so
 * the same source always yields the same report. Loop and condition labels
 * belong to the graph and never reach the report.
 */
import { compareText } from "../callRegistry.js";
import { isControlFlowLabel } from "../controlFlow.js";
import type { ClassRecord, FunctionRecord, Structure, VariableRecord } from "../model.js";

export const EMPTY_REPORT = "No code structure to display.";

export function renderStructure(structure: Structure | null | undefined): string {
  if (!structure) return EMPTY_REPORT;

  const lines: string[] = [`--- Module: ${structure.moduleName} ---`];

  const direct = uniqueSorted(structure.imports.direct);
  const from = uniqueSorted(structure.imports.from);
  if (direct.length > 0 || from.length > 0) {
    lines.push("\n--- Imports ---");
    for (const name of direct) {
      lines.push(`  - import ${name}`);
    }
    for (const name of from) {
      lines.push(`  - ${fromImportText(name)}`);
    }
  }

  if (structure.globalVariables.length > 0) {
    lines.push("\n--- Global Variables ---");
    for (const variable of structure.globalVariables) {
      lines.push(`  - ${variableText(variable)}`);
    }
  }

  if (structure.functions.length > 0) {
    lines.push("\n--- Global Functions ---");
    for (const fn of structure.functions) {
      renderFunction(lines, structure, fn, `${structure.moduleName}.${fn.name}`, "  ");
    }
  }

  if (structure.classes.length > 0) {
    lines.push("\n--- Classes ---");
    for (const cls of structure.classes) {
      renderClass(lines, structure, cls);
    }
  }

  const moduleCalls = reportedCallees(structure, structure.moduleName);
  if (moduleCalls.length > 0) {
    lines.push("\n--- Module-Level Calls ---");
    for (const callee of moduleCalls) {
      lines.push(`  - ${callee}`);
    }
  }

  return lines.join("\n");
}

function renderClass(lines: string[], structure: Structure, cls: ClassRecord): void {
  lines.push(`${decoratorPrefix(cls.decorators, "  ")}  class ${cls.name}${basesText(cls.bases)}:`);
  pushDocstring(lines, cls.docstring, "    ");

  if (cls.attributes.length > 0) {
    lines.push("    --- Class Attributes ---");
    for (const attribute of cls.attributes) {
      lines.push(`    - ${variableText(attribute)}`);
    }
  }

  if (cls.methods.length > 0) {
    lines.push("    --- Methods ---");
    for (const method of cls.methods) {
      renderFunction(lines, structure, method, `${structure.moduleName}.${cls.name}.${method.name}`, "      ");
    }
  }
}

function renderFunction(
  lines: string[],
  structure: Structure,
  fn: FunctionRecord,
  id: string,
  indent: string,
): void {
  lines.push(`${decoratorPrefix(fn.decorators, indent)}${indent}def ${signatureText(fn)}`);
  pushDocstring(lines, fn.docstring, `${indent}  `);

  const callees = reportedCallees(structure, id);
  if (callees.length > 0) {
    lines.push(`${indent}  Calls:`);
    for (const callee of callees) {
      lines.push(`${indent}    - ${callee}`);
    }
  }
}

function reportedCallees(structure: Structure, scopeId: string): string[] {
  return structure.calls.sorted(scopeId).filter((callee) => !isControlFlowLabel(callee));
}

function pushDocstring(lines: string[], docstring: string | undefined, indent: string): void {
  const summary = docstringSummary(docstring);
  if (summary) {
    lines.push(`${indent}Doc: """${summary}"""`);
  }
}

// ============================================================================
// Shared text fragments (also used for graph labels)
// ============================================================================

/** "name(args) -> R" */
export function signatureText(fn: FunctionRecord): string {
  return `${fn.name}(${fn.args.join(", ")})${returnText(fn)}`;
}

export function returnText(fn: FunctionRecord): string {
  return fn.returnAnnotation ? ` -> ${fn.returnAnnotation}` : "";
}

export function basesText(bases: string[]): string {
  return bases.length > 0 ? `(${bases.join(", ")})` : "";
}

/** "name[: annotation][ = value]" */
export function variableText(variable: VariableRecord): string {
  let text = variable.name;
  if (variable.annotation) text += `: ${variable.annotation}`;
  if (variable.value !== undefined) text += ` = ${variable.value}`;
  return text;
}

/**
 * "a.b.c" -> "from a import b.c"; a name without a module reads as a
 * relative import.
 */
export function fromImportText(recorded: string): string {
  const dot = recorded.indexOf(".");
  if (dot === -1) return `from . import ${recorded}`;
  return `from ${recorded.slice(0, dot)} import ${recorded.slice(dot + 1)}`;
}

export function docstringSummary(docstring: string | undefined): string | undefined {
  const first = docstring?.trim().split(/\r?\n/)[0];
  return first ? first : undefined;
}

export function uniqueSorted(values: readonly string[]): string[] {
  return [...new Set(values)].sort(compareText);
}

function decoratorPrefix(decorators: string[], indent: string): string {
  return decorators.map((decorator) => `${indent}@${decorator}\n`).join("");
}
