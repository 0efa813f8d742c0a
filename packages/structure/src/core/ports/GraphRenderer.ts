import type { Result } from "@codeview/core";

import type { AnalysisError, ExportFormat } from "../model.js";

/** Formats that need a layout engine; DOT source is written as is. */
export type RenderFormat = Exclude<ExportFormat, "dot">;

/**
 * Port for a Graphviz layout engine.
 */
export interface GraphRenderer {
  readonly name: string;

  supports(format: RenderFormat): boolean;

  /**
   * Lay out DOT source and return the rendered bytes.
   * Failures are `engine_missing` or `export_failure`.
   */
  render(dot: string, format: RenderFormat): Promise<Result<Uint8Array, AnalysisError>>;
}
