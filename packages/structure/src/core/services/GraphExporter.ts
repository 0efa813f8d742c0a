import path from "node:path";

import { Err, Ok, type Result } from "@codeview/core";

import { exportFailure, type AnalysisError, type ExportArtifact, type ExportFormat, type GraphModel } from "../model.js";
import type { FileSystem } from "../ports/FileSystem.js";
import type { GraphRenderer } from "../ports/GraphRenderer.js";
import { writeDot } from "./DotWriter.js";

/**
 * The destination with its extension replaced by the format:
 * `out/graph.png` exported as svg lands at `out/graph.svg`.
 */
export function artifactPath(destination: string, format: ExportFormat): string {
  const parsed = path.parse(destination);
  return path.join(parsed.dir, `${parsed.name}.${format}`);
}

/**
 * Writes a graph model to disk as DOT source or as a rendered image.
 */
export class GraphExporter {
  /**
   * @param renderers - Layout engines in order of preference; the first one
   *   supporting a format renders it
   */
  constructor(
    private readonly fs: FileSystem,
    private readonly renderers: readonly GraphRenderer[],
  ) {}

  async export(
    model: GraphModel,
    destination: string,
    format: ExportFormat,
  ): Promise<Result<ExportArtifact, AnalysisError>> {
    const target = artifactPath(destination, format);
    const dot = writeDot(model);

    let content: string | Uint8Array;
    if (format === "dot") {
      content = dot;
    } else {
      const renderer = this.renderers.find((candidate) => candidate.supports(format));
      if (!renderer) {
        return Err(exportFailure(`no renderer available for format '${format}'`));
      }
      const rendered = await renderer.render(dot, format);
      if (!rendered.ok) {
        return rendered;
      }
      content = rendered.value;
    }

    const written = this.fs.writeAtomic(target, content);
    if (!written.ok) {
      return Err(exportFailure(written.error.message));
    }

    return Ok({ path: target, format, bytes: written.value });
  }
}
