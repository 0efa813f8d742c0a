/**
 * In-process Graphviz through its WebAssembly build. SVG only.
 */
import { instance } from "@viz-js/viz";

import { Err, Ok, toError, type Result } from "@codeview/core";

import { exportFailure, type AnalysisError } from "../../core/model.js";
import type { GraphRenderer, RenderFormat } from "../../core/ports/GraphRenderer.js";

export type Viz = Pick<Awaited<ReturnType<typeof instance>>, "renderString">;

export type VizLoader = () => Promise<Viz>;

export class VizRenderer implements GraphRenderer {
  readonly name = "viz-wasm";

  private viz: Promise<Viz> | undefined;

  constructor(private readonly load: VizLoader = instance) {}

  supports(format: RenderFormat): boolean {
    return format === "svg";
  }

  async render(dot: string, format: RenderFormat): Promise<Result<Uint8Array, AnalysisError>> {
    if (!this.supports(format)) {
      return Err(exportFailure(`${this.name} cannot render ${format}`));
    }

    try {
      const viz = await this.getInstance();
      const svg = viz.renderString(dot, { format: "svg", engine: "dot" });
      return Ok(new TextEncoder().encode(svg));
    } catch (error) {
      return Err(exportFailure(toError(error).message));
    }
  }

  private getInstance(): Promise<Viz> {
    if (!this.viz) {
      this.viz = this.load().catch((error: unknown) => {
        this.viz = undefined;
        throw error;
      });
    }
    return this.viz;
  }
}
