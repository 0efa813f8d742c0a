import type { GraphRenderer } from "../../core/ports/GraphRenderer.js";
import { GraphvizCliRenderer } from "./GraphvizCliRenderer.js";
import { VizRenderer } from "./VizRenderer.js";

export interface RendererSettings {
  dotPath: string;
  renderTimeoutMs: number;
  svgEngine: "wasm" | "cli";
}

/**
 * Renderers in order of preference. The `dot` executable always comes last
 * since it is the only one producing png and pdf.
 */
export function createRenderers(settings: RendererSettings): GraphRenderer[] {
  const cli = new GraphvizCliRenderer({ executable: settings.dotPath, timeoutMs: settings.renderTimeoutMs });
  return settings.svgEngine === "wasm" ? [new VizRenderer(), cli] : [cli];
}
