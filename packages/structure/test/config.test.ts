import { describe, it, expect } from "vitest";

import { ConfigError, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      dotPath: "dot",
      renderTimeoutMs: 30000,
      svgEngine: "wasm",
      defaultFormat: "png",
    });
  });

  it("reads every variable", () => {
    expect(
      loadConfig({
        CODEVIEW_DOT_PATH: "/opt/graphviz/bin/dot",
        CODEVIEW_RENDER_TIMEOUT_MS: "5000",
        CODEVIEW_SVG_ENGINE: "cli",
        CODEVIEW_DEFAULT_FORMAT: "svg",
      }),
    ).toEqual({
      dotPath: "/opt/graphviz/bin/dot",
      renderTimeoutMs: 5000,
      svgEngine: "cli",
      defaultFormat: "svg",
    });
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ CODEVIEW_RENDER_TIMEOUT_MS: "soon" })).toThrow(ConfigError);
    expect(() => loadConfig({ CODEVIEW_DEFAULT_FORMAT: "gif" })).toThrow(/CODEVIEW_DEFAULT_FORMAT/);
  });
});
