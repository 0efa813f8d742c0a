import * as z from "zod/v4";

import { EXPORT_FORMATS } from "./core/model.js";

const ConfigSchema = z.object({
  CODEVIEW_DOT_PATH: z.string().min(1).default("dot"),
  CODEVIEW_RENDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  CODEVIEW_SVG_ENGINE: z.enum(["wasm", "cli"]).default("wasm"),
  CODEVIEW_DEFAULT_FORMAT: z.enum(EXPORT_FORMATS).default("png"),
});

export interface CodeviewConfig {
  /** Graphviz executable for png and pdf (and svg with the cli engine) */
  dotPath: string;
  renderTimeoutMs: number;
  svgEngine: "wasm" | "cli";
  defaultFormat: (typeof EXPORT_FORMATS)[number];
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Read the configuration from environment variables.
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CodeviewConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }

  const values = parsed.data;
  return {
    dotPath: values.CODEVIEW_DOT_PATH,
    renderTimeoutMs: values.CODEVIEW_RENDER_TIMEOUT_MS,
    svgEngine: values.CODEVIEW_SVG_ENGINE,
    defaultFormat: values.CODEVIEW_DEFAULT_FORMAT,
  };
}
