import path from "node:path";

import { Err, Ok, type Result } from "@codeview/core";

import {
  analysisError,
  type AnalysisError,
  type ExportArtifact,
  type ExportFormat,
  type GraphBuildOptions,
  type GraphModel,
  type Structure,
} from "../model.js";
import type { FileSystem } from "../ports/FileSystem.js";
import type { StructureParser } from "../ports/StructureParser.js";
import { writeDot } from "./DotWriter.js";
import type { GraphExporter } from "./GraphExporter.js";
import { buildGraphModel } from "./GraphModelBuilder.js";
import { renderStructure } from "./TextRenderer.js";

export interface AnalyzeFileParams {
  filePath: string;
}

export interface BuildGraphParams extends GraphBuildOptions {
  filePath: string;
}

export interface ExportGraphParams {
  filePath: string;
  /** Defaults to `<dir>/<stem>_structure.<format>` beside the source */
  outputPath?: string;
  format?: ExportFormat;
}

export interface StructureGraph {
  model: GraphModel;
  dot: string;
}

export interface StructureServiceOptions {
  defaultFormat: ExportFormat;
}

/**
 * The module name a file is analyzed under: its base name without extension.
 */
export function moduleNameOf(filePath: string): string {
  return path.parse(filePath).name;
}

export function defaultOutputPath(filePath: string, format: ExportFormat): string {
  return path.join(path.dirname(filePath), `${moduleNameOf(filePath)}_structure.${format}`);
}

/**
 * Reads one Python file and turns it into a report, a graph or an artifact.
 */
export class StructureService {
  constructor(
    private readonly parser: StructureParser,
    private readonly fs: FileSystem,
    private readonly exporter: GraphExporter,
    private readonly options: StructureServiceOptions = { defaultFormat: "png" },
  ) {}

  async analyzeFile(params: AnalyzeFileParams): Promise<Result<Structure, AnalysisError>> {
    const { filePath } = params;

    if (!this.fs.exists(filePath)) {
      return Err(analysisError("not_found", `File does not exist: '${filePath}'`));
    }

    const source = this.fs.read(filePath);
    if (!source.ok) {
      return Err(analysisError("read_failure", `Could not read file '${filePath}': ${source.error.message}`));
    }

    const parsed = await this.parser.parseStructure(source.value, moduleNameOf(filePath));
    if (!parsed.ok) {
      const failure = parsed.error;
      return Err(
        failure.kind === "syntax"
          ? analysisError("syntax_failure", `File '${filePath}' contains a syntax error: ${failure.message}`)
          : analysisError("unknown_parse_failure", `An unknown error occurred during parsing: ${failure.message}`),
      );
    }

    return Ok(parsed.value);
  }

  async describeFile(params: AnalyzeFileParams): Promise<Result<string, AnalysisError>> {
    const structure = await this.analyzeFile(params);
    if (!structure.ok) return structure;
    return Ok(renderStructure(structure.value));
  }

  async buildGraph(params: BuildGraphParams): Promise<Result<StructureGraph, AnalysisError>> {
    const { filePath, ...options } = params;
    const structure = await this.analyzeFile({ filePath });
    if (!structure.ok) return structure;

    const model = buildGraphModel(structure.value, options);
    return Ok({ model, dot: writeDot(model) });
  }

  async exportGraph(params: ExportGraphParams): Promise<Result<ExportArtifact, AnalysisError>> {
    const format = params.format ?? this.options.defaultFormat;
    const structure = await this.analyzeFile({ filePath: params.filePath });
    if (!structure.ok) return structure;

    const destination = params.outputPath ?? defaultOutputPath(params.filePath, format);
    return this.exporter.export(buildGraphModel(structure.value), destination, format);
  }
}
