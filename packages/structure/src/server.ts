#!/usr/bin/env node
/**
 * MCP server for Python structure analysis.
 */

import { runServer } from "@codeview/core";

import { loadConfig } from "./config.js";
import { GraphExporter } from "./core/services/GraphExporter.js";
import { StructureService } from "./core/services/StructureService.js";
import { NodeFileSystem } from "./infrastructure/filesystem/NodeFileSystem.js";
import { TreeSitterPythonParser } from "./infrastructure/parsers/TreeSitterPythonParser.js";
import { createRenderers } from "./infrastructure/renderers/createRenderers.js";
import { type Services, registerAllTools } from "./tools/index.js";

const SERVER_NAME = "codeview:structure";

runServer<Services>({
  config: {
    name: SERVER_NAME,
    version: "0.1.0",
  },
  createServices: () => {
    const config = loadConfig();
    const fs = new NodeFileSystem();
    const exporter = new GraphExporter(fs, createRenderers(config));

    return {
      structure: new StructureService(new TreeSitterPythonParser(), fs, exporter, {
        defaultFormat: config.defaultFormat,
      }),
    };
  },
  registerTools: registerAllTools,
  onStartup: () => {
    console.error(`[${SERVER_NAME}] ready on stdio`);
  },
});
