import * as z from "zod/v4";

import { resultToStructuredResponse } from "@codeview/core";

import type { ExportFormat } from "../core/model.js";
import { ExportFormatSchema, outputBase } from "./schemas.js";
import type { ToolRegistrar } from "./types.js";

interface ExportStructureGraphInput {
  file_path: string;
  output_path?: string;
  format?: ExportFormat;
}

export const registerExportStructureGraph: ToolRegistrar = (server, service) => {
  server.registerTool(
    "export_structure_graph",
    {
      title: "Export structure graph",
      description: `Render the structure graph of a Python file to disk.

Formats: png, svg, pdf (rendered by Graphviz) or dot (the DOT source itself).
The artifact's extension always follows the format. Without output_path the file lands next to the source as <name>_structure.<format>.

png and pdf need the Graphviz 'dot' executable on PATH.`,
      inputSchema: {
        file_path: z.string().describe("Path to the Python source file"),
        output_path: z.string().optional().describe("Where to write the artifact; its extension is replaced by the format"),
        format: ExportFormatSchema.optional().describe("Output format (default: png)"),
      },
      outputSchema: {
        ...outputBase,
        path: z.string().optional(),
        format: ExportFormatSchema.optional(),
        bytes: z.number().optional(),
      },
    },
    async (input: ExportStructureGraphInput) => {
      const result = await service.exportGraph({
        filePath: input.file_path,
        outputPath: input.output_path,
        format: input.format,
      });

      return resultToStructuredResponse(result, (artifact) => ({
        text: `Visualization graph saved to: ${artifact.path}`,
        data: { path: artifact.path, format: artifact.format, bytes: artifact.bytes },
      }));
    }
  );
};
