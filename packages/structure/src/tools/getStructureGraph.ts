import * as z from "zod/v4";

import { resultToStructuredResponse } from "@codeview/core";

import { outputBase } from "./schemas.js";
import type { ToolRegistrar } from "./types.js";

interface GetStructureGraphInput {
  file_path: string;
  include_imports?: boolean;
  include_control_flow?: boolean;
}

export const registerGetStructureGraph: ToolRegistrar = (server, service) => {
  server.registerTool(
    "get_structure_graph",
    {
      title: "Get structure graph",
      description: `Build the structure and call graph of a Python file and return it as Graphviz DOT source.

Nodes: the module, global variables, imports, functions, classes with their attributes and methods. Edges: containment, calls and inheritance.
Call targets and base classes not defined in the file appear as dashed placeholder nodes; loop and condition labels appear as diamonds.`,
      inputSchema: {
        file_path: z.string().describe("Path to the Python source file"),
        include_imports: z.boolean().optional().describe("Draw a node per import (default: true)"),
        include_control_flow: z
          .boolean()
          .optional()
          .describe("Draw loop and condition labels as call targets (default: true)"),
      },
      outputSchema: {
        ...outputBase,
        moduleName: z.string().optional(),
        nodeCount: z.number().optional(),
        edgeCount: z.number().optional(),
        dot: z.string().optional(),
      },
    },
    async (input: GetStructureGraphInput) => {
      const result = await service.buildGraph({
        filePath: input.file_path,
        includeImports: input.include_imports,
        includeControlFlow: input.include_control_flow,
      });

      return resultToStructuredResponse(result, ({ model, dot }) => ({
        text: dot,
        data: {
          moduleName: model.moduleName,
          nodeCount: model.nodes.length,
          edgeCount: model.edges.length,
          dot,
        },
      }));
    }
  );
};
