import * as z from "zod/v4";

import { resultToStructuredResponse } from "@codeview/core";

import type { Structure } from "../core/model.js";
import { renderStructure } from "../core/services/TextRenderer.js";
import { StructureSchema, outputBase, type StructureJson } from "./schemas.js";
import type { ToolRegistrar } from "./types.js";

interface ShowStructureInput {
  file_path: string;
}

export function structureToJson(structure: Structure): StructureJson {
  return {
    moduleName: structure.moduleName,
    globalVariables: structure.globalVariables,
    functions: structure.functions,
    classes: structure.classes,
    imports: structure.imports,
    calls: structure.calls.toJSON(),
  };
}

export const registerShowStructure: ToolRegistrar = (server, service) => {
  server.registerTool(
    "show_structure",
    {
      title: "Show structure",
      description: `Describe the structure of a Python file as a text report.

Lists imports, global variables, functions (with decorators, signatures, first docstring line and the calls they make), classes with their attributes and methods, and module-level calls.

Names are resolved syntactically within the file only: calls on objects or imported names appear as written.`,
      inputSchema: {
        file_path: z.string().describe("Path to the Python source file"),
      },
      outputSchema: {
        ...outputBase,
        structure: StructureSchema.optional(),
      },
    },
    async (input: ShowStructureInput) => {
      const result = await service.analyzeFile({ filePath: input.file_path });

      return resultToStructuredResponse(result, (structure) => ({
        text: renderStructure(structure),
        data: { structure: structureToJson(structure) },
      }));
    }
  );
};
