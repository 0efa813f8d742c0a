import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { StructureService } from "../core/services/StructureService.js";
import { registerExportStructureGraph } from "./exportStructureGraph.js";
import { registerGetStructureGraph } from "./getStructureGraph.js";
import { registerShowStructure } from "./showStructure.js";

export interface Services {
  structure: StructureService;
}

export function registerAllTools(server: McpServer, services: Services): void {
  registerShowStructure(server, services.structure);
  registerGetStructureGraph(server, services.structure);
  registerExportStructureGraph(server, services.structure);
}
