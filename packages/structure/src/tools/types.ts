import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { StructureService } from "../core/services/StructureService.js";

export interface ToolRegistrar {
  (server: McpServer, service: StructureService): void;
}

