import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { GraphExporter } from "../src/core/services/GraphExporter.js";
import { StructureService } from "../src/core/services/StructureService.js";
import { NodeFileSystem } from "../src/infrastructure/filesystem/NodeFileSystem.js";
import { TreeSitterPythonParser } from "../src/infrastructure/parsers/TreeSitterPythonParser.js";
import { registerAllTools } from "../src/tools/index.js";

describe("structure tools", () => {
  let dir: string;
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), "codeview-tools-"));
    const fs = new NodeFileSystem();
    const service = new StructureService(new TreeSitterPythonParser(), fs, new GraphExporter(fs, []));

    server = new McpServer({ name: "codeview-test", version: "0.0.0" });
    registerAllTools(server, { structure: service });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: "codeview-test-client", version: "0.0.0" });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    rmSync(dir, { recursive: true, force: true });
  });

  function writeSource(name: string, source: string): string {
    const filePath = join(dir, name);
    writeFileSync(filePath, source);
    return filePath;
  }

  it("registers the three tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "export_structure_graph",
      "get_structure_graph",
      "show_structure",
    ]);
  });

  it("show_structure returns the report and the structure", async () => {
    const filePath = writeSource("app.py", "def run():\n    go()\n");

    const result = await client.callTool({ name: "show_structure", arguments: { file_path: filePath } });

    expect(result).toMatchObject({
      content: [{ type: "text", text: "--- Module: app ---\n\n--- Global Functions ---\n  def run()\n    Calls:\n      - go" }],
      structuredContent: {
        success: true,
        structure: {
          moduleName: "app",
          functions: [{ name: "run", args: [], decorators: [], isAsync: false }],
          calls: { "app.run": ["go"] },
        },
      },
    });
  });

  it("show_structure turns failures into error responses", async () => {
    const filePath = join(dir, "absent.py");

    const result = await client.callTool({ name: "show_structure", arguments: { file_path: filePath } });

    expect(result).toMatchObject({
      isError: true,
      structuredContent: {
        success: false,
        kind: "not_found",
        error: `File does not exist: '${filePath}'`,
      },
    });
  });

  it("get_structure_graph counts nodes and edges", async () => {
    const filePath = writeSource("app.py", "import os\n\ndef run():\n    go()\n");

    const result = await client.callTool({
      name: "get_structure_graph",
      arguments: { file_path: filePath, include_imports: false },
    });

    // app, app.run, go
    expect(result).toMatchObject({
      structuredContent: { success: true, moduleName: "app", nodeCount: 3, edgeCount: 2 },
    });
  });

  it("export_structure_graph writes DOT beside the source", async () => {
    const filePath = writeSource("app.py", "x = 1\n");

    const result = await client.callTool({
      name: "export_structure_graph",
      arguments: { file_path: filePath, format: "dot" },
    });

    const artifact = join(dir, "app_structure.dot");
    expect(result).toMatchObject({
      content: [{ type: "text", text: `Visualization graph saved to: ${artifact}` }],
      structuredContent: { success: true, path: artifact, format: "dot" },
    });
  });
});
