/**
 * MCP server bootstrap shared by the packages.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Builds the services handed to the tools; may throw on invalid configuration. */
  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  onStartup?: (services: S) => Promise<void> | void;

  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Create the services, register the tools and connect over stdio.
 * SIGTERM and SIGINT run the shutdown hook before exiting.
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<McpServer> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      console.error(`[${config.name}] Shutdown failed:`, error);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  await onStartup?.(services);

  await server.connect(transport);
  return server;
}

/**
 * Entry point for servers: any bootstrap failure is fatal.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error(`[${options.config.name}] Fatal error:`, error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
