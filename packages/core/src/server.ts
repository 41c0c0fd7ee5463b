/**
 * MCP server bootstrap.
 * Creates services, registers tools, wires shutdown signals, connects stdio.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createLogger, type Logger } from "./logger.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Factory for the services the tools operate on */
  createServices: (logger: Logger) => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs before the transport connects */
  onStartup?: (services: S, logger: Logger) => Promise<void> | void;

  onShutdown?: (services: S, logger: Logger) => Promise<void> | void;
}

/**
 * Build an McpServer with all tools registered, without connecting it.
 * Tests connect the result to an in-memory transport.
 */
export function createServer<S>(config: ServerConfig, services: S, registerTools: (server: McpServer, services: S) => void): McpServer {
  const server = new McpServer({
    name: config.name,
    version: config.version,
  });
  registerTools(server, services);
  return server;
}

/**
 * Bootstrap a stdio MCP server.
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "waypoint", version: "0.1.0" },
 *   createServices: () => ({ paths: new PathService() }),
 *   registerTools: registerAllTools,
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;
  const logger = createLogger(config.name);

  const services = await createServices(logger);
  const server = createServer(config, services, registerTools);
  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down...");
    await onShutdown?.(services, logger);
    await server.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error("Shutdown failed:", error);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  await onStartup?.(services, logger);

  await server.connect(transport);
  logger.info(`Ready (${config.name} ${config.version})`);
}

/**
 * Entry point for server binaries: bootstrap and exit on fatal errors.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    createLogger(options.config.name).error("Fatal error:", error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
