import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { PathService } from "../PathService.js";

export interface ToolRegistrar {
  (server: McpServer, service: PathService): void;
}
