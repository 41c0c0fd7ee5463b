/**
 * MCP tool registration.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { PathService } from "../PathService.js";

import { registerGraphLoad } from "./graphLoad.js";
import { registerPathShortest } from "./pathShortest.js";
import { registerGraphStats } from "./graphStats.js";

export interface Services {
  paths: PathService;
}

export function registerAllTools(server: McpServer, services: Services): void {
  const { paths } = services;

  registerGraphLoad(server, paths);
  registerPathShortest(server, paths);
  registerGraphStats(server, paths);
}
