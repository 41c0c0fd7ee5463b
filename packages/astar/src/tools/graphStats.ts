/**
 * graph_stats - Size of the loaded graph.
 */

import { resultToStructuredResponse, type ToolResponse } from "@waypoint/core";
import type { ToolRegistrar } from "./types.js";

export const registerGraphStats: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_stats",
    {
      title: "Graph statistics",
      description: "Node and edge counts of the loaded graph.",
      inputSchema: {},
    },
    async (): Promise<ToolResponse> =>
      resultToStructuredResponse(service.stats(), (stats) => ({
        text: `${stats.nodes} nodes, ${stats.edges} edges (${stats.directedEdges} directed)`,
        data: { ...stats },
      }))
  );
};
