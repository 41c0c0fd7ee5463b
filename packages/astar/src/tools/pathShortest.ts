/**
 * path_shortest - Cheapest path between two nodes of the loaded graph.
 */

import * as z from "zod/v4";
import { resultToStructuredResponse, type ToolResponse } from "@waypoint/core";
import { COST_MODELS, type CostModelName } from "../core/costs.js";
import type { PathSummary } from "../PathService.js";
import type { ToolRegistrar } from "./types.js";

interface PathShortestInput {
  source: string;
  target: string;
  costs?: CostModelName;
  weight_attribute?: string;
}

export function formatPath(summary: PathSummary): string {
  if (!summary.found) {
    return `No path from ${summary.source} to ${summary.target}`;
  }

  const lines = [`${summary.nodes.join(" -> ")} (cost ${formatCost(summary.cost)})`];
  if (summary.stats) {
    lines.push(
      `${summary.edges.length} edge(s), ${summary.stats.expansions} expansion(s), ${summary.stats.reopened} re-opened`
    );
  }
  return lines.join("\n");
}

function formatCost(cost: number | null): string {
  if (cost === null) return "n/a";
  return Number.isInteger(cost) ? String(cost) : cost.toFixed(3);
}

export const registerPathShortest: ToolRegistrar = (server, service) => {
  server.registerTool(
    "path_shortest",
    {
      title: "Shortest path",
      description:
        'Find the cheapest path between two nodes with A*. "weighted" reads edge weights (Dijkstra); ' +
        '"distance" uses node positions with a straight-line heuristic.',
      inputSchema: {
        source: z.string().describe("Source node ID"),
        target: z.string().describe("Target node ID"),
        costs: z.enum(COST_MODELS).optional().describe("Cost model (default from configuration)"),
        weight_attribute: z.string().optional().describe('Edge attribute holding weights (default: "weight")'),
      },
    },
    async (input: PathShortestInput): Promise<ToolResponse> => {
      const result = service.shortestPath({
        source: input.source,
        target: input.target,
        costs: input.costs,
        weightAttribute: input.weight_attribute,
      });

      return resultToStructuredResponse(result, (summary) => ({
        text: formatPath(summary),
        data: {
          found: summary.found,
          nodes: summary.nodes,
          edges: summary.edges,
          cost: summary.cost,
          costs: summary.costs,
        },
      }));
    }
  );
};
