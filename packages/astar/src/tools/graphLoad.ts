/**
 * graph_load - Load the graph that later path queries run against.
 */

import * as z from "zod/v4";
import { errorResponse, resultToStructuredResponse, type ToolResponse } from "@waypoint/core";
import { EdgeDocumentSchema, NodeDocumentSchema, type EdgeDocument, type GraphStats, type NodeDocument } from "@waypoint/graph";
import type { ToolRegistrar } from "./types.js";

interface GraphLoadInput {
  file?: string;
  directed?: boolean;
  nodes?: NodeDocument[];
  edges?: EdgeDocument[];
}

export function formatLoaded(stats: GraphStats, origin: string): string {
  const directed = stats.directedEdges > 0 ? `, ${stats.directedEdges} directed` : "";
  return `Loaded ${origin}: ${stats.nodes} nodes, ${stats.edges} edges${directed}`;
}

export const registerGraphLoad: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_load",
    {
      title: "Load graph",
      description:
        "Load a graph from a JSON file or from inline nodes and edges. Replaces any loaded graph. " +
        'Edge costs come from numeric attributes (default "weight"); node positions from "xy", "xyz" or "x"/"y"/"z".',
      inputSchema: {
        file: z.string().optional().describe("Path to a JSON graph document"),
        directed: z.boolean().optional().describe("Default direction of inline edges (default: false)"),
        nodes: z.array(NodeDocumentSchema).optional().describe("Inline nodes"),
        edges: z.array(EdgeDocumentSchema).optional().describe("Inline edges"),
      },
    },
    async (input: GraphLoadInput): Promise<ToolResponse> => {
      const format = (origin: string) => (stats: GraphStats) => ({
        text: formatLoaded(stats, origin),
        data: { ...stats },
      });

      if (input.file !== undefined) {
        return resultToStructuredResponse(service.loadGraphFile(input.file), format(input.file));
      }
      if (input.nodes !== undefined) {
        const document = { directed: input.directed, nodes: input.nodes, edges: input.edges };
        return resultToStructuredResponse(service.loadGraph(document), format("inline graph"));
      }
      return errorResponse("Provide either file or nodes");
    }
  );
};
