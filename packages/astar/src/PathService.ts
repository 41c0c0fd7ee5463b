/**
 * PathService - holds the loaded graph and answers shortest-path queries.
 * Everything returns a Result; search errors never escape as exceptions.
 */

import { type Result, Ok, Err, map, tryCatch, createLogger, type Logger } from "@waypoint/core";
import { buildGraph, loadGraphFile, type GraphDocument, type GraphStats, type MemoryGraph } from "@waypoint/graph";
import { AStar } from "./core/AStar.js";
import { createCosts, DEFAULT_WEIGHT_ATTRIBUTE, type CostModelName } from "./core/costs.js";
import type { SearchStats } from "./core/model.js";

export interface PathServiceOptions {
  /** Cost model used when a request does not name one */
  costs: CostModelName;
  /** Edge attribute read by the weighted cost model */
  weightAttribute: string;
}

export interface ShortestPathRequest {
  source: string;
  target: string;
  costs?: CostModelName;
  weightAttribute?: string;
}

export interface PathSummary {
  source: string;
  target: string;
  found: boolean;
  /** Node IDs, source first; empty when no path was found */
  nodes: string[];
  edges: string[];
  /** Total cost under the model used; null when no path was found */
  cost: number | null;
  costs: CostModelName;
  stats: SearchStats | null;
}

const DEFAULT_OPTIONS: PathServiceOptions = {
  costs: "weighted",
  weightAttribute: DEFAULT_WEIGHT_ATTRIBUTE,
};

export class PathService {
  private graph: MemoryGraph | null = null;
  private readonly astar = new AStar();
  private readonly options: PathServiceOptions;
  private readonly logger: Logger;

  constructor(options: Partial<PathServiceOptions> = {}, logger: Logger = createLogger("paths")) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = logger;
  }

  isLoaded(): boolean {
    return this.graph !== null;
  }

  /**
   * Use an already built graph.
   */
  useGraph(graph: MemoryGraph): GraphStats {
    this.graph = graph;
    this.astar.init(graph);
    const stats = graph.stats();
    this.logger.info(`Graph loaded: ${stats.nodes} nodes, ${stats.edges} edges`);
    return stats;
  }

  loadGraph(document: GraphDocument): Result<GraphStats, string> {
    return map(buildGraph(document), (graph) => this.useGraph(graph));
  }

  loadGraphFile(path: string): Result<GraphStats, string> {
    return map(loadGraphFile(path), (graph) => this.useGraph(graph));
  }

  stats(): Result<GraphStats, string> {
    if (!this.graph) return Err(NOT_LOADED);
    return Ok(this.graph.stats());
  }

  /**
   * Compute the cheapest path between two nodes.
   * "No path" is a successful result with found = false.
   * Negative weights are refused up front: the search never terminates on them.
   */
  shortestPath(request: ShortestPathRequest): Result<PathSummary, string> {
    if (!this.graph) return Err(NOT_LOADED);

    const model = request.costs ?? this.options.costs;
    const weightAttribute = request.weightAttribute ?? this.options.weightAttribute;
    if (model === "weighted") {
      const negative = findNegativeWeight(this.graph, weightAttribute);
      if (negative) return Err(negative);
    }
    const costs = createCosts(model, weightAttribute);

    return tryCatch(() => {
      this.astar.setCosts(costs);
      this.astar.compute(request.source, request.target);

      const path = this.astar.getShortestPath();
      return {
        source: request.source,
        target: request.target,
        found: path !== null,
        nodes: path ? path.nodeIds() : [],
        edges: path ? path.edgeIds() : [],
        cost: path ? path.cost(costs) : null,
        costs: model,
        stats: this.astar.getStats(),
      };
    });
  }
}

const NOT_LOADED = "Graph not loaded. Call graph_load first.";

function findNegativeWeight(graph: MemoryGraph, attribute: string): string | null {
  for (const edge of graph.getAllEdges()) {
    const weight = edge.getNumber(attribute);
    if (weight !== undefined && weight < 0) {
      return `edge '${edge.id}' has negative weight ${weight} in "${attribute}"`;
    }
  }
  return null;
}
