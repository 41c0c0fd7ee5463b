/**
 * Cost models: how much an edge costs and how far the target probably is.
 */

import { distance, edgeLength, nodePosition } from "./geometry.js";
import type { GraphEdge, GraphNode } from "./ports/SearchGraph.js";

export interface Costs {
  /**
   * Estimated remaining cost from `node` to `target`. Must never overestimate
   * the true cost for the returned paths to be optimal; this is not checked.
   */
  heuristic(node: GraphNode, target: GraphNode): number;

  /**
   * Cost of following `edge` from `parent` to `next`. Must be nonnegative.
   */
  cost(parent: GraphNode, edge: GraphEdge, next: GraphNode): number;
}

export const DEFAULT_WEIGHT_ATTRIBUTE = "weight";

/**
 * Edge costs read from a numeric edge attribute (1 when absent or not a number).
 * The heuristic is always 0, which makes the search Dijkstra's algorithm.
 */
export class WeightedCosts implements Costs {
  constructor(readonly weightAttribute: string = DEFAULT_WEIGHT_ATTRIBUTE) {}

  heuristic(): number {
    return 0;
  }

  cost(_parent: GraphNode, edge: GraphEdge): number {
    return edge.getNumber(this.weightAttribute) ?? 1;
  }
}

/**
 * Geometric costs: an edge costs its length, and the heuristic is the
 * straight-line distance to the target. Every node needs a position.
 */
export class DistanceCosts implements Costs {
  heuristic(node: GraphNode, target: GraphNode): number {
    return distance(nodePosition(node), nodePosition(target));
  }

  cost(_parent: GraphNode, edge: GraphEdge): number {
    return edgeLength(edge);
  }
}

export const COST_MODELS = ["weighted", "distance"] as const;

export type CostModelName = (typeof COST_MODELS)[number];

export function createCosts(model: CostModelName, weightAttribute?: string): Costs {
  switch (model) {
    case "distance":
      return new DistanceCosts();
    case "weighted":
      return new WeightedCosts(weightAttribute);
  }
}
