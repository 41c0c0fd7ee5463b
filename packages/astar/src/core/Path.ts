/**
 * Paths through a graph, and building them from a record chain.
 */

import type { Costs } from "./costs.js";
import type { RecordStore } from "./RecordStore.js";
import type { GraphEdge, GraphNode } from "./ports/SearchGraph.js";

export class Path {
  private readonly nodeList: readonly GraphNode[];
  private readonly edgeList: readonly GraphEdge[];

  /**
   * @param nodes - Root first; at least one node
   * @param edges - edges[i] joins nodes[i] and nodes[i + 1]
   */
  constructor(nodes: readonly GraphNode[], edges: readonly GraphEdge[] = []) {
    if (nodes.length === 0) {
      throw new RangeError("A path needs at least one node");
    }
    if (edges.length !== nodes.length - 1) {
      throw new RangeError(`A path of ${nodes.length} node(s) needs ${nodes.length - 1} edge(s), got ${edges.length}`);
    }
    this.nodeList = [...nodes];
    this.edgeList = [...edges];
  }

  get root(): GraphNode {
    return this.nodeList[0];
  }

  get tail(): GraphNode {
    return this.nodeList[this.nodeList.length - 1];
  }

  get nodes(): readonly GraphNode[] {
    return this.nodeList;
  }

  get edges(): readonly GraphEdge[] {
    return this.edgeList;
  }

  /** Number of nodes */
  get size(): number {
    return this.nodeList.length;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  nodeIds(): string[] {
    return this.nodeList.map((n) => n.id);
  }

  edgeIds(): string[] {
    return this.edgeList.map((e) => e.id);
  }

  containsNode(id: string): boolean {
    return this.nodeList.some((n) => n.id === id);
  }

  containsEdge(id: string): boolean {
    return this.edgeList.some((e) => e.id === id);
  }

  /**
   * Sum of a numeric edge attribute; edges without it count 1.
   */
  weight(attribute: string = "weight"): number {
    let total = 0;
    for (const edge of this.edgeList) {
      total += edge.getNumber(attribute) ?? 1;
    }
    return total;
  }

  /**
   * Total cost of the path under a cost model.
   */
  cost(costs: Costs): number {
    let total = 0;
    for (let i = 0; i < this.edgeList.length; i++) {
      total += costs.cost(this.nodeList[i], this.edgeList[i], this.nodeList[i + 1]);
    }
    return total;
  }

  toString(): string {
    return this.nodeIds().join(" -> ");
  }
}

/**
 * Walk parent links from the terminal record back to the source and
 * return the path in source-to-terminal order.
 */
export function buildPath(store: RecordStore, terminal: number): Path {
  const chain = store.chain(terminal);
  const nodes: GraphNode[] = [];
  const edges: GraphEdge[] = [];

  for (const record of chain) {
    if (record.viaEdge) edges.push(record.viaEdge);
    nodes.push(record.node);
  }

  return new Path(nodes, edges);
}
