/**
 * Read-only view of a graph, as consumed by the search.
 * The search never mutates the graph and never owns its nodes or edges.
 */

/**
 * Typed access to named attributes of a node or edge.
 */
export interface AttributeSource {
  /** Numeric attribute, or undefined when absent or not a number */
  getNumber(name: string): number | undefined;
  /** Multi-component numeric attribute such as "xy" or "xyz" */
  getVector(name: string): readonly number[] | undefined;
}

export interface GraphNode extends AttributeSource {
  readonly id: string;
}

export interface GraphEdge extends AttributeSource {
  readonly id: string;
  readonly source: GraphNode;
  readonly target: GraphNode;
}

export interface SearchGraph {
  getNode(id: string): GraphNode | null;
  /** Finite, exhaustive, order unspecified */
  leavingEdges(node: GraphNode): Iterable<GraphEdge>;
  /** The endpoint of `edge` that is not `node`; null if `node` is not on it */
  opposite(edge: GraphEdge, node: GraphNode): GraphNode | null;
}
