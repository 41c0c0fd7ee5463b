/**
 * Model for the in-memory graph.
 * Nodes and edges carry a bag of named attributes.
 */

export type AttributeValue = number | string | boolean | readonly number[];

export type Attributes = Readonly<Record<string, AttributeValue>>;

/**
 * Graph statistics.
 */
export interface GraphStats {
  nodes: number;
  edges: number;
  directedEdges: number;
}

export interface EdgeOptions {
  /** Explicit ID; defaults to "source-target" */
  id?: string;
  directed?: boolean;
  attributes?: Attributes;
}

/**
 * Thrown when a graph is built inconsistently (duplicate IDs, unknown endpoints).
 */
export class GraphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GraphError";
  }
}
