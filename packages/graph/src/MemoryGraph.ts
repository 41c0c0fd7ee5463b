/**
 * In-memory graph storage with the lookups a path search needs.
 * Undirected edges leave both endpoints; directed edges leave only their source.
 */

import { Node, Edge } from "./elements.js";
import { GraphError, type Attributes, type EdgeOptions, type GraphStats } from "./model.js";

export interface NodeRef {
  readonly id: string;
}

/**
 * A sequence of edges from one node to another, as found by simplePaths.
 */
export interface EdgeWalk {
  nodes: Node[];
  edges: Edge[];
}

export class MemoryGraph {
  private nodes = new Map<string, Node>();
  private edges = new Map<string, Edge>();
  private leaving = new Map<string, Edge[]>(); // node -> edges usable from it

  /**
   * @param defaultDirected - Direction used by addEdge when the caller does not say
   */
  constructor(readonly defaultDirected: boolean = false) {}

  addNode(id: string, attributes?: Attributes): Node {
    if (this.nodes.has(id)) {
      throw new GraphError(`Duplicate node: ${id}`);
    }
    const node = new Node(id, attributes);
    this.nodes.set(id, node);
    this.leaving.set(id, []);
    return node;
  }

  addEdge(sourceId: string, targetId: string, options: EdgeOptions = {}): Edge {
    const source = this.nodes.get(sourceId);
    if (!source) throw new GraphError(`Unknown source node for edge: ${sourceId}`);
    const target = this.nodes.get(targetId);
    if (!target) throw new GraphError(`Unknown target node for edge: ${targetId}`);

    const id = options.id ?? this.freeEdgeId(`${sourceId}-${targetId}`);
    if (this.edges.has(id)) {
      throw new GraphError(`Duplicate edge: ${id}`);
    }

    const directed = options.directed ?? this.defaultDirected;
    const edge = new Edge(id, source, target, directed, options.attributes);
    this.edges.set(id, edge);

    this.leaving.get(sourceId)?.push(edge);
    if (!directed && sourceId !== targetId) {
      this.leaving.get(targetId)?.push(edge);
    }
    return edge;
  }

  /**
   * Get a node by ID.
   */
  getNode(id: string): Node | null {
    return this.nodes.get(id) ?? null;
  }

  getEdge(id: string): Edge | null {
    return this.edges.get(id) ?? null;
  }

  getAllEdges(): Edge[] {
    return Array.from(this.edges.values());
  }

  /**
   * Edges that can be followed away from a node.
   */
  leavingEdges(node: NodeRef): Edge[] {
    return this.leaving.get(node.id) ?? [];
  }

  /**
   * The endpoint of `edge` on the other side of `node`.
   */
  opposite(edge: { readonly source: NodeRef; readonly target: NodeRef }, node: NodeRef): Node | null {
    if (node.id === edge.source.id) return this.getNode(edge.target.id);
    if (node.id === edge.target.id) return this.getNode(edge.source.id);
    return null;
  }

  /**
   * Enumerate simple paths (no repeated node) between two nodes.
   * Breadth-first, so shorter walks come first.
   */
  simplePaths(fromId: string, toId: string, maxEdges: number = 10, limit: number = 1000): EdgeWalk[] {
    const start = this.nodes.get(fromId);
    if (!start || !this.nodes.has(toId)) return [];

    const walks: EdgeWalk[] = [];
    const queue: EdgeWalk[] = [{ nodes: [start], edges: [] }];

    while (queue.length > 0 && walks.length < limit) {
      const walk = queue.shift();
      if (!walk) break;
      const current = walk.nodes[walk.nodes.length - 1];

      if (current.id === toId) {
        walks.push(walk);
        continue;
      }
      if (walk.edges.length >= maxEdges) continue;

      for (const edge of this.leavingEdges(current)) {
        const next = edge.opposite(current);
        if (!next || walk.nodes.some((n) => n.id === next.id)) continue;
        queue.push({ nodes: [...walk.nodes, next], edges: [...walk.edges, edge] });
      }
    }

    return walks;
  }

  stats(): GraphStats {
    let directedEdges = 0;
    for (const edge of this.edges.values()) {
      if (edge.directed) directedEdges++;
    }
    return {
      nodes: this.nodes.size,
      edges: this.edges.size,
      directedEdges,
    };
  }

  private freeEdgeId(base: string): string {
    if (!this.edges.has(base)) return base;
    let n = 2;
    while (this.edges.has(`${base}#${n}`)) n++;
    return `${base}#${n}`;
  }
}
