import type { GraphEdge, GraphNode } from "./ports/SearchGraph.js";

/**
 * One node's best known state during a run.
 * Immutable: an improvement for the same node is a new record.
 */
export interface SearchRecord {
  /** Position in the run's record arena */
  readonly index: number;
  readonly node: GraphNode;
  /** Arena index of the predecessor; null for the source */
  readonly parent: number | null;
  /** Edge from the parent; null for the source */
  readonly viaEdge: GraphEdge | null;
  /** Cost from the source */
  readonly g: number;
  /** Estimated cost to the target */
  readonly h: number;
  /** g + h */
  readonly rank: number;
}

/**
 * idle → running → found | exhausted
 */
export type SearchState = "idle" | "running" | "found" | "exhausted";

export interface SearchStats {
  /** Records created, including replaced ones */
  recordsCreated: number;
  /** Records moved from open to closed */
  expansions: number;
  /** Closed nodes moved back to open on a strictly better rank */
  reopened: number;
  /** Largest open set size seen */
  peakOpen: number;
  elapsedMs: number;
}

export function createRecord(
  index: number,
  node: GraphNode,
  viaEdge: GraphEdge | null,
  parent: number | null,
  g: number,
  h: number
): SearchRecord {
  return { index, node, parent, viaEdge, g, h, rank: g + h };
}
