/**
 * A* shortest path between two nodes of a graph.
 *
 * The cost model decides edge costs and the heuristic. With the default
 * WeightedCosts the heuristic is zero and the search is Dijkstra's algorithm.
 *
 * @example
 * ```typescript
 * const astar = new AStar(graph);
 * astar.compute("A", "Z");
 * const path = astar.getShortestPath();
 * ```
 */

import { createLogger } from "@waypoint/core";
import { WeightedCosts, type Costs } from "./costs.js";
import { NodeNotFoundError, UnboundGraphError } from "./errors.js";
import type { SearchState, SearchStats } from "./model.js";
import type { Path } from "./Path.js";
import type { SearchGraph } from "./ports/SearchGraph.js";
import { search, type SearchOutcome } from "./search.js";

const log = createLogger("astar");

/**
 * Shape shared by graph algorithms: bind a graph, then compute.
 */
export interface Algorithm {
  init(graph: SearchGraph): void;
  compute(): void;
}

export class AStar implements Algorithm {
  private graph: SearchGraph | null = null;
  private source: string | null = null;
  private target: string | null = null;
  private costs: Costs = new WeightedCosts();

  private result: Path | null = null;
  private noPath = false;
  private currentState: SearchState = "idle";
  private lastStats: SearchStats | null = null;

  constructor(graph?: SearchGraph, source?: string, target?: string) {
    if (graph) this.init(graph);
    if (source !== undefined) this.setSource(source);
    if (target !== undefined) this.setTarget(target);
  }

  /**
   * Bind (or rebind) the graph. Clears any computed result.
   */
  init(graph: SearchGraph): void {
    this.clear();
    this.graph = graph;
  }

  /**
   * Change the source node. Clears the computed result, keeps the target.
   */
  setSource(id: string): void {
    this.clear();
    this.source = id;
  }

  /**
   * Change the target node. Clears the computed result, keeps the source.
   */
  setTarget(id: string): void {
    this.clear();
    this.target = id;
  }

  getSource(): string | null {
    return this.source;
  }

  getTarget(): string | null {
    return this.target;
  }

  /**
   * Replace the cost model. Does not clear the computed result; call
   * compute() again to apply it.
   */
  setCosts(costs: Costs): void {
    this.costs = costs;
  }

  getCosts(): Costs {
    return this.costs;
  }

  get state(): SearchState {
    return this.currentState;
  }

  /**
   * Run the search. Does nothing while the source or target is unset.
   *
   * @throws UnboundGraphError when no graph is bound
   * @throws NodeNotFoundError when an endpoint is not in the graph
   */
  compute(): void;
  /**
   * Set both endpoints, then run the search.
   */
  compute(source: string, target: string): void;
  compute(source?: string, target?: string): void {
    if (source !== undefined && target !== undefined) {
      this.setSource(source);
      this.setTarget(target);
    }

    if (this.source === null || this.target === null) {
      log.debug("compute() skipped: source or target not set");
      return;
    }

    this.clear();
    if (!this.graph) throw new UnboundGraphError();

    const sourceNode = this.graph.getNode(this.source);
    if (!sourceNode) throw new NodeNotFoundError("source", this.source);
    const targetNode = this.graph.getNode(this.target);
    if (!targetNode) throw new NodeNotFoundError("target", this.target);

    this.currentState = "running";
    let outcome: SearchOutcome;
    try {
      outcome = search(this.graph, this.costs, sourceNode, targetNode);
    } catch (error) {
      this.clear();
      throw error;
    }

    this.result = outcome.path;
    this.noPath = outcome.state === "exhausted";
    this.lastStats = outcome.stats;
    this.currentState = outcome.state;

    log.debug(
      `${this.source} -> ${this.target}: ${outcome.state} after ${outcome.stats.expansions} expansion(s), ` +
        `${outcome.stats.reopened} re-opened`
    );
  }

  /**
   * The computed path, or null when no path was found or nothing ran.
   */
  getShortestPath(): Path | null {
    return this.result;
  }

  /**
   * True exactly when the last run ended without reaching the target.
   */
  noPathFound(): boolean {
    return this.noPath;
  }

  /**
   * Counters of the last completed run.
   */
  getStats(): SearchStats | null {
    return this.lastStats;
  }

  private clear(): void {
    this.result = null;
    this.noPath = false;
    this.lastStats = null;
    this.currentState = "idle";
  }
}
