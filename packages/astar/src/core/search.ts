/**
 * The best-first search loop.
 *
 * All per-run state (record arena, open and closed sets, queue) is local to
 * one call, so nothing leaks between runs.
 */

import type { Costs } from "./costs.js";
import type { SearchStats } from "./model.js";
import { OpenQueue } from "./OpenQueue.js";
import { buildPath, type Path } from "./Path.js";
import { RecordStore } from "./RecordStore.js";
import type { GraphNode, SearchGraph } from "./ports/SearchGraph.js";

export type SearchOutcome =
  | { state: "found"; path: Path; records: RecordStore; stats: SearchStats }
  | { state: "exhausted"; path: null; records: RecordStore; stats: SearchStats };

/**
 * Run A* from `source` to `target`.
 *
 * A neighbour is skipped when its open or closed record already ranks at
 * least as well; otherwise it gets a new open record, which re-opens it if
 * it was closed. Terminates on nonnegative edge costs.
 */
export function search(graph: SearchGraph, costs: Costs, source: GraphNode, target: GraphNode): SearchOutcome {
  const started = performance.now();
  const records = new RecordStore();
  const queue = new OpenQueue();
  const stats: SearchStats = { recordsCreated: 0, expansions: 0, reopened: 0, peakOpen: 0, elapsedMs: 0 };

  const finish = (): SearchStats => {
    stats.recordsCreated = records.size;
    stats.elapsedMs = performance.now() - started;
    return stats;
  };

  const root = records.open(source, null, null, 0, costs.heuristic(source, target));
  queue.push(root.index, root.rank);
  stats.peakOpen = 1;

  while (records.openSize > 0) {
    const index = queue.pop();
    if (index === undefined) break;
    if (!records.isOpen(index)) continue; // replaced by a better record

    const current = records.get(index);
    if (current.node.id === target.id) {
      return { state: "found", path: buildPath(records, index), records, stats: finish() };
    }

    records.close(current);
    stats.expansions++;

    for (const edge of graph.leavingEdges(current.node)) {
      const next = graph.opposite(edge, current.node);
      if (!next) continue;

      const h = costs.heuristic(next, target);
      const g = current.g + costs.cost(current.node, edge, next);
      const rank = g + h;

      const inOpen = records.openRecord(next.id);
      if (inOpen && inOpen.rank <= rank) continue;

      const inClosed = records.closedRecord(next.id);
      if (inClosed && inClosed.rank <= rank) continue;
      if (inClosed) stats.reopened++;

      const record = records.open(next, edge, current.index, g, h);
      queue.push(record.index, record.rank);
    }

    stats.peakOpen = Math.max(stats.peakOpen, records.openSize);
  }

  return { state: "exhausted", path: null, records, stats: finish() };
}
