/**
 * Node positions and distances for the distance cost model.
 */

import { MissingPositionError } from "./errors.js";
import type { GraphEdge, GraphNode } from "./ports/SearchGraph.js";

/** [x, y] or [x, y, z] */
export type Position = readonly [number, number] | readonly [number, number, number];

/**
 * Position of a node, looked up in order from an "xyz" vector, an "xy" vector,
 * or separate "x", "y" and optional "z" numbers.
 */
export function findPosition(node: GraphNode): Position | null {
  for (const name of ["xyz", "xy"]) {
    const vector = node.getVector(name);
    if (vector && vector.length >= 2) {
      return vector.length >= 3 ? [vector[0], vector[1], vector[2]] : [vector[0], vector[1]];
    }
  }

  const x = node.getNumber("x");
  const y = node.getNumber("y");
  if (x === undefined || y === undefined) return null;

  const z = node.getNumber("z");
  return z === undefined ? [x, y] : [x, y, z];
}

/**
 * Like findPosition, but a missing position is a precondition violation.
 */
export function nodePosition(node: GraphNode): Position {
  const position = findPosition(node);
  if (!position) throw new MissingPositionError(node.id);
  return position;
}

/**
 * Euclidean distance. The third axis counts only when both positions have one.
 */
export function distance(a: Position, b: Position): number {
  const dx = b[0] - a[0];
  const dy = b[1] - a[1];
  const dz = a.length === 3 && b.length === 3 ? b[2] - a[2] : 0;
  return Math.sqrt(dx * dx + dy * dy + dz * dz);
}

export function edgeLength(edge: GraphEdge): number {
  return distance(nodePosition(edge.source), nodePosition(edge.target));
}
