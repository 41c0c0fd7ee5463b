import { describe, it, expect } from "vitest";
import { MemoryGraph } from "@waypoint/graph";
import { createCosts, DistanceCosts, WeightedCosts } from "../src/core/costs.js";
import { MissingPositionError } from "../src/core/errors.js";
import { distance, edgeLength, findPosition, nodePosition } from "../src/core/geometry.js";

function positioned(): MemoryGraph {
  const graph = new MemoryGraph();
  graph.addNode("origin", { xy: [0, 0] });
  graph.addNode("flat", { x: 3, y: 4 });
  graph.addNode("high", { xyz: [2, 3, 6] });
  graph.addNode("nowhere", { label: "n/a" });
  graph.addNode("half", { x: 1 });
  graph.addNode("short", { xy: [7] });
  graph.addEdge("origin", "flat", { attributes: { weight: 10 } });
  graph.addEdge("origin", "high");
  graph.addEdge("origin", "nowhere", { attributes: { weight: "fast" } });
  return graph;
}

describe("geometry", () => {
  const graph = positioned();
  const node = (id: string) => {
    const found = graph.getNode(id);
    if (!found) throw new Error(`fixture node missing: ${id}`);
    return found;
  };

  it("reads positions from vectors and separate axes", () => {
    expect(findPosition(node("origin"))).toEqual([0, 0]);
    expect(findPosition(node("flat"))).toEqual([3, 4]);
    expect(findPosition(node("high"))).toEqual([2, 3, 6]);
  });

  it("prefers xyz over xy over separate axes", () => {
    const g = new MemoryGraph();
    const both = g.addNode("both", { xyz: [1, 2, 3], xy: [9, 9], x: 5, y: 5 });
    expect(findPosition(both)).toEqual([1, 2, 3]);
  });

  it("has no position without both x and y", () => {
    expect(findPosition(node("nowhere"))).toBeNull();
    expect(findPosition(node("half"))).toBeNull();
    expect(findPosition(node("short"))).toBeNull();
  });

  it("throws a MissingPositionError where a position is required", () => {
    expect(() => nodePosition(node("nowhere"))).toThrow(MissingPositionError);
    expect(() => nodePosition(node("half"))).toThrow(`node 'half' has no position`);
  });

  it("measures in 2D unless both positions are 3D", () => {
    expect(distance([0, 0], [3, 4])).toBe(5);
    expect(distance([0, 0, 0], [2, 3, 6])).toBe(7);
    expect(distance([0, 0], [3, 4, 12])).toBe(5);
  });

  it("measures edge length between the endpoints", () => {
    const edge = graph.getEdge("origin-flat");
    expect(edge).not.toBeNull();
    if (edge) {
      expect(edgeLength(edge)).toBe(5);
    }
  });
});

describe("WeightedCosts", () => {
  const graph = positioned();

  it("has a zero heuristic", () => {
    expect(new WeightedCosts().heuristic()).toBe(0);
  });

  it("reads the weight attribute", () => {
    const edge = graph.getEdge("origin-flat");
    expect(edge).not.toBeNull();
    if (edge) {
      expect(new WeightedCosts().cost(edge.source, edge)).toBe(10);
    }
  });

  it("defaults missing and non-numeric weights to 1", () => {
    const costs = new WeightedCosts();
    const bare = graph.getEdge("origin-high");
    const text = graph.getEdge("origin-nowhere");
    if (bare && text) {
      expect(costs.cost(bare.source, bare)).toBe(1);
      expect(costs.cost(text.source, text)).toBe(1);
    }
    expect(bare).not.toBeNull();
    expect(text).not.toBeNull();
  });

  it("reads a configurable attribute", () => {
    const g = new MemoryGraph();
    g.addNode("a");
    g.addNode("b");
    const edge = g.addEdge("a", "b", { attributes: { weight: 4, km: 2.5 } });
    expect(new WeightedCosts("km").cost(edge.source, edge)).toBe(2.5);
    expect(new WeightedCosts("km").weightAttribute).toBe("km");
  });
});

describe("DistanceCosts", () => {
  const graph = positioned();
  const costs = new DistanceCosts();

  it("estimates the straight-line distance to the target", () => {
    const from = graph.getNode("flat");
    const to = graph.getNode("origin");
    if (from && to) {
      expect(costs.heuristic(from, to)).toBe(5);
      expect(costs.heuristic(to, to)).toBe(0);
    }
    expect(from).not.toBeNull();
  });

  it("costs an edge its geometric length, ignoring weights", () => {
    const edge = graph.getEdge("origin-flat");
    expect(edge).not.toBeNull();
    if (edge) {
      expect(costs.cost(edge.source, edge)).toBe(5);
    }
  });

  it("measures mixed 2D and 3D endpoints in the plane", () => {
    const edge = graph.getEdge("origin-high");
    expect(edge).not.toBeNull();
    if (edge) {
      expect(costs.cost(edge.source, edge)).toBe(Math.sqrt(13));
    }
  });

  it("rejects nodes without a position", () => {
    const from = graph.getNode("nowhere");
    const to = graph.getNode("origin");
    if (from && to) {
      expect(() => costs.heuristic(from, to)).toThrow(MissingPositionError);
    }
    expect(from).not.toBeNull();
  });
});

describe("createCosts", () => {
  it("builds the named model", () => {
    expect(createCosts("distance")).toBeInstanceOf(DistanceCosts);
    const weighted = createCosts("weighted", "time");
    expect(weighted).toBeInstanceOf(WeightedCosts);
    if (weighted instanceof WeightedCosts) {
      expect(weighted.weightAttribute).toBe("time");
    }
  });

  it("falls back to the default weight attribute", () => {
    const weighted = createCosts("weighted");
    expect(weighted instanceof WeightedCosts && weighted.weightAttribute).toBe("weight");
  });
});
