import { describe, it, expect, beforeEach } from "vitest";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { createLogger } from "@waypoint/core";
import { PathService } from "../src/PathService.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const CITY = join(__dirname, "fixtures", "city.json");

describe("PathService", () => {
  let service: PathService;
  let logged: string[];

  beforeEach(() => {
    logged = [];
    service = new PathService({}, createLogger("paths", (line) => logged.push(line)));
  });

  describe("before a graph is loaded", () => {
    it("reports that nothing is loaded", () => {
      expect(service.isLoaded()).toBe(false);
      expect(service.stats()).toEqual({ ok: false, error: "Graph not loaded. Call graph_load first." });
    });

    it("refuses path queries", () => {
      const result = service.shortestPath({ source: "home", target: "office" });
      expect(result).toEqual({ ok: false, error: "Graph not loaded. Call graph_load first." });
    });
  });

  describe("loading", () => {
    it("loads a graph file", () => {
      const result = service.loadGraphFile(CITY);
      expect(result).toEqual({ ok: true, value: { nodes: 5, edges: 4, directedEdges: 0 } });
      expect(service.isLoaded()).toBe(true);
    });

    it("loads an inline document", () => {
      const result = service.loadGraph({
        nodes: [{ id: "a" }, { id: "b" }],
        edges: [{ source: "a", target: "b", directed: true }],
      });
      expect(result).toEqual({ ok: true, value: { nodes: 2, edges: 1, directedEdges: 1 } });
    });

    it("keeps the previous graph when a load fails", () => {
      service.loadGraphFile(CITY);
      const result = service.loadGraph({ nodes: [{ id: "a" }], edges: [{ source: "a", target: "b" }] });
      expect(result).toEqual({ ok: false, error: "Unknown target node for edge: b" });
      expect(service.stats()).toEqual({ ok: true, value: { nodes: 5, edges: 4, directedEdges: 0 } });
    });
  });

  describe("shortestPath", () => {
    beforeEach(() => {
      service.loadGraphFile(CITY);
    });

    it("follows edge weights by default", () => {
      const result = service.shortestPath({ source: "home", target: "office" });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toMatchObject({
          source: "home",
          target: "office",
          found: true,
          nodes: ["home", "mall", "office"],
          edges: ["home-mall", "mall-office"],
          cost: 2,
          costs: "weighted",
        });
        expect(result.value.stats).toMatchObject({ expansions: 2, reopened: 0 });
      }
    });

    it("follows geometry with the distance model", () => {
      const result = service.shortestPath({ source: "home", target: "office", costs: "distance" });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.nodes).toEqual(["home", "park", "office"]);
        expect(result.value.cost).toBe(10);
        expect(result.value.costs).toBe("distance");
      }
    });

    it("reads a custom weight attribute", () => {
      const result = service.shortestPath({ source: "home", target: "office", weightAttribute: "minutes" });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.nodes).toEqual(["home", "park", "office"]);
        expect(result.value.cost).toBe(2);
      }
    });

    it("uses the configured defaults", () => {
      const configured = new PathService({ costs: "distance" }, createLogger("paths", () => {}));
      configured.loadGraphFile(CITY);
      const result = configured.shortestPath({ source: "home", target: "office" });
      expect(result.ok && result.value.costs).toBe("distance");
    });

    it("treats no path as a successful answer", () => {
      const result = service.shortestPath({ source: "home", target: "lake" });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toMatchObject({ found: false, nodes: [], edges: [], cost: null });
      }
    });

    it("turns unknown nodes into errors", () => {
      expect(service.shortestPath({ source: "home", target: "moon" })).toEqual({
        ok: false,
        error: "target node 'moon' does not exist in the graph",
      });
    });

    it("refuses graphs with negative weights", () => {
      service.loadGraph({
        nodes: [{ id: "a" }, { id: "b" }, { id: "c" }],
        edges: [{ source: "a", target: "b", attributes: { weight: -1 } }],
      });
      expect(service.shortestPath({ source: "a", target: "c" })).toEqual({
        ok: false,
        error: `edge 'a-b' has negative weight -1 in "weight"`,
      });
    });

    it("checks only the attribute in use for negative weights", () => {
      service.loadGraph({
        nodes: [{ id: "a" }, { id: "b" }],
        edges: [{ source: "a", target: "b", attributes: { weight: -1, minutes: 4 } }],
      });
      const result = service.shortestPath({ source: "a", target: "b", weightAttribute: "minutes" });
      expect(result.ok && result.value.cost).toBe(4);
    });

    it("turns missing positions into errors", () => {
      service.loadGraph({ nodes: [{ id: "a" }, { id: "b" }], edges: [{ source: "a", target: "b" }] });
      const result = service.shortestPath({ source: "a", target: "b", costs: "distance" });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe(`node 'a' has no position (expected "xyz", "xy" or "x"/"y" attributes)`);
      }
    });
  });

  it("logs graph loads", () => {
    service.loadGraphFile(CITY);
    expect(logged).toEqual(["[paths] Graph loaded: 5 nodes, 4 edges"]);
  });
});
