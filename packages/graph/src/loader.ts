/**
 * Build MemoryGraphs from JSON graph documents.
 */

import { readFileSync } from "node:fs";
import * as z from "zod/v4";
import { type Result, Ok, Err, andThen, tryCatch, errorMessage } from "@waypoint/core";
import { MemoryGraph } from "./MemoryGraph.js";
import { GraphDocumentSchema, type GraphDocument } from "./schema.js";

/**
 * Validate an untyped value against the graph document schema.
 */
export function parseGraphDocument(input: unknown): Result<z.output<typeof GraphDocumentSchema>, string> {
  const parsed = GraphDocumentSchema.safeParse(input);
  if (!parsed.success) {
    return Err(`Invalid graph document: ${z.prettifyError(parsed.error)}`);
  }
  return Ok(parsed.data);
}

/**
 * Build a graph from a document. Unknown endpoints and duplicate IDs are errors.
 */
export function buildGraph(document: GraphDocument): Result<MemoryGraph, string> {
  return andThen(parseGraphDocument(document), fromDocument);
}

/**
 * Read a JSON graph document from disk and build it.
 */
export function loadGraphFile(path: string): Result<MemoryGraph, string> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    return Err(`Could not read graph file ${path}: ${errorMessage(error)}`);
  }
  return andThen(parseGraphDocument(raw), fromDocument);
}

function fromDocument(doc: z.output<typeof GraphDocumentSchema>): Result<MemoryGraph, string> {
  return tryCatch(() => {
    const graph = new MemoryGraph(doc.directed ?? false);
    for (const node of doc.nodes) {
      graph.addNode(node.id, node.attributes);
    }
    for (const edge of doc.edges) {
      graph.addEdge(edge.source, edge.target, {
        id: edge.id,
        directed: edge.directed,
        attributes: edge.attributes,
      });
    }
    return graph;
  });
}
