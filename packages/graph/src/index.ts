/**
 * @waypoint/graph
 * In-memory attributed graph for path searches.
 */

export type { AttributeValue, Attributes, GraphStats, EdgeOptions } from "./model.js";
export { GraphError } from "./model.js";

export { Node, Edge } from "./elements.js";
export { MemoryGraph, type NodeRef, type EdgeWalk } from "./MemoryGraph.js";

export {
  GraphDocumentSchema,
  NodeDocumentSchema,
  EdgeDocumentSchema,
  type GraphDocument,
  type NodeDocument,
  type EdgeDocument,
} from "./schema.js";
export { parseGraphDocument, buildGraph, loadGraphFile } from "./loader.js";
