/**
 * @waypoint/astar
 * A* shortest paths over any graph that implements SearchGraph.
 */

// Graph port
export type { AttributeSource, GraphNode, GraphEdge, SearchGraph } from "./core/ports/SearchGraph.js";

// Search
export type { SearchRecord, SearchState, SearchStats } from "./core/model.js";
export { AStar, type Algorithm } from "./core/AStar.js";
export { search, type SearchOutcome } from "./core/search.js";
export { RecordStore } from "./core/RecordStore.js";
export { OpenQueue } from "./core/OpenQueue.js";
export { Path, buildPath } from "./core/Path.js";

// Cost models
export {
  type Costs,
  type CostModelName,
  WeightedCosts,
  DistanceCosts,
  createCosts,
  COST_MODELS,
  DEFAULT_WEIGHT_ATTRIBUTE,
} from "./core/costs.js";
export { type Position, findPosition, nodePosition, distance, edgeLength } from "./core/geometry.js";

// Errors
export {
  type SearchErrorKind,
  SearchError,
  UnboundGraphError,
  NodeNotFoundError,
  MissingPositionError,
} from "./core/errors.js";

// Service and tools
export { PathService, type PathServiceOptions, type ShortestPathRequest, type PathSummary } from "./PathService.js";
export { loadConfig, type WaypointConfig } from "./config.js";
export { registerAllTools, type Services } from "./tools/index.js";
