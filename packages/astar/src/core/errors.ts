/**
 * Errors thrown by the search session.
 * "No path" is not among them: it is a normal outcome.
 */

export type SearchErrorKind = "unbound-graph" | "node-not-found" | "missing-position";

export abstract class SearchError extends Error {
  abstract readonly kind: SearchErrorKind;
}

export class UnboundGraphError extends SearchError {
  readonly kind = "unbound-graph";

  constructor() {
    super("No graph bound: call init(graph) before compute()");
    this.name = "UnboundGraphError";
  }
}

export class NodeNotFoundError extends SearchError {
  readonly kind = "node-not-found";

  constructor(
    readonly role: "source" | "target",
    readonly nodeId: string
  ) {
    super(`${role} node '${nodeId}' does not exist in the graph`);
    this.name = "NodeNotFoundError";
  }
}

export class MissingPositionError extends SearchError {
  readonly kind = "missing-position";

  constructor(readonly nodeId: string) {
    super(`node '${nodeId}' has no position (expected "xyz", "xy" or "x"/"y" attributes)`);
    this.name = "MissingPositionError";
  }
}
