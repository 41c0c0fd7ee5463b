import type { AttributeValue, Attributes } from "./model.js";

/**
 * Shared attribute storage for nodes and edges.
 */
abstract class Element {
  private readonly attributes = new Map<string, AttributeValue>();

  constructor(
    readonly id: string,
    attributes: Attributes = {}
  ) {
    for (const [name, value] of Object.entries(attributes)) {
      this.attributes.set(name, value);
    }
  }

  /**
   * Numeric attribute, or undefined when absent or not a number.
   */
  getNumber(name: string): number | undefined {
    const value = this.attributes.get(name);
    return typeof value === "number" && !Number.isNaN(value) ? value : undefined;
  }

  /**
   * Multi-component attribute such as "xy" or "xyz".
   */
  getVector(name: string): readonly number[] | undefined {
    const value = this.attributes.get(name);
    return typeof value === "object" ? value : undefined;
  }
}

export class Node extends Element {}

export class Edge extends Element {
  constructor(
    id: string,
    readonly source: Node,
    readonly target: Node,
    readonly directed: boolean,
    attributes: Attributes = {}
  ) {
    super(id, attributes);
  }

  /**
   * The endpoint on the other side of `node`, or null if `node` is not an endpoint.
   */
  opposite(node: { readonly id: string }): Node | null {
    if (node.id === this.source.id) return this.target;
    if (node.id === this.target.id) return this.source;
    return null;
  }
}
