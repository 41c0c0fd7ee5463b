/**
 * Per-run store of search records.
 *
 * Every record lives in an append-only arena and is referred to by index.
 * The open and closed sets map node IDs to the arena index of the node's
 * current record. Replacing a record only moves the map entry; the old record
 * stays in the arena, so parent indices can never dangle. A parent is always
 * created before its children, so parent chains are acyclic.
 */

import { createRecord, type SearchRecord } from "./model.js";
import type { GraphEdge, GraphNode } from "./ports/SearchGraph.js";

export class RecordStore {
  private records: SearchRecord[] = [];
  private openSet = new Map<string, number>();
  private closedSet = new Map<string, number>();

  /** Records created so far in this run */
  get size(): number {
    return this.records.length;
  }

  get openSize(): number {
    return this.openSet.size;
  }

  get closedSize(): number {
    return this.closedSet.size;
  }

  get(index: number): SearchRecord {
    const record = this.records[index];
    if (record === undefined) {
      throw new RangeError(`No search record at index ${index}`);
    }
    return record;
  }

  /**
   * Create a record and make it the node's open record.
   * Any closed record for the node is dropped (re-opening).
   */
  open(
    node: GraphNode,
    viaEdge: GraphEdge | null,
    parent: number | null,
    g: number,
    h: number
  ): SearchRecord {
    if (parent !== null) this.get(parent);

    const record = createRecord(this.records.length, node, viaEdge, parent, g, h);
    this.records.push(record);
    this.closedSet.delete(node.id);
    this.openSet.set(node.id, record.index);
    return record;
  }

  /**
   * Move a node's open record to the closed set.
   */
  close(record: SearchRecord): void {
    if (this.openSet.get(record.node.id) !== record.index) {
      throw new Error(`Record ${record.index} is not the open record of node '${record.node.id}'`);
    }
    this.openSet.delete(record.node.id);
    this.closedSet.set(record.node.id, record.index);
  }

  openRecord(nodeId: string): SearchRecord | undefined {
    const index = this.openSet.get(nodeId);
    return index === undefined ? undefined : this.get(index);
  }

  closedRecord(nodeId: string): SearchRecord | undefined {
    const index = this.closedSet.get(nodeId);
    return index === undefined ? undefined : this.get(index);
  }

  /**
   * Whether the record at `index` is still its node's open record.
   */
  isOpen(index: number): boolean {
    return this.openSet.get(this.get(index).node.id) === index;
  }

  /**
   * Records from the source to `index`, source first.
   */
  chain(index: number): SearchRecord[] {
    const chain: SearchRecord[] = [];
    let current: number | null = index;
    while (current !== null) {
      const record = this.get(current);
      chain.push(record);
      current = record.parent;
    }
    return chain.reverse();
  }

  openRecords(): SearchRecord[] {
    return Array.from(this.openSet.values(), (index) => this.get(index));
  }

  closedRecords(): SearchRecord[] {
    return Array.from(this.closedSet.values(), (index) => this.get(index));
  }

  clear(): void {
    this.records = [];
    this.openSet.clear();
    this.closedSet.clear();
  }
}
