/**
 * Directed graph over arbitrary node values.
 *
 * Accepts any edge, self-loops included. Nothing is ever removed, so the
 * node and edge sets only grow.
 */

import type { Digraph, Edge, GraphOptions, NodeKeyFn } from './types';

export class Graph<TNode> implements Digraph<TNode> {
  private readonly keyOf: NodeKeyFn<TNode>;
  // boxed so a stored `undefined` node still reads as present
  private readonly nodeMap: Map<unknown, { node: TNode }> = new Map();
  // tail key -> head key -> edge
  private readonly adjacency: Map<unknown, Map<unknown, Edge<TNode>>> = new Map();
  private edgeTotal = 0;

  constructor(options: GraphOptions<TNode> = {}) {
    this.keyOf = options.key ?? ((node: TNode) => node);
  }

  /** Snapshot of the node set, in insertion order. */
  get nodes(): ReadonlySet<TNode> {
    return new Set(Array.from(this.nodeMap.values(), (entry) => entry.node));
  }

  /** Snapshot of the edge set, grouped by tail in insertion order. */
  get edges(): ReadonlyArray<Edge<TNode>> {
    const edges: Edge<TNode>[] = [];
    for (const outgoing of this.adjacency.values()) {
      edges.push(...outgoing.values());
    }
    return edges;
  }

  get nodeCount(): number {
    return this.nodeMap.size;
  }

  get edgeCount(): number {
    return this.edgeTotal;
  }

  /** The identity value this graph uses for `node`. */
  keyFor(node: TNode): unknown {
    return this.keyOf(node);
  }

  hasNode(node: TNode): boolean {
    return this.nodeMap.has(this.keyOf(node));
  }

  hasEdge(tail: TNode, head: TNode): boolean {
    return this.adjacency.get(this.keyOf(tail))?.has(this.keyOf(head)) ?? false;
  }

  successors(node: TNode): TNode[] {
    const outgoing = this.adjacency.get(this.keyOf(node));
    if (!outgoing) return [];
    return Array.from(outgoing.values(), ([, head]) => head);
  }

  addNode(node: TNode): void {
    this.intern(node);
  }

  addEdge(tail: TNode, head: TNode): void {
    const storedTail = this.intern(tail);
    const storedHead = this.intern(head);
    const tailKey = this.keyOf(storedTail);
    const headKey = this.keyOf(storedHead);

    let outgoing = this.adjacency.get(tailKey);
    if (!outgoing) {
      outgoing = new Map();
      this.adjacency.set(tailKey, outgoing);
    }
    if (outgoing.has(headKey)) return;

    outgoing.set(headKey, [storedTail, storedHead]);
    this.edgeTotal++;
  }

  /**
   * Insert `node` if absent and return the stored value for its key.
   * The first value inserted under a key is the one the graph keeps.
   */
  private intern(node: TNode): TNode {
    const key = this.keyOf(node);
    const existing = this.nodeMap.get(key);
    if (existing) return existing.node;
    this.nodeMap.set(key, { node });
    return node;
  }
}
