/**
 * Partial Order
 *
 * A directed graph whose edge relation stays acyclic. Every insertion first
 * searches from the new edge's head for its tail; if the tail is reachable
 * (or is the head itself) the edge is refused and nothing changes.
 *
 * The partial order owns a {@link Graph} and delegates storage and reads to it.
 *
 * @example
 * ```typescript
 * const order = new PartialOrder<string>();
 * order.addEdge('setup', 'upkeep');
 * order.addEdge('upkeep', 'movement');
 * order.addEdge('movement', 'setup'); // throws CycleError
 * ```
 */

import { debugLog } from '../debug';
import { Graph } from './digraph';
import {
  CycleError,
  InvariantViolationError,
  type Digraph,
  type Edge,
  type GraphOptions,
} from './types';

interface SearchFrame<TNode> {
  key: unknown;
  successors: TNode[];
  index: number;
}

function sameKey(a: unknown, b: unknown): boolean {
  // SameValueZero, matching Map and Set
  return a === b || (a !== a && b !== b);
}

export class PartialOrder<TNode> implements Digraph<TNode> {
  private readonly graph: Graph<TNode>;

  constructor(options: GraphOptions<TNode> = {}) {
    this.graph = new Graph<TNode>(options);
  }

  get nodes(): ReadonlySet<TNode> {
    return this.graph.nodes;
  }

  get edges(): ReadonlyArray<Edge<TNode>> {
    return this.graph.edges;
  }

  get nodeCount(): number {
    return this.graph.nodeCount;
  }

  get edgeCount(): number {
    return this.graph.edgeCount;
  }

  hasNode(node: TNode): boolean {
    return this.graph.hasNode(node);
  }

  hasEdge(tail: TNode, head: TNode): boolean {
    return this.graph.hasEdge(tail, head);
  }

  successors(node: TNode): TNode[] {
    return this.graph.successors(node);
  }

  addNode(node: TNode): void {
    this.graph.addNode(node);
  }

  /**
   * @throws {CycleError} if `tail` is reachable from `head`, including `tail === head`
   * @throws {InvariantViolationError} if the stored relation already holds a cycle
   */
  addEdge(tail: TNode, head: TNode): void {
    if (this.reaches(head, tail)) {
      debugLog('PartialOrder', 'rejected edge', tail, '->', head);
      throw new CycleError(tail, head);
    }
    this.graph.addEdge(tail, head);
  }

  /**
   * Whether `a` comes strictly before `b`: `b` is reachable from `a` through
   * one or more edges.
   */
  precedes(a: TNode, b: TNode): boolean {
    if (sameKey(this.graph.keyFor(a), this.graph.keyFor(b))) return false;
    return this.reaches(a, b);
  }

  /**
   * All nodes in an order where every edge points forward. Ties keep node
   * insertion order.
   */
  linearize(): TNode[] {
    const inDegree = new Map<unknown, number>();
    for (const node of this.graph.nodes) {
      inDegree.set(this.graph.keyFor(node), 0);
    }
    for (const [, head] of this.graph.edges) {
      const key = this.graph.keyFor(head);
      inDegree.set(key, (inDegree.get(key) ?? 0) + 1);
    }

    const ready: TNode[] = [];
    for (const node of this.graph.nodes) {
      if (inDegree.get(this.graph.keyFor(node)) === 0) ready.push(node);
    }

    const sorted: TNode[] = [];
    for (let i = 0; i < ready.length; i++) {
      const node = ready[i];
      sorted.push(node);
      for (const next of this.graph.successors(node)) {
        const key = this.graph.keyFor(next);
        const remaining = (inDegree.get(key) ?? 0) - 1;
        inDegree.set(key, remaining);
        if (remaining === 0) ready.push(next);
      }
    }

    if (sorted.length < this.graph.nodeCount) {
      const stuck = Array.from(this.graph.nodes).find(
        (node) => (inDegree.get(this.graph.keyFor(node)) ?? 0) > 0
      );
      throw new InvariantViolationError(stuck);
    }
    return sorted;
  }

  /**
   * Depth-first search from `start` for `target`, through zero or more edges.
   * Meeting a node that is still on the current path means a cycle is stored.
   */
  private reaches(start: TNode, target: TNode): boolean {
    const targetKey = this.graph.keyFor(target);
    const startKey = this.graph.keyFor(start);
    if (sameKey(startKey, targetKey)) return true;

    const onPath = new Set<unknown>([startKey]);
    const finished = new Set<unknown>();
    const stack: SearchFrame<TNode>[] = [
      { key: startKey, successors: this.graph.successors(start), index: 0 },
    ];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.index >= frame.successors.length) {
        stack.pop();
        onPath.delete(frame.key);
        finished.add(frame.key);
        continue;
      }

      const next = frame.successors[frame.index++];
      const nextKey = this.graph.keyFor(next);
      if (sameKey(nextKey, targetKey)) return true;
      if (onPath.has(nextKey)) throw new InvariantViolationError(next);
      if (finished.has(nextKey)) continue;

      onPath.add(nextKey);
      stack.push({ key: nextKey, successors: this.graph.successors(next), index: 0 });
    }

    return false;
  }
}
