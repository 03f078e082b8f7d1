/**
 * Graph Types
 *
 * Shared contracts for the directed graph and the partial order built on it.
 */

// =============================================================================
// Nodes and Edges
// =============================================================================

/**
 * Maps a node to the value that decides its identity.
 * Keys are compared with SameValueZero, like Map keys.
 */
export type NodeKeyFn<TNode> = (node: TNode) => unknown;

/**
 * A directed edge, tail first.
 */
export type Edge<TNode> = readonly [tail: TNode, head: TNode];

/**
 * Read side shared by Graph and PartialOrder.
 */
export interface ReadonlyDigraph<TNode> {
  /** Current node set */
  readonly nodes: ReadonlySet<TNode>;
  /** Current edge set as [tail, head] pairs, no duplicates */
  readonly edges: ReadonlyArray<Edge<TNode>>;
  readonly nodeCount: number;
  readonly edgeCount: number;
  hasNode(node: TNode): boolean;
  hasEdge(tail: TNode, head: TNode): boolean;
  /** Heads of the edges leaving `node`, in insertion order */
  successors(node: TNode): TNode[];
}

export interface Digraph<TNode> extends ReadonlyDigraph<TNode> {
  addNode(node: TNode): void;
  addEdge(tail: TNode, head: TNode): void;
}

export interface GraphOptions<TNode> {
  /**
   * Identity of a node. Defaults to the node itself, so primitives compare by
   * value and objects by reference.
   */
  key?: NodeKeyFn<TNode>;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Thrown when an edge would close a directed cycle in a partial order.
 */
export class CycleError<TNode = unknown> extends Error {
  constructor(
    public readonly tail: TNode,
    public readonly head: TNode
  ) {
    super(
      `Adding edge ${String(tail)} -> ${String(head)} creates a cycle, which is not allowed in a partial order`
    );
    this.name = 'CycleError';
  }
}

/**
 * Thrown when the cycle search meets a node already on its own path.
 * The stored relation holds a cycle that no accepted insertion could have made.
 */
export class InvariantViolationError<TNode = unknown> extends Error {
  constructor(public readonly node: TNode) {
    super(`Partial order already contains a cycle through ${String(node)}`);
    this.name = 'InvariantViolationError';
  }
}
