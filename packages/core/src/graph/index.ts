export type {
  NodeKeyFn,
  Edge,
  ReadonlyDigraph,
  Digraph,
  GraphOptions,
} from './types';

export { CycleError, InvariantViolationError } from './types';

export { Graph } from './digraph';

export { PartialOrder } from './partial-order';
