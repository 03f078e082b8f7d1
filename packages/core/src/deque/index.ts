export type { DequeOperation } from './types';
export { EmptyDequeError } from './types';
export { Deque } from './deque';
