/**
 * Deque Types
 */

export type DequeOperation = 'dequeueFront' | 'dequeueRear' | 'peekFront' | 'peekRear';

/**
 * Thrown when an item is taken from, or looked up on, an empty deque.
 */
export class EmptyDequeError extends Error {
  constructor(public readonly operation: DequeOperation) {
    super(`${operation} from empty deque`);
    this.name = 'EmptyDequeError';
  }
}
