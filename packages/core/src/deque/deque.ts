/**
 * Double-ended queue on a doubly linked list.
 *
 * Every insertion and removal at either end is O(1). Iteration runs front to
 * rear.
 */

import { EmptyDequeError } from './types';

interface DequeNode<T> {
  value: T;
  next: DequeNode<T> | null;
  prev: DequeNode<T> | null;
}

export class Deque<T> implements Iterable<T> {
  private front: DequeNode<T> | null = null;
  private rear: DequeNode<T> | null = null;
  private size = 0;

  /** The first item of `items` ends up at the front. */
  constructor(items: Iterable<T> = []) {
    for (const item of items) {
      this.enqueueRear(item);
    }
  }

  get length(): number {
    return this.size;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  enqueueFront(item: T): void {
    const node: DequeNode<T> = { value: item, next: this.front, prev: null };
    if (this.front) {
      this.front.prev = node;
    } else {
      this.rear = node;
    }
    this.front = node;
    this.size++;
  }

  enqueueRear(item: T): void {
    const node: DequeNode<T> = { value: item, next: null, prev: this.rear };
    if (this.rear) {
      this.rear.next = node;
    } else {
      this.front = node;
    }
    this.rear = node;
    this.size++;
  }

  /** @throws {EmptyDequeError} when the deque is empty */
  dequeueFront(): T {
    const node = this.front;
    if (!node) throw new EmptyDequeError('dequeueFront');

    this.front = node.next;
    if (this.front) {
      this.front.prev = null;
    } else {
      this.rear = null;
    }
    node.next = null;
    this.size--;
    return node.value;
  }

  /** @throws {EmptyDequeError} when the deque is empty */
  dequeueRear(): T {
    const node = this.rear;
    if (!node) throw new EmptyDequeError('dequeueRear');

    this.rear = node.prev;
    if (this.rear) {
      this.rear.next = null;
    } else {
      this.front = null;
    }
    node.prev = null;
    this.size--;
    return node.value;
  }

  /** @throws {EmptyDequeError} when the deque is empty */
  peekFront(): T {
    if (!this.front) throw new EmptyDequeError('peekFront');
    return this.front.value;
  }

  /** @throws {EmptyDequeError} when the deque is empty */
  peekRear(): T {
    if (!this.rear) throw new EmptyDequeError('peekRear');
    return this.rear.value;
  }

  *[Symbol.iterator](): Iterator<T> {
    let current = this.front;
    while (current) {
      yield current.value;
      current = current.next;
    }
  }

  toArray(): T[] {
    return Array.from(this);
  }

  toString(): string {
    return `Deque(size=${this.size})`;
  }
}
