import { Option } from './option';

/**
 * Value removed from the front (absent when the queue was empty) and the queue
 * that remains.
 *
 * @category Queues
 */
export type Dequeued<T, Q extends Queue<T> = Queue<T>> = readonly [Option<T>, Q];

/**
 * Persistent FIFO queue contract.
 *
 * @remarks
 *
 * Every operation leaves the receiver untouched and returns a new queue where
 * the contents change, so any queue value can be kept and reused after
 * "modifying" it:
 *
 * ```typescript
 * const a = createQueue([1, 2]);
 * const b = a.enqueue(3);
 * const [first, c] = b.dequeue();
 * // a is still (1, 2), b is (1, 2, 3), c is (2, 3), first is Some(1)
 * ```
 *
 * Reading from an empty queue is not an error: `dequeue`, `peekFront` and
 * `peekBack` return `None`.
 *
 * @category Queues
 */
export interface Queue<T> extends Iterable<T> {
  /**
   * Number of elements held.
   */
  readonly size: number;

  /**
   * Add an element at the back.
   */
  enqueue(element: T): Queue<T>;

  /**
   * Remove the front element.
   *
   * @returns `[None, this]` when empty, otherwise `[Some(front), rest]`
   */
  dequeue(): Dequeued<T>;

  /**
   * Front element (next to be dequeued), without removing it.
   */
  peekFront(): Option<T>;

  /**
   * Back element (most recently enqueued), without removing it.
   */
  peekBack(): Option<T>;

  isEmpty(): boolean;

  /**
   * Elements from front to back.
   */
  toArray(): T[];

  /**
   * Same elements in the same order, whatever the strategy behind either queue.
   */
  equals(other: Queue<T>): boolean;

  toString(): string;
}
