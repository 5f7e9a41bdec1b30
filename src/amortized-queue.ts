import { inspect } from 'util';
import { formatElements } from './format';
import * as list from './list';
import { List } from './list';
import { Option, none, some } from './option';
import { Dequeued, Queue } from './queue';

/**
 * Queue over two lists ("two-stacks queue") with O(1) enqueue and amortized
 * O(1) dequeue.
 *
 * @remarks
 *
 * - `front` holds the oldest elements in dequeue order.
 * - `rear` holds the newest elements, most recent first.
 *
 * The queue contents are always `front ++ reverse(rear)`, and `size` is always
 * `length(front) + length(rear)`.
 *
 * `enqueue` only ever prepends to `rear`. When `dequeue` finds `front` empty it
 * reverses `rear` into a new `front` in one pass. Each element is moved across at
 * most once between being enqueued and dequeued, which is where the amortized
 * bound comes from.
 *
 * Peeking never stores a reversal: `peekFront` on an empty `front` walks `rear`
 * to its last cell and leaves both lists as they were.
 *
 * @category Queues
 */
export class AmortizedQueue<T> implements Queue<T> {
  private readonly _front: List<T>;
  private readonly _rear: List<T>;
  private readonly _size: number;

  private constructor(front: List<T>, rear: List<T>, size: number) {
    this._front = front;
    this._rear = rear;
    this._size = size;
  }

  /**
   * Create an empty queue
   */
  public static empty<T>(): AmortizedQueue<T> {
    return new AmortizedQueue<T>(list.nil(), list.nil(), 0);
  }

  /**
   * Create a queue holding `elements`, all placed in `front`; the first one
   * iterated is the front.
   *
   * @throws TypeError if `elements` is not iterable
   */
  public static from<T>(elements: Iterable<T>): AmortizedQueue<T> {
    const front = list.fromIterable(elements);
    return new AmortizedQueue(front, list.nil(), list.length(front));
  }

  public static of<T>(...elements: T[]): AmortizedQueue<T> {
    return AmortizedQueue.from(elements);
  }

  public get size(): number {
    return this._size;
  }

  public enqueue(element: T): AmortizedQueue<T> {
    return new AmortizedQueue(this._front, list.cons(element, this._rear), this._size + 1);
  }

  public dequeue(): Dequeued<T, AmortizedQueue<T>> {
    const front = this._front;
    if (front.kind === 'cons') {
      return [some(front.head), new AmortizedQueue(front.tail, this._rear, this._size - 1)];
    }

    // front is empty: move rear across, oldest first
    const reversed = list.reverse(this._rear);
    if (reversed.kind === 'nil') {
      return [none(), this];
    }

    return [some(reversed.head), new AmortizedQueue(reversed.tail, list.nil(), this._size - 1)];
  }

  public peekFront(): Option<T> {
    if (this._front.kind === 'cons') {
      return some(this._front.head);
    }
    return list.last(this._rear);
  }

  public peekBack(): Option<T> {
    if (this._rear.kind === 'cons') {
      return some(this._rear.head);
    }
    return list.last(this._front);
  }

  public isEmpty(): boolean {
    return list.isNil(this._front) && list.isNil(this._rear);
  }

  public toArray(): T[] {
    return Array.from(this);
  }

  public equals(other: Queue<T>): boolean {
    return this._size === other.size && list.sameElements(this, other);
  }

  public *[Symbol.iterator](): Iterator<T> {
    yield* list.values(this._front);
    yield* list.values(list.reverse(this._rear));
  }

  /**
   * Shows both lists, the rear one in enqueue order:
   * `front -> (2, 3) (42, 43) <- rear`
   */
  public toString(): string {
    const front = formatElements(list.values(this._front));
    const rear = formatElements(list.values(list.reverse(this._rear)));
    return `front -> (${front}) (${rear}) <- rear`;
  }

  public [inspect.custom](): string {
    return this.toString();
  }
}
