import { inspect } from 'util';
import { formatElements } from './format';
import * as list from './list';
import { List } from './list';
import { Option, none, some } from './option';
import { Dequeued, Queue } from './queue';

/**
 * Queue over a single list, front to back.
 *
 * @remarks
 *
 * `enqueue` copies the whole list to append at the end, so it is O(n).
 * This is the straightforward reference strategy that `AmortizedQueue` is
 * checked against; use `AmortizedQueue` where throughput matters.
 *
 * @category Queues
 */
export class NaiveQueue<T> implements Queue<T> {
  private readonly _elements: List<T>;
  private readonly _size: number;

  private constructor(elements: List<T>, size: number) {
    this._elements = elements;
    this._size = size;
  }

  /**
   * Create an empty queue
   */
  public static empty<T>(): NaiveQueue<T> {
    return new NaiveQueue<T>(list.nil(), 0);
  }

  /**
   * Create a queue holding `elements`; the first one iterated is the front.
   *
   * @throws TypeError if `elements` is not iterable
   */
  public static from<T>(elements: Iterable<T>): NaiveQueue<T> {
    const xs = list.fromIterable(elements);
    return new NaiveQueue(xs, list.length(xs));
  }

  public static of<T>(...elements: T[]): NaiveQueue<T> {
    return NaiveQueue.from(elements);
  }

  public get size(): number {
    return this._size;
  }

  public enqueue(element: T): NaiveQueue<T> {
    return new NaiveQueue(list.append(this._elements, element), this._size + 1);
  }

  public dequeue(): Dequeued<T, NaiveQueue<T>> {
    const elements = this._elements;
    if (elements.kind === 'nil') {
      return [none(), this];
    }

    return [some(elements.head), new NaiveQueue(elements.tail, this._size - 1)];
  }

  public peekFront(): Option<T> {
    return list.head(this._elements);
  }

  public peekBack(): Option<T> {
    return list.last(this._elements);
  }

  public isEmpty(): boolean {
    return list.isNil(this._elements);
  }

  public toArray(): T[] {
    return list.toArray(this._elements);
  }

  public equals(other: Queue<T>): boolean {
    return this._size === other.size && list.sameElements(this, other);
  }

  public [Symbol.iterator](): Iterator<T> {
    return list.values(this._elements);
  }

  public toString(): string {
    return `front -> (${formatElements(this)})`;
  }

  public [inspect.custom](): string {
    return this.toString();
  }
}
