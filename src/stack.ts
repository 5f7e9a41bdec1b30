import { inspect } from 'util';
import { formatElements } from './format';
import * as list from './list';
import { List } from './list';
import { Option, none, some } from './option';

/**
 * Value removed from the top (absent when the stack was empty) and the stack
 * that remains.
 *
 * @category Stacks
 */
export type Popped<T, S extends Stack<T> = Stack<T>> = readonly [Option<T>, S];

/**
 * Persistent LIFO stack contract.
 *
 * @category Stacks
 */
export interface Stack<T> extends Iterable<T> {
  readonly size: number;
  push(element: T): Stack<T>;
  pop(): Popped<T>;
  peek(): Option<T>;
  isEmpty(): boolean;

  /**
   * Elements from top to bottom.
   */
  toArray(): T[];
  equals(other: Stack<T>): boolean;
  toString(): string;
}

/**
 * Stack over a single list whose head is the top.
 *
 * Every operation is O(1) apart from `toArray`, `equals` and `toString`.
 *
 * @category Stacks
 */
export class ListStack<T> implements Stack<T> {
  private readonly _elements: List<T>;
  private readonly _size: number;

  private constructor(elements: List<T>, size: number) {
    this._elements = elements;
    this._size = size;
  }

  public static empty<T>(): ListStack<T> {
    return new ListStack<T>(list.nil(), 0);
  }

  /**
   * Create a stack holding `elements`; the first one iterated is the top.
   *
   * @throws TypeError if `elements` is not iterable
   */
  public static from<T>(elements: Iterable<T>): ListStack<T> {
    const xs = list.fromIterable(elements);
    return new ListStack(xs, list.length(xs));
  }

  public static of<T>(...elements: T[]): ListStack<T> {
    return ListStack.from(elements);
  }

  public get size(): number {
    return this._size;
  }

  public push(element: T): ListStack<T> {
    return new ListStack(list.cons(element, this._elements), this._size + 1);
  }

  public pop(): Popped<T, ListStack<T>> {
    const elements = this._elements;
    if (elements.kind === 'nil') {
      return [none(), this];
    }
    return [some(elements.head), new ListStack(elements.tail, this._size - 1)];
  }

  public peek(): Option<T> {
    return list.head(this._elements);
  }

  public isEmpty(): boolean {
    return list.isNil(this._elements);
  }

  public toArray(): T[] {
    return list.toArray(this._elements);
  }

  public equals(other: Stack<T>): boolean {
    return this._size === other.size && list.sameElements(this, other);
  }

  public [Symbol.iterator](): Iterator<T> {
    return list.values(this._elements);
  }

  public toString(): string {
    return `top -> (${formatElements(this)})`;
  }

  public [inspect.custom](): string {
    return this.toString();
  }
}
