import { Option, none, some } from './option';

/**
 * A non-empty list cell.
 *
 * @category Low-Level
 */
export interface Cons<T> {
  readonly kind: 'cons';
  readonly head: T;
  readonly tail: List<T>;
}

/**
 * The empty list.
 *
 * @category Low-Level
 */
export interface Nil {
  readonly kind: 'nil';
}

/**
 * Immutable singly linked list.
 *
 * @remarks
 *
 * Cells are frozen once built, so a tail can be shared between any number of
 * lists (and containers) without one ever observing a change made through another.
 * Prepending and reading the head are O(1); everything reaching the last cell is O(n).
 *
 * All traversals here are loops rather than recursion so long lists do not
 * exhaust the call stack.
 *
 * @category Low-Level
 */
export type List<T> = Cons<T> | Nil;

const NIL: Nil = { kind: 'nil' };
Object.freeze(NIL);

export function nil<T = never>(): List<T> {
  return NIL;
}

export function cons<T>(head: T, tail: List<T>): List<T> {
  const cell: Cons<T> = { kind: 'cons', head, tail };
  return Object.freeze(cell);
}

export function isNil<T>(xs: List<T>): xs is Nil {
  return xs.kind === 'nil';
}

/**
 * Runtime check for values handed to us by untyped callers.
 */
export function isIterable(value: unknown): value is Iterable<unknown> {
  if (typeof value === 'string') {
    return true;
  }
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}

/**
 * Compare two iterables element by element with `Object.is`.
 *
 * @category Low-Level
 */
export function sameElements<T>(a: Iterable<T>, b: Iterable<T>): boolean {
  const left = a[Symbol.iterator]();
  const right = b[Symbol.iterator]();

  // eslint-disable-next-line no-constant-condition
  while (true) {
    const l = left.next();
    const r = right.next();
    if (l.done === true || r.done === true) {
      return l.done === r.done;
    }
    if (!Object.is(l.value, r.value)) {
      return false;
    }
  }
}

/**
 * Build a list holding the iterated values in iteration order.
 *
 * @throws TypeError if `iterable` is not iterable
 */
export function fromIterable<T>(iterable: Iterable<T>): List<T> {
  if (!isIterable(iterable)) {
    throw new TypeError(
      `Expected an iterable, got \`${String(iterable)}\` (${typeof iterable})`,
    );
  }

  const items = Array.from(iterable);
  let xs: List<T> = NIL;
  for (let i = items.length - 1; i >= 0; i--) {
    xs = cons(items[i], xs);
  }
  return xs;
}

export function head<T>(xs: List<T>): Option<T> {
  return xs.kind === 'cons' ? some(xs.head) : none();
}

/**
 * Everything after the head; the tail of `nil` is `nil`.
 */
export function tail<T>(xs: List<T>): List<T> {
  return xs.kind === 'cons' ? xs.tail : NIL;
}

export function last<T>(xs: List<T>): Option<T> {
  if (xs.kind === 'nil') {
    return none();
  }

  let cell: Cons<T> = xs;
  while (cell.tail.kind === 'cons') {
    cell = cell.tail;
  }
  return some(cell.head);
}

export function length<T>(xs: List<T>): number {
  let count = 0;
  let cursor = xs;
  while (cursor.kind === 'cons') {
    count++;
    cursor = cursor.tail;
  }
  return count;
}

export function reverse<T>(xs: List<T>): List<T> {
  let reversed: List<T> = NIL;
  let cursor = xs;
  while (cursor.kind === 'cons') {
    reversed = cons(cursor.head, reversed);
    cursor = cursor.tail;
  }
  return reversed;
}

/**
 * Add `element` after the last cell. Copies every cell of `xs`.
 */
export function append<T>(xs: List<T>, element: T): List<T> {
  return concat(xs, cons(element, NIL));
}

/**
 * `xs` followed by `ys`. Copies the cells of `xs` and shares `ys`.
 */
export function concat<T>(xs: List<T>, ys: List<T>): List<T> {
  let result = ys;
  let cursor = reverse(xs);
  while (cursor.kind === 'cons') {
    result = cons(cursor.head, result);
    cursor = cursor.tail;
  }
  return result;
}

export function* values<T>(xs: List<T>): Generator<T, void, undefined> {
  let cursor = xs;
  while (cursor.kind === 'cons') {
    yield cursor.head;
    cursor = cursor.tail;
  }
}

export function toArray<T>(xs: List<T>): T[] {
  return Array.from(values(xs));
}
