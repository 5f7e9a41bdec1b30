import { formatElement } from './format';

/**
 * A present value.
 *
 * @category Low-Level
 */
export interface Some<T> {
  readonly kind: 'some';
  readonly value: T;
}

/**
 * An absent value.
 *
 * @category Low-Level
 */
export interface None {
  readonly kind: 'none';
}

/**
 * Optional value returned by every operation that may find nothing
 * (`dequeue`, `pop`, `peekFront`, `peekBack`, `peek`).
 *
 * @remarks
 *
 * Callers narrow on `kind` (or use `isSome` / `isNone`) before touching `value`,
 * so an empty container can never be mistaken for a stored `undefined`.
 *
 * ```typescript
 * const [front, rest] = queue.dequeue();
 * if (isSome(front)) {
 *   handle(front.value);
 * }
 * ```
 *
 * @category Low-Level
 */
export type Option<T> = Some<T> | None;

const NONE: None = { kind: 'none' };
Object.freeze(NONE);

export function some<T>(value: T): Option<T> {
  const option: Some<T> = { kind: 'some', value };
  return Object.freeze(option);
}

export function none<T = never>(): Option<T> {
  return NONE;
}

export function isSome<T>(option: Option<T>): option is Some<T> {
  return option.kind === 'some';
}

export function isNone<T>(option: Option<T>): option is None {
  return option.kind === 'none';
}

/**
 * Get the value, or `fallback` when absent.
 */
export function getOrElse<T, U = T>(option: Option<T>, fallback: U): T | U {
  return option.kind === 'some' ? option.value : fallback;
}

export function map<T, U>(option: Option<T>, fn: (value: T) => U): Option<U> {
  return option.kind === 'some' ? some(fn(option.value)) : NONE;
}

/**
 * Chain a computation that may itself produce nothing.
 *
 * Unlike `map`, the result is not nested.
 */
export function flatMap<T, U>(option: Option<T>, fn: (value: T) => Option<U>): Option<U> {
  return option.kind === 'some' ? fn(option.value) : NONE;
}

/**
 * Convert to `T | undefined` for code that does not use `Option`.
 */
export function toNullable<T>(option: Option<T>): T | undefined {
  return option.kind === 'some' ? option.value : undefined;
}

/**
 * @returns `Some(<value>)` or `None`
 */
export function formatOption<T>(option: Option<T>): string {
  return option.kind === 'some' ? `Some(${formatElement(option.value)})` : 'None';
}
