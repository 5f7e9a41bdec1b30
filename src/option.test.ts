/// <reference types="jest" />
import {
  flatMap,
  formatOption,
  getOrElse,
  isNone,
  isSome,
  map,
  none,
  Option,
  some,
  toNullable,
} from './option';

function divide(x: number, y: number): Option<number> {
  return y === 0 ? none() : some(Math.trunc(x / y));
}

describe('Option', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('some and none are tagged', () => {
    expect(some(1)).toEqual({ kind: 'some', value: 1 });
    expect(none()).toEqual({ kind: 'none' });
    expect(isSome(some(1))).toBe(true);
    expect(isNone(none())).toBe(true);
    expect(isNone(some(undefined))).toBe(false);
  });

  it('values are frozen', () => {
    expect(Object.isFrozen(some(1))).toBe(true);
    expect(Object.isFrozen(none())).toBe(true);
  });

  it('getOrElse falls back only when absent', () => {
    expect(divide(10, 2)).toEqual(some(5));
    expect(getOrElse(divide(10, 2), 0) + getOrElse(divide(10, 3), 0)).toBe(8);
    expect(getOrElse(divide(10, 2), 0) + getOrElse(divide(10, 0), 0)).toBe(5);
  });

  it('map nests and flatMap does not', () => {
    const nested = map(divide(10, 2), (q1) => map(divide(10, 0), (q2) => q1 + q2));
    expect(nested).toEqual(some(none()));

    const flat = flatMap(divide(10, 2), (q1) => map(divide(10, 3), (q2) => q1 + q2));
    expect(flat).toEqual(some(8));

    expect(flatMap(divide(10, 0), (q1) => divide(q1, 1))).toEqual(none());
  });

  it('toNullable unwraps', () => {
    expect(toNullable(some('a'))).toBe('a');
    expect(toNullable(none())).toBeUndefined();
  });

  it('formatOption renders like the containers do', () => {
    expect(formatOption(some(42))).toBe('Some(42)');
    expect(formatOption(some('x'))).toBe('Some(x)');
    expect(formatOption(some([1, 2]))).toBe('Some([ 1, 2 ])');
    expect(formatOption(none())).toBe('None');
  });
});
