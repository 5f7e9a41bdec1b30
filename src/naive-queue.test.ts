/// <reference types="jest" />
import { inspect } from 'util';
import { NaiveQueue } from './naive-queue';
import { formatOption, none, some } from './option';

describe('NaiveQueue', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('factories', () => {
    it('empty has no elements', () => {
      const q = NaiveQueue.empty<number>();
      expect(q.size).toBe(0);
      expect(q.isEmpty()).toBe(true);
      expect(q.toArray()).toEqual([]);
    });

    it('from keeps iteration order with the first element at the front', () => {
      const q = NaiveQueue.from(new Set(['a', 'b', 'c']));
      expect(q.size).toBe(3);
      expect(q.peekFront()).toEqual(some('a'));
      expect(q.peekBack()).toEqual(some('c'));
    });

    it('of takes elements as arguments', () => {
      expect(NaiveQueue.of(1, 2, 3).toArray()).toEqual([1, 2, 3]);
    });

    it('from throws TypeError on a non-iterable', () => {
      expect(() => NaiveQueue.from(42 as unknown as Iterable<number>)).toThrow(
        'Expected an iterable, got `42` (number)',
      );
    });
  });

  describe('toString', () => {
    it('renders an empty queue', () => {
      expect(NaiveQueue.empty().toString()).toBe('front -> ()');
    });

    it('enqueue then dequeue renders front to back', () => {
      const queue = NaiveQueue.empty<number>();
      const [deqElem, newQueue] = queue.dequeue();
      expect(formatOption(deqElem)).toBe('None');
      expect(newQueue.toString()).toBe('front -> ()');

      const queue2 = newQueue.enqueue(42).enqueue(43);
      expect(queue2.toString()).toBe('front -> (42, 43)');

      const [deqElem2, newQueue2] = queue2.dequeue();
      expect(deqElem2).toEqual(some(42));
      expect(formatOption(deqElem2)).toBe('Some(42)');
      expect(newQueue2.toString()).toBe('front -> (43)');
    });

    it('renders strings without quotes and objects with inspect', () => {
      expect(NaiveQueue.of('a', 'b').toString()).toBe('front -> (a, b)');
      expect(NaiveQueue.of({ id: 1 }).toString()).toBe('front -> ({ id: 1 })');
    });

    it('util.inspect matches toString', () => {
      expect(inspect(NaiveQueue.of(1, 2))).toBe('front -> (1, 2)');
    });
  });

  it('dequeue returns a NaiveQueue', () => {
    const [item, rest] = NaiveQueue.of(5, 6).dequeue();
    expect(item).toEqual(some(5));
    expect(rest).toBeInstanceOf(NaiveQueue);
    expect(rest.dequeue()[1].dequeue()[0]).toEqual(none());
  });
});
