import { AmortizedQueue } from './amortized-queue';
import { isIterable } from './list';
import { NaiveQueue } from './naive-queue';
import { Queue } from './queue';

/**
 * Strategy backing a queue returned by `createQueue`.
 *
 * - `naive`: `NaiveQueue`, one list, O(n) enqueue
 * - `amortized`: `AmortizedQueue`, two lists, O(1) enqueue and amortized O(1) dequeue
 *
 * @category Queues
 */
export type QueueStrategy = 'naive' | 'amortized';

const STRATEGIES: readonly QueueStrategy[] = ['naive', 'amortized'];

/**
 * Options for createQueue
 */
export interface QueueOptions {
  /**
   * Which implementation backs the queue.
   *
   * Both satisfy the same `Queue` contract and behave identically apart from cost.
   *
   * @default 'amortized'
   */
  readonly strategy?: QueueStrategy;
}

function isQueueStrategy(value: unknown): value is QueueStrategy {
  return STRATEGIES.some((strategy) => strategy === value);
}

/**
 * Create a persistent queue holding `elements`, front first.
 *
 * @example
 * ```typescript
 * const queue = createQueue([1, 2, 3], { strategy: 'naive' });
 * const [front, rest] = queue.enqueue(4).dequeue();
 * ```
 *
 * @param elements Initial elements, the first iterated becomes the front
 * @param options Queue options
 * @throws TypeError if `elements` is not iterable or `strategy` is unknown
 *
 * @category Queues
 */
export function createQueue<T>(
  elements: Iterable<T> = [],
  { strategy = 'amortized' }: QueueOptions = {},
): Queue<T> {
  const options: Required<QueueOptions> = { strategy };

  // Validate strategy option
  if (!isQueueStrategy(options.strategy)) {
    throw new TypeError(
      `Expected \`strategy\` to be one of ${STRATEGIES.map((s) => `\`${s}\``).join(
        ', ',
      )}, got \`${String(strategy)}\` (${typeof strategy})`,
    );
  }

  // Validate elements
  if (!isIterable(elements)) {
    throw new TypeError(
      `Expected \`elements\` to be iterable, got \`${String(elements)}\` (${typeof elements})`,
    );
  }

  switch (options.strategy) {
    case 'naive':
      return NaiveQueue.from(elements);
    case 'amortized':
      return AmortizedQueue.from(elements);
  }
}
