/* eslint-disable no-console */
import { createQueue, formatOption, isSome, Queue, QueueStrategy } from '../src';

function walkThrough(strategy: QueueStrategy) {
  console.log(`--- ${strategy}`);

  const queue = createQueue<number>([], { strategy });
  console.log(`${queue}`); // front -> ()

  const [deqElem, newQueue] = queue.dequeue();
  console.log(formatOption(deqElem)); // None

  const queue2 = newQueue.enqueue(42).enqueue(43);
  console.log(`${queue2}`);

  const [deqElem2, newQueue2] = queue2.dequeue();
  console.log(formatOption(deqElem2)); // Some(42)
  console.log(`${newQueue2}`);

  // queue2 was not changed by the dequeue above
  console.log(`still ${queue2.size} items: ${queue2}`);
}

function drain<T>(queue: Queue<T>): T[] {
  const items: T[] = [];
  let current = queue;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    const [item, rest] = current.dequeue();
    if (!isSome(item)) break;
    items.push(item.value);
    current = rest;
  }
  return items;
}

function main() {
  walkThrough('naive');
  walkThrough('amortized');

  // Values enqueued after the initial ones land in rear, then come out in order
  const queue = createQueue([1, 2, 3]).enqueue(42).enqueue(43);
  const [, rest] = queue.dequeue();
  console.log(`${rest}`); // front -> (2, 3) (42, 43) <- rear
  console.log(drain(rest).join(', ')); // 2, 3, 42, 43
}

main();
