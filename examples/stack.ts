/* eslint-disable no-console */
import { getOrElse, ListStack } from '../src';

function main() {
  const stack = ListStack.empty<number>();
  console.log(`Initial stack: ${stack}`);

  const stack1 = stack.push(1);
  console.log(`After pushing 1: ${stack1}`);

  const stack2 = stack1.push(2);
  console.log(`After pushing 2: ${stack2}`);

  const [top, stack3] = stack2.pop();
  console.log(`Popped element: ${getOrElse(top, 'None')}, New stack: ${stack3}`);
  console.log(`Peeked element: ${getOrElse(stack3.peek(), 'None')}`);
  console.log(`Is the stack empty? ${stack3.isEmpty()}`);

  const [top1, stack4] = stack3.pop();
  console.log(`Popped element: ${getOrElse(top1, 'None')}, New stack: ${stack4}`);

  const [top2, stack5] = stack4.pop();
  console.log(`Popped element: ${getOrElse(top2, 'None')}, New stack: ${stack5}`);
  console.log(`Is the stack empty after popping all elements? ${stack5.isEmpty()}`);

  console.log(`Stack created with elements: ${ListStack.of(1, 2, 3)}`);
}

main();
