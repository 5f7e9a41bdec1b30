import { AmortizedQueue } from './amortized-queue';
import { createQueue, QueueOptions, QueueStrategy } from './create-queue';
import { formatElement, formatElements } from './format';
import * as list from './list';
import { Cons, List, Nil } from './list';
import { NaiveQueue } from './naive-queue';
import {
  flatMap,
  formatOption,
  getOrElse,
  isNone,
  isSome,
  map,
  none,
  None,
  Option,
  some,
  Some,
  toNullable,
} from './option';
import { Dequeued, Queue } from './queue';
import { ListStack, Popped, Stack } from './stack';

export {
  AmortizedQueue,
  createQueue,
  QueueOptions,
  QueueStrategy,
  Dequeued,
  NaiveQueue,
  Queue,
  ListStack,
  Popped,
  Stack,
  Option,
  Some,
  None,
  some,
  none,
  isSome,
  isNone,
  getOrElse,
  map,
  flatMap,
  toNullable,
  formatOption,
  list,
  List,
  Cons,
  Nil,
  formatElement,
  formatElements,
};
