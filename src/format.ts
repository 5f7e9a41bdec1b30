import { inspect } from 'util';

/**
 * Render a single element for diagnostic output.
 *
 * Strings are shown as-is, everything else goes through `util.inspect`.
 *
 * @category Low-Level
 */
export function formatElement(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return inspect(value);
}

/**
 * Render elements as a comma-separated list, in iteration order.
 *
 * @category Low-Level
 */
export function formatElements(values: Iterable<unknown>): string {
  const parts: string[] = [];
  for (const value of values) {
    parts.push(formatElement(value));
  }
  return parts.join(', ');
}
