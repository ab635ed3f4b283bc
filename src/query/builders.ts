import { InvalidArgumentError } from '../errors.js';
import type { BooleanMethod } from './types.js';

/** `[distance, word, word, ...words]` for one `near` clause. */
export type NearSpec = readonly [number, string, string, ...string[]];

/** `[minimum occurrences, word]` for one `repeat` clause. */
export type RepeatSpec = readonly [number, string];

function assertCount(n: number, what: string): void {
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`${what} must be a positive integer, not ${n}`);
  }
}

function assertMethod(method: string): asserts method is BooleanMethod {
  if (method !== 'AND' && method !== 'OR') {
    throw new InvalidArgumentError(`method must be one of AND or OR, not ${method}`);
  }
}

/**
 * Matches articles where the words occur within `n` words of each other.
 *
 * @example
 * near(5, 'airline', 'climate') // 'near5:"airline climate" '
 */
export function near(n: number, ...words: string[]): string {
  if (words.length < 2) {
    throw new InvalidArgumentError('At least two words must be provided');
  }
  assertCount(n, 'near distance');
  return `near${n}:"${words.join(' ')}" `;
}

/**
 * Combines several `near` clauses. An OR of more than one clause is
 * parenthesized; a lone clause is returned unchanged.
 */
export function multiNear(nears: readonly NearSpec[], method: BooleanMethod = 'OR'): string {
  assertMethod(method);
  if (nears.length === 0) {
    throw new InvalidArgumentError('At least one near clause must be provided');
  }
  const clauses = nears.map(([n, ...words]) => near(n, ...words));
  const joined = clauses.join(`${method} `);
  if (method === 'OR' && clauses.length > 1) {
    return `(${joined}) `;
  }
  return joined;
}

/**
 * Matches articles containing `word` at least `n` times. Only single words
 * can be repeated.
 */
export function repeat(n: number, word: string): string {
  if (word.includes(' ')) {
    throw new InvalidArgumentError(`Only single words can be repeated, got "${word}"`);
  }
  assertCount(n, 'repeat count');
  return `repeat${n}:"${word}" `;
}

/**
 * Combines several `repeat` clauses. OR always wraps the whole expression
 * in parentheses, even for one clause; AND never does.
 */
export function multiRepeat(repeats: readonly RepeatSpec[], method: BooleanMethod): string {
  assertMethod(method);
  if (repeats.length === 0) {
    throw new InvalidArgumentError('At least one repeat clause must be provided');
  }
  const joined = repeats.map(([n, word]) => repeat(n, word)).join(`${method} `);
  return method === 'OR' ? `(${joined})` : joined;
}
