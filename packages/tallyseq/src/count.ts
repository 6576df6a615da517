/**
 * Predicate-counting combinators
 *
 * Each combinator consumes a sequence and answers a counting question
 * about it. They pull only as many items as the verdict needs: a
 * short-circuit leaves the loop, which closes the source iterator.
 */

import type { Predicate } from "./types.js";

function assertThreshold(op: string, n: number): void {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new RangeError(`${op}() threshold must be a non-negative integer, got ${n}`);
  }
}

/**
 * True if at least `n` items satisfy `predicate`.
 *
 * Stops at the `n`-th match. With `n = 0` nothing is pulled.
 *
 * @example
 * ```typescript
 * atLeast([2, 3, 2, 4, 2, 5], 3, (x) => x === 2); // true, stops at index 4
 * ```
 */
export function atLeast<T>(source: Iterable<T>, n: number, predicate: Predicate<T>): boolean {
  assertThreshold("atLeast", n);
  if (n === 0) return true;
  let matches = 0;
  for (const item of source) {
    if (predicate(item) && ++matches === n) return true;
  }
  return false;
}

/**
 * True if no more than `n` items satisfy `predicate`.
 *
 * Stops at the `(n + 1)`-th match; otherwise reads to the end.
 * `n = Infinity` is an unbounded cap: true, with nothing pulled.
 */
export function atMost<T>(source: Iterable<T>, n: number, predicate: Predicate<T>): boolean {
  if (n === Infinity) return true;
  assertThreshold("atMost", n);
  let matches = 0;
  for (const item of source) {
    if (predicate(item) && ++matches > n) return false;
  }
  return true;
}

/**
 * True if exactly `n` items satisfy `predicate`.
 *
 * Fails as soon as the count passes `n`.
 *
 * @example
 * ```typescript
 * exactlyN("deadb33f", 2, (c) => c >= "0" && c <= "9"); // true
 * ```
 */
export function exactlyN<T>(source: Iterable<T>, n: number, predicate: Predicate<T>): boolean {
  assertThreshold("exactlyN", n);
  let matches = 0;
  for (const item of source) {
    if (predicate(item) && ++matches > n) return false;
  }
  return matches === n;
}

/**
 * True if exactly `m` items satisfy `pm` and exactly `n` items satisfy `pn`.
 *
 * Both predicates see every item, `pm` first. Fails as soon as either
 * count passes its threshold.
 */
export function exactlyMN<T>(
  source: Iterable<T>,
  m: number,
  pm: Predicate<T>,
  n: number,
  pn: Predicate<T>,
): boolean {
  assertThreshold("exactlyMN", m);
  assertThreshold("exactlyMN", n);
  let mMatches = 0;
  let nMatches = 0;
  for (const item of source) {
    const passesM = pm(item);
    const passesN = pn(item);
    if (passesM) mMatches++;
    if (passesN) nMatches++;
    if (mMatches > m || nMatches > n) return false;
  }
  return mMatches === m && nMatches === n;
}

/**
 * True if every item satisfies `predicate`, or none does.
 * Returns on the first mixed result. Vacuously true when empty.
 */
export function allOrNone<T>(source: Iterable<T>, predicate: Predicate<T>): boolean {
  let hasPass = false;
  let hasFail = false;
  for (const item of source) {
    if (predicate(item)) {
      hasPass = true;
    } else {
      hasFail = true;
    }
    if (hasPass && hasFail) return false;
  }
  return true;
}

/**
 * True if the sequence has an even length and exactly half its items
 * satisfy `predicate`. Always reads the whole sequence.
 */
export function perfectlyBalanced<T>(source: Iterable<T>, predicate: Predicate<T>): boolean {
  let total = 0;
  let matches = 0;
  for (const item of source) {
    total++;
    if (predicate(item)) matches++;
  }
  return total % 2 === 0 && total / 2 === matches;
}
