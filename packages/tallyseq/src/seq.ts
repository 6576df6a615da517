/**
 * Fluent sequence wrapper
 *
 * Lazy adapters (`map`, `filter`, `take`, `takeWhile`, `alternate`)
 * wrap the source in another single-pass generator; nothing is pulled
 * until a terminal operation runs. Terminals hand the whole chain to
 * the counting combinators, so the source is traversed at most once.
 */

import { Alternate } from "./alternate.js";
import {
  allOrNone,
  atLeast,
  atMost,
  exactlyMN,
  exactlyN,
  perfectlyBalanced,
} from "./count.js";
import type { Predicate } from "./types.js";

/**
 * A lazy, single-pass sequence.
 *
 * @example
 * ```typescript
 * seq([1, 2, 3, 4, 5, 6])
 *   .map((x) => x * 3)
 *   .atLeast(2, (x) => x % 2 === 0); // true, stops at 12
 * ```
 */
export class Seq<T> implements Iterable<T> {
  constructor(private readonly source: Iterable<T>) {}

  [Symbol.iterator](): Iterator<T> {
    return this.source[Symbol.iterator]();
  }

  /** Apply `f` to each item as it is pulled */
  map<U>(f: (value: T) => U): Seq<U> {
    return new Seq(mapIterable(this.source, f));
  }

  /** Pass on only the matches; rejected items are pulled and discarded */
  filter(predicate: Predicate<T>): Seq<T> {
    return new Seq(filterIterable(this.source, predicate));
  }

  /** End after `count` items, without pulling the next one */
  take(count: number): Seq<T> {
    return new Seq(takeIterable(this.source, count));
  }

  /** End at the first item the predicate rejects; that item is dropped */
  takeWhile(predicate: Predicate<T>): Seq<T> {
    return new Seq(takeWhileIterable(this.source, predicate));
  }

  /** Alternate with `other`, this sequence first */
  alternate(other: Iterable<T>): Seq<T> {
    return new Seq(new Alternate(this.source, other));
  }

  // ---------------------------------------------------------------------------
  // Terminal operations
  // ---------------------------------------------------------------------------

  toArray(): T[] {
    const result: T[] = [];
    for (const value of this.source) {
      result.push(value);
    }
    return result;
  }

  atLeast(n: number, predicate: Predicate<T>): boolean {
    return atLeast(this.source, n, predicate);
  }

  atMost(n: number, predicate: Predicate<T>): boolean {
    return atMost(this.source, n, predicate);
  }

  exactlyN(n: number, predicate: Predicate<T>): boolean {
    return exactlyN(this.source, n, predicate);
  }

  exactlyMN(m: number, pm: Predicate<T>, n: number, pn: Predicate<T>): boolean {
    return exactlyMN(this.source, m, pm, n, pn);
  }

  allOrNone(predicate: Predicate<T>): boolean {
    return allOrNone(this.source, predicate);
  }

  perfectlyBalanced(predicate: Predicate<T>): boolean {
    return perfectlyBalanced(this.source, predicate);
  }
}

// ---------------------------------------------------------------------------
// Adapter generators
// ---------------------------------------------------------------------------

function* mapIterable<T, U>(source: Iterable<T>, f: (value: T) => U): Generator<U> {
  for (const value of source) yield f(value);
}

function* filterIterable<T>(source: Iterable<T>, predicate: Predicate<T>): Generator<T> {
  for (const value of source) {
    if (predicate(value)) yield value;
  }
}

function* takeIterable<T>(source: Iterable<T>, count: number): Generator<T> {
  if (count <= 0) return;
  let taken = 0;
  for (const value of source) {
    yield value;
    // Return before pulling the item after the last one taken
    if (++taken >= count) return;
  }
}

function* takeWhileIterable<T>(source: Iterable<T>, predicate: Predicate<T>): Generator<T> {
  for (const value of source) {
    if (!predicate(value)) return;
    yield value;
  }
}
