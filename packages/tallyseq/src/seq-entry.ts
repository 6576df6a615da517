/**
 * Sequence sources.
 *
 * Everything here is built on `unfold`: a step function that maps a
 * state to the next item and state, or to `undefined` to end. Steps
 * run only when an item is pulled, so unbounded sources are safe to
 * hand to any short-circuiting combinator.
 */

import { Seq } from "./seq.js";

/** Result of one `unfold` step: the item to yield and the next state */
export type Unfolded<T, S> = readonly [item: T, next: S];

/** Wrap any iterable */
export function seq<T>(source: Iterable<T>): Seq<T> {
  return new Seq(source);
}

/**
 * Build a sequence from a seed and a step function.
 *
 * @example
 * ```typescript
 * // squares of 0, 1, 2: yields 0, 1, 4
 * unfold(0, (n) => (n < 3 ? [n * n, n + 1] : undefined));
 * ```
 */
export function unfold<S, T>(seed: S, step: (state: S) => Unfolded<T, S> | undefined): Seq<T> {
  return new Seq(unfoldIterable(seed, step));
}

/** Numbers from `start` towards `end` (exclusive), unbounded by default */
export function range(start: number, end: number = Infinity, step: number = 1): Seq<number> {
  if (step === 0) throw new RangeError("range() step must not be zero");
  const inBounds = step > 0 ? (i: number) => i < end : (i: number) => i > end;
  return unfold<number, number>(start, (i) => (inBounds(i) ? [i, i + step] : undefined));
}

/** `seed`, `f(seed)`, `f(f(seed))`, ... without end. `f` runs once per pull after the first. */
export function iterate<T>(seed: T, f: (value: T) => T): Seq<T> {
  return unfold<{ value: T; started: boolean }, T>({ value: seed, started: false }, (state) => {
    const value = state.started ? f(state.value) : state.value;
    return [value, { value, started: true }];
  });
}

/** `value`, `times` times over; endlessly when `times` is omitted */
export function repeat<T>(value: T, times: number = Infinity): Seq<T> {
  return unfold<number, T>(times, (left) => (left > 0 ? [value, left - 1] : undefined));
}

function* unfoldIterable<S, T>(
  seed: S,
  step: (state: S) => Unfolded<T, S> | undefined,
): Generator<T> {
  let state = seed;
  for (let next = step(state); next !== undefined; next = step(state)) {
    yield next[0];
    state = next[1];
  }
}
