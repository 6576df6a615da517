/**
 * Alternating merge of two sequences
 */

import type { AlternateState } from "./types.js";

/**
 * Yields from two sources turn by turn, starting with `first`, and ends
 * at the first exhausted pull from either one. The longer source is
 * closed then, never drained.
 *
 * @example
 * ```typescript
 * [...alternate([1, 3, 5], [2])]; // [1, 2, 3]
 * ```
 */
export class Alternate<T> implements IterableIterator<T> {
  private readonly first: Iterator<T>;
  private readonly second: Iterator<T>;
  private state: AlternateState = { kind: "active", turn: "first" };

  constructor(first: Iterable<T>, second: Iterable<T>) {
    this.first = first[Symbol.iterator]();
    this.second = second[Symbol.iterator]();
  }

  /** True once either source has run out (or the merge was closed) */
  get finished(): boolean {
    return this.state.kind === "finished";
  }

  next(): IteratorResult<T, undefined> {
    if (this.state.kind === "finished") return { done: true, value: undefined };

    const { turn } = this.state;
    const result = turn === "first" ? this.first.next() : this.second.next();

    if (result.done) {
      this.state = { kind: "finished" };
      // Release the source that did not run out
      if (turn === "first") {
        this.second.return?.();
      } else {
        this.first.return?.();
      }
      return { done: true, value: undefined };
    }

    this.state = { kind: "active", turn: turn === "first" ? "second" : "first" };
    return { done: false, value: result.value };
  }

  /** Stop early: closes both sources. No-op once finished. */
  return(): IteratorResult<T, undefined> {
    if (this.state.kind === "active") {
      this.state = { kind: "finished" };
      this.first.return?.();
      this.second.return?.();
    }
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): this {
    return this;
  }
}

/** Merge two sequences in strict alternation, `first` leading */
export function alternate<T>(first: Iterable<T>, second: Iterable<T>): Alternate<T> {
  return new Alternate(first, second);
}
