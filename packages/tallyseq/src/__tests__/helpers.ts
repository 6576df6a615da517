/**
 * Test helper: wraps a source and records how it is driven.
 */
export interface Tracked<T> {
  iterable: Iterable<T>;
  /** Items handed out */
  reads: () => number;
  /** Calls to `next()`, including ones that reported exhaustion */
  pulls: () => number;
  /** Calls to `return()` */
  closes: () => number;
}

export function tracked<T>(source: Iterable<T>): Tracked<T> {
  let reads = 0;
  let pulls = 0;
  let closes = 0;
  const iterable: Iterable<T> = {
    [Symbol.iterator]() {
      const iter = source[Symbol.iterator]();
      return {
        next() {
          pulls++;
          const result = iter.next();
          if (!result.done) reads++;
          return result;
        },
        return(value?: unknown): IteratorResult<T> {
          closes++;
          return { done: true, value };
        },
      };
    },
  };
  return { iterable, reads: () => reads, pulls: () => pulls, closes: () => closes };
}
