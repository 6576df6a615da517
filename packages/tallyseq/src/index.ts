/**
 * tallyseq: counting queries over lazy sequences
 *
 * Predicate-counting combinators that stop pulling as soon as their
 * verdict is known, and an alternating merge of two sequences.
 *
 * @example
 * ```typescript
 * import { atLeast, exactlyMN, alternate, range } from "tallyseq";
 *
 * atLeast([2, 3, 2, 4, 2, 5], 3, (x) => x === 2); // true
 *
 * exactlyMN("abcd1234", 4, (c) => /[a-z]/.test(c), 4, (c) => /\d/.test(c)); // true
 *
 * [...alternate([1, 3], [2, 4])]; // [1, 2, 3, 4]
 *
 * // Unbounded sources are fine when the verdict short-circuits
 * range(0, Infinity).atLeast(3, (x) => x % 7 === 0); // true
 * ```
 */

export {
  atLeast,
  atMost,
  exactlyN,
  exactlyMN,
  allOrNone,
  perfectlyBalanced,
} from "./count.js";
export { Alternate, alternate } from "./alternate.js";
export { Seq } from "./seq.js";
export { seq, unfold, range, iterate, repeat } from "./seq-entry.js";

export type { Predicate, Turn, AlternateState } from "./types.js";
export type { Unfolded } from "./seq-entry.js";
