/**
 * Shared types for tallyseq
 */

/** A boolean test applied to one item. May carry state between calls. */
export type Predicate<T> = (item: T) => boolean;

/** Which source of an alternating merge supplies the next item */
export type Turn = "first" | "second";

/** State machine of an alternating merge */
export type AlternateState =
  | { readonly kind: "active"; readonly turn: Turn }
  | { readonly kind: "finished" };
