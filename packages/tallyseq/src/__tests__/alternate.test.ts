import { describe, it, expect } from "vitest";
import { Alternate, alternate } from "../alternate.js";
import { atLeast, exactlyN, perfectlyBalanced } from "../count.js";
import { repeat } from "../seq-entry.js";
import { tracked } from "./helpers.js";

describe("alternate", () => {
  it("interleaves equal-length sources", () => {
    expect([...alternate([1, 3], [2, 4])]).toEqual([1, 2, 3, 4]);
  });

  it("stops when the second source runs out", () => {
    expect([...alternate([1, 3, 5], [2])]).toEqual([1, 2, 3]);
  });

  it("stops when the first source runs out", () => {
    expect([...alternate([1], [2, 4, 6])]).toEqual([1, 2]);
  });

  it("is empty when the first source is empty", () => {
    expect([...alternate([], [1, 2])]).toEqual([]);
  });

  it("yields one item when the second source is empty", () => {
    expect([...alternate([1, 3], [])]).toEqual([1]);
  });

  it("detects equal-length exhaustion on the first source's turn", () => {
    const a = tracked([1, 3]);
    const b = tracked([2, 4]);
    expect([...alternate(a.iterable, b.iterable)]).toEqual([1, 2, 3, 4]);
    expect(a.pulls()).toBe(3);
    expect(b.pulls()).toBe(2);
  });

  it("never drains the longer source after finishing", () => {
    const a = tracked([1, 3, 5, 7]);
    const b = tracked([2]);
    expect([...alternate(a.iterable, b.iterable)]).toEqual([1, 2, 3]);
    expect(a.reads()).toBe(2);
    expect(b.pulls()).toBe(2);
  });

  it("keeps reporting exhaustion without pulling again", () => {
    const a = tracked([1]);
    const b = tracked([2, 4]);
    const merged = alternate(a.iterable, b.iterable);
    expect(merged.next()).toEqual({ done: false, value: 1 });
    expect(merged.next()).toEqual({ done: false, value: 2 });
    expect(merged.next()).toEqual({ done: true, value: undefined });
    expect(merged.finished).toBe(true);
    expect(merged.next()).toEqual({ done: true, value: undefined });
    expect(merged.next()).toEqual({ done: true, value: undefined });
    expect(a.pulls()).toBe(2);
    expect(b.pulls()).toBe(1);
  });

  it("works over unbounded sources", () => {
    const merged = alternate(repeat("a"), repeat("b"));
    const out: string[] = [];
    for (const s of merged) {
      out.push(s);
      if (out.length === 5) break;
    }
    expect(out).toEqual(["a", "b", "a", "b", "a"]);
  });

  it("closes both sources when stopped early", () => {
    let closed = 0;
    function* source(items: number[]): Generator<number> {
      try {
        yield* items;
      } finally {
        closed++;
      }
    }
    const merged = alternate(source([1, 2, 3]), source([4, 5, 6]));
    for (const x of merged) {
      if (x === 4) break;
    }
    expect(closed).toBe(2);
    expect(merged.next()).toEqual({ done: true, value: undefined });
  });

  it("closes the remaining source when the other runs out", () => {
    let closedSecond = 0;
    function* second(): Generator<number> {
      try {
        yield* [2, 4, 6];
      } finally {
        closedSecond++;
      }
    }
    expect(perfectlyBalanced(alternate([1, 3], second()), (x) => x % 2 === 0)).toBe(true);
    expect(closedSecond).toBe(1);
  });

  it("closes the first source when the second runs out", () => {
    const a = tracked([1, 3, 5]);
    const b = tracked([2]);
    expect([...alternate(a.iterable, b.iterable)]).toEqual([1, 2, 3]);
    expect(a.closes()).toBe(1);
    expect(b.closes()).toBe(0);
  });

  it("does not close sources again once finished", () => {
    const a = tracked([1]);
    const b = tracked([2]);
    const merged = new Alternate(a.iterable, b.iterable);
    expect([...merged]).toEqual([1, 2]);
    merged.return();
    expect(a.closes()).toBe(0);
    expect(b.closes()).toBe(1);
  });

  it("is itself a sequence the combinators accept", () => {
    expect(perfectlyBalanced(alternate([2, 4, 6], [1, 3, 5]), (x) => x % 2 === 0)).toBe(true);
    expect(exactlyN(alternate("abc", "123"), 3, (c) => c >= "0" && c <= "9")).toBe(true);
  });

  it("composes with itself", () => {
    const inner = alternate([1, 5], [2, 6]);
    expect([...alternate(inner, [0, 0, 0])]).toEqual([1, 0, 2, 0, 5, 0, 6]);
  });

  it("closes its sources when a combinator short-circuits", () => {
    const a = tracked([2, 2, 2]);
    const b = tracked([2, 2, 2]);
    expect(atLeast(alternate(a.iterable, b.iterable), 2, (x) => x === 2)).toBe(true);
    expect(a.closes()).toBe(1);
    expect(b.closes()).toBe(1);
    expect(a.reads() + b.reads()).toBe(2);
  });
});
