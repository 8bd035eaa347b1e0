import { describe, expect, it } from "vitest";

import { hasValueEquality, valueEquals } from "../src/equality.js";

class Money {
  constructor(
    readonly amount: number,
    readonly currency: string,
  ) {}

  equals(other: unknown): boolean {
    return other instanceof Money && other.amount === this.amount && other.currency === this.currency;
  }
}

class Point {
  constructor(
    readonly x: number,
    readonly y: number,
  ) {}
}

describe("hasValueEquality", () => {
  it("is true for primitives and functions", () => {
    for (const v of [1, "a", true, 1n, undefined, null, Symbol("s"), () => 1]) {
      expect(hasValueEquality(v)).toBe(true);
    }
  });

  it("is true for dates, regexps, boxed primitives and equals() implementers", () => {
    expect(hasValueEquality(new Date(0))).toBe(true);
    expect(hasValueEquality(/a/g)).toBe(true);
    expect(hasValueEquality(new Number(3))).toBe(true);
    expect(hasValueEquality(new Money(1, "EUR"))).toBe(true);
  });

  it("is false for identity-only composites", () => {
    expect(hasValueEquality({ a: 1 })).toBe(false);
    expect(hasValueEquality([1])).toBe(false);
    expect(hasValueEquality(new Map())).toBe(false);
    expect(hasValueEquality(new Point(1, 2))).toBe(false);
  });
});

describe("valueEquals", () => {
  it("treats NaN as equal to itself and +0 as equal to -0", () => {
    expect(valueEquals(NaN, NaN)).toBe(true);
    expect(valueEquals(0, -0)).toBe(true);
    expect(valueEquals(1, 2)).toBe(false);
  });

  it("does not coerce between types", () => {
    expect(valueEquals(1, "1")).toBe(false);
    expect(valueEquals(null, undefined)).toBe(false);
  });

  it("compares dates by time value", () => {
    expect(valueEquals(new Date(5), new Date(5))).toBe(true);
    expect(valueEquals(new Date(5), new Date(6))).toBe(false);
    expect(valueEquals(new Date(5), 5)).toBe(false);
  });

  it("compares regexps by source and flags", () => {
    expect(valueEquals(/a+/g, /a+/g)).toBe(true);
    expect(valueEquals(/a+/g, /a+/i)).toBe(false);
  });

  it("compares boxed primitives by their primitive value", () => {
    expect(valueEquals(new String("x"), new String("x"))).toBe(true);
    expect(valueEquals(new Number(2), 2)).toBe(true);
  });

  it("unboxes the actual value when only it is boxed", () => {
    expect(valueEquals("a", new String("a"))).toBe(true);
    expect(valueEquals(2, new Number(2))).toBe(true);
    expect(valueEquals("a", new String("b"))).toBe(false);
    expect(valueEquals(null, new String("null"))).toBe(false);
  });

  it("delegates to the expected value's equals()", () => {
    expect(valueEquals(new Money(3, "EUR"), new Money(3, "EUR"))).toBe(true);
    expect(valueEquals(new Money(3, "EUR"), new Money(3, "USD"))).toBe(false);
  });

  it("falls back to identity for composites", () => {
    const p = new Point(1, 2);
    expect(valueEquals(p, p)).toBe(true);
    expect(valueEquals(p, new Point(1, 2))).toBe(false);
  });
});
