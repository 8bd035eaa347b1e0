import { describe, expect, it } from "vitest";

import { InvariantError } from "@checkwise/core";

import { compareFields } from "../src/compare/compare.js";
import { formatPath } from "../src/compare/path.js";
import type { EqualityVerdict } from "../src/compare/types.js";
import { MemberReadError } from "../src/errors.js";
import type { Introspector } from "../src/members/shape.js";

class Person {
  private _name: string;

  constructor(name: string) {
    this._name = name;
  }

  get name(): string {
    return this._name;
  }
}

class Shape {
  constructor(protected readonly sides: number) {}

  get label(): string {
    return `polygon/${this.sides}`;
  }
}

class Square extends Shape {
  color: string;

  constructor(color: string) {
    super(4);
    this.color = color;
  }
}

class Money {
  constructor(
    readonly amount: number,
    readonly currency: string,
  ) {}

  equals(other: unknown): boolean {
    return other instanceof Money && other.amount === this.amount && other.currency === this.currency;
  }
}

function customer(city: string) {
  return {
    name: "Ada",
    address: { street: "1 Rue Test", city, zip: "75001" },
    tags: ["vip", "early"],
  };
}

function pathOf(verdict: EqualityVerdict): string | undefined {
  return verdict.kind === "match" ? undefined : formatPath(verdict.path);
}

describe("compareFields", () => {
  it("matches a graph against itself and against a structural clone", () => {
    const a = customer("Paris");

    expect(compareFields(a, a)).toEqual({ kind: "match" });
    expect(compareFields(customer("Paris"), a)).toEqual({ kind: "match" });
    expect(compareFields(customer("Paris"), a, { detectCycles: false })).toEqual({ kind: "match" });
  });

  it("reports the exact leaf that differs", () => {
    const verdict = compareFields(customer("Paris"), customer("Lyon"));

    expect(verdict).toMatchObject({
      kind: "mismatch",
      path: ["address", "city"],
      expected: "Paris",
      actual: "Lyon",
      reason: "valueDiffers",
    });
    expect(pathOf(verdict)).toBe("address.city");
  });

  it("stops at the first difference in declaration order", () => {
    const expected = { a: 1, b: 2, c: 3 };
    const actual = { a: 1, b: 20, c: 30 };

    expect(pathOf(compareFields(expected, actual))).toBe("b");
  });

  it("reports members of actual that expected lacks", () => {
    const verdict = compareFields({ id: 1 }, { id: 1, nickname: "x" });

    expect(verdict).toMatchObject({ kind: "missingMember", path: ["nickname"], memberLabel: "nickname" });
  });

  it("only walks the members of actual", () => {
    expect(compareFields({ id: 1, extra: true }, { id: 1 })).toEqual({ kind: "match" });
  });

  it("treats absent expected values as matching only absent actual values", () => {
    expect(compareFields({ v: null }, { v: undefined })).toEqual({ kind: "match" });
    expect(compareFields({ v: null }, { v: 0 })).toMatchObject({
      kind: "mismatch",
      path: ["v"],
      reason: "expectedAbsent",
      actual: 0,
    });
  });

  it("flags type asymmetry when a composite is expected", () => {
    expect(compareFields({ inner: { x: 1 } }, { inner: null })).toMatchObject({
      kind: "mismatch",
      path: ["inner"],
      reason: "actualAbsent",
    });
    expect(compareFields({ inner: { x: 1 } }, { inner: 5 })).toMatchObject({
      kind: "mismatch",
      path: ["inner"],
      reason: "notComposite",
    });
  });

  it("compares root values directly when they define value equality", () => {
    expect(compareFields(1, 1)).toEqual({ kind: "match" });
    expect(compareFields(1, 2)).toEqual({
      kind: "mismatch",
      path: [],
      expected: 1,
      actual: 2,
      reason: "valueDiffers",
    });
  });

  it("uses value equality instead of recursing when available", () => {
    expect(compareFields({ price: new Money(5, "EUR") }, { price: new Money(5, "EUR") })).toEqual({ kind: "match" });
    expect(compareFields({ at: new Date(10) }, { at: new Date(11) })).toMatchObject({
      kind: "mismatch",
      path: ["at"],
      reason: "valueDiffers",
    });
  });

  it("reconciles accessor backing fields with plain members in both directions", () => {
    expect(compareFields(new Person("Ada"), { name: "Ada" })).toEqual({ kind: "match" });
    expect(compareFields({ name: "Ada" }, new Person("Ada"))).toEqual({ kind: "match" });

    const verdict = compareFields({ name: "Ada" }, new Person("Grace"));
    expect(verdict).toMatchObject({ kind: "mismatch", path: ["name"], expected: "Ada", actual: "Grace" });
    expect(verdict.kind === "mismatch" ? verdict.member?.rawName : undefined).toBe("_name");
    expect(verdict.kind === "mismatch" ? verdict.member?.origin : undefined).toBe("synthesizedAccessor");
  });

  it("finds members declared on an ancestor type", () => {
    expect(compareFields(new Square("red"), { label: "polygon/4", color: "red" })).toEqual({ kind: "match" });
    expect(compareFields(new Square("red"), { label: "polygon/5" })).toMatchObject({
      kind: "mismatch",
      path: ["label"],
      expected: "polygon/4",
      actual: "polygon/5",
    });
  });

  it("compares arrays element by element and by length", () => {
    expect(pathOf(compareFields([1, 2, 3], [1, 2, 4]))).toBe("[2]");
    expect(compareFields([1, 2, 3], [1, 2])).toMatchObject({
      kind: "mismatch",
      path: ["length"],
      expected: 3,
      actual: 2,
    });
    expect(compareFields([1, 2], [1, 2, 3])).toMatchObject({ kind: "missingMember", path: ["2"] });
  });

  it("renders nested array paths", () => {
    const expected = { lines: [{ sku: "A" }, { sku: "B" }] };
    const actual = { lines: [{ sku: "A" }, { sku: "C" }] };

    expect(pathOf(compareFields(expected, actual))).toBe("lines[1].sku");
  });

  it("compares maps and sets by entries and size", () => {
    const m = (entries: Array<[string, number]>) => new Map(entries);

    expect(compareFields(m([["a", 1]]), m([["a", 1]]))).toEqual({ kind: "match" });
    expect(pathOf(compareFields(m([["a", 1]]), m([["a", 2]])))).toBe("entries[0][1]");
    expect(compareFields(m([["a", 1], ["b", 2]]), m([["a", 1]]))).toMatchObject({
      kind: "mismatch",
      path: ["size"],
      expected: 2,
      actual: 1,
    });
    expect(compareFields(new Set([1, 2]), new Set([1, 3]))).toMatchObject({
      kind: "mismatch",
      path: ["values[1]"],
    });
  });

  it("prefixes reported paths", () => {
    const verdict = compareFields({ total: 1 }, { total: 2 }, { path: ["order"] });

    expect(pathOf(verdict)).toBe("order.total");
  });

  it("reports self-referential graphs instead of recursing forever", () => {
    type Node = { id: number; next?: Node };
    const a: Node = { id: 1 };
    a.next = a;
    const b: Node = { id: 1 };
    b.next = b;

    expect(compareFields(a, b)).toMatchObject({ kind: "cyclicStructure", path: ["next"] });
  });

  it("does not mistake shared references for cycles", () => {
    const shared = { v: 1 };

    expect(compareFields({ x: shared, y: shared }, { x: { v: 1 }, y: { v: 1 } })).toEqual({ kind: "match" });
  });

  it("traces counterparts found by semantic name", () => {
    const traces: string[] = [];

    compareFields(new Person("Ada"), { name: "Ada" }, { onTrace: (m) => traces.push(m) });

    expect(traces).toEqual(["name: resolved name to Person._name (semantic, depth 0)"]);
  });

  it("surfaces throwing accessors as MemberReadError", () => {
    const boom = {};
    Object.defineProperty(boom, "state", {
      get() {
        throw new Error("not ready");
      },
    });

    expect(() => compareFields({ state: 1 }, boom)).toThrow(MemberReadError);
    expect(() => compareFields({ state: 1 }, boom)).toThrow("failed to read Object.state at state");
  });

  it("accepts a custom introspector", () => {
    const fieldsOnly: Introspector = {
      shapeOf: (value) => {
        const names = Object.keys(value).filter((k) => !k.startsWith("cache"));
        return {
          name: "Fields",
          base: null,
          declaredNames: () => names,
          has: (raw) => names.includes(raw),
          read: (instance, raw) => Reflect.get(instance, raw),
        };
      },
    };

    expect(
      compareFields({ id: 1, cacheHits: 3 }, { id: 1, cacheHits: 9 }, { introspector: fieldsOnly }),
    ).toEqual({ kind: "match" });
  });

  it("rejects an introspector whose names and lookups disagree", () => {
    const inconsistent: Introspector = {
      shapeOf: () => ({
        name: "Drifted",
        base: null,
        declaredNames: () => ["id"],
        has: () => false,
        read: (instance, raw) => Reflect.get(instance, raw),
      }),
    };

    expect(() => compareFields({ id: 1 }, { id: 1 }, { introspector: inconsistent })).toThrow(InvariantError);
  });
});

describe("compareFields on binary data", () => {
  it("reports a shorter typed array through its length", () => {
    expect(compareFields(new Uint8Array([1, 2, 3]), new Uint8Array([1, 2]))).toEqual({
      kind: "mismatch",
      path: ["length"],
      expected: 3,
      actual: 2,
      reason: "valueDiffers",
      member: expect.objectContaining({ rawName: "length", origin: "ordinary" }),
    });
  });

  it("points at the differing or extra element", () => {
    expect(pathOf(compareFields(new Uint8Array([1, 2]), new Uint8Array([1, 9])))).toBe("[1]");
    expect(pathOf(compareFields(new Float64Array([1, 2]), new Float64Array([1, 2, 3])))).toBe("[2]");
  });

  it("compares buffers with their own equals()", () => {
    expect(compareFields(Buffer.from([1, 2]), Buffer.from([1, 2]))).toEqual({ kind: "match" });
    expect(compareFields(Buffer.from([1, 2, 3]), Buffer.from([1, 2]))).toMatchObject({
      kind: "mismatch",
      path: [],
      reason: "valueDiffers",
    });
  });
});

describe("compareFields on large collections", () => {
  it("walks big sets and maps in linear passes", () => {
    const numbers = Array.from({ length: 20_000 }, (_, i) => i);

    expect(compareFields(new Set(numbers), new Set(numbers))).toEqual({ kind: "match" });
    expect(compareFields(new Map(numbers.map((n) => [n, n])), new Map(numbers.map((n) => [n, n])))).toEqual({
      kind: "match",
    });
  });
});
