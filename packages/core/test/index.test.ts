import { describe, expect, it } from "vitest";

import { assertNever, invariant, InvariantError, isAbsent, isDebugEnabled } from "../src/index.js";

describe("@checkwise/core", () => {
  it("throws InvariantError when the condition is false", () => {
    expect(() => invariant(false, "shape out of step")).toThrow(new InvariantError("shape out of step"));
    expect(() => invariant(1, "unused")).not.toThrow();
  });

  it("throws for assertNever", () => {
    expect(() => assertNever("nope" as never)).toThrow("Unexpected value: nope");
  });

  it("treats null and undefined as absent, and nothing else", () => {
    expect(isAbsent(null)).toBe(true);
    expect(isAbsent(undefined)).toBe(true);
    expect(isAbsent(0)).toBe(false);
    expect(isAbsent("")).toBe(false);
  });

  it("enables debug tracing only for CHECKWISE_DEBUG=1", () => {
    expect(isDebugEnabled({ CHECKWISE_DEBUG: "1" })).toBe(true);
    expect(isDebugEnabled({ CHECKWISE_DEBUG: "true" })).toBe(false);
    expect(isDebugEnabled({})).toBe(false);
  });
});
