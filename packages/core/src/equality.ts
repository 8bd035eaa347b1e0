/**
 * Objects that carry their own notion of value equality.
 *
 * Anything exposing an `equals(other)` method is compared with it instead of
 * being walked member by member.
 */
export interface ValueEquatable {
  equals(other: unknown): boolean;
}

function isValueEquatable(value: object): value is ValueEquatable {
  return "equals" in value && typeof value.equals === "function";
}

function samePrimitive(a: unknown, b: unknown): boolean {
  // Self-inequality only holds for NaN.
  return a === b || (a !== a && b !== b);
}

function isBoxedPrimitive(value: object): value is Number | String | Boolean {
  return value instanceof Number || value instanceof String || value instanceof Boolean;
}

/**
 * True when `value` exposes a meaningful value-equality operation, i.e. it is
 * not relying on identity alone.
 *
 * Primitives and functions compare by value/identity directly. Among objects,
 * `Date`, `RegExp`, boxed primitives and {@link ValueEquatable} instances
 * qualify; plain objects, arrays, maps, sets and class instances do not.
 */
export function hasValueEquality(value: unknown): boolean {
  if (typeof value !== "object" || value === null) return true;

  return (
    value instanceof Date ||
    value instanceof RegExp ||
    isBoxedPrimitive(value) ||
    isValueEquatable(value)
  );
}

/**
 * Value equality as the expected value defines it.
 *
 * `NaN` equals `NaN` and `+0` equals `-0`. The expected side drives the
 * comparison, so an `equals` method is looked up on `expected` only.
 */
export function valueEquals(expected: unknown, actual: unknown): boolean {
  if (samePrimitive(expected, actual)) return true;

  if (typeof expected !== "object" || expected === null) {
    return typeof actual === "object" && actual !== null && isBoxedPrimitive(actual) && samePrimitive(expected, actual.valueOf());
  }
  if (typeof actual !== "object" || actual === null) {
    return isBoxedPrimitive(expected) && samePrimitive(expected.valueOf(), actual);
  }

  if (expected instanceof Date) {
    if (!(actual instanceof Date)) return false;
    return samePrimitive(expected.getTime(), actual.getTime());
  }

  if (expected instanceof RegExp) {
    return actual instanceof RegExp && actual.source === expected.source && actual.flags === expected.flags;
  }

  if (isBoxedPrimitive(expected)) {
    return isBoxedPrimitive(actual) && samePrimitive(expected.valueOf(), actual.valueOf());
  }

  if (isValueEquatable(expected)) {
    return expected.equals(actual) === true;
  }

  return false;
}
