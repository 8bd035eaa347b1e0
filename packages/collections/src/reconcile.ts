import { isAbsent, valueEquals } from "@checkwise/core";

import { InputMalformedError } from "./errors.js";
import { expectedValuesFrom } from "./expectedValues.js";
import type { CollectionVerdict, Slot } from "./types.js";

const ALL_FOUND = Object.freeze({ kind: "allFound" as const });

function requireCollection<T>(
  value: Iterable<T> | null | undefined,
  role: "haystack" | "expected values",
  op: string,
): Iterable<T> {
  if (isAbsent(value)) {
    throw new InputMalformedError(`${op}: ${role} must be a collection (got ${String(value)})`);
  }
  return value;
}

function slotAt<T>(items: readonly T[], index: number): Slot<T> {
  return index < items.length ? { present: true, value: items[index] } : { present: false };
}

/**
 * Multiset containment: every needle must be matched by its own haystack
 * element, so `[2, 2]` needs two 2s.
 *
 * Needles left unmatched are reported in their original order.
 */
export function reconcileAtLeast<T>(
  haystack: Iterable<T> | null | undefined,
  needles: Iterable<T> | null | undefined,
): CollectionVerdict<T> {
  const items = requireCollection(haystack, "haystack", "containsAtLeast");
  const remaining = Array.from(requireCollection(needles, "expected values", "containsAtLeast"));

  for (const element of items) {
    if (remaining.length === 0) break;
    const i = remaining.findIndex((needle) => valueEquals(needle, element));
    if (i >= 0) remaining.splice(i, 1);
  }

  return remaining.length === 0 ? ALL_FOUND : { kind: "missingElements", missing: remaining };
}

/**
 * Positional equality: same elements, same order, same length.
 *
 * `needles === null`/`undefined` means no expected collection was given; that
 * is always a failure, reported at index 0 with `expectedItems: null`.
 */
export function reconcileExactly<T>(
  haystack: Iterable<T> | null | undefined,
  needles: Iterable<T> | null | undefined,
): CollectionVerdict<T> {
  const actualItems = Array.from(requireCollection(haystack, "haystack", "containsExactly"));

  if (isAbsent(needles)) {
    return {
      kind: "orderMismatch",
      index: 0,
      actual: slotAt(actualItems, 0),
      expected: { present: false },
      actualItems,
      expectedItems: null,
    };
  }

  const expectedItems = Array.from(needles);
  const length = Math.max(actualItems.length, expectedItems.length);

  for (let i = 0; i < length; i++) {
    const actual = slotAt(actualItems, i);
    const expected = slotAt(expectedItems, i);

    const same = actual.present && expected.present && valueEquals(expected.value, actual.value);
    if (!same) {
      return { kind: "orderMismatch", index: i, actual, expected, actualItems, expectedItems };
    }
  }

  return ALL_FOUND;
}

/**
 * Membership only: every haystack element must equal some needle. Duplicates
 * in the haystack are each checked on their own; multiplicity is not.
 */
export function reconcileOnly<T>(
  haystack: Iterable<T> | null | undefined,
  needles: Iterable<T> | null | undefined,
): CollectionVerdict<T> {
  const items = requireCollection(haystack, "haystack", "containsOnly");
  const allowed = Array.from(requireCollection(needles, "expected values", "containsOnly"));

  const unexpected: T[] = [];
  for (const element of items) {
    if (!allowed.some((needle) => valueEquals(needle, element))) {
      unexpected.push(element);
    }
  }

  return unexpected.length === 0 ? ALL_FOUND : { kind: "unexpectedElements", unexpected };
}

// Variadic fronts: the expected-values disambiguation runs first, identically.

export function containsAtLeast(
  haystack: Iterable<unknown> | null | undefined,
  ...expected: unknown[]
): CollectionVerdict<unknown> {
  return reconcileAtLeast(haystack, expectedValuesFrom(expected));
}

/**
 * A lone `null`/`undefined` argument means no expected collection at all,
 * not a single absent element.
 */
export function containsExactly(
  haystack: Iterable<unknown> | null | undefined,
  ...expected: unknown[]
): CollectionVerdict<unknown> {
  if (expected.length === 1 && isAbsent(expected[0])) {
    return reconcileExactly(haystack, null);
  }
  return reconcileExactly(haystack, expectedValuesFrom(expected));
}

export function containsOnly(
  haystack: Iterable<unknown> | null | undefined,
  ...expected: unknown[]
): CollectionVerdict<unknown> {
  return reconcileOnly(haystack, expectedValuesFrom(expected));
}
