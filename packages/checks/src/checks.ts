import { defaultOnWarning, hasValueEquality, isAbsent, isDebugEnabled, valueEquals } from "@checkwise/core";
import {
  containsAtLeast,
  containsExactly,
  containsOnly,
  InputMalformedError,
} from "@checkwise/collections";
import {
  BUILTIN_RECOGNIZERS,
  compareFields,
  type CompareOptions,
  type Introspector,
  type SyntheticNameRecognizer,
} from "@checkwise/structural";

import { DEFAULT_CONFIG, type CheckwiseConfig } from "./config/types.js";
import { CheckFailure } from "./errors.js";
import { formatVerdict } from "./reporting/formatVerdict.js";
import { interpretVerdict, type PredicateDetails, type PredicateVerdict, type Verdict } from "./verdict.js";

type AnyConstructor = abstract new (...args: never[]) => unknown;

type Numeric = number | bigint;

export type ChecksOptions = {
  config?: CheckwiseConfig;
  /** Overrides `config.structural.recognizers`. */
  recognizers?: readonly SyntheticNameRecognizer[];
  introspector?: Introspector;
  /**
   * Trace hook for member resolution. When omitted and `CHECKWISE_DEBUG=1`,
   * traces go to `console.warn`.
   */
  onTrace?: (message: string) => void;
  /** Environment consulted for `CHECKWISE_DEBUG` (defaults to `process.env`). */
  env?: Record<string, string | undefined>;
  negated?: boolean;
};

/** Check functions; each throws {@link CheckFailure} when it does not pass. */
export interface Checks {
  readonly negated: boolean;
  /** The same checks with the negation flag flipped. */
  readonly not: Checks;

  hasFieldsWithSameValues(actual: unknown, expected: unknown): void;
  hasNotFieldsWithSameValues(actual: unknown, expected: unknown): void;
  isEqualTo(actual: unknown, expected: unknown): void;
  isNotEqualTo(actual: unknown, expected: unknown): void;
  isNull(actual: unknown): void;
  isNotNull(actual: unknown): void;
  isSameReferenceAs(actual: unknown, expected: unknown): void;
  isDistinctFrom(actual: unknown, comparand: unknown): void;
  isInstanceOf(actual: unknown, type: AnyConstructor): void;
  inheritsFrom(actual: unknown, type: AnyConstructor): void;

  isZero(actual: Numeric): void;
  isNotZero(actual: Numeric): void;
  /** Strictly greater than zero; `NaN` is not positive. */
  isPositive(actual: Numeric): void;
  isLessThan(actual: Numeric, comparand: Numeric): void;
  isGreaterThan(actual: Numeric, comparand: Numeric): void;
  hasAValue(actual: Numeric | null | undefined): void;
  hasNoValue(actual: Numeric | null | undefined): void;

  contains(haystack: Iterable<unknown> | null | undefined, ...expected: unknown[]): void;
  containsExactly(haystack: Iterable<unknown> | null | undefined, ...expected: unknown[]): void;
  containsOnly(haystack: Iterable<unknown> | null | undefined, ...expected: unknown[]): void;
  hasSize(haystack: Iterable<unknown> | null | undefined, expectedSize: number): void;
  isEmpty(haystack: Iterable<unknown> | null | undefined): void;
}

function predicate(holds: boolean, details: PredicateDetails): PredicateVerdict {
  return holds ? { kind: "holds", ...details } : { kind: "doesNotHold", ...details };
}

function itemsOf(haystack: Iterable<unknown> | null | undefined, check: string): unknown[] {
  if (isAbsent(haystack)) {
    throw new InputMalformedError(`${check}: haystack must be a collection (got ${String(haystack)})`);
  }
  return Array.from(haystack);
}

function typeName(type: AnyConstructor): string {
  return type.name || "(anonymous class)";
}

export function createChecks(options: ChecksOptions = {}): Checks {
  const config = options.config ?? DEFAULT_CONFIG;
  const negated = options.negated ?? false;

  const onTrace = options.onTrace ?? (isDebugEnabled(options.env) ? defaultOnWarning : undefined);
  const compareOptions: CompareOptions = {
    recognizers: options.recognizers ?? config.structural.recognizers.map((id) => BUILTIN_RECOGNIZERS[id]),
    detectCycles: config.structural.detectCycles,
    ...(options.introspector ? { introspector: options.introspector } : {}),
    ...(onTrace ? { onTrace } : {}),
  };

  const run = (check: string, verdict: Verdict, polarity: boolean): void => {
    const outcome = interpretVerdict(verdict, polarity);
    if (!outcome.pass) {
      const message = formatVerdict(verdict, {
        negated: polarity,
        maxValueLength: config.report.maxValueLength,
      });
      throw new CheckFailure(check, polarity, verdict, message);
    }
  };

  // Structural equality is checked both ways; one walk visits only the
  // checked value's members.
  const equality = (actual: unknown, expected: unknown): Verdict => {
    const details = { statement: "be equal to the expected value", actual, expected };
    if (typeof expected !== "object" || expected === null || hasValueEquality(expected)) {
      return predicate(valueEquals(expected, actual), details);
    }

    const forward = compareFields(expected, actual, compareOptions);
    if (forward.kind !== "match") return forward;

    const backward = compareFields(actual, expected, compareOptions);
    if (backward.kind === "cyclicStructure") return backward;
    return predicate(backward.kind === "match", details);
  };

  const isNull = (actual: unknown) => predicate(isAbsent(actual), { statement: "be null", actual });
  const sameReference = (actual: unknown, expected: unknown) =>
    predicate(actual === expected, { statement: "be the same instance as the expected value", actual, expected });

  const isZero = (actual: Numeric) => predicate(actual === 0 || actual === 0n, { statement: "be zero", actual });
  const hasAValue = (actual: Numeric | null | undefined) =>
    predicate(!isAbsent(actual), { statement: "have a value", actual });

  let not: Checks | undefined;

  const checks: Checks = {
    negated,
    get not() {
      not ??= createChecks({ ...options, negated: !negated });
      return not;
    },

    hasFieldsWithSameValues: (actual, expected) =>
      run("hasFieldsWithSameValues", compareFields(expected, actual, compareOptions), negated),
    hasNotFieldsWithSameValues: (actual, expected) =>
      run("hasNotFieldsWithSameValues", compareFields(expected, actual, compareOptions), !negated),

    isEqualTo: (actual, expected) => run("isEqualTo", equality(actual, expected), negated),
    isNotEqualTo: (actual, expected) => run("isNotEqualTo", equality(actual, expected), !negated),

    isNull: (actual) => run("isNull", isNull(actual), negated),
    isNotNull: (actual) => run("isNotNull", isNull(actual), !negated),

    isSameReferenceAs: (actual, expected) => run("isSameReferenceAs", sameReference(actual, expected), negated),
    isDistinctFrom: (actual, comparand) => run("isDistinctFrom", sameReference(actual, comparand), !negated),

    isInstanceOf: (actual, type) =>
      run(
        "isInstanceOf",
        predicate(typeof actual === "object" && actual !== null && Object.getPrototypeOf(actual) === type.prototype, {
          statement: `be an instance of ${typeName(type)}`,
          actual,
        }),
        negated,
      ),
    inheritsFrom: (actual, type) =>
      run(
        "inheritsFrom",
        predicate(actual instanceof type, {
          statement: `be part of the inheritance hierarchy of ${typeName(type)}`,
          actual,
        }),
        negated,
      ),

    isZero: (actual) => run("isZero", isZero(actual), negated),
    isNotZero: (actual) => run("isNotZero", isZero(actual), !negated),
    isPositive: (actual) =>
      run("isPositive", predicate(actual > 0, { statement: "be strictly positive", actual }), negated),
    isLessThan: (actual, comparand) =>
      run(
        "isLessThan",
        predicate(actual < comparand, { statement: "be less than the comparand", actual, expected: comparand }),
        negated,
      ),
    isGreaterThan: (actual, comparand) =>
      run(
        "isGreaterThan",
        predicate(actual > comparand, { statement: "be greater than the comparand", actual, expected: comparand }),
        negated,
      ),
    hasAValue: (actual) => run("hasAValue", hasAValue(actual), negated),
    hasNoValue: (actual) => run("hasNoValue", hasAValue(actual), !negated),

    contains: (haystack, ...expected) => run("contains", containsAtLeast(haystack, ...expected), negated),
    containsExactly: (haystack, ...expected) =>
      run("containsExactly", containsExactly(haystack, ...expected), negated),
    containsOnly: (haystack, ...expected) => run("containsOnly", containsOnly(haystack, ...expected), negated),

    hasSize: (haystack, expectedSize) => {
      const items = itemsOf(haystack, "hasSize");
      run(
        "hasSize",
        predicate(items.length === expectedSize, {
          statement: `have ${expectedSize} item(s)`,
          actual: items.length,
          expected: expectedSize,
        }),
        negated,
      );
    },
    isEmpty: (haystack) => {
      const items = itemsOf(haystack, "isEmpty");
      run("isEmpty", predicate(items.length === 0, { statement: "be empty", actual: items }), negated);
    },
  };

  return checks;
}
