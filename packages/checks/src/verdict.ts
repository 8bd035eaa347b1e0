import { assertNever } from "@checkwise/core";
import type { CollectionVerdict } from "@checkwise/collections";
import type { EqualityVerdict } from "@checkwise/structural";

export type PredicateDetails = {
  /** What the value must do, phrased for "The checked value must …". */
  statement: string;
  actual: unknown;
  expected?: unknown;
};

/** Outcome of a single-value predicate such as "is null". */
export type PredicateVerdict = ({ kind: "holds" } & PredicateDetails) | ({ kind: "doesNotHold" } & PredicateDetails);

export type Verdict = EqualityVerdict | CollectionVerdict<unknown> | PredicateVerdict;

export type CheckOutcome = {
  pass: boolean;
  verdict: Verdict;
  negated: boolean;
};

type Reading = "holds" | "fails" | "undecided";

function readVerdict(verdict: Verdict): Reading {
  switch (verdict.kind) {
    case "match":
    case "allFound":
    case "holds":
      return "holds";
    case "mismatch":
    case "missingMember":
    case "missingElements":
    case "unexpectedElements":
    case "orderMismatch":
    case "doesNotHold":
      return "fails";
    case "cyclicStructure":
      return "undecided";
    default:
      return assertNever(verdict);
  }
}

/**
 * The one place negation is applied.
 *
 * Engines compute verdicts without polarity; a check passes when the verdict
 * holds and the check is not negated, or fails to hold and it is. A verdict
 * that could not be decided (a cyclic structure) passes in neither polarity.
 */
export function interpretVerdict(verdict: Verdict, negated: boolean): CheckOutcome {
  const reading = readVerdict(verdict);
  const pass = reading === "undecided" ? false : (reading === "holds") !== negated;
  return { pass, verdict, negated };
}
