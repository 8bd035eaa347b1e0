import { assertNever } from "@checkwise/core";
import type { CollectionVerdict, Slot } from "@checkwise/collections";
import { formatPath, type EqualityVerdict, type MemberDescriptor, type MismatchReason } from "@checkwise/structural";

import type { PredicateVerdict, Verdict } from "../verdict.js";
import { formatValue } from "./safeStringify.js";

export type FormatOptions = {
  negated: boolean;
  maxValueLength: number;
};

const REASONS: Record<MismatchReason, string> = {
  valueDiffers: "does not have the expected value",
  expectedAbsent: "has a value whereas none is expected",
  actualAbsent: "has no value whereas an object is expected",
  notComposite: "is not an object whereas an object is expected",
};

function memberLabel(path: readonly string[], member: MemberDescriptor | undefined): string {
  const shown = formatPath(path) || "value";
  if (member?.origin === "synthesizedAccessor") {
    return `${shown} (backing field ${member.rawName})`;
  }
  return shown;
}

function itemCount(n: number): string {
  return n <= 1 ? `${n} item` : `${n} items`;
}

function list(items: readonly unknown[], opts: FormatOptions): string {
  return `[${items.map((v) => formatValue(v, opts.maxValueLength)).join(", ")}]`;
}

function slot(s: Slot<unknown>, opts: FormatOptions): string {
  return s.present ? formatValue(s.value, opts.maxValueLength) : "(nothing)";
}

export function formatEqualityVerdict(verdict: EqualityVerdict, opts: FormatOptions): string {
  const value = (v: unknown) => formatValue(v, opts.maxValueLength);

  switch (verdict.kind) {
    case "match":
      return opts.negated
        ? "The checked value has the same field values as the expected one, whereas it must not."
        : "The checked value has the same field values as the expected one.";
    case "mismatch":
      return [
        `The checked value's ${memberLabel(verdict.path, verdict.member)} ${REASONS[verdict.reason]}.`,
        `  expected: ${value(verdict.expected)}`,
        `  actual:   ${value(verdict.actual)}`,
      ].join("\n");
    case "missingMember":
      return `The checked value's ${memberLabel(verdict.path, verdict.member)} is absent from the expected value.`;
    case "cyclicStructure":
      return `The checked value's ${formatPath(verdict.path) || "value"} refers back to an object already being compared; fields cannot be compared on a cyclic structure.`;
    default:
      return assertNever(verdict);
  }
}

export function formatCollectionVerdict(verdict: CollectionVerdict<unknown>, opts: FormatOptions): string {
  switch (verdict.kind) {
    case "allFound":
      return opts.negated
        ? "The checked collection satisfies the expected values, whereas it must not."
        : "The checked collection satisfies the expected values.";
    case "missingElements":
      return `The checked collection does not contain the expected value(s): ${list(verdict.missing, opts)}.`;
    case "unexpectedElements":
      return `The checked collection does not contain only the expected value(s). It also contains: ${list(verdict.unexpected, opts)}.`;
    case "orderMismatch": {
      const found = `${list(verdict.actualItems, opts)} (${itemCount(verdict.actualItems.length)})`;
      if (verdict.expectedItems === null) {
        return `Found: ${found} instead of the expected [null] (0 item).`;
      }
      return [
        `Found: ${found} instead of the expected ${list(verdict.expectedItems, opts)} (${itemCount(verdict.expectedItems.length)}).`,
        `  at index ${verdict.index}: expected ${slot(verdict.expected, opts)}, actual ${slot(verdict.actual, opts)}`,
      ].join("\n");
    }
    default:
      return assertNever(verdict);
  }
}

export function formatPredicateVerdict(verdict: PredicateVerdict, opts: FormatOptions): string {
  const lines = [`The checked value must ${opts.negated ? "not " : ""}${verdict.statement}.`];
  lines.push(`  actual:   ${formatValue(verdict.actual, opts.maxValueLength)}`);
  if ("expected" in verdict) {
    lines.push(`  expected: ${formatValue(verdict.expected, opts.maxValueLength)}`);
  }
  return lines.join("\n");
}

export function formatVerdict(verdict: Verdict, opts: FormatOptions): string {
  switch (verdict.kind) {
    case "match":
    case "mismatch":
    case "missingMember":
    case "cyclicStructure":
      return formatEqualityVerdict(verdict, opts);
    case "allFound":
    case "missingElements":
    case "unexpectedElements":
    case "orderMismatch":
      return formatCollectionVerdict(verdict, opts);
    case "holds":
    case "doesNotHold":
      return formatPredicateVerdict(verdict, opts);
    default:
      return assertNever(verdict);
  }
}
