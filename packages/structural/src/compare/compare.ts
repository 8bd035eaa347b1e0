import { hasValueEquality, isAbsent, valueEquals } from "@checkwise/core";

import { MemberReadError } from "../errors.js";
import { DEFAULT_RECOGNIZERS, type SyntheticNameRecognizer } from "../members/names.js";
import { describeMember, resolveMemberWithStep, type MemberDescriptor, type Resolution } from "../members/resolve.js";
import { reflectiveIntrospector, type Introspector } from "../members/shape.js";
import { extendPath, formatPath, ROOT_PATH, type ComparisonPath } from "./path.js";
import type { CompareOptions, EqualityVerdict, MismatchReason } from "./types.js";

const MATCH: EqualityVerdict = Object.freeze({ kind: "match" });

type Walk = {
  introspector: Introspector;
  recognizers: readonly SyntheticNameRecognizer[];
  detectCycles: boolean;
  onTrace?: (message: string) => void;
  /** expected instance -> actual instances currently being compared against it */
  onStack: Map<object, Set<object>>;
};

function mismatch(
  path: ComparisonPath,
  expected: unknown,
  actual: unknown,
  reason: MismatchReason,
  member: MemberDescriptor | undefined,
): EqualityVerdict {
  return member === undefined
    ? { kind: "mismatch", path, actual, expected, reason }
    : { kind: "mismatch", path, actual, expected, reason, member };
}

function readMember(member: MemberDescriptor, instance: object, path: ComparisonPath): unknown {
  try {
    return member.read(instance);
  } catch (err) {
    throw new MemberReadError(path, member, { cause: err });
  }
}

function traceResolution(walk: Walk, path: ComparisonPath, rawName: string, resolution: Resolution): void {
  if (!walk.onTrace) return;
  if (resolution.step === "direct" && resolution.depth === 0) return;

  const { member } = resolution;
  walk.onTrace(
    `${formatPath(path)}: resolved ${rawName} to ${member.owningType.name}.${member.rawName} (${resolution.step}, depth ${resolution.depth})`,
  );
}

function compareMembers(expected: object, actual: object, path: ComparisonPath, walk: Walk): EqualityVerdict {
  const actualShape = walk.introspector.shapeOf(actual);
  const expectedShape = walk.introspector.shapeOf(expected);

  for (const rawName of actualShape.declaredNames()) {
    const actualMember = describeMember(actualShape, rawName, walk.recognizers);
    const memberPath = extendPath(path, actualMember.semanticName);

    const resolution = resolveMemberWithStep(expectedShape, rawName, walk.recognizers);
    if (resolution === null) {
      return { kind: "missingMember", path: memberPath, memberLabel: actualMember.semanticName, member: actualMember };
    }
    traceResolution(walk, memberPath, rawName, resolution);

    const actualValue = readMember(actualMember, actual, memberPath);
    const expectedValue = readMember(resolution.member, expected, memberPath);

    const verdict = compareValue(expectedValue, actualValue, memberPath, actualMember, walk);
    if (verdict.kind !== "match") return verdict;
  }

  return MATCH;
}

function compareComposite(expected: object, actual: object, path: ComparisonPath, walk: Walk): EqualityVerdict {
  if (!walk.detectCycles) return compareMembers(expected, actual, path, walk);

  let partners = walk.onStack.get(expected);
  if (partners?.has(actual)) {
    return { kind: "cyclicStructure", path, actual, expected };
  }
  if (!partners) {
    partners = new Set();
    walk.onStack.set(expected, partners);
  }

  partners.add(actual);
  try {
    return compareMembers(expected, actual, path, walk);
  } finally {
    partners.delete(actual);
    if (partners.size === 0) walk.onStack.delete(expected);
  }
}

function compareValue(
  expected: unknown,
  actual: unknown,
  path: ComparisonPath,
  member: MemberDescriptor | undefined,
  walk: Walk,
): EqualityVerdict {
  if (isAbsent(expected)) {
    return isAbsent(actual) ? MATCH : mismatch(path, expected, actual, "expectedAbsent", member);
  }

  if (typeof expected !== "object" || expected === null || hasValueEquality(expected)) {
    return valueEquals(expected, actual) ? MATCH : mismatch(path, expected, actual, "valueDiffers", member);
  }

  if (isAbsent(actual)) return mismatch(path, expected, actual, "actualAbsent", member);
  if (typeof actual !== "object" || actual === null) return mismatch(path, expected, actual, "notComposite", member);

  return compareComposite(expected, actual, path, walk);
}

/**
 * Compare two object graphs member by member and report the first difference.
 *
 * Members are enumerated on `actual`'s instance level; each one is resolved on
 * `expected` (see {@link resolveMemberWithStep}) and then compared by value
 * when the expected value defines value equality, or recursively otherwise.
 * The walk stops at the first non-match and returns it unchanged.
 *
 * The verdict carries no polarity: callers that check for *difference* flip
 * the interpretation themselves.
 */
export function compareFields(expected: unknown, actual: unknown, opts: CompareOptions = {}): EqualityVerdict {
  const walk: Walk = {
    introspector: opts.introspector ?? reflectiveIntrospector,
    recognizers: opts.recognizers ?? DEFAULT_RECOGNIZERS,
    detectCycles: opts.detectCycles ?? true,
    onStack: new Map(),
    ...(opts.onTrace ? { onTrace: opts.onTrace } : {}),
  };

  return compareValue(expected, actual, opts.path ?? ROOT_PATH, undefined, walk);
}

export function isMatch(verdict: EqualityVerdict): boolean {
  return verdict.kind === "match";
}
