import { invariant } from "@checkwise/core";

import { DEFAULT_RECOGNIZERS, normalizeMemberName, type MemberOrigin, type SyntheticNameRecognizer } from "./names.js";
import type { TypeShape } from "./shape.js";

/** A resolved member: where it lives, what it is called, how to read it. */
export type MemberDescriptor = {
  readonly rawName: string;
  readonly semanticName: string;
  readonly origin: MemberOrigin;
  readonly owningType: TypeShape;
  read(instance: object): unknown;
};

/** How a counterpart was found, for tracing. */
export type ResolutionStep = "direct" | "semantic";

export type Resolution = {
  member: MemberDescriptor;
  step: ResolutionStep;
  /** Number of ancestor levels climbed (0 = the shape passed in). */
  depth: number;
};

/**
 * Build a descriptor for a raw name declared on `shape`.
 *
 * Throws `InvariantError` when `shape.has(rawName)` disagrees, which only a
 * shape whose `declaredNames()` and `has()` are out of step can cause.
 */
export function describeMember(
  shape: TypeShape,
  rawName: string,
  recognizers: readonly SyntheticNameRecognizer[] = DEFAULT_RECOGNIZERS,
): MemberDescriptor {
  invariant(shape.has(rawName), `${shape.name} lists ${rawName} but does not declare it`);

  const { semanticName, origin } = normalizeMemberName(rawName, recognizers);
  return Object.freeze({
    rawName,
    semanticName,
    origin,
    owningType: shape,
    read: (instance: object) => shape.read(instance, rawName),
  });
}

function resolveAt(
  shape: TypeShape,
  requestedName: string,
  semanticName: string,
  recognizers: readonly SyntheticNameRecognizer[],
  depth: number,
): Resolution | null {
  if (shape.has(requestedName)) {
    return { member: describeMember(shape, requestedName, recognizers), step: "direct", depth };
  }

  for (const candidate of shape.declaredNames()) {
    if (normalizeMemberName(candidate, recognizers).semanticName === semanticName) {
      return { member: describeMember(shape, candidate, recognizers), step: "semantic", depth };
    }
  }

  if (shape.base === null) return null;
  return resolveAt(shape.base, requestedName, semanticName, recognizers, depth + 1);
}

/**
 * Find the member `requestedName` refers to on `shape` or one of its
 * ancestors.
 *
 * Each level is tried by exact raw name first, then by semantic name, so a
 * hand-written `name` field and a synthesized `_name` backing field resolve to
 * each other. Returns `null` once the hierarchy is exhausted.
 */
export function resolveMemberWithStep(
  shape: TypeShape,
  requestedName: string,
  recognizers: readonly SyntheticNameRecognizer[] = DEFAULT_RECOGNIZERS,
): Resolution | null {
  const { semanticName } = normalizeMemberName(requestedName, recognizers);
  return resolveAt(shape, requestedName, semanticName, recognizers, 0);
}

export function resolveMember(
  shape: TypeShape,
  requestedName: string,
  recognizers: readonly SyntheticNameRecognizer[] = DEFAULT_RECOGNIZERS,
): MemberDescriptor | null {
  return resolveMemberWithStep(shape, requestedName, recognizers)?.member ?? null;
}
