import type { MemberDescriptor } from "../members/resolve.js";
import type { SyntheticNameRecognizer } from "../members/names.js";
import type { Introspector } from "../members/shape.js";
import type { ComparisonPath } from "./path.js";

export type MismatchReason =
  /** Both values are present and the value-equality operation says they differ. */
  | "valueDiffers"
  /** The expected value is absent but the actual one is not. */
  | "expectedAbsent"
  /** A composite was expected but the actual value is absent. */
  | "actualAbsent"
  /** A composite was expected but the actual value is a primitive. */
  | "notComposite";

export type EqualityVerdict =
  | { kind: "match" }
  | {
      kind: "mismatch";
      path: ComparisonPath;
      actual: unknown;
      expected: unknown;
      reason: MismatchReason;
      /** The actual-side member at `path`; absent for a root-level mismatch. */
      member?: MemberDescriptor;
    }
  | {
      kind: "missingMember";
      path: ComparisonPath;
      memberLabel: string;
      member: MemberDescriptor;
    }
  | {
      kind: "cyclicStructure";
      path: ComparisonPath;
      actual: unknown;
      expected: unknown;
    };

export type CompareOptions = {
  /** Defaults to {@link reflectiveIntrospector}. */
  introspector?: Introspector;

  /** Synthesized-name recognizers, tried in order. `[]` disables demangling. */
  recognizers?: readonly SyntheticNameRecognizer[];

  /** Prefix prepended to every reported path (for nested comparisons). */
  path?: ComparisonPath;

  /**
   * Report `cyclicStructure` when an (expected, actual) pair is revisited on
   * the current recursion stack (default `true`).
   *
   * With `false` the walk has no guard and self-referential graphs recurse
   * until the stack is exhausted.
   */
  detectCycles?: boolean;

  /**
   * Trace hook, called when a counterpart member is found by semantic name or
   * on an ancestor level instead of by direct lookup.
   */
  onTrace?: (message: string) => void;
};
