/** A broken internal guarantee: a bug in checkwise or in a plugged-in introspector. */
export class InvariantError extends Error {
  override name = "InvariantError";
}

/** Throws {@link InvariantError} with `message` unless `condition` holds. */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}

/**
* Exhaustiveness helper for `switch` statements over verdict kinds.
*
* Throws an error if called.
*/
export function assertNever(value: never, message = "Unexpected value"): never {
  throw new Error(`${message}: ${String(value)}`);
}

/** `null` and `undefined` are both treated as "no value". */
export function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

export { hasValueEquality, valueEquals } from "./equality.js";
export type { ValueEquatable } from "./equality.js";
export {
  DEBUG_ENV_VAR,
  defaultOnWarning,
  isDebugEnabled,
  type WarningHandler,
} from "./warnings.js";
