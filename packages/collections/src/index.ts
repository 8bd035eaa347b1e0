export type { CollectionVerdict, Slot } from "./types.js";
export { InputMalformedError } from "./errors.js";
export { expectedValuesFrom, isUnwrappableCollection } from "./expectedValues.js";
export {
  containsAtLeast,
  containsExactly,
  containsOnly,
  reconcileAtLeast,
  reconcileExactly,
  reconcileOnly,
} from "./reconcile.js";
