export type { MemberOrigin, NormalizedName, SyntheticNameRecognizer, BuiltinRecognizerId } from "./members/names.js";
export {
  accessorBackingField,
  BUILTIN_RECOGNIZERS,
  DEFAULT_RECOGNIZERS,
  isBuiltinRecognizerId,
  normalizeMemberName,
  privateFieldKey,
} from "./members/names.js";

export type { Introspector, TypeShape } from "./members/shape.js";
export { reflectiveIntrospector } from "./members/shape.js";

export type { MemberDescriptor, Resolution, ResolutionStep } from "./members/resolve.js";
export { describeMember, resolveMember, resolveMemberWithStep } from "./members/resolve.js";

export type { ComparisonPath } from "./compare/path.js";
export { extendPath, formatPath, ROOT_PATH } from "./compare/path.js";

export type { CompareOptions, EqualityVerdict, MismatchReason } from "./compare/types.js";
export { compareFields, isMatch } from "./compare/compare.js";

export { MemberReadError } from "./errors.js";
