import type { MemberDescriptor } from "./members/resolve.js";
import { formatPath, type ComparisonPath } from "./compare/path.js";

/** A member accessor threw while the comparator was reading it. */
export class MemberReadError extends Error {
  override name = "MemberReadError";

  constructor(
    readonly path: ComparisonPath,
    readonly member: MemberDescriptor,
    options?: { cause?: unknown },
  ) {
    super(`failed to read ${member.owningType.name}.${member.rawName} at ${formatPath(path) || "<root>"}`, options);
  }
}
