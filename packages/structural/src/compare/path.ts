/** Member labels from the comparison root down to the inspected member. */
export type ComparisonPath = readonly string[];

export const ROOT_PATH: ComparisonPath = [];

const INDEX_LABEL = /^(0|[1-9]\d*)$/;

export function extendPath(path: ComparisonPath, label: string): ComparisonPath {
  return [...path, label];
}

/**
 * Render a path the way a test author would write the access:
 * `address.city`, `lines[2].sku`, `[0]` for a top-level array element.
 */
export function formatPath(path: ComparisonPath): string {
  let out = "";
  for (const label of path) {
    if (INDEX_LABEL.test(label)) {
      out += `[${label}]`;
    } else {
      out = out === "" ? label : `${out}.${label}`;
    }
  }
  return out;
}
