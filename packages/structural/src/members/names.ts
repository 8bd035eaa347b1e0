/** Where an introspected member name came from. */
export type MemberOrigin = "ordinary" | "synthesizedAccessor" | "synthesizedCapture";

/**
 * Recognizes one compiler/convention-synthesized naming pattern.
 *
 * `match` returns the semantic (source-level) name when `rawName` is wrapped
 * in this recognizer's pattern, and `null` otherwise.
 */
export interface SyntheticNameRecognizer {
  id: string;
  origin: Exclude<MemberOrigin, "ordinary">;
  match(rawName: string): string | null;
}

export type NormalizedName = {
  semanticName: string;
  origin: MemberOrigin;
};

function anchoredRecognizer(
  id: string,
  origin: SyntheticNameRecognizer["origin"],
  pattern: RegExp,
): SyntheticNameRecognizer {
  return {
    id,
    origin,
    match(rawName) {
      const m = pattern.exec(rawName);
      return m?.[1] ?? null;
    },
  };
}

/** `_name`: the field a TypeScript `get name()` / `set name()` pair stores into. */
export const accessorBackingField = anchoredRecognizer(
  "accessorBackingField",
  "synthesizedAccessor",
  /^_([A-Za-z$][\w$]*)$/,
);

/** `__private_<n>_name`: the key a loose-mode transform emits for `#name`. */
export const privateFieldKey = anchoredRecognizer(
  "privateFieldKey",
  "synthesizedCapture",
  /^__private_\d+_([A-Za-z$][\w$]*)$/,
);

export const BUILTIN_RECOGNIZERS = {
  accessorBackingField,
  privateFieldKey,
} as const satisfies Record<string, SyntheticNameRecognizer>;

export type BuiltinRecognizerId = keyof typeof BUILTIN_RECOGNIZERS;

export function isBuiltinRecognizerId(id: string): id is BuiltinRecognizerId {
  return Object.prototype.hasOwnProperty.call(BUILTIN_RECOGNIZERS, id);
}

/** Tried in this order; accessor backing fields take precedence. */
export const DEFAULT_RECOGNIZERS: readonly SyntheticNameRecognizer[] = [accessorBackingField, privateFieldKey];

/**
 * Map a raw member name to the name a test author wrote in source.
 *
 * The first recognizer that matches decides the origin. Partial matches do not
 * count, and an empty recognizer list turns demangling off entirely.
 */
export function normalizeMemberName(
  rawName: string,
  recognizers: readonly SyntheticNameRecognizer[] = DEFAULT_RECOGNIZERS,
): NormalizedName {
  for (const recognizer of recognizers) {
    const semanticName = recognizer.match(rawName);
    if (semanticName !== null) {
      return { semanticName, origin: recognizer.origin };
    }
  }

  return { semanticName: rawName, origin: "ordinary" };
}
