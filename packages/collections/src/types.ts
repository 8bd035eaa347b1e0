/** One side of a positional comparison; `present: false` once that side ran out. */
export type Slot<T> = { present: true; value: T } | { present: false };

export type CollectionVerdict<T> =
  | { kind: "allFound" }
  | { kind: "missingElements"; missing: T[] }
  | { kind: "unexpectedElements"; unexpected: T[] }
  | {
      kind: "orderMismatch";
      index: number;
      actual: Slot<T>;
      expected: Slot<T>;
      actualItems: T[];
      /** `null` when no expected collection was given at all. */
      expectedItems: T[] | null;
    };
