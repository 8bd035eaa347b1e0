function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

/**
 * True for iterables that stand for a whole collection. Strings (primitive or
 * boxed) are iterable too, but always mean a single element.
 */
export function isUnwrappableCollection(value: unknown): value is Iterable<unknown> {
  return typeof value !== "string" && !(value instanceof String) && isIterable(value);
}

/**
 * Turn the arguments of a variadic collection check into the expected
 * collection.
 *
 * `contains(x, [1, 2])` and `contains(x, 1, 2)` mean the same thing: a single
 * non-string iterable argument is the expected collection. Anything else,
 * including a single string, is a list of individual expected elements.
 */
export function expectedValuesFrom(args: readonly unknown[]): unknown[] {
  if (args.length === 1) {
    const [only] = args;
    if (isUnwrappableCollection(only)) return Array.from(only);
  }
  return [...args];
}
