/** A collection operation was handed an absent collection where one is required. */
export class InputMalformedError extends Error {
  override name = "InputMalformedError";
}
