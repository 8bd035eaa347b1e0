import type { Verdict } from "./verdict.js";

/** Error used for invalid or unreadable checkwise configuration. */
export class ConfigError extends Error {
  override name = "ConfigError";
}

/** A check whose interpreted verdict did not pass. */
export class CheckFailure extends Error {
  override name = "CheckFailure";

  constructor(
    readonly check: string,
    readonly negated: boolean,
    readonly verdict: Verdict,
    message: string,
  ) {
    super(message);
  }
}
