/** Receives non-fatal diagnostics (ignored config keys, traces). */
export type WarningHandler = (message: string) => void;

export const DEBUG_ENV_VAR = "CHECKWISE_DEBUG";

export const defaultOnWarning: WarningHandler = (message) => {
  if (typeof console !== "undefined" && typeof console.warn === "function") {
    console.warn(message);
  }
};

/**
 * Whether debug tracing was requested through `CHECKWISE_DEBUG=1`.
 *
 * Reads `process.env` unless an explicit environment is passed in.
 */
export function isDebugEnabled(env: Record<string, string | undefined> = process.env): boolean {
  return env[DEBUG_ENV_VAR] === "1";
}
