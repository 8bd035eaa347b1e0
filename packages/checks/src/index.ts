export type { CheckOutcome, PredicateDetails, PredicateVerdict, Verdict } from "./verdict.js";
export { interpretVerdict } from "./verdict.js";

export type { Checks, ChecksOptions } from "./checks.js";
export { createChecks } from "./checks.js";

export { CheckFailure, ConfigError } from "./errors.js";

export type { FormatOptions } from "./reporting/formatVerdict.js";
export {
  formatCollectionVerdict,
  formatEqualityVerdict,
  formatPredicateVerdict,
  formatVerdict,
} from "./reporting/formatVerdict.js";
export { formatValue, safeStringify } from "./reporting/safeStringify.js";

export type { CheckwiseConfig, ReportConfig, StructuralConfig } from "./config/types.js";
export { DEFAULT_CONFIG, DEFAULT_CONFIG_PATH } from "./config/types.js";
export type { LoadConfigOptions } from "./config/loadConfig.js";
export { loadConfig, parseConfig } from "./config/loadConfig.js";
