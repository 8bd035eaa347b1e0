import type { BuiltinRecognizerId } from "@checkwise/structural";

export interface StructuralConfig {
  recognizers: BuiltinRecognizerId[];
  detectCycles: boolean;
}

export interface ReportConfig {
  /** Rendered values longer than this are truncated with `…`. */
  maxValueLength: number;
}

export interface CheckwiseConfig {
  schemaVersion: 1;
  structural: StructuralConfig;
  report: ReportConfig;
}

export const DEFAULT_CONFIG_PATH = "checkwise.yml";

export const DEFAULT_CONFIG: CheckwiseConfig = {
  schemaVersion: 1,
  structural: {
    recognizers: ["accessorBackingField", "privateFieldKey"],
    detectCycles: true,
  },
  report: {
    maxValueLength: 120,
  },
};
