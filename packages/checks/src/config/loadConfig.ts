import fs from "node:fs/promises";
import path from "node:path";

import YAML from "yaml";

import { defaultOnWarning, type WarningHandler } from "@checkwise/core";
import { isBuiltinRecognizerId, type BuiltinRecognizerId } from "@checkwise/structural";

import { ConfigError } from "../errors.js";
import {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATH,
  type CheckwiseConfig,
  type ReportConfig,
  type StructuralConfig,
} from "./types.js";

const KNOWN_TOP_LEVEL_KEYS = new Set(["schemaVersion", "structural", "report"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseStructural(value: unknown, onWarning: WarningHandler, source: string): StructuralConfig {
  const defaults = DEFAULT_CONFIG.structural;
  if (value === undefined) {
    return { recognizers: [...defaults.recognizers], detectCycles: defaults.detectCycles };
  }
  if (!isRecord(value)) {
    throw new ConfigError("structural must be an object");
  }

  let recognizers: BuiltinRecognizerId[] = [...defaults.recognizers];
  const rawRecognizers = value.recognizers;
  if (rawRecognizers !== undefined) {
    if (!Array.isArray(rawRecognizers) || !rawRecognizers.every((r) => typeof r === "string")) {
      throw new ConfigError("structural.recognizers must be a string[]");
    }

    // Accept unknown recognizers for forward-compat, but drop them.
    const unknownIds = rawRecognizers.filter((r) => !isBuiltinRecognizerId(r));
    if (unknownIds.length > 0) {
      onWarning(`warning: unknown recognizer(s) in ${source}: ${unknownIds.sort().join(", ")} (ignoring)`);
    }
    recognizers = rawRecognizers.filter(isBuiltinRecognizerId);
  }

  const detectCycles = value.detectCycles ?? defaults.detectCycles;
  if (typeof detectCycles !== "boolean") {
    throw new ConfigError(`structural.detectCycles must be a boolean (got ${String(detectCycles)})`);
  }

  return { recognizers, detectCycles };
}

function parseReport(value: unknown): ReportConfig {
  if (value === undefined) return { ...DEFAULT_CONFIG.report };
  if (!isRecord(value)) {
    throw new ConfigError("report must be an object");
  }

  const maxValueLength = value.maxValueLength ?? DEFAULT_CONFIG.report.maxValueLength;
  if (typeof maxValueLength !== "number" || !Number.isInteger(maxValueLength) || maxValueLength < 1) {
    throw new ConfigError(`report.maxValueLength must be a positive integer (got ${String(maxValueLength)})`);
  }

  return { maxValueLength };
}

/**
 * Validate an already-parsed config document.
 *
 * Omitted sections take their defaults; unknown top-level keys and unknown
 * recognizer ids are reported through `onWarning` and ignored.
 */
export function parseConfig(
  parsed: unknown,
  opts: { source?: string; onWarning?: WarningHandler } = {},
): CheckwiseConfig {
  const source = opts.source ?? DEFAULT_CONFIG_PATH;
  const onWarning = opts.onWarning ?? defaultOnWarning;

  if (!isRecord(parsed)) {
    throw new ConfigError("config root must be an object");
  }

  const schemaVersion = parsed.schemaVersion;
  if (schemaVersion !== 1) {
    throw new ConfigError(`schemaVersion must be 1 (got ${String(schemaVersion)})`);
  }

  const unknownKeys = Object.keys(parsed).filter((k) => !KNOWN_TOP_LEVEL_KEYS.has(k));
  if (unknownKeys.length > 0) {
    onWarning(`warning: unknown key(s) in ${source}: ${unknownKeys.sort().join(", ")} (ignoring)`);
  }

  return {
    schemaVersion: 1,
    structural: parseStructural(parsed.structural, onWarning, source),
    report: parseReport(parsed.report),
  };
}

export interface LoadConfigOptions {
  cwd: string;
  /** Relative to `cwd`; defaults to `checkwise.yml`. */
  configPath?: string;
  onWarning?: WarningHandler;
}

export async function loadConfig(
  opts: LoadConfigOptions,
): Promise<{ configPath: string; config: CheckwiseConfig }> {
  const configPath = opts.configPath ?? DEFAULT_CONFIG_PATH;
  const absPath = path.resolve(opts.cwd, configPath);

  let raw: string;
  try {
    raw = await fs.readFile(absPath, "utf8");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;

    if (code === "ENOENT") {
      throw new ConfigError(`config not found: ${configPath}`);
    }

    if (code === "EACCES" || code === "EPERM") {
      throw new ConfigError(`cannot read config (permission denied): ${configPath}`);
    }

    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`failed to read config ${configPath}: ${msg}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`invalid YAML in ${configPath}: ${msg}`);
  }

  return {
    configPath,
    config: parseConfig(parsed, { source: configPath, onWarning: opts.onWarning }),
  };
}
