import type {
  CLIOptions,
  FlushOptions,
  ImportAllOptions,
  ImportOptions,
  InspectOptions,
  LogFormat,
  LogLevel,
  ReadOptions,
  WriteOptions,
} from "./types.js";
import { isReadMode } from "../reader/readBenchmark.js";
import { VersionTagSchema } from "../config/types.js";
import { DEFAULT_READ_COUNT } from "../config/constants.js";

export type ParsedOptionValues = Record<string, unknown>;

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const LOG_FORMATS: readonly LogFormat[] = ["json", "pretty"];

function stringValue(values: ParsedOptionValues, name: string): string | undefined {
  const value = values[name];
  if (value === undefined || value === false) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`--${name} requires a value`);
  }
  return value;
}

function parseInteger(name: string, raw: string, min: number): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(
      min === 0
        ? `--${name} must be a non-negative integer`
        : `--${name} must be an integer of at least ${min}`,
    );
  }
  return value;
}

function positiveInt(values: ParsedOptionValues, name: string): number | undefined {
  const raw = stringValue(values, name);
  return raw === undefined ? undefined : parseInteger(name, raw, 1);
}

function nonNegativeInt(values: ParsedOptionValues, name: string): number | undefined {
  const raw = stringValue(values, name);
  return raw === undefined ? undefined : parseInteger(name, raw, 0);
}

function versionTag(values: ParsedOptionValues, name: string): string | undefined {
  const raw = stringValue(values, name);
  if (raw === undefined) {
    return undefined;
  }
  const result = VersionTagSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`--${name} is not a valid version tag: ${raw}`);
  }
  return result.data;
}

export function parseGlobalOptions(values: ParsedOptionValues): CLIOptions {
  const options: CLIOptions = {
    config: stringValue(values, "config"),
    output: stringValue(values, "output"),
    dryRun: values["dry-run"] === true,
  };

  const level = stringValue(values, "log-level");
  if (level !== undefined) {
    const match = LOG_LEVELS.find((l) => l === level);
    if (!match) {
      throw new Error(`--log-level must be one of: ${LOG_LEVELS.join(", ")}`);
    }
    options.logLevel = match;
  }

  const format = stringValue(values, "log-format");
  if (format !== undefined) {
    const match = LOG_FORMATS.find((f) => f === format);
    if (!match) {
      throw new Error(`--log-format must be one of: ${LOG_FORMATS.join(", ")}`);
    }
    options.logFormat = match;
  }

  return options;
}

export function parseImportOptions(
  global: CLIOptions,
  values: ParsedOptionValues,
): ImportOptions {
  return {
    ...global,
    tag: versionTag(values, "tag"),
    keys: positiveInt(values, "keys"),
    workers: positiveInt(values, "workers"),
    batchSize: positiveInt(values, "batch-size"),
  };
}

export function parseImportAllOptions(
  global: CLIOptions,
  values: ParsedOptionValues,
): ImportAllOptions {
  const raw = stringValue(values, "versions");
  if (raw === undefined) {
    throw new Error("--versions is required, e.g. --versions v22,v23");
  }
  const versions = raw
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
  if (versions.length === 0) {
    throw new Error("--versions must name at least one version");
  }
  for (const version of versions) {
    if (!VersionTagSchema.safeParse(version).success) {
      throw new Error(`--versions contains an invalid version tag: ${version}`);
    }
  }

  return {
    ...global,
    versions,
    keys: positiveInt(values, "keys"),
    workers: positiveInt(values, "workers"),
    batchSize: positiveInt(values, "batch-size"),
    project: positiveInt(values, "project"),
  };
}

export function parseWriteOptions(
  global: CLIOptions,
  values: ParsedOptionValues,
): WriteOptions {
  return {
    ...global,
    tag: versionTag(values, "tag"),
    keys: positiveInt(values, "keys"),
    durationSeconds: positiveInt(values, "duration"),
    start: nonNegativeInt(values, "start"),
    batchSize: positiveInt(values, "batch-size"),
  };
}

export function parseReadOptions(
  global: CLIOptions,
  values: ParsedOptionValues,
): ReadOptions {
  const mode = stringValue(values, "mode") ?? "parallel-pipeline";
  if (!isReadMode(mode)) {
    throw new Error(
      "--mode must be one of: sequential, pipeline, parallel-pipeline",
    );
  }

  return {
    ...global,
    mode,
    reads: nonNegativeInt(values, "reads") ?? DEFAULT_READ_COUNT,
    workers: positiveInt(values, "workers"),
    batchSize: positiveInt(values, "batch-size"),
    primary: versionTag(values, "primary"),
    secondary: versionTag(values, "secondary"),
    maxKeys: positiveInt(values, "max-keys"),
  };
}

export function parseInspectOptions(
  global: CLIOptions,
  values: ParsedOptionValues,
): InspectOptions {
  return {
    ...global,
    tag: versionTag(values, "tag"),
    pattern: stringValue(values, "pattern"),
  };
}

export function parseFlushOptions(
  global: CLIOptions,
  values: ParsedOptionValues,
): FlushOptions {
  return { ...global, yes: values.yes === true };
}
