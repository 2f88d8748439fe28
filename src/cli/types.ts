import type { ReadMode } from "../stats/types.js";
import type { LogFormat, LogLevel } from "../util/logger.js";

export type { LogFormat, LogLevel };

export interface CLIOptions {
  config?: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
  /** Run against the in-memory store instead of connecting. */
  dryRun?: boolean;
  /** Path the JSON report is written to. */
  output?: string;
}

export interface VersionOptions extends CLIOptions {}

export interface PingOptions extends CLIOptions {}

export interface ImportOptions extends CLIOptions {
  tag?: string;
  keys?: number;
  workers?: number;
  batchSize?: number;
}

export interface ImportAllOptions extends CLIOptions {
  versions: string[];
  keys?: number;
  workers?: number;
  batchSize?: number;
  /** Key count to project the completion time for. */
  project?: number;
}

export interface WriteOptions extends CLIOptions {
  tag?: string;
  keys?: number;
  durationSeconds?: number;
  start?: number;
  batchSize?: number;
}

export interface ReadOptions extends CLIOptions {
  mode: ReadMode;
  reads: number;
  workers?: number;
  batchSize?: number;
  primary?: string;
  secondary?: string;
  maxKeys?: number;
}

export interface InspectOptions extends CLIOptions {
  tag?: string;
  pattern?: string;
}

export interface FlushOptions extends CLIOptions {
  yes: boolean;
}
