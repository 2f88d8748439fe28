import { existsSync, readFileSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { AppConfigSchema, type AppConfig, type ResolvedConfig } from "./types.js";
import { CONFIG_FILE_NAME, ENV_PREFIX } from "./constants.js";
import { findPackageRoot } from "../util/findPackageRoot.js";
import { ConfigError } from "../util/errors.js";
import { logger } from "../util/logger.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

type EnvValueKind = "string" | "int" | "boolean";

interface EnvOverride {
  path: readonly [string] | readonly [string, string];
  kind: EnvValueKind;
}

/**
 * Every supported override, keyed by the variable name without ENV_PREFIX.
 */
export const ENV_OVERRIDES = {
  STORE_HOST: { path: ["store", "host"], kind: "string" },
  STORE_PORT: { path: ["store", "port"], kind: "int" },
  STORE_DB: { path: ["store", "db"], kind: "int" },
  STORE_PASSWORD: { path: ["store", "password"], kind: "string" },
  STORE_CLUSTER: { path: ["store", "cluster"], kind: "boolean" },
  WRITER_COUNT: { path: ["writer", "numWriters"], kind: "int" },
  WRITER_BATCH_SIZE: { path: ["writer", "batchSize"], kind: "int" },
  WRITER_TTL: { path: ["writer", "keyTtlSeconds"], kind: "int" },
  WRITER_MAX_KEYS: { path: ["writer", "maxKeys"], kind: "int" },
  READER_COUNT: { path: ["reader", "numReaders"], kind: "int" },
  READER_BATCH_SIZE: { path: ["reader", "batchSize"], kind: "int" },
  VERSION: { path: ["version"], kind: "string" },
  PRIMARY_VERSION: { path: ["reader", "primaryVersion"], kind: "string" },
  SECONDARY_VERSION: { path: ["reader", "secondaryVersion"], kind: "string" },
  LOG_LEVEL: { path: ["logLevel"], kind: "string" },
} as const satisfies Record<string, EnvOverride>;

export type EnvOverrideKey = keyof typeof ENV_OVERRIDES;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function expandEnvVars(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === "string") {
    return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      const value = env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not set`);
      }
      return value;
    });
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => expandEnvVars(item, env));
  }

  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = expandEnvVars(value, env);
    }
    return result;
  }

  return obj;
}

function convertEnvValue(raw: string, kind: EnvValueKind): string | number | boolean {
  switch (kind) {
    case "string":
      return raw;
    case "int": {
      const trimmed = raw.trim();
      if (!/^-?\d+$/.test(trimmed)) {
        throw new Error(`expected an integer, got "${raw}"`);
      }
      return parseInt(trimmed, 10);
    }
    case "boolean": {
      const normalized = raw.trim().toLowerCase();
      if (["1", "true", "yes", "on"].includes(normalized)) return true;
      if (["0", "false", "no", "off"].includes(normalized)) return false;
      throw new Error(`expected a boolean, got "${raw}"`);
    }
  }
}

function withValueAt(
  base: Record<string, unknown>,
  path: readonly string[],
  value: unknown,
): Record<string, unknown> {
  const [head, ...rest] = path;
  if (head === undefined) {
    return base;
  }
  if (rest.length === 0) {
    return { ...base, [head]: value };
  }
  const child = base[head];
  return {
    ...base,
    [head]: withValueAt(isRecord(child) ? child : {}, rest, value),
  };
}

function formatIssues(error: {
  errors: Array<{ path: Array<string | number>; message: string }>;
}): string {
  return error.errors
    .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
    .join("\n");
}

/**
 * Applies GEOKV_* overrides one at a time. An override that fails conversion
 * or schema validation is logged and dropped; the previous value stays.
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  let current = raw;

  for (const [name, override] of Object.entries(ENV_OVERRIDES)) {
    const envVar = `${ENV_PREFIX}${name}`;
    const value = env[envVar];
    if (value === undefined) {
      continue;
    }

    let converted: string | number | boolean;
    try {
      converted = convertEnvValue(value, override.kind);
    } catch (err) {
      logger.warn(`Ignoring invalid environment variable ${envVar}`, {
        value,
        error: err,
      });
      continue;
    }

    const candidate = withValueAt(current, override.path, converted);
    const result = AppConfigSchema.safeParse(candidate);
    if (!result.success) {
      logger.warn(`Ignoring invalid environment variable ${envVar}`, {
        value,
        issues: formatIssues(result.error),
      });
      continue;
    }
    current = candidate;
  }

  return current;
}

/**
 * Version tag derived from the day of month, e.g. `v22` on the 22nd.
 */
export function generateVersionFromDate(date: Date = new Date()): string {
  return `v${date.getDate()}`;
}

export function defaultConfigPath(): string {
  return resolve(findPackageRoot(__dirname), "config", CONFIG_FILE_NAME);
}

function readConfigFile(filePath: string): Record<string, unknown> {
  const rawContent = readFileSync(filePath, "utf-8");
  let parsedConfig: unknown;

  try {
    parsedConfig = JSON.parse(rawContent);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new ConfigError(`Invalid JSON in config file: ${filePath}`);
    }
    throw err;
  }

  if (!isRecord(parsedConfig)) {
    throw new ConfigError(`Config file must contain a JSON object: ${filePath}`);
  }
  return parsedConfig;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  now?: Date;
}

/**
 * Loads config from, in order: the explicit path, GEOKV_CONFIG, or the
 * package's config/geokv.config.json. Only the default file may be absent.
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  const env = options.env ?? process.env;
  const explicitPath = options.configPath ?? env[`${ENV_PREFIX}CONFIG`];
  const filePath = explicitPath ? resolve(explicitPath) : defaultConfigPath();

  let fileConfig: Record<string, unknown> = {};
  if (existsSync(filePath)) {
    const expanded = expandEnvVars(readConfigFile(filePath), env);
    fileConfig = isRecord(expanded) ? expanded : {};
  } else if (explicitPath) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  const fileResult = AppConfigSchema.safeParse(fileConfig);
  if (!fileResult.success) {
    throw new ConfigError(
      `Config validation failed:\n${formatIssues(fileResult.error)}`,
    );
  }

  const merged = AppConfigSchema.parse(applyEnvOverrides(fileConfig, env));
  return resolveVersion(merged, options.now);
}

export function resolveVersion(config: AppConfig, now?: Date): ResolvedConfig {
  return { ...config, version: config.version ?? generateVersionFromDate(now) };
}
