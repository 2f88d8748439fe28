import { z } from "zod";
import {
  DEFAULT_STORE_HOST,
  DEFAULT_STORE_PORT,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_KEY_PREFIX,
  DEFAULT_WRITER_COUNT,
  DEFAULT_WRITER_BATCH_SIZE,
  DEFAULT_WRITE_CHUNK,
  DEFAULT_KEY_TTL_SECONDS,
  DEFAULT_MAX_KEYS,
  MAX_WORKERS,
  DEFAULT_VERSION_PAUSE_MS,
  DEFAULT_READER_COUNT,
  DEFAULT_READER_BATCH_SIZE,
  DEFAULT_PRIMARY_VERSION,
  DEFAULT_SECONDARY_VERSION,
  DEFAULT_PROGRESS_INTERVAL_MS,
  DEFAULT_SAMPLE_COUNT,
} from "./constants.js";

/**
 * Version tags end up inside store keys, so they cannot contain the key
 * separator or glob characters.
 */
export const VersionTagSchema = z
  .string()
  .min(1)
  .max(32)
  .regex(/^[A-Za-z0-9_-]+$/, "must be alphanumeric, '-' or '_'");

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const StoreConfigSchema = z.object({
  host: z.string().min(1).default(DEFAULT_STORE_HOST),
  port: z.number().int().min(1).max(65535).default(DEFAULT_STORE_PORT),
  db: z.number().int().min(0).default(0),
  password: z.string().optional(),
  cluster: z.boolean().default(false),
  connectTimeoutMs: z
    .number()
    .int()
    .min(1)
    .default(DEFAULT_CONNECT_TIMEOUT_MS),
  commandTimeoutMs: z
    .number()
    .int()
    .min(0)
    .default(DEFAULT_COMMAND_TIMEOUT_MS),
  keyPrefix: z.string().min(1).default(DEFAULT_KEY_PREFIX),
});

export type StoreConfig = z.infer<typeof StoreConfigSchema>;

export const WriterConfigSchema = z.object({
  numWriters: z
    .number()
    .int()
    .min(1)
    .max(MAX_WORKERS)
    .default(DEFAULT_WRITER_COUNT),
  batchSize: z.number().int().min(1).default(DEFAULT_WRITER_BATCH_SIZE),
  writeChunk: z.number().int().min(1).default(DEFAULT_WRITE_CHUNK),
  keyTtlSeconds: z.number().int().min(1).default(DEFAULT_KEY_TTL_SECONDS),
  maxKeys: z.number().int().min(1).default(DEFAULT_MAX_KEYS),
  skipProbability: z.number().min(0).max(1).default(0),
  versionPauseMs: z.number().int().min(0).default(DEFAULT_VERSION_PAUSE_MS),
});

export type WriterConfig = z.infer<typeof WriterConfigSchema>;

export const ReaderConfigSchema = z.object({
  numReaders: z
    .number()
    .int()
    .min(1)
    .max(MAX_WORKERS)
    .default(DEFAULT_READER_COUNT),
  batchSize: z.number().int().min(1).default(DEFAULT_READER_BATCH_SIZE),
  primaryVersion: VersionTagSchema.default(DEFAULT_PRIMARY_VERSION),
  secondaryVersion: VersionTagSchema.default(DEFAULT_SECONDARY_VERSION),
});

export type ReaderConfig = z.infer<typeof ReaderConfigSchema>;

export const RecordsConfigSchema = z.object({
  sampleCount: z.number().int().min(1).default(DEFAULT_SAMPLE_COUNT),
});

export type RecordsConfig = z.infer<typeof RecordsConfigSchema>;

export const TracingConfigSchema = z.object({
  enabled: z.boolean().default(false),
  exporterType: z.enum(["console", "memory"]).default("console"),
  serviceName: z.string().min(1).optional(),
});

export type TracingConfig = z.infer<typeof TracingConfigSchema>;

export const AppConfigSchema = z.object({
  store: StoreConfigSchema.default({}),
  writer: WriterConfigSchema.default({}),
  reader: ReaderConfigSchema.default({}),
  records: RecordsConfigSchema.default({}),
  tracing: TracingConfigSchema.default({}),
  /**
   * Version tag the writers target. Falls back to `v<day-of-month>`.
   */
  version: VersionTagSchema.optional(),
  progressIntervalMs: z
    .number()
    .int()
    .min(1)
    .default(DEFAULT_PROGRESS_INTERVAL_MS),
  logLevel: LogLevelSchema.default("info"),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Config after loading: the write version is always resolved.
 */
export type ResolvedConfig = AppConfig & { version: string };
