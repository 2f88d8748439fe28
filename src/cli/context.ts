import { writeFileSync } from "fs";
import { resolve } from "path";
import type { CLIOptions } from "./types.js";
import type { ResolvedConfig } from "../config/types.js";
import { loadConfig } from "../config/loadConfig.js";
import type { KeyValueStore } from "../store/types.js";
import { MemoryStore } from "../store/memoryStore.js";
import { connectStore } from "../store/redisStore.js";
import { logger, initTracing, shutdownTracing } from "../util/logger.js";
import { abortOnSignals } from "../util/cancellation.js";

export interface CommandContext {
  config: ResolvedConfig;
  store: KeyValueStore;
  signal: AbortSignal;
}

/**
 * Loads config and applies the logging and tracing settings. CLI flags win
 * over the config file.
 */
export function setupCommand(options: CLIOptions): ResolvedConfig {
  const config = loadConfig({ configPath: options.config });
  logger.setLevel(options.logLevel ?? config.logLevel);
  logger.setFormat(options.logFormat ?? "pretty");
  initTracing(config.tracing);
  return config;
}

export type StoreOpener = (
  config: ResolvedConfig,
  dryRun: boolean,
) => Promise<KeyValueStore>;

export async function openStore(
  config: ResolvedConfig,
  dryRun: boolean,
): Promise<KeyValueStore> {
  if (dryRun) {
    logger.info("Dry run: using the in-memory store");
    return new MemoryStore();
  }
  return connectStore(config.store);
}

/**
 * Runs `fn` with a connected store and an AbortSignal tied to SIGINT and
 * SIGTERM. The store is closed afterwards; tracing is shut down even when
 * the store never connected.
 */
export async function withCommandContext<T>(
  options: CLIOptions,
  fn: (ctx: CommandContext) => Promise<T>,
  open: StoreOpener = openStore,
): Promise<T> {
  const config = setupCommand(options);

  try {
    const store = await open(config, options.dryRun ?? false);
    const controller = new AbortController();
    const unregister = abortOnSignals(controller, (signal) => {
      logger.warn(`Received ${signal}, stopping after the current batch`);
    });

    try {
      return await fn({ config, store, signal: controller.signal });
    } finally {
      unregister();
      await store.close();
    }
  } finally {
    await shutdownTracing();
  }
}

/**
 * Writes `report` as JSON when `--output` was given.
 */
export function writeReport(output: string | undefined, report: unknown): void {
  if (!output) {
    return;
  }
  const filePath = resolve(output);
  writeFileSync(filePath, JSON.stringify(report, null, 2) + "\n", "utf-8");
  logger.info(`Report written to ${filePath}`);
}
