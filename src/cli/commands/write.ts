import type { WriteOptions } from "../types.js";
import { withCommandContext, writeReport } from "../context.js";
import { createRecordSource } from "./import.js";
import { BatchWriter, type WriterRunResult } from "../../writer/batchWriter.js";
import { ratePerSecond } from "../../stats/report.js";

function formatRun(version: string, result: WriterRunResult): string {
  const rate = ratePerSecond(result.keysWritten, result.durationMs);
  return [
    `Writer results for ${version} (stopped: ${result.stopReason}):`,
    `  Keys written: ${result.keysWritten.toLocaleString("en-US")}`,
    `  Keys skipped: ${result.keysSkipped.toLocaleString("en-US")}`,
    `  Keys failed: ${result.keysFailed.toLocaleString("en-US")}`,
    `  Cursor: ${result.cursor}`,
    `  Duration: ${(result.durationMs / 1000).toFixed(1)}s`,
    `  Rate: ${Math.round(rate).toLocaleString("en-US")} keys/sec`,
  ].join("\n");
}

/**
 * One continuous writer from `--start`, until `--keys` are written,
 * `--duration` seconds pass, the key space ends, or the process is
 * interrupted.
 */
export async function writeCommand(options: WriteOptions): Promise<void> {
  await withCommandContext(options, async ({ config, store, signal }) => {
    const version = options.tag ?? config.version;
    const writer = new BatchWriter({
      store,
      records: createRecordSource(config),
      version,
      keyPrefix: config.store.keyPrefix,
      ttlSeconds: config.writer.keyTtlSeconds,
      maxKeys: config.writer.maxKeys,
      batchSize: options.batchSize ?? config.writer.batchSize,
      startOffset: options.start,
      writeChunk: config.writer.writeChunk,
      skipProbability: config.writer.skipProbability,
      progressIntervalMs: config.progressIntervalMs,
      signal,
    });

    const result = await writer.runUntil({
      targetKeys: options.keys,
      durationSeconds: options.durationSeconds,
    });

    console.log(formatRun(version, result));
    writeReport(options.output, { version, ...result });
  });
}
