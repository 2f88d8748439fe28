import type { ImportOptions } from "../types.js";
import type { ResolvedConfig, WriterConfig } from "../../config/types.js";
import { withCommandContext, writeReport } from "../context.js";
import { RecordSource } from "../../records/recordSource.js";
import { WriteOrchestrator } from "../../writer/orchestrator.js";
import { formatWriteReport } from "../../stats/report.js";
import { logger } from "../../util/logger.js";

/**
 * Config writer settings with the command-line overrides applied.
 */
export function writerSettings(
  config: ResolvedConfig,
  overrides: { workers?: number; batchSize?: number },
): WriterConfig {
  return {
    ...config.writer,
    numWriters: overrides.workers ?? config.writer.numWriters,
    batchSize: overrides.batchSize ?? config.writer.batchSize,
  };
}

export function createRecordSource(config: ResolvedConfig): RecordSource {
  const records = new RecordSource({ sampleCount: config.records.sampleCount });
  logger.info(
    `Record source ready: ${records.sampleCount} samples, ~${Math.round(records.averagePayloadBytes())} bytes each`,
  );
  return records;
}

export async function importCommand(options: ImportOptions): Promise<void> {
  await withCommandContext(options, async ({ config, store, signal }) => {
    const writer = writerSettings(config, options);
    const orchestrator = new WriteOrchestrator({
      store,
      records: createRecordSource(config),
      writer,
      keyPrefix: config.store.keyPrefix,
      progressIntervalMs: config.progressIntervalMs,
      signal,
    });

    const report = await orchestrator.runImport(
      options.tag ?? config.version,
      options.keys ?? writer.maxKeys,
    );

    console.log(formatWriteReport(report));
    writeReport(options.output, report);

    if (report.workers.some((w) => w.error !== undefined)) {
      process.exitCode = 1;
    }
  });
}
