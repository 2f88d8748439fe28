import type { ReadOptions } from "../types.js";
import { withCommandContext, writeReport } from "../context.js";
import { ReadBenchmark } from "../../reader/readBenchmark.js";
import { formatReadStatistics } from "../../stats/report.js";

export async function readCommand(options: ReadOptions): Promise<void> {
  await withCommandContext(options, async ({ config, store, signal }) => {
    const benchmark = new ReadBenchmark({
      store,
      keyPrefix: config.store.keyPrefix,
      reader: {
        ...config.reader,
        primaryVersion: options.primary ?? config.reader.primaryVersion,
        secondaryVersion: options.secondary ?? config.reader.secondaryVersion,
      },
      maxKeys: options.maxKeys ?? config.writer.maxKeys,
      progressIntervalMs: config.progressIntervalMs,
      signal,
    });

    const stats = await benchmark.run(options.mode, options.reads, {
      numWorkers: options.workers,
      batchSize: options.batchSize,
    });

    console.log(formatReadStatistics(stats));
    writeReport(options.output, stats);
  });
}
