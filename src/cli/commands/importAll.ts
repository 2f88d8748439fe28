import type { ImportAllOptions } from "../types.js";
import { withCommandContext, writeReport } from "../context.js";
import { createRecordSource, writerSettings } from "./import.js";
import { WriteOrchestrator } from "../../writer/orchestrator.js";
import { formatMultiVersionReport } from "../../stats/report.js";

export async function importAllCommand(options: ImportAllOptions): Promise<void> {
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

    const report = await orchestrator.runMultiVersionImport(
      options.versions,
      options.keys ?? writer.maxKeys,
      { projectionTargetKeys: options.project },
    );

    console.log(formatMultiVersionReport(report));
    writeReport(options.output, report);

    const failed = report.versions.some((v) =>
      v.workers.some((w) => w.error !== undefined),
    );
    if (failed) {
      process.exitCode = 1;
    }
  });
}
