import type { KeyValueStore } from "../store/types.js";
import type { WriterConfig } from "../config/types.js";
import type {
  AggregateWriteReport,
  KeyPartition,
  MultiVersionReport,
  WorkerWriteReport,
  WriterCounters,
  WriterProgress,
} from "../stats/types.js";
import {
  mergeWriteReports,
  projectCompletion,
  ratePerSecond,
} from "../stats/report.js";
import { BatchWriter, type PayloadSource } from "./batchWriter.js";
import { partitionKeySpace } from "./partition.js";
import { ValidationError, errorMessage } from "../util/errors.js";
import { logger } from "../util/logger.js";
import { SPAN_NAMES, setSpanAttributes, withSpan } from "../util/tracing.js";
import { monotonicNow, sleep, type Clock } from "../util/cancellation.js";

export interface WriteOrchestratorOptions {
  store: KeyValueStore;
  records: PayloadSource;
  writer: WriterConfig;
  keyPrefix: string;
  progressIntervalMs?: number;
  onProgress?: (workerId: number, progress: WriterProgress) => void;
  signal?: AbortSignal;
  now?: Clock;
  random?: () => number;
}

export interface MultiVersionOptions {
  /** Key count to project the completion time for, from the combined rate. */
  projectionTargetKeys?: number;
}

const ZERO_COUNTERS: WriterCounters = {
  keysWritten: 0,
  keysSkipped: 0,
  keysFailed: 0,
};

/**
 * Fans a key space out over parallel Batch Writers and merges their reports.
 */
export class WriteOrchestrator {
  private readonly now: Clock;

  constructor(private readonly options: WriteOrchestratorOptions) {
    this.now = options.now ?? monotonicNow;
  }

  private get aborted(): boolean {
    return this.options.signal?.aborted ?? false;
  }

  /**
   * Imports `[0, targetKeys)` under `version` with one writer per partition.
   * Defaults to the configured maxKeys.
   */
  async runImport(
    version: string,
    targetKeys: number = this.options.writer.maxKeys,
  ): Promise<AggregateWriteReport> {
    if (version.length === 0) {
      throw new ValidationError("version must not be empty");
    }
    const numWorkers = this.options.writer.numWriters;
    const partitions = partitionKeySpace(targetKeys, numWorkers);

    return withSpan(
      SPAN_NAMES.IMPORT,
      async (span) => {
        logger.info(
          `Importing ${targetKeys} keys as ${version} with ${numWorkers} workers`,
        );
        const start = this.now();

        // One concurrent writer per partition; reports merge after all settle.
        const settled = await Promise.allSettled(
          partitions.map((partition) => this.runWorker(version, partition)),
        );

        const workers = settled.map((outcome, i): WorkerWriteReport => {
          if (outcome.status === "fulfilled") {
            return outcome.value;
          }
          const partition = partitions[i];
          logger.error(`Worker ${partition.workerId} failed`, {
            version,
            error: outcome.reason,
          });
          return {
            ...ZERO_COUNTERS,
            workerId: partition.workerId,
            version,
            range: { start: partition.start, end: partition.end },
            durationMs: 0,
            error: errorMessage(outcome.reason),
          };
        });

        const report = mergeWriteReports(workers, {
          version,
          targetKeys,
          numWorkers,
          durationMs: this.now() - start,
          interrupted: this.aborted,
        });
        setSpanAttributes(span, {
          keysWritten: report.keysWritten,
          keysFailed: report.keysFailed,
          interrupted: report.interrupted,
        });
        return report;
      },
      { version, targetKeys, numWorkers },
    );
  }

  private async runWorker(
    version: string,
    partition: KeyPartition,
  ): Promise<WorkerWriteReport> {
    const { writer: config, onProgress } = this.options;
    const writer = new BatchWriter({
      store: this.options.store,
      records: this.options.records,
      version,
      keyPrefix: this.options.keyPrefix,
      ttlSeconds: config.keyTtlSeconds,
      startOffset: partition.start,
      maxKeys: partition.end,
      batchSize: config.batchSize,
      writeChunk: config.writeChunk,
      skipProbability: config.skipProbability,
      random: this.options.random,
      progressIntervalMs: this.options.progressIntervalMs,
      onProgress: onProgress
        ? (progress) => onProgress(partition.workerId, progress)
        : undefined,
      now: this.now,
      signal: this.options.signal,
      label: `worker ${partition.workerId} (${version})`,
    });

    const range = { start: partition.start, end: partition.end };
    const start = this.now();
    try {
      const result = await writer.runUntil({
        targetKeys: partition.end - partition.start,
      });
      logger.debug(`Worker ${partition.workerId} finished`, {
        version,
        written: result.keysWritten,
        stopReason: result.stopReason,
      });
      return {
        keysWritten: result.keysWritten,
        keysSkipped: result.keysSkipped,
        keysFailed: result.keysFailed,
        workerId: partition.workerId,
        version,
        range,
        durationMs: result.durationMs,
      };
    } catch (err) {
      // Keep what was written before the failure.
      logger.error(`Worker ${partition.workerId} failed`, { version, error: err });
      return {
        ...writer.getCounters(),
        workerId: partition.workerId,
        version,
        range,
        durationMs: this.now() - start,
        error: errorMessage(err),
      };
    }
  }

  /**
   * Runs `runImport` for each version in turn, pausing `versionPauseMs`
   * between them. Stops early once the signal aborts.
   */
  async runMultiVersionImport(
    versions: string[],
    targetKeysEach?: number,
    options: MultiVersionOptions = {},
  ): Promise<MultiVersionReport> {
    if (versions.length === 0) {
      throw new ValidationError("at least one version is required");
    }

    return withSpan(
      SPAN_NAMES.IMPORT_MULTI,
      async (span) => {
        const start = this.now();
        const reports: AggregateWriteReport[] = [];

        for (const [i, version] of versions.entries()) {
          if (this.aborted) {
            break;
          }
          reports.push(await this.runImport(version, targetKeysEach));

          if (i < versions.length - 1 && !this.aborted) {
            logger.info(
              `Pausing ${this.options.writer.versionPauseMs}ms before ${versions[i + 1]}`,
            );
            await sleep(this.options.writer.versionPauseMs, this.options.signal);
          }
        }

        const totals = reports.reduce<WriterCounters>(
          (sum, r) => ({
            keysWritten: sum.keysWritten + r.keysWritten,
            keysSkipped: sum.keysSkipped + r.keysSkipped,
            keysFailed: sum.keysFailed + r.keysFailed,
          }),
          { ...ZERO_COUNTERS },
        );
        const overallDurationMs = this.now() - start;
        const combinedRate = ratePerSecond(totals.keysWritten, overallDurationMs);

        const report: MultiVersionReport = {
          ...totals,
          versions: reports,
          overallDurationMs,
          combinedRate,
          interrupted: this.aborted,
        };
        if (options.projectionTargetKeys !== undefined) {
          report.projection = projectCompletion(
            options.projectionTargetKeys,
            combinedRate,
          );
        }

        setSpanAttributes(span, {
          versions: versions.join(","),
          keysWritten: totals.keysWritten,
          interrupted: report.interrupted,
        });
        return report;
      },
      { versionCount: versions.length, targetKeysEach },
    );
  }
}
