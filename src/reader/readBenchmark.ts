import type { KeyValueStore } from "../store/types.js";
import type { ReaderConfig } from "../config/types.js";
import type {
  ReadMode,
  ReadProgress,
  ReadResult,
  ReadStatistics,
} from "../stats/types.js";
import { buildReadStatistics, ratePerSecond } from "../stats/report.js";
import { distributeCounts } from "../writer/partition.js";
import { lookupBatch, lookupWithFallback, type LookupContext } from "./lookup.js";
import { ValidationError } from "../util/errors.js";
import { logger } from "../util/logger.js";
import { SPAN_NAMES, setSpanAttributes, withSpan } from "../util/tracing.js";
import {
  monotonicNow,
  yieldToEventLoop,
  type Clock,
} from "../util/cancellation.js";
import { DEFAULT_PROGRESS_INTERVAL_MS } from "../config/constants.js";

export const READ_MODES: readonly ReadMode[] = [
  "sequential",
  "pipeline",
  "parallel-pipeline",
];

export function isReadMode(value: string): value is ReadMode {
  return READ_MODES.some((mode) => mode === value);
}

export interface ReadBenchmarkOptions {
  store: KeyValueStore;
  keyPrefix: string;
  reader: ReaderConfig;
  /** Ids are drawn uniformly from `[0, maxKeys)`. */
  maxKeys: number;
  random?: () => number;
  now?: Clock;
  signal?: AbortSignal;
  progressIntervalMs?: number;
  onProgress?: (progress: ReadProgress) => void;
}

/**
 * A read worker appends each completed lookup to `results` as it goes.
 */
type ReadWorker = (results: ReadResult[]) => Promise<void>;

export interface ReadRunOptions {
  numWorkers?: number;
  batchSize?: number;
}

/**
 * Time-based progress snapshots across all workers of one run.
 */
class ProgressTracker {
  private completed = 0;
  private lastReport: number;
  private lastCompleted = 0;

  constructor(
    private readonly total: number,
    private readonly start: number,
    private readonly now: Clock,
    private readonly intervalMs: number,
    private readonly emit: (progress: ReadProgress) => void,
  ) {
    this.lastReport = start;
  }

  record(count: number): void {
    this.completed += count;
    const now = this.now();
    if (now - this.lastReport < this.intervalMs) {
      return;
    }
    this.emit({
      completed: this.completed,
      total: this.total,
      elapsedMs: now - this.start,
      instantRate: ratePerSecond(
        this.completed - this.lastCompleted,
        now - this.lastReport,
      ),
    });
    this.lastReport = now;
    this.lastCompleted = this.completed;
  }
}

/**
 * Read benchmark over two version namespaces with primary-then-secondary
 * fallback.
 */
export class ReadBenchmark {
  private readonly ctx: LookupContext;
  private readonly random: () => number;
  private readonly now: Clock;

  constructor(private readonly options: ReadBenchmarkOptions) {
    if (!Number.isInteger(options.maxKeys) || options.maxKeys < 1) {
      throw new ValidationError(`maxKeys must be a positive integer, got ${options.maxKeys}`);
    }
    this.random = options.random ?? Math.random;
    this.now = options.now ?? monotonicNow;
    this.ctx = {
      store: options.store,
      keyPrefix: options.keyPrefix,
      primaryVersion: options.reader.primaryVersion,
      secondaryVersion: options.reader.secondaryVersion,
      now: this.now,
    };
  }

  private get aborted(): boolean {
    return this.options.signal?.aborted ?? false;
  }

  drawId(): number {
    return Math.floor(this.random() * this.options.maxKeys);
  }

  generateIds(count: number): number[] {
    return Array.from({ length: count }, () => this.drawId());
  }

  async run(
    mode: ReadMode,
    totalReads: number,
    options: ReadRunOptions = {},
  ): Promise<ReadStatistics> {
    if (!Number.isInteger(totalReads) || totalReads < 0) {
      throw new ValidationError(`totalReads must be a non-negative integer, got ${totalReads}`);
    }
    const numWorkers =
      mode === "pipeline" ? 1 : options.numWorkers ?? this.options.reader.numReaders;
    const batchSize = options.batchSize ?? this.options.reader.batchSize;
    if (!Number.isInteger(numWorkers) || numWorkers < 1) {
      throw new ValidationError(`numWorkers must be a positive integer, got ${numWorkers}`);
    }
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ValidationError(`batchSize must be a positive integer, got ${batchSize}`);
    }

    return withSpan(
      SPAN_NAMES.READ_BENCHMARK,
      async (span) => {
        logger.info(
          `Starting ${mode} read benchmark: ${totalReads} reads, ${numWorkers} worker(s)`,
          {
            primaryVersion: this.ctx.primaryVersion,
            secondaryVersion: this.ctx.secondaryVersion,
          },
        );
        const start = this.now();
        const progress = new ProgressTracker(
          totalReads,
          start,
          this.now,
          this.options.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS,
          this.options.onProgress ?? ((p) => logger.info(
            `Read progress: ${p.completed}/${p.total}`,
            { rate: Math.round(p.instantRate) },
          )),
        );

        let workers: ReadWorker[];
        switch (mode) {
          case "sequential":
            workers = distributeCounts(totalReads, numWorkers).map(
              (count): ReadWorker => (results) =>
                this.sequentialWorker(count, batchSize, progress, results),
            );
            break;
          case "pipeline": {
            const ids = this.generateIds(totalReads);
            workers = [
              (results) => this.pipelineWorker(ids, batchSize, progress, results),
            ];
            break;
          }
          case "parallel-pipeline":
            workers = this.sliceIds(this.generateIds(totalReads), numWorkers).map(
              (slice): ReadWorker => (results) =>
                this.pipelineWorker(slice, batchSize, progress, results),
            );
            break;
          default:
            throw new ValidationError(`Unknown read mode: ${String(mode)}`);
        }
        const results = await this.runWorkers(workers);

        const stats = buildReadStatistics(results, {
          mode,
          primaryVersion: this.ctx.primaryVersion,
          secondaryVersion: this.ctx.secondaryVersion,
          numWorkers,
          durationMs: this.now() - start,
          interrupted: this.aborted,
        });
        setSpanAttributes(span, {
          totalReads: stats.totalReads,
          successfulReads: stats.successfulReads,
          primaryHits: stats.primaryHits,
          secondaryHits: stats.secondaryHits,
          interrupted: stats.interrupted,
        });
        return stats;
      },
      { mode, totalReads, numWorkers, batchSize },
    );
  }

  /**
   * Contiguous slices of `ids`; the first `ids.length % numWorkers` slices
   * take one extra id.
   */
  sliceIds(ids: number[], numWorkers: number): number[][] {
    const slices: number[][] = [];
    let offset = 0;
    for (const count of distributeCounts(ids.length, numWorkers)) {
      slices.push(ids.slice(offset, offset + count));
      offset += count;
    }
    return slices;
  }

  /**
   * Runs all workers concurrently. Every worker owns its result list; the
   * lists are concatenated once all workers settle, including the reads a
   * failed worker completed before it threw.
   */
  private async runWorkers(workers: ReadWorker[]): Promise<ReadResult[]> {
    const owned = workers.map((): ReadResult[] => []);
    const settled = await Promise.allSettled(
      workers.map((worker, i) => worker(owned[i])),
    );

    settled.forEach((outcome, i) => {
      if (outcome.status === "rejected") {
        logger.error(`Read worker ${i + 1} failed`, {
          error: outcome.reason,
          completed: owned[i].length,
        });
      }
    });
    return owned.flat();
  }

  private async sequentialWorker(
    count: number,
    yieldEvery: number,
    progress: ProgressTracker,
    results: ReadResult[],
  ): Promise<void> {
    for (let i = 0; i < count; i++) {
      if (this.aborted) {
        break;
      }
      results.push(await lookupWithFallback(this.ctx, this.drawId()));
      progress.record(1);
      if ((i + 1) % yieldEvery === 0) {
        await yieldToEventLoop();
      }
    }
  }

  private async pipelineWorker(
    ids: number[],
    batchSize: number,
    progress: ProgressTracker,
    results: ReadResult[],
  ): Promise<void> {
    for (let i = 0; i < ids.length; i += batchSize) {
      if (this.aborted) {
        break;
      }
      const outcome = await lookupBatch(this.ctx, ids.slice(i, i + batchSize));
      results.push(...outcome.results);
      progress.record(outcome.results.length);
      await yieldToEventLoop();
    }
  }
}
