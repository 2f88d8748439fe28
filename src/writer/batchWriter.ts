import type { KeyValueStore, PipelineCommand } from "../store/types.js";
import { formatKey } from "../store/types.js";
import type { RecordId } from "../records/recordSource.js";
import type { WriterCounters, WriterProgress } from "../stats/types.js";
import { ratePerSecond } from "../stats/report.js";
import { ValidationError, toError } from "../util/errors.js";
import { logger } from "../util/logger.js";
import { SPAN_NAMES, setSpanAttributes, withSpan } from "../util/tracing.js";
import {
  monotonicNow,
  yieldToEventLoop,
  type Clock,
} from "../util/cancellation.js";
import {
  DEFAULT_PROGRESS_INTERVAL_MS,
  DEFAULT_WRITE_CHUNK,
} from "../config/constants.js";

export interface PayloadSource {
  generate(id: RecordId): string;
}

export type ItemOutcome = "written" | "failed";

/**
 * Result of one pipelined batch. `fallback` means the pipeline failed as a
 * whole and every key was retried once as an individual write.
 */
export type BatchOutcome =
  | { kind: "pipelined"; outcomes: ItemOutcome[] }
  | { kind: "fallback"; cause: Error; outcomes: ItemOutcome[] };

export interface WriteTally {
  written: number;
  skipped: number;
  failed: number;
  batches: BatchOutcome[];
}

export type StopReason = "target" | "duration" | "exhausted" | "interrupted";

export interface WriterRunResult extends WriterCounters {
  stopReason: StopReason;
  durationMs: number;
  cursor: number;
}

export interface RunUntilOptions {
  targetKeys?: number;
  durationSeconds?: number;
}

export interface BatchWriterOptions {
  store: KeyValueStore;
  records: PayloadSource;
  version: string;
  keyPrefix: string;
  ttlSeconds: number;
  /** Exclusive upper bound of the cursor. */
  maxKeys: number;
  batchSize: number;
  startOffset?: number;
  writeChunk?: number;
  skipProbability?: number;
  random?: () => number;
  progressIntervalMs?: number;
  onProgress?: (progress: WriterProgress) => void;
  now?: Clock;
  signal?: AbortSignal;
  /** Used in log lines only. */
  label?: string;
}

export class BatchWriter {
  private cursor: number;
  private readonly counters: WriterCounters = {
    keysWritten: 0,
    keysSkipped: 0,
    keysFailed: 0,
  };

  private readonly writeChunk: number;
  private readonly skipProbability: number;
  private readonly random: () => number;
  private readonly progressIntervalMs: number;
  private readonly now: Clock;
  private readonly label: string;

  constructor(private readonly options: BatchWriterOptions) {
    const startOffset = options.startOffset ?? 0;
    if (!Number.isInteger(startOffset) || startOffset < 0) {
      throw new ValidationError(`startOffset must be a non-negative integer, got ${startOffset}`);
    }
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new ValidationError(`batchSize must be a positive integer, got ${options.batchSize}`);
    }
    this.cursor = startOffset;
    this.writeChunk = options.writeChunk ?? DEFAULT_WRITE_CHUNK;
    this.skipProbability = options.skipProbability ?? 0;
    this.random = options.random ?? Math.random;
    this.progressIntervalMs =
      options.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS;
    this.now = options.now ?? monotonicNow;
    this.label = options.label ?? `writer:${options.version}`;
  }

  get position(): number {
    return this.cursor;
  }

  /** True once the cursor has reached maxKeys; the writer never resumes. */
  get exhausted(): boolean {
    return this.cursor >= this.options.maxKeys;
  }

  getCounters(): WriterCounters {
    return { ...this.counters };
  }

  /**
   * Attempts up to `count` ids from the cursor in pipelined batches of
   * `batchSize`. Counters are updated as batches complete.
   */
  async write(
    count: number,
    batchSize: number = this.options.batchSize,
  ): Promise<WriteTally> {
    const tally: WriteTally = { written: 0, skipped: 0, failed: 0, batches: [] };
    let remaining = count;

    while (remaining > 0 && !this.exhausted) {
      if (this.options.signal?.aborted) {
        break;
      }

      const size = Math.min(batchSize, remaining);
      const entries: Array<[string, string]> = [];
      for (let i = 0; i < size && !this.exhausted; i++) {
        const id = this.cursor++;
        if (this.shouldSkip()) {
          tally.skipped++;
          this.counters.keysSkipped++;
          continue;
        }
        entries.push([
          formatKey(this.options.keyPrefix, this.options.version, id),
          this.options.records.generate(id),
        ]);
      }

      if (entries.length > 0) {
        const outcome = await this.writeBatch(entries);
        tally.batches.push(outcome);
        for (const item of outcome.outcomes) {
          if (item === "written") {
            tally.written++;
            this.counters.keysWritten++;
          } else {
            tally.failed++;
            this.counters.keysFailed++;
          }
        }
      }
      remaining -= size;
    }

    return tally;
  }

  private shouldSkip(): boolean {
    return this.skipProbability > 0 && this.random() < this.skipProbability;
  }

  /**
   * One pipelined SET-with-expiry round trip; on a whole-batch failure each
   * key is written individually, once.
   */
  async writeBatch(entries: Array<[string, string]>): Promise<BatchOutcome> {
    const ttlSeconds = this.options.ttlSeconds;
    const commands: PipelineCommand[] = entries.map(([key, value]) => ({
      op: "setex",
      key,
      value,
      ttlSeconds,
    }));

    let cause: Error;
    try {
      const replies = await this.options.store.pipeline(commands);
      return {
        kind: "pipelined",
        outcomes: commands.map((_, i) => {
          const reply = replies[i];
          return reply && reply.error === null && reply.value !== null
            ? "written"
            : "failed";
        }),
      };
    } catch (err) {
      cause = toError(err);
    }

    logger.warn(`${this.label}: pipeline of ${entries.length} keys failed, writing individually`, {
      error: cause,
    });

    const outcomes: ItemOutcome[] = [];
    for (const [key, value] of entries) {
      try {
        const ok = await this.options.store.setWithTtl(key, value, ttlSeconds);
        outcomes.push(ok ? "written" : "failed");
      } catch (err) {
        logger.debug(`${this.label}: individual write failed`, { key, error: err });
        outcomes.push("failed");
      }
    }
    return { kind: "fallback", cause, outcomes };
  }

  /**
   * Writes until the target is written, the duration elapses, the cursor
   * reaches maxKeys, or the signal aborts.
   */
  async runUntil(options: RunUntilOptions = {}): Promise<WriterRunResult> {
    return withSpan(
      SPAN_NAMES.WRITER_RUN,
      async (span) => {
        const result = await this.runLoop(options);
        setSpanAttributes(span, {
          keysWritten: result.keysWritten,
          keysSkipped: result.keysSkipped,
          keysFailed: result.keysFailed,
          stopReason: result.stopReason,
        });
        return result;
      },
      {
        version: this.options.version,
        startOffset: this.cursor,
        maxKeys: this.options.maxKeys,
        targetKeys: options.targetKeys,
      },
    );
  }

  private async runLoop({
    targetKeys,
    durationSeconds,
  }: RunUntilOptions): Promise<WriterRunResult> {
    const start = this.now();
    let lastReport = start;
    let lastWritten = this.counters.keysWritten;
    let stopReason: StopReason;

    for (;;) {
      if (this.options.signal?.aborted) {
        stopReason = "interrupted";
        break;
      }
      if (targetKeys !== undefined && this.counters.keysWritten >= targetKeys) {
        stopReason = "target";
        break;
      }
      if (
        durationSeconds !== undefined &&
        this.now() - start >= durationSeconds * 1000
      ) {
        stopReason = "duration";
        break;
      }
      if (this.exhausted) {
        logger.debug(`${this.label}: reached end of key space at ${this.options.maxKeys}`);
        stopReason = "exhausted";
        break;
      }

      const chunk =
        targetKeys !== undefined
          ? Math.min(this.writeChunk, targetKeys - this.counters.keysWritten)
          : this.writeChunk;
      await this.write(chunk);

      const now = this.now();
      if (now - lastReport >= this.progressIntervalMs) {
        this.reportProgress({
          ...this.getCounters(),
          elapsedMs: now - start,
          instantRate: ratePerSecond(
            this.counters.keysWritten - lastWritten,
            now - lastReport,
          ),
          cursor: this.cursor,
        });
        lastReport = now;
        lastWritten = this.counters.keysWritten;
      }

      await yieldToEventLoop();
    }

    return {
      ...this.getCounters(),
      stopReason,
      durationMs: this.now() - start,
      cursor: this.cursor,
    };
  }

  private reportProgress(progress: WriterProgress): void {
    if (this.options.onProgress) {
      this.options.onProgress(progress);
      return;
    }
    logger.info(`${this.label}: progress`, {
      written: progress.keysWritten,
      skipped: progress.keysSkipped,
      failed: progress.keysFailed,
      rate: Math.round(progress.instantRate),
    });
  }
}
