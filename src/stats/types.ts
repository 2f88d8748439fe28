export interface KeyRange {
  /** Inclusive. */
  start: number;
  /** Exclusive. */
  end: number;
}

export interface KeyPartition extends KeyRange {
  workerId: number;
}

export interface WriterCounters {
  keysWritten: number;
  keysSkipped: number;
  keysFailed: number;
}

export interface WriterProgress extends WriterCounters {
  elapsedMs: number;
  /** Keys written per second since the previous snapshot. */
  instantRate: number;
  cursor: number;
}

export interface WorkerWriteReport extends WriterCounters {
  workerId: number;
  version: string;
  range: KeyRange;
  durationMs: number;
  error?: string;
}

export interface AggregateWriteReport extends WriterCounters {
  version: string;
  targetKeys: number;
  numWorkers: number;
  /** Wall-clock span of the parallel phase. */
  durationMs: number;
  /** keysWritten per wall-clock second. */
  rate: number;
  interrupted: boolean;
  workers: WorkerWriteReport[];
}

export interface CompletionProjection {
  targetKeys: number;
  /** Null when nothing was written and no rate is known. */
  estimatedSeconds: number | null;
}

export interface MultiVersionReport extends WriterCounters {
  versions: AggregateWriteReport[];
  overallDurationMs: number;
  combinedRate: number;
  interrupted: boolean;
  projection?: CompletionProjection;
}

export type ReadTier = "primary" | "secondary" | "none";

export type ReadMode = "sequential" | "pipeline" | "parallel-pipeline";

export interface ReadResult {
  id: number;
  tier: ReadTier;
  /** Version tag that satisfied the lookup, null on a miss. */
  version: string | null;
  bytes: number;
  latencyMs: number;
  success: boolean;
}

export interface LatencySummary {
  p50Ms: number;
  p95Ms: number;
  minMs: number;
  maxMs: number;
}

export interface ReadStatistics {
  mode: ReadMode;
  primaryVersion: string;
  secondaryVersion: string;
  numWorkers: number;
  totalReads: number;
  successfulReads: number;
  cacheMisses: number;
  primaryHits: number;
  secondaryHits: number;
  totalBytes: number;
  durationMs: number;
  rate: number;
  interrupted: boolean;
  /** Over successful reads only. */
  latency: LatencySummary | null;
}

export interface ReadProgress {
  completed: number;
  total: number;
  elapsedMs: number;
  instantRate: number;
}
