import type {
  AggregateWriteReport,
  CompletionProjection,
  LatencySummary,
  MultiVersionReport,
  ReadMode,
  ReadResult,
  ReadStatistics,
  WorkerWriteReport,
} from "./types.js";

export function ratePerSecond(count: number, durationMs: number): number {
  return durationMs > 0 ? count / (durationMs / 1000) : 0;
}

/**
 * Nearest-rank percentiles: p50 = s[floor(n/2)], p95 = s[floor(n*0.95)].
 */
export function summarizeLatency(latenciesMs: number[]): LatencySummary | null {
  if (latenciesMs.length === 0) {
    return null;
  }
  const sorted = [...latenciesMs].sort((a, b) => a - b);
  const at = (fraction: number): number =>
    sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * fraction))];

  return {
    p50Ms: at(0.5),
    p95Ms: at(0.95),
    minMs: sorted[0],
    maxMs: sorted[sorted.length - 1],
  };
}

export interface ReadStatisticsMeta {
  mode: ReadMode;
  primaryVersion: string;
  secondaryVersion: string;
  numWorkers: number;
  durationMs: number;
  interrupted: boolean;
}

export function buildReadStatistics(
  results: ReadResult[],
  meta: ReadStatisticsMeta,
): ReadStatistics {
  let successfulReads = 0;
  let primaryHits = 0;
  let secondaryHits = 0;
  let totalBytes = 0;
  const latencies: number[] = [];

  for (const result of results) {
    if (!result.success) {
      continue;
    }
    successfulReads++;
    totalBytes += result.bytes;
    latencies.push(result.latencyMs);
    if (result.tier === "primary") {
      primaryHits++;
    } else {
      secondaryHits++;
    }
  }

  return {
    ...meta,
    totalReads: results.length,
    successfulReads,
    cacheMisses: results.length - successfulReads,
    primaryHits,
    secondaryHits,
    totalBytes,
    rate: ratePerSecond(results.length, meta.durationMs),
    latency: summarizeLatency(latencies),
  };
}

export interface WriteRunMeta {
  version: string;
  targetKeys: number;
  numWorkers: number;
  durationMs: number;
  interrupted: boolean;
}

export function mergeWriteReports(
  workers: WorkerWriteReport[],
  meta: WriteRunMeta,
): AggregateWriteReport {
  const sorted = [...workers].sort((a, b) => a.workerId - b.workerId);
  const keysWritten = sorted.reduce((sum, w) => sum + w.keysWritten, 0);

  return {
    ...meta,
    keysWritten,
    keysSkipped: sorted.reduce((sum, w) => sum + w.keysSkipped, 0),
    keysFailed: sorted.reduce((sum, w) => sum + w.keysFailed, 0),
    rate: ratePerSecond(keysWritten, meta.durationMs),
    workers: sorted,
  };
}

/**
 * Linear estimate of how long `targetKeys` would take at `rate` keys/sec.
 */
export function projectCompletion(
  targetKeys: number,
  rate: number,
): CompletionProjection {
  return {
    targetKeys,
    estimatedSeconds: rate > 0 ? targetKeys / rate : null,
  };
}

function formatNumber(n: number): string {
  return Math.round(n).toLocaleString("en-US");
}

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatMb(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function percent(part: number, whole: number): string {
  return whole > 0 ? `${((part / whole) * 100).toFixed(1)}%` : "0.0%";
}

export function formatWriteReport(report: AggregateWriteReport): string {
  const lines = [
    `Import results for ${report.version}${report.interrupted ? " (interrupted)" : ""}:`,
    `  Keys written: ${formatNumber(report.keysWritten)}`,
    `  Keys skipped: ${formatNumber(report.keysSkipped)}`,
    `  Keys failed: ${formatNumber(report.keysFailed)}`,
    `  Duration: ${formatSeconds(report.durationMs)}`,
    `  Combined rate: ${formatNumber(report.rate)} keys/sec`,
    `  Workers:`,
  ];
  for (const worker of report.workers) {
    const status = worker.error ? ` FAILED: ${worker.error}` : "";
    lines.push(
      `    #${worker.workerId} [${worker.range.start}, ${worker.range.end}): ` +
        `${formatNumber(worker.keysWritten)} written in ${formatSeconds(worker.durationMs)}${status}`,
    );
  }
  return lines.join("\n");
}

export function formatMultiVersionReport(report: MultiVersionReport): string {
  const lines = report.versions.map(formatWriteReport);
  lines.push(
    [
      `Multi-version import${report.interrupted ? " (interrupted)" : ""}:`,
      ...report.versions.map(
        (v) => `  ${v.version}: ${formatNumber(v.keysWritten)} keys`,
      ),
      `  Total written: ${formatNumber(report.keysWritten)}`,
      `  Total skipped: ${formatNumber(report.keysSkipped)}`,
      `  Total failed: ${formatNumber(report.keysFailed)}`,
      `  Overall duration: ${formatSeconds(report.overallDurationMs)}`,
      `  Combined rate: ${formatNumber(report.combinedRate)} keys/sec`,
    ].join("\n"),
  );
  if (report.projection) {
    const { targetKeys, estimatedSeconds } = report.projection;
    lines.push(
      estimatedSeconds === null
        ? `Projection for ${formatNumber(targetKeys)} keys: no rate available`
        : `Projection for ${formatNumber(targetKeys)} keys: ~${(estimatedSeconds / 3600).toFixed(1)} hours`,
    );
  }
  return lines.join("\n\n");
}

export function formatReadStatistics(stats: ReadStatistics): string {
  const lines = [
    `Read benchmark (${stats.mode}, ${stats.numWorkers} worker(s))${stats.interrupted ? " (interrupted)" : ""}:`,
    `  Total reads: ${formatNumber(stats.totalReads)}`,
    `  Successful reads: ${formatNumber(stats.successfulReads)} (${percent(stats.successfulReads, stats.totalReads)})`,
    `  Cache misses: ${formatNumber(stats.cacheMisses)} (${percent(stats.cacheMisses, stats.totalReads)})`,
    `  ${stats.primaryVersion} hits: ${formatNumber(stats.primaryHits)} (${percent(stats.primaryHits, stats.successfulReads)})`,
    `  ${stats.secondaryVersion} hits: ${formatNumber(stats.secondaryHits)} (${percent(stats.secondaryHits, stats.successfulReads)})`,
    `  Duration: ${formatSeconds(stats.durationMs)}`,
    `  Read rate: ${formatNumber(stats.rate)} reads/sec`,
    `  Data read: ${formatMb(stats.totalBytes)}`,
  ];
  if (stats.latency) {
    lines.push(
      `  Latency p50: ${stats.latency.p50Ms.toFixed(2)} ms`,
      `  Latency p95: ${stats.latency.p95Ms.toFixed(2)} ms`,
      `  Latency min/max: ${stats.latency.minMs.toFixed(2)} / ${stats.latency.maxMs.toFixed(2)} ms`,
    );
  }
  return lines.join("\n");
}
