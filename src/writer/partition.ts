import { ValidationError } from "../util/errors.js";
import type { KeyPartition } from "../stats/types.js";

/**
 * Splits `[0, totalKeys)` into `numWorkers` contiguous ranges of
 * `floor(totalKeys / numWorkers)` ids. The last range also takes the
 * remainder, so every id lands in exactly one range.
 */
export function partitionKeySpace(
  totalKeys: number,
  numWorkers: number,
): KeyPartition[] {
  if (!Number.isInteger(totalKeys) || totalKeys < 1) {
    throw new ValidationError(`totalKeys must be a positive integer, got ${totalKeys}`);
  }
  if (!Number.isInteger(numWorkers) || numWorkers < 1) {
    throw new ValidationError(`numWorkers must be a positive integer, got ${numWorkers}`);
  }
  if (numWorkers > totalKeys) {
    throw new ValidationError(
      `numWorkers (${numWorkers}) cannot exceed totalKeys (${totalKeys})`,
    );
  }

  const perWorker = Math.floor(totalKeys / numWorkers);
  const remainder = totalKeys % numWorkers;

  return Array.from({ length: numWorkers }, (_, i) => ({
    workerId: i + 1,
    start: i * perWorker,
    end: (i + 1) * perWorker + (i === numWorkers - 1 ? remainder : 0),
  }));
}

/**
 * Per-worker share of `total` items where the first `total % numWorkers`
 * workers take one extra.
 */
export function distributeCounts(total: number, numWorkers: number): number[] {
  if (!Number.isInteger(numWorkers) || numWorkers < 1) {
    throw new ValidationError(`numWorkers must be a positive integer, got ${numWorkers}`);
  }
  const base = Math.floor(total / numWorkers);
  const extra = total % numWorkers;
  return Array.from({ length: numWorkers }, (_, i) => base + (i < extra ? 1 : 0));
}
