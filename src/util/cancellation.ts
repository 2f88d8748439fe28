import {
  setImmediate as immediate,
  setTimeout as delay,
} from "node:timers/promises";

export type Clock = () => number;

export const monotonicNow: Clock = () => performance.now();

/**
 * Lets timers and signal handlers run between loop iterations, even when
 * the store answers from memory.
 */
export async function yieldToEventLoop(): Promise<void> {
  await immediate();
}

/**
 * Waits `ms` unless `signal` aborts first. Resolves false when aborted.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return false;
  }
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (err instanceof Error && err.name === "AbortError") {
      return false;
    }
    throw err;
  }
}

/**
 * Aborts `controller` on SIGINT/SIGTERM. Returns a function that removes the
 * handlers again.
 */
export function abortOnSignals(
  controller: AbortController,
  onSignal?: (signal: NodeJS.Signals) => void,
): () => void {
  const handler = (signal: NodeJS.Signals): void => {
    onSignal?.(signal);
    controller.abort();
  };
  process.once("SIGINT", handler);
  process.once("SIGTERM", handler);
  return () => {
    process.off("SIGINT", handler);
    process.off("SIGTERM", handler);
  };
}
