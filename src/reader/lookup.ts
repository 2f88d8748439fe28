import type { KeyValueStore, PipelineCommand, PipelineReply } from "../store/types.js";
import { formatKey } from "../store/types.js";
import type { ReadResult } from "../stats/types.js";
import type { Clock } from "../util/cancellation.js";
import { toError } from "../util/errors.js";
import { logger } from "../util/logger.js";

export interface LookupContext {
  store: KeyValueStore;
  keyPrefix: string;
  primaryVersion: string;
  secondaryVersion: string;
  now: Clock;
}

/**
 * Outcome of one pipelined read batch. `fallback` means the pipeline failed
 * as a whole and the batch was re-read one id at a time.
 */
export type BatchReadOutcome =
  | { kind: "pipelined"; results: ReadResult[] }
  | { kind: "fallback"; cause: Error; results: ReadResult[] };

function hit(
  id: number,
  tier: "primary" | "secondary",
  version: string,
  value: string,
  latencyMs: number,
): ReadResult {
  return {
    id,
    tier,
    version,
    bytes: Buffer.byteLength(value, "utf8"),
    latencyMs,
    success: true,
  };
}

function miss(id: number, latencyMs: number): ReadResult {
  return { id, tier: "none", version: null, bytes: 0, latencyMs, success: false };
}

async function tryGet(ctx: LookupContext, key: string): Promise<string | null> {
  try {
    return await ctx.store.get(key);
  } catch (err) {
    logger.debug("Lookup failed, treating key as absent", { key, error: err });
    return null;
  }
}

/**
 * Primary version first, then secondary. An error on either tier is treated
 * as absent, so an error on primary still consults secondary.
 */
export async function lookupWithFallback(
  ctx: LookupContext,
  id: number,
): Promise<ReadResult> {
  const start = ctx.now();

  const primary = await tryGet(ctx, formatKey(ctx.keyPrefix, ctx.primaryVersion, id));
  if (primary) {
    return hit(id, "primary", ctx.primaryVersion, primary, ctx.now() - start);
  }

  const secondary = await tryGet(
    ctx,
    formatKey(ctx.keyPrefix, ctx.secondaryVersion, id),
  );
  if (secondary) {
    return hit(id, "secondary", ctx.secondaryVersion, secondary, ctx.now() - start);
  }

  return miss(id, ctx.now() - start);
}

function replyValue(reply: PipelineReply | undefined): string | null {
  if (!reply || reply.error !== null) {
    return null;
  }
  return reply.value;
}

/**
 * Reads a batch in one pipeline of `2 * ids.length` GETs, primary then
 * secondary per id. Latency of each result is measured from the start of the
 * batch.
 */
export async function lookupBatch(
  ctx: LookupContext,
  ids: number[],
): Promise<BatchReadOutcome> {
  const start = ctx.now();
  const commands: PipelineCommand[] = ids.flatMap((id): PipelineCommand[] => [
    { op: "get", key: formatKey(ctx.keyPrefix, ctx.primaryVersion, id) },
    { op: "get", key: formatKey(ctx.keyPrefix, ctx.secondaryVersion, id) },
  ]);

  let replies: PipelineReply[];
  try {
    replies = await ctx.store.pipeline(commands);
  } catch (err) {
    const cause = toError(err);
    logger.warn(`Pipeline read of ${ids.length} ids failed, reading individually`, {
      error: cause,
    });
    const results: ReadResult[] = [];
    for (const id of ids) {
      results.push(await lookupWithFallback(ctx, id));
    }
    return { kind: "fallback", cause, results };
  }

  const results = ids.map((id, i): ReadResult => {
    const latencyMs = ctx.now() - start;
    const primary = replyValue(replies[i * 2]);
    if (primary) {
      return hit(id, "primary", ctx.primaryVersion, primary, latencyMs);
    }
    const secondary = replyValue(replies[i * 2 + 1]);
    if (secondary) {
      return hit(id, "secondary", ctx.secondaryVersion, secondary, latencyMs);
    }
    return miss(id, latencyMs);
  });
  return { kind: "pipelined", results };
}
