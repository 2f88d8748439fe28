import type { InspectOptions } from "../types.js";
import { withCommandContext, writeReport } from "../context.js";
import { INSPECT_SAMPLE_KEYS } from "../../config/constants.js";

/**
 * Counts keys matching a glob (default: every key of one version) and shows
 * the TTL of a few of them.
 */
export async function inspectCommand(options: InspectOptions): Promise<void> {
  await withCommandContext(options, async ({ config, store }) => {
    const pattern =
      options.pattern ??
      `${config.store.keyPrefix}:${options.tag ?? config.version}:*`;

    const keys = await store.keys(pattern);
    const sample: Array<{ key: string; ttlSeconds: number }> = [];
    for (const key of keys.slice(0, INSPECT_SAMPLE_KEYS)) {
      sample.push({ key, ttlSeconds: await store.ttl(key) });
    }

    console.log(`Keys matching ${pattern}: ${keys.length.toLocaleString("en-US")}`);
    for (const { key, ttlSeconds } of sample) {
      console.log(`  ${key} (ttl ${ttlSeconds}s)`);
    }
    writeReport(options.output, { pattern, count: keys.length, sample });
  });
}
