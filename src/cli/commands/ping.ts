import type { PingOptions } from "../types.js";
import { withCommandContext } from "../context.js";

export async function pingCommand(options: PingOptions): Promise<void> {
  await withCommandContext(options, async ({ config, store }) => {
    const start = performance.now();
    const reply = await store.ping();
    const elapsed = performance.now() - start;

    const target = options.dryRun
      ? "in-memory store"
      : `${config.store.host}:${config.store.port}`;
    console.log(`${reply} from ${target} in ${elapsed.toFixed(2)} ms`);
  });
}
