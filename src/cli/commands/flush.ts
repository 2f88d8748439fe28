import type { FlushOptions } from "../types.js";
import { withCommandContext } from "../context.js";
import { ValidationError } from "../../util/errors.js";
import { logger } from "../../util/logger.js";

export async function flushCommand(options: FlushOptions): Promise<void> {
  if (!options.yes) {
    throw new ValidationError(
      "flush deletes every key in the store; pass --yes to confirm",
    );
  }

  await withCommandContext(options, async ({ store }) => {
    await store.flushAll();
    logger.info("Store flushed");
    console.log("All keys deleted.");
  });
}
