import { Redis, Cluster } from "ioredis";
import calculateSlot from "cluster-key-slot";
import type { StoreConfig } from "../config/types.js";
import { StoreConnectionError, errorMessage } from "../util/errors.js";
import { logger } from "../util/logger.js";
import type { KeyValueStore, PipelineCommand, PipelineReply } from "./types.js";

function toReply(error: Error | null, result: unknown): PipelineReply {
  if (error) {
    return { error, value: null };
  }
  if (typeof result === "string") {
    return { error: null, value: result };
  }
  if (Buffer.isBuffer(result)) {
    return { error: null, value: result.toString("utf-8") };
  }
  return { error: null, value: null };
}

/**
 * Indexes of `commands` grouped by the nodes serving each key's hash slot,
 * in first-seen order. `slots` is the cluster's slot table (node keys per
 * slot); a slot missing from it forms a group of its own.
 */
export function groupBySlotOwner(
  commands: PipelineCommand[],
  slots: string[][],
): number[][] {
  const groups = new Map<string, number[]>();
  commands.forEach((command, i) => {
    const slot = calculateSlot(command.key);
    const owner = slots[slot]?.join(";") ?? `slot:${slot}`;
    const group = groups.get(owner);
    if (group) {
      group.push(i);
    } else {
      groups.set(owner, [i]);
    }
  });
  return [...groups.values()];
}

export class RedisStore implements KeyValueStore {
  constructor(private readonly client: Redis | Cluster) {}

  async ping(): Promise<string> {
    return this.client.ping();
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async setWithTtl(
    key: string,
    value: string,
    ttlSeconds: number,
  ): Promise<boolean> {
    const result = await this.client.setex(key, ttlSeconds, value);
    return result === "OK";
  }

  /**
   * A cluster only pipelines keys of one slot owner, so the batch is split
   * per owner, one pipeline each, and the replies are put back in request
   * order.
   */
  async pipeline(commands: PipelineCommand[]): Promise<PipelineReply[]> {
    if (!(this.client instanceof Cluster)) {
      return this.execPipeline(commands);
    }

    const groups = groupBySlotOwner(commands, this.client.slots);
    const replies: PipelineReply[] = [];
    await Promise.all(
      groups.map(async (indexes) => {
        const groupReplies = await this.execPipeline(
          indexes.map((i) => commands[i]),
        );
        indexes.forEach((commandIndex, j) => {
          replies[commandIndex] = groupReplies[j];
        });
      }),
    );
    return replies;
  }

  protected async execPipeline(
    commands: PipelineCommand[],
  ): Promise<PipelineReply[]> {
    const pipe = this.client.pipeline();
    for (const command of commands) {
      if (command.op === "get") {
        pipe.get(command.key);
      } else {
        pipe.setex(command.key, command.ttlSeconds, command.value);
      }
    }

    const results = await pipe.exec();
    if (results === null) {
      throw new Error("Pipeline returned no results");
    }
    return results.map(([error, result]) => toReply(error, result));
  }

  async keys(pattern: string): Promise<string[]> {
    if (this.client instanceof Cluster) {
      const perNode = await Promise.all(
        this.client.nodes("master").map((node) => node.keys(pattern)),
      );
      return perNode.flat();
    }
    return this.client.keys(pattern);
  }

  async flushAll(): Promise<void> {
    if (this.client instanceof Cluster) {
      await Promise.all(
        this.client.nodes("master").map((node) => node.flushall()),
      );
      return;
    }
    await this.client.flushall();
  }

  async ttl(key: string): Promise<number> {
    return this.client.ttl(key);
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
    } catch (err) {
      logger.debug("Store quit failed, disconnecting", { error: err });
      this.client.disconnect();
    }
  }
}

function createClient(config: StoreConfig): Redis | Cluster {
  const commandTimeout =
    config.commandTimeoutMs > 0 ? config.commandTimeoutMs : undefined;

  if (config.cluster) {
    return new Cluster([{ host: config.host, port: config.port }], {
      lazyConnect: true,
      redisOptions: {
        password: config.password,
        connectTimeout: config.connectTimeoutMs,
        commandTimeout,
      },
    });
  }

  return new Redis({
    host: config.host,
    port: config.port,
    db: config.db,
    password: config.password,
    connectTimeout: config.connectTimeoutMs,
    commandTimeout,
    lazyConnect: true,
    maxRetriesPerRequest: 1,
  });
}

/**
 * Connects and pings. Any failure here is fatal to the caller.
 */
export async function connectStore(config: StoreConfig): Promise<RedisStore> {
  const client = createClient(config);
  const target = `${config.host}:${config.port}`;

  try {
    await client.connect();
    const store = new RedisStore(client);
    await store.ping();
    logger.info(`Connected to store at ${target}`, {
      cluster: config.cluster,
      db: config.db,
    });
    return store;
  } catch (err) {
    client.disconnect();
    throw new StoreConnectionError(
      `Failed to connect to store at ${target}: ${errorMessage(err)}`,
      { cause: err },
    );
  }
}
