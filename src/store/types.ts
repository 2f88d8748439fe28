/**
 * Store primitives the writers and readers depend on. RedisStore implements
 * them over ioredis; MemoryStore keeps everything in process.
 */

export type PipelineCommand =
  | { op: "get"; key: string }
  | { op: "setex"; key: string; value: string; ttlSeconds: number };

/**
 * One reply per command, in request order. A failed command carries its
 * error and a null value; the rest of the pipeline is unaffected.
 */
export interface PipelineReply {
  error: Error | null;
  value: string | null;
}

export interface KeyValueStore {
  ping(): Promise<string>;
  get(key: string): Promise<string | null>;
  /**
   * SET with expiry. Resolves true when the store acknowledged the write.
   */
  setWithTtl(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  /**
   * Sends all commands in one non-transactional round trip. Rejects only when
   * the batch fails as a whole.
   */
  pipeline(commands: PipelineCommand[]): Promise<PipelineReply[]>;
  keys(pattern: string): Promise<string[]>;
  flushAll(): Promise<void>;
  /**
   * Seconds to live, -1 for no expiry, -2 for a missing key.
   */
  ttl(key: string): Promise<number>;
  close(): Promise<void>;
}

export function formatKey(prefix: string, version: string, id: number): string {
  return `${prefix}:${version}:${id}`;
}
