import type { KeyValueStore, PipelineCommand, PipelineReply } from "./types.js";

interface Entry {
  value: string;
  expiresAt: number | null;
}

export interface MemoryStoreOptions {
  now?: () => number;
}

function globToRegExp(pattern: string): RegExp {
  let source = "";
  for (const char of pattern) {
    if (char === "*") source += ".*";
    else if (char === "?") source += ".";
    else source += char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
  }
  return new RegExp(`^${source}$`);
}

/**
 * In-process KeyValueStore used for dry runs and tests. TTLs are honoured
 * lazily on access.
 */
export class MemoryStore implements KeyValueStore {
  private readonly entries = new Map<string, Entry>();
  private readonly now: () => number;

  /** When set, every pipeline call rejects as a whole. */
  failPipelines = false;
  /** Keys whose individual commands fail, inside or outside a pipeline. */
  readonly failKeys = new Set<string>();

  pipelineCalls = 0;
  getCalls = 0;
  setCalls = 0;

  constructor(options: MemoryStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private checkKey(key: string): void {
    if (this.failKeys.has(key)) {
      throw new Error(`Injected failure for ${key}`);
    }
  }

  async ping(): Promise<string> {
    return "PONG";
  }

  async get(key: string): Promise<string | null> {
    this.getCalls++;
    this.checkKey(key);
    return this.live(key)?.value ?? null;
  }

  async setWithTtl(
    key: string,
    value: string,
    ttlSeconds: number,
  ): Promise<boolean> {
    this.setCalls++;
    this.checkKey(key);
    this.entries.set(key, {
      value,
      expiresAt: this.now() + ttlSeconds * 1000,
    });
    return true;
  }

  /** Stores a key without expiry. */
  seed(key: string, value: string): void {
    this.entries.set(key, { value, expiresAt: null });
  }

  async pipeline(commands: PipelineCommand[]): Promise<PipelineReply[]> {
    this.pipelineCalls++;
    if (this.failPipelines) {
      throw new Error("Injected pipeline failure");
    }

    return commands.map((command): PipelineReply => {
      if (this.failKeys.has(command.key)) {
        return {
          error: new Error(`Injected failure for ${command.key}`),
          value: null,
        };
      }
      if (command.op === "get") {
        return { error: null, value: this.live(command.key)?.value ?? null };
      }
      this.entries.set(command.key, {
        value: command.value,
        expiresAt: this.now() + command.ttlSeconds * 1000,
      });
      return { error: null, value: "OK" };
    });
  }

  async keys(pattern: string): Promise<string[]> {
    const matcher = globToRegExp(pattern);
    return [...this.entries.keys()].filter(
      (key) => matcher.test(key) && this.live(key) !== undefined,
    );
  }

  async flushAll(): Promise<void> {
    this.entries.clear();
  }

  async ttl(key: string): Promise<number> {
    const entry = this.live(key);
    if (!entry) return -2;
    if (entry.expiresAt === null) return -1;
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }

  async close(): Promise<void> {}
}
