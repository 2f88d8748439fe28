import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import { BatchWriter, type BatchWriterOptions } from "../../src/writer/batchWriter.js";
import { MemoryStore } from "../../src/store/memoryStore.js";
import type { PipelineCommand, PipelineReply } from "../../src/store/types.js";
import type { WriterProgress } from "../../src/stats/types.js";
import { ValidationError } from "../../src/util/errors.js";
import { logger } from "../../src/util/logger.js";

const records = { generate: (id: number | string) => `payload-${id}` };

function createWriter(
  store: MemoryStore,
  overrides: Partial<BatchWriterOptions> = {},
): BatchWriter {
  return new BatchWriter({
    store,
    records,
    version: "v1",
    keyPrefix: "ip",
    ttlSeconds: 30,
    maxKeys: 1000,
    batchSize: 50,
    ...overrides,
  });
}

/**
 * Advances a shared clock by one second on every pipeline call.
 */
class TickingStore extends MemoryStore {
  time = 0;
  onPipeline: (call: number) => void = () => {};

  async pipeline(commands: PipelineCommand[]): Promise<PipelineReply[]> {
    this.time += 1000;
    const replies = await super.pipeline(commands);
    this.onPipeline(this.pipelineCalls);
    return replies;
  }
}

describe("BatchWriter", () => {
  const logLines: string[] = [];

  before(() => {
    logger.setSink((line) => logLines.push(line));
  });

  after(() => {
    logger.setSink();
  });

  it("writes ids from the cursor in pipelined batches", async () => {
    const store = new MemoryStore({ now: () => 1000 });
    const writer = createWriter(store);

    const tally = await writer.write(120, 50);

    assert.strictEqual(tally.written, 120);
    assert.strictEqual(tally.skipped, 0);
    assert.strictEqual(tally.failed, 0);
    assert.deepStrictEqual(
      tally.batches.map((b) => [b.kind, b.outcomes.length]),
      [
        ["pipelined", 50],
        ["pipelined", 50],
        ["pipelined", 20],
      ],
    );
    assert.strictEqual(store.pipelineCalls, 3);
    assert.strictEqual(writer.position, 120);
    assert.strictEqual(store.size, 120);
    assert.strictEqual(await store.get("ip:v1:0"), "payload-0");
    assert.strictEqual(await store.get("ip:v1:119"), "payload-119");
    assert.strictEqual(await store.get("ip:v1:120"), null);
    assert.strictEqual(await store.ttl("ip:v1:7"), 30);
  });

  it("starts at the configured offset", async () => {
    const store = new MemoryStore();
    const writer = createWriter(store, { startOffset: 500 });

    await writer.write(3);

    assert.deepStrictEqual((await store.keys("ip:v1:*")).sort(), [
      "ip:v1:500",
      "ip:v1:501",
      "ip:v1:502",
    ]);
  });

  it("never moves the cursor past maxKeys", async () => {
    const store = new MemoryStore();
    const writer = createWriter(store, { startOffset: 90, maxKeys: 100 });

    const first = await writer.write(50);
    assert.strictEqual(first.written, 10);
    assert.strictEqual(writer.position, 100);
    assert.strictEqual(writer.exhausted, true);

    const second = await writer.write(10);
    assert.strictEqual(second.written, 0);
    assert.strictEqual(writer.position, 100);
    assert.strictEqual(store.pipelineCalls, 1);
  });

  it("falls back to individual writes when the pipeline fails", async () => {
    const store = new MemoryStore();
    store.failPipelines = true;
    store.failKeys.add("ip:v1:3");
    const writer = createWriter(store);

    const tally = await writer.write(5, 5);

    assert.strictEqual(tally.batches.length, 1);
    const [batch] = tally.batches;
    assert.strictEqual(batch.kind, "fallback");
    if (batch.kind === "fallback") {
      assert.strictEqual(batch.cause.message, "Injected pipeline failure");
    }
    assert.deepStrictEqual(batch.outcomes, [
      "written",
      "written",
      "written",
      "failed",
      "written",
    ]);
    assert.strictEqual(tally.written, 4);
    assert.strictEqual(tally.failed, 1);
    assert.strictEqual(store.setCalls, 5);
    assert.strictEqual(await store.get("ip:v1:4"), "payload-4");
    assert.deepStrictEqual(writer.getCounters(), {
      keysWritten: 4,
      keysSkipped: 0,
      keysFailed: 1,
    });
  });

  it("counts a per-command error inside a pipeline as failed", async () => {
    const store = new MemoryStore();
    store.failKeys.add("ip:v1:1");
    const writer = createWriter(store);

    const tally = await writer.write(4, 4);

    assert.strictEqual(tally.batches[0].kind, "pipelined");
    assert.deepStrictEqual(tally.batches[0].outcomes, [
      "written",
      "failed",
      "written",
      "written",
    ]);
    assert.strictEqual(store.setCalls, 0);
  });

  it("consumes skipped ids without writing them", async () => {
    const store = new MemoryStore();
    let call = 0;
    const writer = createWriter(store, {
      skipProbability: 0.5,
      random: () => (call++ % 2 === 0 ? 0.1 : 0.9),
    });

    const tally = await writer.write(10);

    assert.strictEqual(tally.skipped, 5);
    assert.strictEqual(tally.written, 5);
    assert.strictEqual(writer.position, 10);
    assert.strictEqual(await store.get("ip:v1:0"), null);
    assert.strictEqual(await store.get("ip:v1:1"), "payload-1");
    assert.deepStrictEqual(
      (await store.keys("ip:v1:*")).sort(),
      ["ip:v1:1", "ip:v1:3", "ip:v1:5", "ip:v1:7", "ip:v1:9"],
    );
  });

  it("runs until exactly the target is written", async () => {
    const store = new MemoryStore();
    const writer = createWriter(store, { writeChunk: 100 });

    const result = await writer.runUntil({ targetKeys: 230 });

    assert.strictEqual(result.stopReason, "target");
    assert.strictEqual(result.keysWritten, 230);
    assert.strictEqual(result.cursor, 230);
    assert.strictEqual(store.size, 230);
  });

  it("stops at the end of the key space without a target", async () => {
    const store = new MemoryStore();
    const writer = createWriter(store, { maxKeys: 75 });

    const result = await writer.runUntil();

    assert.strictEqual(result.stopReason, "exhausted");
    assert.strictEqual(result.keysWritten, 75);
    assert.strictEqual(result.cursor, 75);
  });

  it("stops once the duration has elapsed and reports progress by time", async () => {
    const store = new TickingStore();
    const snapshots: WriterProgress[] = [];
    const writer = createWriter(store, {
      writeChunk: 10,
      batchSize: 10,
      now: () => store.time,
      progressIntervalMs: 2000,
      onProgress: (progress) => snapshots.push(progress),
    });

    const result = await writer.runUntil({ durationSeconds: 3 });

    assert.strictEqual(result.stopReason, "duration");
    assert.strictEqual(result.keysWritten, 30);
    assert.strictEqual(result.durationMs, 3000);
    assert.deepStrictEqual(snapshots, [
      {
        keysWritten: 20,
        keysSkipped: 0,
        keysFailed: 0,
        elapsedMs: 2000,
        instantRate: 10,
        cursor: 20,
      },
    ]);
  });

  it("halts at the next batch boundary once aborted", async () => {
    const store = new TickingStore();
    const controller = new AbortController();
    store.onPipeline = (call) => {
      if (call === 2) controller.abort();
    };
    const writer = createWriter(store, {
      writeChunk: 200,
      batchSize: 50,
      signal: controller.signal,
    });

    const result = await writer.runUntil({ targetKeys: 1000 });

    assert.strictEqual(result.stopReason, "interrupted");
    assert.strictEqual(result.keysWritten, 100);
    assert.strictEqual(result.cursor, 100);
    assert.strictEqual(store.pipelineCalls, 2);
  });

  it("does nothing when started with an aborted signal", async () => {
    const store = new MemoryStore();
    const controller = new AbortController();
    controller.abort();
    const writer = createWriter(store, { signal: controller.signal });

    const result = await writer.runUntil({ targetKeys: 10 });

    assert.strictEqual(result.stopReason, "interrupted");
    assert.strictEqual(result.keysWritten, 0);
    assert.strictEqual(store.pipelineCalls, 0);
  });

  it("rejects an invalid start offset or batch size", () => {
    const store = new MemoryStore();
    assert.throws(() => createWriter(store, { startOffset: -1 }), ValidationError);
    assert.throws(() => createWriter(store, { batchSize: 0 }), ValidationError);
  });
});
