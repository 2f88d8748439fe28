import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import { WriteOrchestrator } from "../../src/writer/orchestrator.js";
import type { PayloadSource } from "../../src/writer/batchWriter.js";
import { MemoryStore } from "../../src/store/memoryStore.js";
import type { PipelineCommand, PipelineReply } from "../../src/store/types.js";
import type { WriterConfig } from "../../src/config/types.js";
import { ValidationError } from "../../src/util/errors.js";
import { logger } from "../../src/util/logger.js";

const records: PayloadSource = { generate: (id) => `payload-${id}` };

const writerConfig: WriterConfig = {
  numWriters: 4,
  batchSize: 50,
  writeChunk: 100,
  keyTtlSeconds: 60,
  maxKeys: 1000,
  skipProbability: 0,
  versionPauseMs: 0,
};

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

describe("WriteOrchestrator", () => {
  before(() => {
    logger.setSink(() => {});
  });

  after(() => {
    logger.setSink();
  });

  it("imports 1000 keys over 4 workers", async () => {
    const store = new MemoryStore();
    const orchestrator = new WriteOrchestrator({
      store,
      records,
      writer: writerConfig,
      keyPrefix: "ip",
    });

    const report = await orchestrator.runImport("v1");

    assert.strictEqual(report.version, "v1");
    assert.strictEqual(report.targetKeys, 1000);
    assert.strictEqual(report.numWorkers, 4);
    assert.strictEqual(report.keysWritten, 1000);
    assert.strictEqual(report.keysSkipped, 0);
    assert.strictEqual(report.keysFailed, 0);
    assert.strictEqual(report.interrupted, false);
    assert.deepStrictEqual(
      report.workers.map((w) => [w.workerId, w.range.start, w.range.end, w.keysWritten]),
      [
        [1, 0, 250, 250],
        [2, 250, 500, 250],
        [3, 500, 750, 250],
        [4, 750, 1000, 250],
      ],
    );
    assert.strictEqual(store.size, 1000);
    assert.strictEqual(await store.get("ip:v1:999"), "payload-999");
  });

  it("puts the remainder on the last worker for an explicit target", async () => {
    const store = new MemoryStore();
    const orchestrator = new WriteOrchestrator({
      store,
      records,
      writer: writerConfig,
      keyPrefix: "ip",
    });

    const report = await orchestrator.runImport("v2", 10);

    assert.strictEqual(report.keysWritten, 10);
    assert.deepStrictEqual(
      report.workers.map((w) => w.keysWritten),
      [2, 2, 2, 4],
    );
  });

  it("keeps the partial counts of a worker that fails", async () => {
    const store = new MemoryStore();
    const failing: PayloadSource = {
      generate: (id) => {
        if (id === 600) throw new Error("bad record 600");
        return `payload-${id}`;
      },
    };
    const orchestrator = new WriteOrchestrator({
      store,
      records: failing,
      writer: writerConfig,
      keyPrefix: "ip",
    });

    const report = await orchestrator.runImport("v1");

    const worker3 = report.workers[2];
    assert.strictEqual(worker3.workerId, 3);
    assert.strictEqual(worker3.error, "bad record 600");
    assert.strictEqual(worker3.keysWritten, 100);
    assert.strictEqual(report.workers.filter((w) => w.error).length, 1);
    assert.strictEqual(report.keysWritten, 850);
  });

  it("counts batches written earlier in the chunk where a worker fails", async () => {
    const store = new MemoryStore();
    const failing: PayloadSource = {
      generate: (id) => {
        if (id === 660) throw new Error("bad record 660");
        return `payload-${id}`;
      },
    };
    const orchestrator = new WriteOrchestrator({
      store,
      records: failing,
      writer: writerConfig,
      keyPrefix: "ip",
    });

    const report = await orchestrator.runImport("v1");

    const worker3 = report.workers[2];
    assert.strictEqual(worker3.error, "bad record 660");
    assert.strictEqual(worker3.keysWritten, 150);
    assert.strictEqual(await store.get("ip:v1:649"), "payload-649");
    assert.strictEqual(await store.get("ip:v1:650"), null);
    assert.strictEqual(report.keysWritten, 900);
    assert.strictEqual(store.size, report.keysWritten);
  });

  it("reports an interrupted run when the signal is already aborted", async () => {
    const store = new MemoryStore();
    const controller = new AbortController();
    controller.abort();
    const orchestrator = new WriteOrchestrator({
      store,
      records,
      writer: writerConfig,
      keyPrefix: "ip",
      signal: controller.signal,
    });

    const report = await orchestrator.runImport("v1", 100);

    assert.strictEqual(report.interrupted, true);
    assert.strictEqual(report.keysWritten, 0);
    assert.strictEqual(report.workers.length, 4);
    assert.strictEqual(store.pipelineCalls, 0);
  });

  it("rejects a worker count larger than the key count", async () => {
    const orchestrator = new WriteOrchestrator({
      store: new MemoryStore(),
      records,
      writer: writerConfig,
      keyPrefix: "ip",
    });

    await assert.rejects(orchestrator.runImport("v1", 3), ValidationError);
  });

  it("imports several versions in turn and projects completion time", async () => {
    const store = new TickingStore();
    const orchestrator = new WriteOrchestrator({
      store,
      records,
      writer: { ...writerConfig, numWriters: 2 },
      keyPrefix: "ip",
      now: () => store.time,
    });

    const report = await orchestrator.runMultiVersionImport(["v1", "v2"], 100, {
      projectionTargetKeys: 1000,
    });

    assert.deepStrictEqual(
      report.versions.map((v) => [v.version, v.keysWritten]),
      [
        ["v1", 100],
        ["v2", 100],
      ],
    );
    assert.strictEqual(report.keysWritten, 200);
    assert.strictEqual(report.overallDurationMs, 4000);
    assert.strictEqual(report.combinedRate, 50);
    assert.deepStrictEqual(report.projection, {
      targetKeys: 1000,
      estimatedSeconds: 20,
    });
    assert.strictEqual((await store.keys("ip:v2:*")).length, 100);
  });

  it("stops before the next version once interrupted", async () => {
    const store = new TickingStore();
    const controller = new AbortController();
    store.onPipeline = (call) => {
      if (call === 2) controller.abort();
    };
    const orchestrator = new WriteOrchestrator({
      store,
      records,
      writer: { ...writerConfig, numWriters: 2, versionPauseMs: 60_000 },
      keyPrefix: "ip",
      signal: controller.signal,
    });

    const report = await orchestrator.runMultiVersionImport(["v1", "v2"], 100);

    assert.strictEqual(report.interrupted, true);
    assert.deepStrictEqual(report.versions.map((v) => v.version), ["v1"]);
    assert.strictEqual(report.keysWritten, 100);
    assert.strictEqual(report.projection, undefined);
  });

  it("requires at least one version", async () => {
    const orchestrator = new WriteOrchestrator({
      store: new MemoryStore(),
      records,
      writer: writerConfig,
      keyPrefix: "ip",
    });

    await assert.rejects(orchestrator.runMultiVersionImport([]), ValidationError);
  });
});
