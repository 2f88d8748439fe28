import { describe, it, afterEach } from "node:test";
import assert from "node:assert";
import { logger } from "../../src/util/logger.js";

describe("logger", () => {
  afterEach(() => {
    logger.setSink();
    logger.setLevel("info");
    logger.setFormat("pretty");
  });

  it("drops messages below the configured level", () => {
    const lines: string[] = [];
    logger.setSink((line) => lines.push(line));
    logger.setLevel("warn");

    logger.info("hidden");
    logger.warn("shown");

    assert.deepStrictEqual(lines, ["[WARN] shown"]);
  });

  it("appends metadata as JSON in pretty format", () => {
    const lines: string[] = [];
    logger.setSink((line) => lines.push(line));

    logger.info("Connected", { db: 0, cluster: false });

    assert.deepStrictEqual(lines, ['[INFO] Connected {"db":0,"cluster":false}']);
  });

  it("writes one JSON object per line in json format", () => {
    const lines: string[] = [];
    logger.setSink((line) => lines.push(line));
    logger.setFormat("json");

    logger.error("Worker failed", { workerId: 3 });

    const entry: unknown = JSON.parse(lines[0]);
    assert.ok(entry !== null && typeof entry === "object");
    assert.ok("timestamp" in entry);
    assert.deepStrictEqual(
      { ...entry, timestamp: undefined },
      { timestamp: undefined, level: "error", message: "Worker failed", workerId: 3 },
    );
  });

  it("flattens errors in metadata to their message", () => {
    const lines: string[] = [];
    logger.setSink((line) => lines.push(line));
    logger.setFormat("json");

    logger.warn("Pipeline failed", { error: new Error("timeout") });

    const entry: unknown = JSON.parse(lines[0]);
    assert.ok(entry !== null && typeof entry === "object" && "error" in entry);
    assert.strictEqual(entry.error, "timeout");
  });
});
