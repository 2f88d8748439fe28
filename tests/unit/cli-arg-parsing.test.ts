import { describe, it } from "node:test";
import assert from "node:assert";
import {
  parseFlushOptions,
  parseGlobalOptions,
  parseImportAllOptions,
  parseImportOptions,
  parseInspectOptions,
  parseReadOptions,
  parseWriteOptions,
} from "../../src/cli/argParsing.js";
import type { CLIOptions } from "../../src/cli/types.js";

describe("CLI arg parsing", () => {
  const global: CLIOptions = {};

  it("parses global options", () => {
    const options = parseGlobalOptions({
      config: "./geokv.json",
      "log-level": "debug",
      "log-format": "json",
      "dry-run": true,
      output: "report.json",
    });

    assert.deepStrictEqual(options, {
      config: "./geokv.json",
      logLevel: "debug",
      logFormat: "json",
      dryRun: true,
      output: "report.json",
    });
  });

  it("rejects unknown log levels and formats", () => {
    assert.throws(() => parseGlobalOptions({ "log-level": "trace" }), /--log-level/);
    assert.throws(() => parseGlobalOptions({ "log-format": "xml" }), /--log-format/);
  });

  it("rejects a string option given without a value", () => {
    assert.throws(() => parseGlobalOptions({ config: true }), /--config requires a value/);
  });

  it("parses import options and keeps global ones", () => {
    const options = parseImportOptions(
      { dryRun: true },
      { tag: "v22", keys: "1000", workers: "4", "batch-size": "25" },
    );

    assert.deepStrictEqual(options, {
      dryRun: true,
      tag: "v22",
      keys: 1000,
      workers: 4,
      batchSize: 25,
    });
  });

  it("validates numeric and version arguments", () => {
    assert.throws(
      () => parseImportOptions(global, { keys: "0" }),
      /--keys must be an integer of at least 1/,
    );
    assert.throws(() => parseImportOptions(global, { workers: "2.5" }), /--workers/);
    assert.throws(() => parseImportOptions(global, { tag: "v1:x" }), /valid version tag/);
    assert.throws(
      () => parseWriteOptions(global, { start: "-1" }),
      /--start must be a non-negative integer/,
    );
  });

  it("splits the version list for import-all", () => {
    const options = parseImportAllOptions(global, {
      versions: "v22, v23,,",
      project: "20000000",
    });

    assert.deepStrictEqual(options.versions, ["v22", "v23"]);
    assert.strictEqual(options.project, 20000000);
  });

  it("requires --versions for import-all", () => {
    assert.throws(() => parseImportAllOptions(global, {}), /--versions is required/);
    assert.throws(
      () => parseImportAllOptions(global, { versions: "v1,bad tag" }),
      /invalid version tag: bad tag/,
    );
  });

  it("parses write options", () => {
    const options = parseWriteOptions(global, { duration: "60", start: "0", keys: "500" });
    assert.strictEqual(options.durationSeconds, 60);
    assert.strictEqual(options.start, 0);
    assert.strictEqual(options.keys, 500);
  });

  it("defaults the read mode and count", () => {
    const options = parseReadOptions(global, {});
    assert.strictEqual(options.mode, "parallel-pipeline");
    assert.strictEqual(options.reads, 10000);
  });

  it("parses read options", () => {
    const options = parseReadOptions(global, {
      mode: "sequential",
      reads: "500",
      primary: "v23",
      secondary: "v22",
      "max-keys": "1000",
    });

    assert.strictEqual(options.mode, "sequential");
    assert.strictEqual(options.reads, 500);
    assert.strictEqual(options.primary, "v23");
    assert.strictEqual(options.secondary, "v22");
    assert.strictEqual(options.maxKeys, 1000);
    assert.throws(() => parseReadOptions(global, { mode: "threaded" }), /--mode/);
  });

  it("parses inspect and flush options", () => {
    assert.strictEqual(parseInspectOptions(global, { pattern: "ip:*" }).pattern, "ip:*");
    assert.strictEqual(parseFlushOptions(global, {}).yes, false);
    assert.strictEqual(parseFlushOptions(global, { yes: true }).yes, true);
  });
});
