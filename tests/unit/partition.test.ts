import { describe, it } from "node:test";
import assert from "node:assert";
import {
  distributeCounts,
  partitionKeySpace,
} from "../../src/writer/partition.js";
import { ValidationError } from "../../src/util/errors.js";

describe("partitionKeySpace", () => {
  it("splits 1000 keys over 4 workers into equal ranges", () => {
    assert.deepStrictEqual(partitionKeySpace(1000, 4), [
      { workerId: 1, start: 0, end: 250 },
      { workerId: 2, start: 250, end: 500 },
      { workerId: 3, start: 500, end: 750 },
      { workerId: 4, start: 750, end: 1000 },
    ]);
  });

  it("appends the remainder to the last range", () => {
    assert.deepStrictEqual(partitionKeySpace(10, 3), [
      { workerId: 1, start: 0, end: 3 },
      { workerId: 2, start: 3, end: 6 },
      { workerId: 3, start: 6, end: 10 },
    ]);
  });

  it("gives a single worker the whole key space", () => {
    assert.deepStrictEqual(partitionKeySpace(7, 1), [
      { workerId: 1, start: 0, end: 7 },
    ]);
  });

  it("allows one key per worker", () => {
    const ranges = partitionKeySpace(3, 3);
    assert.deepStrictEqual(
      ranges.map((r) => [r.start, r.end]),
      [
        [0, 1],
        [1, 2],
        [2, 3],
      ],
    );
  });

  it("rejects empty key spaces and invalid worker counts", () => {
    assert.throws(() => partitionKeySpace(0, 1), ValidationError);
    assert.throws(() => partitionKeySpace(10, 0), ValidationError);
    assert.throws(() => partitionKeySpace(10, 2.5), ValidationError);
    assert.throws(() => partitionKeySpace(3, 4), /cannot exceed totalKeys/);
  });
});

describe("distributeCounts", () => {
  it("gives the remainder to the first workers", () => {
    assert.deepStrictEqual(distributeCounts(10, 4), [3, 3, 2, 2]);
  });

  it("returns zero shares when there is nothing to distribute", () => {
    assert.deepStrictEqual(distributeCounts(0, 3), [0, 0, 0]);
  });

  it("rejects a worker count below one", () => {
    assert.throws(() => distributeCounts(10, 0), ValidationError);
  });
});
