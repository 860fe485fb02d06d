/**
 * Sample Accumulator Tests
 */
import { beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { type FakeSink, createFakeSink } from "../../__tests__/support/fake-sink.js";
import type { PositionService } from "../../position/index.js";
import { createInitialState } from "../../truck/index.js";
import { type SampleAccumulator, createSampleAccumulator } from "../service.js";

const STATE = { ...createInitialState(4.8), fanDurationMin: 5 };

describe("Sample Accumulator", () => {
  let sink: FakeSink;
  let position: PositionService;
  let accumulator: SampleAccumulator;

  beforeEach(() => {
    sink = createFakeSink();
    position = {
      start: vi.fn(),
      stop: vi.fn(),
      pushCurrentLocation: vi.fn(() => "FIX" as const),
    };
    accumulator = createSampleAccumulator({ sink, position, maxRecordCount: 3 });
  });

  test("opens a record lazily and pushes the location with it", () => {
    expect(accumulator.openRecordCount()).toBeNull();

    expect(accumulator.accumulate(STATE, 1000)).toBe("buffering");

    expect(accumulator.openRecordCount()).toBe(1);
    expect(position.pushCurrentLocation).toHaveBeenCalledTimes(1);
    expect(sink.openRecords.get(1)).toEqual([
      { path: "truck.var.temp.current", value: 4.8, timestamp: 1000 },
      { path: "truck.var.fan.duration", value: 5, timestamp: 1000 },
    ]);
  });

  test("flushes and discards the record after exactly N accumulations", () => {
    const outcomes = [1000, 2000, 3000].map((t) => accumulator.accumulate(STATE, t));

    expect(outcomes).toEqual(["buffering", "buffering", "flushed-full"]);
    expect(sink.pushedRecords).toHaveLength(1);
    expect(sink.pushedRecords[0]).toHaveLength(6);
    expect(sink.deletedRecords).toEqual([1]);
    expect(accumulator.openRecordCount()).toBeNull();
    expect(position.pushCurrentLocation).toHaveBeenCalledTimes(1);
  });

  test("creates a new record on the next call after a flush", () => {
    for (const t of [1, 2, 3]) accumulator.accumulate(STATE, t);

    accumulator.accumulate(STATE, 4);

    expect(accumulator.openRecordCount()).toBe(1);
    expect([...sink.openRecords.keys()]).toEqual([2]);
    expect(position.pushCurrentLocation).toHaveBeenCalledTimes(2);
  });

  test("flushes immediately when the buffer reports full", () => {
    accumulator.accumulate(STATE, 1000);
    sink.sampleStatus = () => "full";

    expect(accumulator.accumulate(STATE, 2000)).toBe("flushed-overflow");
    expect(sink.pushedRecords).toEqual([
      [
        { path: "truck.var.temp.current", value: 4.8, timestamp: 1000 },
        { path: "truck.var.fan.duration", value: 5, timestamp: 1000 },
      ],
    ]);
    expect(accumulator.openRecordCount()).toBeNull();
  });

  test("discards the record even when the push fails", async () => {
    sink.failPushes = true;

    for (const t of [1, 2, 3]) accumulator.accumulate(STATE, t);
    await Promise.resolve();

    expect(sink.deletedRecords).toEqual([1]);
    expect(accumulator.openRecordCount()).toBeNull();
  });

  test("keeps the record without counting on a sample error", () => {
    accumulator.accumulate(STATE, 1000);
    sink.sampleStatus = () => "error";

    expect(accumulator.accumulate(STATE, 2000)).toBe("sample-error");
    expect(accumulator.openRecordCount()).toBe(1);
    expect(sink.pushedRecords).toHaveLength(0);
  });
});
