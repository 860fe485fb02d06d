/**
 * Timeseries Module - Pure Transformations
 */
import type { RecordStatus } from "../asset-data/index.js";
import type { AccumulatorDecision } from "./schema.js";

const SEVERITY: Readonly<Record<RecordStatus, number>> = {
  ok: 0,
  error: 1,
  full: 2,
};

/**
 * Combine the statuses of the samples recorded in one accumulation.
 * Buffer exhaustion wins over any other outcome.
 */
export function combineStatuses(
  statuses: ReadonlyArray<RecordStatus>,
): RecordStatus {
  return statuses.reduce<RecordStatus>(
    (worst, status) => (SEVERITY[status] > SEVERITY[worst] ? status : worst),
    "ok",
  );
}

/**
 * Decide what to do with the open record after one accumulation.
 *
 * @param status - Combined status of the samples just recorded
 * @param count - Accumulations already in the record before this one
 * @param max - Accumulations that make a record complete
 */
export function decideAfterSample(
  status: RecordStatus,
  count: number,
  max: number,
): AccumulatorDecision {
  switch (status) {
    case "ok": {
      const next = count + 1;
      return next >= max
        ? { outcome: "flushed-full", count: next, flush: true }
        : { outcome: "buffering", count: next, flush: false };
    }
    case "full":
      return { outcome: "flushed-overflow", count, flush: true };
    case "error":
      return { outcome: "sample-error", count, flush: false };
  }
}
