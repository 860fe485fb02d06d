/**
 * Timeseries Module - Service Layer
 *
 * Buffers timestamped temperature and fan-duration samples into bounded
 * records and hands each full record to the asset-data sink.
 *
 * Delivery is at-most-once: the record is deleted as soon as the push is
 * submitted, whatever its outcome, and a failed push is only logged.
 */
import {
  type AssetDataSink,
  VARIABLE_PATHS,
  logPushOutcome,
} from "../asset-data/index.js";
import { createLogger } from "../logger.js";
import type { PositionService } from "../position/index.js";
import type { PhysicalState } from "../truck/index.js";
import type { AccumulateOutcome, OpenRecord } from "./schema.js";
import { DEFAULT_MAX_RECORD_COUNT } from "./schema.js";
import { combineStatuses, decideAfterSample } from "./transform.js";

const log = createLogger("timeseries");

export type SampleAccumulator = Readonly<{
  accumulate(state: PhysicalState, nowMs: number): AccumulateOutcome;
  /** Accumulations in the open record, or null when none is open */
  openRecordCount(): number | null;
}>;

export function createSampleAccumulator(deps: {
  sink: AssetDataSink;
  position: PositionService;
  maxRecordCount?: number;
}): SampleAccumulator {
  const { sink, position } = deps;
  const max = deps.maxRecordCount ?? DEFAULT_MAX_RECORD_COUNT;
  let open: OpenRecord | null = null;

  const flush = (record: OpenRecord): void => {
    log.info({ recordId: record.handle.id, count: record.count }, "Pushing timeseries");
    logPushOutcome(log, "timeseries", sink.pushRecord(record.handle));
    sink.deleteRecord(record.handle);
    open = null;
  };

  return {
    accumulate(state, nowMs) {
      if (open === null) {
        position.pushCurrentLocation();
        log.debug("Creating new record");
        open = { handle: sink.createRecord(), count: 0 };
      }
      const record = open;

      const status = combineStatuses([
        sink.recordSample(record.handle, VARIABLE_PATHS.temperature, state.currentTempC, nowMs),
        sink.recordSample(record.handle, VARIABLE_PATHS.fanDuration, state.fanDurationMin, nowMs),
      ]);

      const decision = decideAfterSample(status, record.count, max);

      switch (decision.outcome) {
        case "flushed-overflow":
          log.info("Buffer overflow or full, pushing timeseries now");
          break;
        case "sample-error":
          log.warn({ recordId: record.handle.id }, "Unknown accumulation outcome");
          break;
        default:
          break;
      }

      const updated: OpenRecord = { ...record, count: decision.count };
      if (decision.flush) {
        flush(updated);
      } else {
        open = updated;
      }

      return decision.outcome;
    },

    openRecordCount: () => open?.count ?? null,
  };
}
