/**
 * Timeseries Module - Schemas and Types
 */
import type { RecordHandle } from "../asset-data/index.js";

/** Accumulations per record before it is pushed */
export const DEFAULT_MAX_RECORD_COUNT = 6;

export type AccumulateOutcome =
  | "buffering"
  | "flushed-full"
  | "flushed-overflow"
  | "sample-error";

/**
 * The record currently being filled.
 */
export type OpenRecord = Readonly<{
  handle: RecordHandle;
  count: number;
}>;

export type AccumulatorDecision = Readonly<{
  outcome: AccumulateOutcome;
  count: number;
  flush: boolean;
}>;
