/**
 * Timeseries Module - Public API
 */

export type { AccumulateOutcome, AccumulatorDecision, OpenRecord } from "./schema.js";
export type { SampleAccumulator } from "./service.js";

export { DEFAULT_MAX_RECORD_COUNT } from "./schema.js";

export { createSampleAccumulator } from "./service.js";

export { combineStatuses, decideAfterSample } from "./transform.js";
