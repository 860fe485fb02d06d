/**
 * Scheduler Module - Public API
 */

export type { PeriodicTimer, Scheduler, TimerName } from "./schema.js";

export { createPeriodicTimer, createScheduler } from "./service.js";
