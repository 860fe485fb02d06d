/**
 * Scheduler Module - Schemas and Types
 */

export type TimerName = "generate" | "publish";

export type PeriodicTimer = Readonly<{
  name: TimerName;
  start(): void;
  stop(): void;
  /** Takes effect on the next start() */
  setInterval(intervalSec: number): void;
  intervalSec(): number;
  isRunning(): boolean;
}>;

export type Scheduler = Readonly<{
  /** Fire both callbacks once, then start both timers */
  start(): void;
  stop(): void;
  /** Stop, set the new interval, restart */
  reconfigure(name: TimerName, intervalSec: number): void;
  intervalOf(name: TimerName): number;
}>;
