/**
 * Time source for the engine and scheduler.
 */
export interface Clock {
  now(): number;
}

/**
 * Clock that only moves when told to. Drives the scheduler in tests.
 */
export interface ControllableClock extends Clock {
  set(timestamp: number): void;
  advance(ms: number): void;
}
