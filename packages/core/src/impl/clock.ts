import type { Clock, ControllableClock } from '../interfaces/clock';

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }
}

/**
 * Deterministic clock for tests.
 */
export class ManualClock implements ControllableClock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    if (timestamp < this.current) {
      throw new Error(`Clock cannot move backwards (${timestamp} < ${this.current})`);
    }
    this.current = timestamp;
  }

  advance(ms: number): void {
    if (ms < 0) throw new Error('Clock cannot move backwards');
    this.current += ms;
  }
}

export function isControllable(clock: Clock): clock is ControllableClock {
  return 'advance' in clock && 'set' in clock;
}
