import type { ClockPort } from '@trackfold/domain';

/**
 * Clock for tests and reproducible runs: every reading returns the current
 * instant and then moves it forward by `stepMs`.
 */
export class DeterministicClock implements ClockPort {
  private nextMs: number;

  constructor(
    start: Date | number,
    private readonly stepMs: number = 1_000,
  ) {
    this.nextMs = typeof start === 'number' ? start : start.getTime();
  }

  now(): Date {
    const at = this.peek();
    this.nextMs += this.stepMs;
    return at;
  }

  /** The instant the next `now()` will return. */
  peek(): Date {
    return new Date(this.nextMs);
  }

  advance(ms: number): void {
    this.nextMs += ms;
  }

  set(at: Date): void {
    this.nextMs = at.getTime();
  }
}

export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}
