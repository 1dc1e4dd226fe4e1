import { describe, it, expect } from '@jest/globals';
import { DeterministicClock, SystemClock } from '../clock/clock.js';

describe('DeterministicClock', () => {
  it('advances by one tick per reading', () => {
    const clock = new DeterministicClock(1_000, 250);
    expect(clock.now().getTime()).toBe(1_000);
    expect(clock.now().getTime()).toBe(1_250);
    expect(clock.peek().getTime()).toBe(1_500);
  });

  it('skips ahead on advance', () => {
    const clock = new DeterministicClock(0);
    clock.advance(60_000);
    expect(clock.now().getTime()).toBe(60_000);
    expect(clock.now().getTime()).toBe(61_000);
  });
});

describe('DeterministicClock.set', () => {
  it('jumps to an absolute instant and keeps stepping from there', () => {
    const clock = new DeterministicClock(new Date('2026-01-10T07:00:00Z'), 500);
    clock.set(new Date('2026-06-01T00:00:00Z'));
    expect(clock.now().toISOString()).toBe('2026-06-01T00:00:00.000Z');
    expect(clock.now().toISOString()).toBe('2026-06-01T00:00:00.500Z');
  });
});

describe('SystemClock', () => {
  it('reads the wall clock', () => {
    const before = Date.now();
    const now = new SystemClock().now().getTime();
    expect(now).toBeGreaterThanOrEqual(before);
    expect(now).toBeLessThanOrEqual(Date.now());
  });
});
