import { describe, it, expect } from 'vitest';
import { Timer } from './timer.js';

describe('Timer', () => {
  const createClock = (start = 1000) => {
    const clock = { now: start, source: () => clock.now };
    return clock;
  };

  it('should start at zero elapsed time', () => {
    const clock = createClock();
    const timer = new Timer(clock.source);

    expect(timer.startTime).toBe(1000);
    expect(timer.elapsed).toBe(0);
  });

  it('should measure time since construction', () => {
    const clock = createClock();
    const timer = new Timer(clock.source);

    clock.now = 1250;
    expect(timer.elapsed).toBe(250);

    clock.now = 1400;
    expect(timer.elapsed).toBe(400);
  });

  it('should restart from zero on reset', () => {
    const clock = createClock();
    const timer = new Timer(clock.source);

    clock.now = 1500;
    timer.reset();
    expect(timer.startTime).toBe(1500);
    expect(timer.elapsed).toBe(0);

    clock.now = 1520;
    expect(timer.elapsed).toBe(20);
  });

  it('should never report negative elapsed time', () => {
    const clock = createClock();
    const timer = new Timer(clock.source);

    clock.now = 900;
    expect(timer.elapsed).toBe(0);
  });

  it('should compare elapsed time against a duration', () => {
    const clock = createClock(0);
    const timer = new Timer(clock.source);
    clock.now = 100;

    expect(timer.isElapsedGreaterThan(99)).toBe(true);
    expect(timer.isElapsedGreaterThan(100)).toBe(false);

    expect(timer.isElapsedLessThan(101)).toBe(true);
    expect(timer.isElapsedLessThan(100)).toBe(false);

    expect(timer.isElapsedAtLeast(100)).toBe(true);
    expect(timer.isElapsedAtLeast(101)).toBe(false);

    expect(timer.isElapsedAtMost(100)).toBe(true);
    expect(timer.isElapsedAtMost(99)).toBe(false);
  });

  it('should use the monotonic clock by default', () => {
    const timer = new Timer();

    expect(timer.elapsed).toBeGreaterThanOrEqual(0);
    expect(timer.elapsed).toBeLessThan(1000);
  });
});
