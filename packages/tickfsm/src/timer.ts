/**
 * Timer - elapsed time since the last reset
 */

import type { TimeSource } from './types.js';

/**
 * Default clock: monotonic milliseconds
 */
export const defaultTimeSource: TimeSource = () => performance.now();

export class Timer {
  startTime: number;

  constructor(private readonly timeSource: TimeSource = defaultTimeSource) {
    this.startTime = timeSource();
  }

  /**
   * Time since the last reset, never negative
   */
  get elapsed(): number {
    return Math.max(0, this.timeSource() - this.startTime);
  }

  reset(): void {
    this.startTime = this.timeSource();
  }

  isElapsedGreaterThan(duration: number): boolean {
    return this.elapsed > duration;
  }

  isElapsedLessThan(duration: number): boolean {
    return this.elapsed < duration;
  }

  isElapsedAtLeast(duration: number): boolean {
    return this.elapsed >= duration;
  }

  isElapsedAtMost(duration: number): boolean {
    return this.elapsed <= duration;
  }
}
