/**
 * @fileoverview Per-item timer
 *
 * Tracks estimate and accumulated elapsed time. While running, the time
 * since `runningSince` has not yet been folded into `elapsed`.
 */

import type { DurationMs } from './duration.js';

export class TimeTracking {
  estimate: DurationMs;
  elapsed: DurationMs;
  runningSince: Date | undefined;

  constructor(estimate: DurationMs = 0, elapsed: DurationMs = 0) {
    this.estimate = Math.max(0, estimate);
    this.elapsed = Math.max(0, elapsed);
    this.runningSince = undefined;
  }

  get isRunning(): boolean {
    return this.runningSince !== undefined;
  }

  start(now: Date = new Date()): void {
    if (this.runningSince) return;
    this.runningSince = now;
  }

  pause(now: Date = new Date()): void {
    if (!this.runningSince) return;
    this.elapsed += Math.max(0, now.getTime() - this.runningSince.getTime());
    this.runningSince = undefined;
  }

  /**
   * Fold the running span into elapsed and re-baseline
   */
  tick(now: Date = new Date()): void {
    if (!this.runningSince) return;
    this.elapsed += Math.max(0, now.getTime() - this.runningSince.getTime());
    this.runningSince = now;
  }

  increaseEstimate(amount: DurationMs): void {
    this.estimate += amount;
  }

  decreaseEstimate(amount: DurationMs): void {
    this.estimate = Math.max(0, this.estimate - amount);
  }

  progressRatio(): number {
    if (this.estimate === 0) return 1;
    return this.elapsed / this.estimate;
  }
}
