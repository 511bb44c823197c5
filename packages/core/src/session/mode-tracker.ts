/**
 * @fileoverview Global life mode and per-mode time accounting
 *
 * Leaving Working pauses every running item and remembers which ones;
 * returning to Working resumes exactly those. Switching between two
 * non-working modes leaves run state alone.
 */

import { createLogger } from '../logging/index.js';
import { MS_PER_SECOND, type DurationMs } from '../domain/duration.js';
import type { Item } from '../domain/item.js';
import { LIFE_MODES, modePausesTimers, type LifeMode } from '../domain/types.js';
import {
  emptyModeSeconds,
  idsForKeys,
  keysForIds,
  type AppMetadata,
} from '../persistence/metadata.js';

const logger = createLogger('session:modes');

function allItems(items: readonly Item[]): Item[] {
  return items.flatMap(item => [item, ...item.subtasks]);
}

export class ModeTracker {
  private current: LifeMode;
  private accumulated: Record<LifeMode, DurationMs>;
  private lastChange: Date;
  private pausedIds: Set<string>;

  constructor(mode: LifeMode = 'working', now: Date = new Date()) {
    this.current = mode;
    this.accumulated = emptyModeSeconds();
    this.lastChange = now;
    this.pausedIds = new Set();
  }

  /**
   * Rebuild from meta.json, mapping durable keys onto the loaded items.
   * Time while the process was down is not counted.
   */
  static fromMetadata(metadata: AppMetadata, items: readonly Item[], now: Date = new Date()): ModeTracker {
    const tracker = new ModeTracker(metadata.globalMode, now);
    for (const mode of LIFE_MODES) {
      tracker.accumulated[mode] = metadata.modeSeconds[mode] * MS_PER_SECOND;
    }
    tracker.pausedIds = idsForKeys(metadata.modePausedItems, items);
    return tracker;
  }

  get mode(): LifeMode {
    return this.current;
  }

  get canStartTimers(): boolean {
    return !modePausesTimers(this.current);
  }

  get pausedByMode(): ReadonlySet<string> {
    return this.pausedIds;
  }

  /**
   * Fold time spent in the current mode into its counter
   */
  checkpoint(now: Date = new Date()): void {
    const span = Math.max(0, now.getTime() - this.lastChange.getTime());
    this.accumulated[this.current] += span;
    this.lastChange = now;
  }

  /**
   * @returns false when already in `mode`
   */
  switchTo(mode: LifeMode, items: readonly Item[], now: Date = new Date()): boolean {
    if (mode === this.current) return false;
    const previous = this.current;
    this.checkpoint(now);
    this.current = mode;

    if (!modePausesTimers(previous) && modePausesTimers(mode)) {
      this.pausedIds = new Set();
      for (const item of allItems(items)) {
        if (item.status === 'running') {
          this.pausedIds.add(item.id);
          item.pause(now);
        }
      }
      logger.info('Paused running items for mode', { mode, count: this.pausedIds.size });
    } else if (modePausesTimers(previous) && !modePausesTimers(mode)) {
      let resumed = 0;
      for (const item of allItems(items)) {
        if (this.pausedIds.has(item.id) && item.start(now)) resumed++;
      }
      this.pausedIds = new Set();
      logger.info('Resumed items after mode', { previous, count: resumed });
    }

    return true;
  }

  /**
   * Time per mode today, including the live span of the current mode
   */
  modeTimes(now: Date = new Date()): Record<LifeMode, DurationMs> {
    const times = { ...this.accumulated };
    times[this.current] += Math.max(0, now.getTime() - this.lastChange.getTime());
    return times;
  }

  /**
   * Reset counters for a new day
   */
  resetCounters(now: Date = new Date()): void {
    this.accumulated = emptyModeSeconds();
    this.lastChange = now;
  }

  toMetadata(items: readonly Item[], now: Date = new Date()): AppMetadata {
    this.checkpoint(now);
    const modeSeconds = emptyModeSeconds();
    for (const mode of LIFE_MODES) {
      modeSeconds[mode] = Math.floor(this.accumulated[mode] / MS_PER_SECOND);
    }
    return {
      globalMode: this.current,
      modePausedItems: keysForIds(this.pausedIds, items),
      modeSeconds,
      lastModeChange: now,
    };
  }
}
