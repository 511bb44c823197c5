/**
 * @fileoverview Task item and its status state machine
 *
 * Every status change appends a StateEvent to the item's history. Elapsed
 * time is kept live by the timer and can always be rebuilt from history.
 */

import { randomUUID } from 'crypto';
import type { DurationMs } from './duration.js';
import { TimeTracking } from './time-tracking.js';
import {
  cloneEvent,
  interruptionCount,
  sessionCount,
  timeInEachState,
  type StateTimes,
} from './history.js';
import type { RunStatus, ScheduleDay, StateEvent } from './types.js';

export interface ItemInit {
  title: string;
  estimate?: DurationMs;
  elapsed?: DurationMs;
  status?: RunStatus;
  schedule?: ScheduleDay;
  notes?: string;
  tags?: readonly string[];
  createdAt?: Date;
  completedAt?: Date;
  history?: StateEvent[];
}

/**
 * Collapse duplicate tags, keeping first-seen order
 */
export function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of tags) {
    const tag = raw.trim();
    if (tag && !seen.has(tag)) {
      seen.add(tag);
      result.push(tag);
    }
  }
  return result;
}

export class Item {
  id: string;
  title: string;
  notes: string;
  schedule: ScheduleDay;
  status: RunStatus;
  readonly track: TimeTracking;
  createdAt: Date;
  completedAt: Date | undefined;
  readonly history: StateEvent[];
  readonly subtasks: Item[] = [];
  /** Row visibility of subtasks; not persisted */
  expanded = true;

  private _tags: string[];
  private nested = false;

  constructor(init: ItemInit) {
    this.id = randomUUID();
    this.title = init.title;
    this.notes = init.notes ?? '';
    this.schedule = init.schedule ?? 'today';
    this.status = init.status ?? 'idle';
    this.track = new TimeTracking(init.estimate ?? 0, init.elapsed ?? 0);
    this.createdAt = init.createdAt ?? new Date();
    this.completedAt = init.completedAt;
    this.history = init.history ?? [];
    this._tags = normalizeTags(init.tags ?? []);
  }

  /**
   * A brand new Idle item with its initial history event
   */
  static create(
    title: string,
    estimate: DurationMs,
    options: { schedule?: ScheduleDay; tags?: readonly string[]; notes?: string } = {},
    now: Date = new Date()
  ): Item {
    return new Item({
      title,
      estimate,
      schedule: options.schedule,
      tags: options.tags,
      notes: options.notes,
      createdAt: now,
      history: [{ timestamp: now, to: 'idle' }],
    });
  }

  get tags(): readonly string[] {
    return this._tags;
  }

  setTags(tags: readonly string[]): void {
    this._tags = normalizeTags(tags);
  }

  get isSubtask(): boolean {
    return this.nested;
  }

  get estimate(): DurationMs {
    return this.track.estimate;
  }

  get elapsed(): DurationMs {
    return this.track.elapsed;
  }

  // ===========================================================================
  // State machine
  // ===========================================================================

  private transition(to: RunStatus, now: Date): void {
    this.history.push({ timestamp: now, from: this.status, to });
    this.status = to;
  }

  start(now: Date = new Date()): boolean {
    if (this.status !== 'idle' && this.status !== 'paused') return false;
    this.track.start(now);
    this.transition('running', now);
    return true;
  }

  pause(now: Date = new Date()): boolean {
    if (this.status !== 'running') return false;
    this.track.pause(now);
    this.transition('paused', now);
    return true;
  }

  setIdle(now: Date = new Date()): boolean {
    if (this.status !== 'running' && this.status !== 'paused') return false;
    this.track.pause(now);
    this.transition('idle', now);
    return true;
  }

  markDone(now: Date = new Date()): boolean {
    if (this.status === 'done') return false;
    this.track.pause(now);
    this.completedAt = now;
    this.transition('done', now);
    return true;
  }

  /**
   * Stop work and send the item back to Idle. The Postponed status is only
   * ever read from files.
   */
  postpone(now: Date = new Date()): boolean {
    this.track.pause(now);
    if (this.status === 'idle') return false;
    this.transition('idle', now);
    return true;
  }

  toggleRunPause(now: Date = new Date()): boolean {
    if (this.status === 'running') return this.pause(now);
    return this.start(now);
  }

  tick(now: Date = new Date()): void {
    if (this.status === 'running') this.track.tick(now);
    for (const sub of this.subtasks) sub.tick(now);
  }

  increaseEstimate(amount: DurationMs): void {
    this.track.increaseEstimate(amount);
  }

  decreaseEstimate(amount: DurationMs): void {
    this.track.decreaseEstimate(amount);
  }

  isOverEstimate(): boolean {
    return this.status === 'running' && this.track.elapsed >= this.track.estimate;
  }

  progressRatio(): number {
    return this.track.progressRatio();
  }

  // ===========================================================================
  // History replay
  // ===========================================================================

  /**
   * Rebuild elapsed from history. Items whose history never entered Running
   * keep the stored value. A running timer is re-baselined to `now`.
   */
  syncElapsedFromHistory(now: Date = new Date()): void {
    // With no Running entry the history has nothing to rebuild from; keep the stored value
    if (sessionCount(this.history) > 0) {
      this.track.elapsed = this.timeInEachState(now).running;
      if (this.track.runningSince) this.track.runningSince = now;
    }
    for (const sub of this.subtasks) sub.syncElapsedFromHistory(now);
  }

  /**
   * Force Running to Paused (self and subtasks), recording the pause at `now`
   */
  coerceRunningToPaused(now: Date = new Date()): void {
    this.pause(now);
    for (const sub of this.subtasks) sub.coerceRunningToPaused(now);
  }

  timeInEachState(now: Date = new Date()): StateTimes {
    return timeInEachState(this.history, this.completedAt, now);
  }

  runningTime(now: Date = new Date()): DurationMs {
    return this.timeInEachState(now).running;
  }

  interruptionCount(): number {
    return interruptionCount(this.history);
  }

  sessionCount(): number {
    return sessionCount(this.history);
  }

  /**
   * Wall-clock time from creation to completion; undefined until done
   */
  calendarTime(): DurationMs | undefined {
    if (!this.completedAt) return undefined;
    return Math.max(0, this.completedAt.getTime() - this.createdAt.getTime());
  }

  // ===========================================================================
  // Subtasks
  // ===========================================================================

  /**
   * Nesting stops at one level: subtasks take no subtasks of their own
   */
  addSubtask(child: Item): boolean {
    if (this.nested || child.subtasks.length > 0) return false;
    child.nested = true;
    this.subtasks.push(child);
    return true;
  }

  insertSubtask(index: number, child: Item): boolean {
    if (this.nested || child.subtasks.length > 0) return false;
    child.nested = true;
    this.subtasks.splice(Math.min(Math.max(0, index), this.subtasks.length), 0, child);
    return true;
  }

  /**
   * Detach from a parent so the item can live as a top-level task
   */
  promote(): void {
    this.nested = false;
  }

  hasRunningSubtask(): boolean {
    return this.subtasks.some(s => s.status === 'running');
  }

  // ===========================================================================
  // Copies
  // ===========================================================================

  regenerateIds(): void {
    this.id = randomUUID();
    for (const sub of this.subtasks) sub.regenerateIds();
  }

  clone(): Item {
    const copy = new Item({
      title: this.title,
      estimate: this.track.estimate,
      elapsed: this.track.elapsed,
      notes: this.notes,
      schedule: this.schedule,
      status: this.status,
      tags: this._tags,
      createdAt: new Date(this.createdAt.getTime()),
      completedAt: this.completedAt ? new Date(this.completedAt.getTime()) : undefined,
      history: this.history.map(cloneEvent),
    });
    copy.id = this.id;
    copy.nested = this.nested;
    copy.expanded = this.expanded;
    copy.track.runningSince = this.track.runningSince ? new Date(this.track.runningSince.getTime()) : undefined;
    for (const sub of this.subtasks) copy.subtasks.push(sub.clone());
    return copy;
  }
}
