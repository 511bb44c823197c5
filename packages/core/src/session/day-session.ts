/**
 * @fileoverview Day session: the one owned aggregate for a running day
 *
 * Holds the active, done and archived lists for the current daily file,
 * the row selection, undo history, life mode, and the pending estimate and
 * idle prompts. Every mutation marks the session dirty; `save()` writes the
 * daily file and meta.json.
 */

import { createLogger } from '../logging/index.js';
import { getSettings, type DaybookSettings } from '../settings/index.js';
import { addDays, localDateKey, minutes, type DurationMs } from '../domain/duration.js';
import { Item } from '../domain/item.js';
import type { ActivityState, LifeMode } from '../domain/types.js';
import {
  computeTotals,
  flattenRows,
  globalActivityState,
  syncParentStatus,
  type Totals,
} from '../domain/views.js';
import {
  atomicWrite,
  dailyFilePath,
  journalFilePath,
  metadataFilePath,
  readFileIfExists,
} from '../persistence/files.js';
import { defaultMetadata, saveMetadata, type AppMetadata } from '../persistence/metadata.js';
import type { LoadedDay } from '../persistence/migration.js';
import { parseDailyFile } from '../persistence/parser.js';
import { serializeDailyFile } from '../persistence/serializer.js';
import { LogNotificationSink, safeNotify, type NotificationSink } from '../runtime/notifications.js';
import { ModeTracker } from './mode-tracker.js';
import { UndoStack, type UndoKind } from './undo-stack.js';

const logger = createLogger('session');

// =============================================================================
// Types
// =============================================================================

export interface Selection {
  taskIndex: number;
  subtaskIndex?: number;
}

export interface AddItemOptions {
  estimate?: DurationMs;
  tags?: string[];
  notes?: string;
}

export interface ItemEdit {
  title?: string;
  notes?: string;
  tags?: string[];
}

export type BreachResolution = 'done' | 'pause' | 'postpone' | 'extend';

export interface EstimateBreach {
  itemId: string;
  title: string;
  estimate: DurationMs;
}

export interface IdleCheck {
  openedAt: Date;
  /** Running items are paused once this passes without confirmation */
  deadline: Date;
}

export type IdleCheckResult = 'none' | 'opened' | 'pending' | 'auto-paused';

export interface DaySessionOptions {
  dataDir: string;
  day: LoadedDay;
  journal?: string;
  metadata?: AppMetadata;
  settings?: DaybookSettings;
  notifications?: NotificationSink;
  now?: Date;
}

interface Located {
  item: Item;
  parent?: Item;
  selection: Selection;
}

// =============================================================================
// DaySession
// =============================================================================

export class DaySession {
  readonly dataDir: string;
  readonly active: Item[];
  readonly done: Item[];
  readonly archived: Item[];
  readonly modes: ModeTracker;

  private _date: string;
  private _journal: string;
  private selectedRow = 0;
  private readonly undoStack: UndoStack;
  private readonly settings: DaybookSettings;
  private readonly notifications: NotificationSink;
  private breach: EstimateBreach | null = null;
  private idle: IdleCheck | null = null;
  private lastIdleConfirm: Date;
  private dirty: boolean;
  private journalDirty = false;

  constructor(options: DaySessionOptions) {
    const now = options.now ?? new Date();
    this.dataDir = options.dataDir;
    this._date = options.day.date;
    this.active = options.day.active;
    this.done = options.day.done;
    this.archived = options.day.archived;
    this._journal = options.journal ?? '';
    this.settings = options.settings ?? getSettings();
    this.notifications = options.notifications ?? new LogNotificationSink();
    this.undoStack = new UndoStack(this.settings.tasks.undoCapacity);
    this.modes = ModeTracker.fromMetadata(options.metadata ?? defaultMetadata(), this.active, now);
    this.lastIdleConfirm = now;
    // Loaded items may have been force-paused; persist that on the first save
    this.dirty = options.day.source !== 'fresh';
  }

  get date(): string {
    return this._date;
  }

  get journal(): string {
    return this._journal;
  }

  get isDirty(): boolean {
    return this.dirty || this.journalDirty;
  }

  get pendingBreach(): EstimateBreach | null {
    return this.breach;
  }

  get idleCheck(): IdleCheck | null {
    return this.idle;
  }

  get undoDepth(): number {
    return this.undoStack.size;
  }

  get selectedRowIndex(): number {
    return this.selectedRow;
  }

  private markDirty(): void {
    this.dirty = true;
  }

  // ===========================================================================
  // Selection
  // ===========================================================================

  selected(): Selection | undefined {
    return flattenRows(this.active)[this.selectedRow];
  }

  selectedItem(): Item | undefined {
    const selection = this.selected();
    return selection ? this.locate(selection)?.item : undefined;
  }

  moveSelectionUp(): boolean {
    if (this.selectedRow === 0) return false;
    this.selectedRow--;
    return true;
  }

  moveSelectionDown(): boolean {
    if (this.selectedRow >= flattenRows(this.active).length - 1) return false;
    this.selectedRow++;
    return true;
  }

  private select(taskIndex: number, subtaskIndex?: number): void {
    const row = flattenRows(this.active).findIndex(
      r => r.taskIndex === taskIndex && r.subtaskIndex === subtaskIndex
    );
    if (row !== -1) this.selectedRow = row;
  }

  private clampSelection(): void {
    const count = flattenRows(this.active).length;
    this.selectedRow = count === 0 ? 0 : Math.min(this.selectedRow, count - 1);
  }

  private locate(selection: Selection): Located | undefined {
    const task = this.active[selection.taskIndex];
    if (!task) return undefined;
    if (selection.subtaskIndex === undefined) return { item: task, selection };
    const sub = task.subtasks[selection.subtaskIndex];
    return sub ? { item: sub, parent: task, selection } : undefined;
  }

  private locateById(id: string): Located | undefined {
    for (const [taskIndex, task] of this.active.entries()) {
      if (task.id === id) return { item: task, selection: { taskIndex } };
      const subtaskIndex = task.subtasks.findIndex(s => s.id === id);
      const sub = task.subtasks[subtaskIndex];
      if (sub) return { item: sub, parent: task, selection: { taskIndex, subtaskIndex } };
    }
    return undefined;
  }

  private locateSelected(): Located | undefined {
    const selection = this.selected();
    return selection ? this.locate(selection) : undefined;
  }

  // ===========================================================================
  // Ordering
  // ===========================================================================

  moveItemUp(): boolean {
    const located = this.locateSelected();
    if (!located) return false;
    const { taskIndex, subtaskIndex } = located.selection;

    if (located.parent && subtaskIndex !== undefined) {
      if (subtaskIndex === 0) return false;
      swap(located.parent.subtasks, subtaskIndex - 1, subtaskIndex);
      this.select(taskIndex, subtaskIndex - 1);
    } else {
      if (taskIndex === 0) return false;
      swap(this.active, taskIndex - 1, taskIndex);
      this.select(taskIndex - 1);
    }
    this.markDirty();
    return true;
  }

  moveItemDown(): boolean {
    const located = this.locateSelected();
    if (!located) return false;
    const { taskIndex, subtaskIndex } = located.selection;

    if (located.parent && subtaskIndex !== undefined) {
      if (subtaskIndex >= located.parent.subtasks.length - 1) return false;
      swap(located.parent.subtasks, subtaskIndex, subtaskIndex + 1);
      this.select(taskIndex, subtaskIndex + 1);
    } else {
      if (taskIndex >= this.active.length - 1) return false;
      swap(this.active, taskIndex, taskIndex + 1);
      this.select(taskIndex + 1);
    }
    this.markDirty();
    return true;
  }

  // ===========================================================================
  // Editing
  // ===========================================================================

  private defaultEstimate(): DurationMs {
    return minutes(this.settings.tasks.defaultEstimateMinutes);
  }

  private estimateStep(): DurationMs {
    return minutes(this.settings.tasks.estimateStepMinutes);
  }

  addTask(title: string, options: AddItemOptions = {}, now: Date = new Date()): Item | null {
    const trimmed = title.trim();
    if (!trimmed) return null;
    const item = Item.create(trimmed, options.estimate ?? this.defaultEstimate(), options, now);
    this.active.push(item);
    this.select(this.active.length - 1);
    this.markDirty();
    return item;
  }

  /**
   * Add a subtask to the selected row's task
   */
  addSubtask(title: string, options: AddItemOptions = {}, now: Date = new Date()): Item | null {
    const trimmed = title.trim();
    const selection = this.selected();
    if (!trimmed || !selection) return null;
    const parent = this.active[selection.taskIndex];
    if (!parent) return null;

    const child = Item.create(trimmed, options.estimate ?? this.defaultEstimate(), options, now);
    if (!parent.addSubtask(child)) return null;
    parent.expanded = true;
    this.select(selection.taskIndex, parent.subtasks.length - 1);
    this.markDirty();
    return child;
  }

  editSelected(edit: ItemEdit): boolean {
    const item = this.selectedItem();
    if (!item) return false;
    const title = edit.title?.trim();
    if (title) item.title = title;
    if (edit.notes !== undefined) item.notes = edit.notes;
    if (edit.tags !== undefined) item.setTags(edit.tags);
    this.markDirty();
    return true;
  }

  /**
   * Collapse or expand the selected task; on a subtask, collapse its parent
   */
  toggleExpand(): boolean {
    const located = this.locateSelected();
    if (!located) return false;
    if (located.parent) {
      located.parent.expanded = false;
      this.select(located.selection.taskIndex);
      return true;
    }
    if (located.item.subtasks.length === 0) return false;
    located.item.expanded = !located.item.expanded;
    return true;
  }

  increaseEstimate(): boolean {
    const item = this.selectedItem();
    if (!item) return false;
    item.increaseEstimate(this.estimateStep());
    this.markDirty();
    return true;
  }

  decreaseEstimate(): boolean {
    const item = this.selectedItem();
    if (!item) return false;
    item.decreaseEstimate(this.estimateStep());
    this.markDirty();
    return true;
  }

  // ===========================================================================
  // Run state
  // ===========================================================================

  /**
   * Start or pause the selected item. Outside Working mode items can be
   * paused but not started.
   */
  toggleRunPause(now: Date = new Date()): boolean {
    const located = this.locateSelected();
    if (!located) return false;
    const { item, parent } = located;

    if (item.status !== 'running' && !this.modes.canStartTimers) {
      logger.debug('Start blocked by mode', { mode: this.modes.mode, title: item.title });
      return false;
    }

    if (!item.toggleRunPause(now)) return false;
    if (parent) syncParentStatus(parent, now);
    this.markDirty();
    return true;
  }

  setMode(mode: LifeMode, now: Date = new Date()): boolean {
    if (!this.modes.switchTo(mode, this.active, now)) return false;
    for (const task of this.active) syncParentStatus(task, now);
    this.markDirty();
    return true;
  }

  modeTimes(now: Date = new Date()): Record<LifeMode, DurationMs> {
    return this.modes.modeTimes(now);
  }

  tick(now: Date = new Date()): void {
    for (const item of this.active) item.tick(now);
  }

  autoPauseAll(now: Date = new Date()): number {
    let paused = 0;
    for (const item of this.active.flatMap(t => [t, ...t.subtasks])) {
      if (item.pause(now)) paused++;
    }
    if (paused > 0) this.markDirty();
    return paused;
  }

  /**
   * Send every running or paused item back to Idle
   */
  autoIdleAll(now: Date = new Date()): number {
    let changed = 0;
    for (const item of this.active.flatMap(t => [t, ...t.subtasks])) {
      if (item.setIdle(now)) changed++;
    }
    if (changed > 0) this.markDirty();
    return changed;
  }

  // ===========================================================================
  // Moving items between lists
  // ===========================================================================

  private detach(located: Located): void {
    const { taskIndex, subtaskIndex } = located.selection;
    if (located.parent && subtaskIndex !== undefined) {
      located.parent.subtasks.splice(subtaskIndex, 1);
      located.item.promote();
    } else {
      this.active.splice(taskIndex, 1);
    }
  }

  private recordUndo(kind: UndoKind, located: Located): void {
    this.undoStack.push({
      kind,
      item: located.item.clone(),
      taskIndex: located.selection.taskIndex,
      subtaskIndex: located.selection.subtaskIndex,
    });
  }

  private pauseTree(item: Item, now: Date): void {
    item.pause(now);
    for (const sub of item.subtasks) sub.pause(now);
  }

  private completeAt(located: Located, now: Date): void {
    this.recordUndo('done', located);
    this.detach(located);
    for (const sub of located.item.subtasks) sub.pause(now);
    located.item.markDone(now);
    this.done.push(located.item);
    if (located.parent) syncParentStatus(located.parent, now);
    safeNotify(this.notifications, 'task-done', located.item.title);
    this.clampSelection();
    this.markDirty();
  }

  markDone(now: Date = new Date()): boolean {
    const located = this.locateSelected();
    if (!located) return false;
    this.completeAt(located, now);
    return true;
  }

  archiveSelected(now: Date = new Date()): boolean {
    const located = this.locateSelected();
    if (!located) return false;
    this.recordUndo('archived', located);
    this.detach(located);
    this.pauseTree(located.item, now);
    this.archived.push(located.item);
    if (located.parent) syncParentStatus(located.parent, now);
    this.clampSelection();
    this.markDirty();
    return true;
  }

  /**
   * Delete the selected item. A task that still owns subtasks is kept.
   */
  deleteSelected(now: Date = new Date()): boolean {
    const located = this.locateSelected();
    if (!located) return false;
    if (!located.parent && located.item.subtasks.length > 0) return false;
    this.recordUndo('deleted', located);
    this.detach(located);
    if (located.parent) syncParentStatus(located.parent, now);
    this.clampSelection();
    this.markDirty();
    return true;
  }

  /**
   * Restore the most recent done, archived or deleted item
   */
  undo(now: Date = new Date()): boolean {
    const entry = this.undoStack.pop();
    if (!entry) return false;

    const source = entry.kind === 'done' ? this.done : entry.kind === 'archived' ? this.archived : null;
    if (source) {
      const index = source.findIndex(i => i.id === entry.item.id);
      if (index !== -1) source.splice(index, 1);
    }

    const restored = entry.item;
    const parent = entry.subtaskIndex !== undefined ? this.active[entry.taskIndex] : undefined;
    if (parent && parent.addSubtask(restored)) {
      syncParentStatus(parent, now);
      this.select(entry.taskIndex, parent.subtasks.length - 1);
    } else {
      restored.promote();
      const index = Math.min(entry.taskIndex, this.active.length);
      this.active.splice(index, 0, restored);
      this.select(index);
    }

    logger.debug('Undid action', { kind: entry.kind, title: restored.title });
    this.markDirty();
    return true;
  }

  private postponeAt(located: Located, now: Date): void {
    const tomorrow = localDateKey(addDays(now, 1));
    const tomorrowPath = dailyFilePath(this.dataDir, tomorrow);
    const existing = parseDailyFile(readFileIfExists(tomorrowPath) ?? '', { now });

    const copy = located.item.clone();
    copy.promote();
    for (const sub of copy.subtasks) sub.pause(now);
    copy.postpone(now);
    copy.schedule = 'tomorrow';

    atomicWrite(
      tomorrowPath,
      serializeDailyFile(
        {
          date: tomorrow,
          active: [...existing.active, copy],
          done: existing.done,
          archived: existing.archived,
        },
        now
      )
    );

    this.detach(located);
    if (located.parent) syncParentStatus(located.parent, now);
    this.clampSelection();
    this.markDirty();
    logger.info('Postponed item', { title: copy.title, to: tomorrow });
  }

  /**
   * Move the selected item to tomorrow's daily file. The file is written
   * first; on failure the StorageError propagates and nothing changes here.
   */
  postponeSelected(now: Date = new Date()): boolean {
    const located = this.locateSelected();
    if (!located) return false;
    this.postponeAt(located, now);
    return true;
  }

  // ===========================================================================
  // Prompts
  // ===========================================================================

  /**
   * Open a prompt for the first running item that reached its estimate
   */
  checkEstimateBreaches(): EstimateBreach | null {
    if (this.breach) return this.breach;
    const over = this.active.flatMap(t => [t, ...t.subtasks]).find(i => i.isOverEstimate());
    if (!over) return null;

    this.breach = { itemId: over.id, title: over.title, estimate: over.estimate };
    safeNotify(this.notifications, 'estimate-reached', over.title);
    return this.breach;
  }

  resolveBreach(resolution: BreachResolution, amount?: DurationMs, now: Date = new Date()): boolean {
    const breach = this.breach;
    if (!breach) return false;
    const located = this.locateById(breach.itemId);
    if (!located) {
      this.breach = null;
      return false;
    }

    switch (resolution) {
      case 'done':
        this.completeAt(located, now);
        break;
      case 'pause':
        located.item.pause(now);
        if (located.parent) syncParentStatus(located.parent, now);
        this.markDirty();
        break;
      case 'postpone':
        this.postponeAt(located, now);
        break;
      case 'extend':
        located.item.increaseEstimate(amount ?? this.estimateStep());
        this.markDirty();
        break;
    }

    this.breach = null;
    return true;
  }

  private hasRunning(): boolean {
    return this.active.some(t => t.status === 'running' || t.hasRunningSubtask());
  }

  /**
   * After a quiet period with something running, ask whether work is still
   * happening; pause everything if the grace window lapses.
   */
  checkIdle(now: Date = new Date()): IdleCheckResult {
    const { idleCheckMinutes, idleGraceMinutes } = this.settings.timing;

    if (this.idle) {
      if (now.getTime() < this.idle.deadline.getTime()) return 'pending';
      this.autoPauseAll(now);
      this.idle = null;
      this.lastIdleConfirm = now;
      logger.info('Idle check lapsed, paused running items');
      return 'auto-paused';
    }

    if (!this.hasRunning()) {
      this.lastIdleConfirm = now;
      return 'none';
    }

    if (now.getTime() - this.lastIdleConfirm.getTime() < minutes(idleCheckMinutes)) return 'none';

    this.idle = { openedAt: now, deadline: new Date(now.getTime() + minutes(idleGraceMinutes)) };
    safeNotify(this.notifications, 'idle-check', 'Still working?');
    return 'opened';
  }

  confirmWorking(now: Date = new Date()): void {
    this.lastIdleConfirm = now;
    this.idle = null;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Estimate and elapsed over active and done items
   */
  totals(): Totals {
    return computeTotals([...this.active, ...this.done]);
  }

  globalState(): ActivityState {
    return globalActivityState(this.active);
  }

  hasDayChanged(now: Date = new Date()): boolean {
    return localDateKey(now) !== this._date;
  }

  // ===========================================================================
  // Journal
  // ===========================================================================

  setJournal(text: string): void {
    this._journal = text;
    this.journalDirty = true;
  }

  saveJournal(): boolean {
    if (!this.journalDirty) return false;
    atomicWrite(journalFilePath(this.dataDir, this._date), this._journal);
    this.journalDirty = false;
    return true;
  }

  // ===========================================================================
  // Persistence
  // ===========================================================================

  /**
   * Write the daily file and meta.json. On failure the StorageError
   * propagates and the session stays dirty.
   */
  save(now: Date = new Date()): void {
    atomicWrite(
      dailyFilePath(this.dataDir, this._date),
      serializeDailyFile(
        { date: this._date, active: this.active, done: this.done, archived: this.archived },
        now
      )
    );
    saveMetadata(metadataFilePath(this.dataDir), {
      ...this.modes.toMetadata(this.active, now),
      sessionDate: this._date,
    });
    this.dirty = false;
    logger.debug('Saved', { date: this._date });
  }

  /**
   * Close out the current day and continue in today's file. Active items
   * carry over; items already postponed into today's file are appended.
   *
   * @returns the date key of the day that ended
   */
  rollover(now: Date = new Date()): string {
    const ended = this._date;
    this.save(now);
    this.saveJournal();

    const date = localDateKey(now);
    const existing = parseDailyFile(readFileIfExists(dailyFilePath(this.dataDir, date)) ?? '', { now });

    for (const item of existing.active) item.schedule = 'today';
    this.active.push(...existing.active);
    this.done.splice(0, this.done.length, ...existing.done);
    this.archived.splice(0, this.archived.length, ...existing.archived);

    this._date = date;
    this._journal = readFileIfExists(journalFilePath(this.dataDir, date)) ?? '';
    this.undoStack.clear();
    this.modes.resetCounters(now);
    this.breach = null;
    this.clampSelection();
    this.markDirty();

    logger.info('Rolled over', { from: ended, to: date, active: this.active.length });
    return ended;
  }
}

function swap<T>(list: T[], a: number, b: number): void {
  const first = list[a];
  const second = list[b];
  if (first === undefined || second === undefined) return;
  list[a] = second;
  list[b] = first;
}
