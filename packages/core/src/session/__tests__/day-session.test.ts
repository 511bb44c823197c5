/**
 * @fileoverview DaySession tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

vi.mock('../../logging/index.js', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
  }),
}));

import { minutes } from '../../domain/duration.js';
import { Item } from '../../domain/item.js';
import { StorageError } from '../../errors/index.js';
import { dailyFilePath, journalFilePath, metadataFilePath } from '../../persistence/files.js';
import { emptyModeSeconds } from '../../persistence/metadata.js';
import { parseDailyFile } from '../../persistence/parser.js';
import { DEFAULT_SETTINGS, type DaybookSettings } from '../../settings/index.js';
import { DaySession } from '../day-session.js';

const T0 = new Date(2024, 4, 2, 9, 0);
const TODAY = '2024-05-02';
const TOMORROW = '2024-05-03';

function at(offsetMinutes: number): Date {
  return new Date(T0.getTime() + minutes(offsetMinutes));
}

describe('DaySession', () => {
  let dataDir: string;
  let notify: ReturnType<typeof vi.fn>;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'daybook-session-'));
    notify = vi.fn();
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  function createSession(active: Item[] = [], settings: DaybookSettings = DEFAULT_SETTINGS): DaySession {
    return new DaySession({
      dataDir,
      day: { date: TODAY, active, done: [], archived: [], source: 'fresh' },
      settings,
      notifications: { notify },
      now: T0,
    });
  }

  /** Session with tasks A, B, C (C selected) */
  function withTasks(...titles: string[]): DaySession {
    const session = createSession();
    for (const title of titles) session.addTask(title, {}, T0);
    return session;
  }

  function titles(items: readonly Item[]): string[] {
    return items.map(i => i.title);
  }

  describe('adding and editing', () => {
    it('should start clean for a fresh day', () => {
      expect(createSession().isDirty).toBe(false);
    });

    it('should add a trimmed task with the default estimate and select it', () => {
      const session = createSession();

      const first = session.addTask('  Write report ', {}, T0);
      session.addTask('Review', { estimate: minutes(20), tags: ['WORK'] }, T0);

      expect(first?.title).toBe('Write report');
      expect(first?.estimate).toBe(minutes(60));
      expect(first?.history).toEqual([{ timestamp: T0, to: 'idle' }]);
      expect(session.active[1]?.tags).toEqual(['WORK']);
      expect(session.selectedRowIndex).toBe(1);
      expect(session.isDirty).toBe(true);
    });

    it('should reject empty titles', () => {
      const session = createSession();
      expect(session.addTask('   ', {}, T0)).toBeNull();
      expect(session.active).toEqual([]);
    });

    it('should add subtasks to the selected row\'s task', () => {
      const session = withTasks('Parent', 'Other');
      session.moveSelectionUp();

      session.addSubtask('First', {}, T0);
      session.addSubtask('Second', {}, T0);

      expect(titles(session.active[0]?.subtasks ?? [])).toEqual(['First', 'Second']);
      expect(session.active[0]?.subtasks[0]?.isSubtask).toBe(true);
      expect(session.selected()).toEqual({ taskIndex: 0, subtaskIndex: 1 });
      expect(session.selectedRowIndex).toBe(2);
    });

    it('should edit the selected item', () => {
      const session = withTasks('Draft');

      session.editSelected({ title: '  Final  ', notes: 'line', tags: ['A', 'A', 'B'] });

      const item = session.selectedItem();
      expect(item?.title).toBe('Final');
      expect(item?.notes).toBe('line');
      expect(item?.tags).toEqual(['A', 'B']);
    });

    it('should step estimates and floor at zero', () => {
      const session = createSession();
      session.addTask('Tiny', { estimate: minutes(10) }, T0);

      session.increaseEstimate();
      expect(session.selectedItem()?.estimate).toBe(minutes(25));

      session.decreaseEstimate();
      session.decreaseEstimate();
      expect(session.selectedItem()?.estimate).toBe(0);
    });

    it('should collapse the parent when toggling on a subtask', () => {
      const session = withTasks('Parent');
      session.addSubtask('Child', {}, T0);

      expect(session.toggleExpand()).toBe(true);
      expect(session.active[0]?.expanded).toBe(false);
      expect(session.selected()).toEqual({ taskIndex: 0 });
      expect(session.moveSelectionDown()).toBe(false);

      session.toggleExpand();
      expect(session.active[0]?.expanded).toBe(true);
    });
  });

  describe('ordering', () => {
    it('should move the selection within bounds', () => {
      const session = withTasks('A', 'B');
      expect(session.moveSelectionDown()).toBe(false);
      expect(session.moveSelectionUp()).toBe(true);
      expect(session.moveSelectionUp()).toBe(false);
    });

    it('should move items and keep them selected', () => {
      const session = withTasks('A', 'B', 'C');

      expect(session.moveItemUp()).toBe(true);
      expect(titles(session.active)).toEqual(['A', 'C', 'B']);
      expect(session.selectedItem()?.title).toBe('C');

      session.moveItemUp();
      expect(session.moveItemUp()).toBe(false);
      expect(titles(session.active)).toEqual(['C', 'A', 'B']);

      session.moveItemDown();
      expect(titles(session.active)).toEqual(['A', 'C', 'B']);
    });

    it('should move subtasks within their parent', () => {
      const session = withTasks('Parent');
      session.addSubtask('One', {}, T0);
      session.addSubtask('Two', {}, T0);

      session.moveItemUp();
      expect(titles(session.active[0]?.subtasks ?? [])).toEqual(['Two', 'One']);
      expect(session.selected()).toEqual({ taskIndex: 0, subtaskIndex: 0 });
      expect(session.moveItemUp()).toBe(false);
    });
  });

  describe('run state', () => {
    it('should toggle the selected item', () => {
      const session = withTasks('Work');

      session.toggleRunPause(T0);
      expect(session.globalState()).toBe('running');

      session.toggleRunPause(at(15));
      expect(session.selectedItem()?.status).toBe('paused');
      expect(session.selectedItem()?.elapsed).toBe(minutes(15));
      expect(session.globalState()).toBe('paused');
    });

    it('should keep a parent running exactly while a subtask runs', () => {
      const session = withTasks('Parent');
      session.addSubtask('Child', {}, T0);
      const parent = session.active[0];

      session.toggleRunPause(T0);
      expect(parent?.status).toBe('running');

      session.toggleRunPause(at(5));
      expect(parent?.status).toBe('paused');
    });

    it('should refuse to start timers outside working mode', () => {
      const session = withTasks('Work');

      session.setMode('lunch', T0);
      expect(session.toggleRunPause(at(1))).toBe(false);
      expect(session.selectedItem()?.status).toBe('idle');
    });

    it('should pause on leaving working and resume on return', () => {
      const session = withTasks('Parent', 'Solo');
      session.toggleRunPause(T0);
      session.moveSelectionUp();
      session.addSubtask('Child', {}, T0);
      session.toggleRunPause(T0);
      const [parent, solo] = session.active;

      expect(session.setMode('gym', at(10))).toBe(true);
      expect(parent?.status).toBe('paused');
      expect(parent?.subtasks[0]?.status).toBe('paused');
      expect(solo?.status).toBe('paused');

      expect(session.setMode('gym', at(11))).toBe(false);

      session.setMode('working', at(70));
      expect(parent?.status).toBe('running');
      expect(parent?.subtasks[0]?.status).toBe('running');
      expect(solo?.status).toBe('running');
      expect(session.modeTimes(at(70))).toEqual({ ...emptyModeSeconds(), working: minutes(10), gym: minutes(60) });
    });

    it('should count auto-paused and auto-idled items', () => {
      const session = withTasks('A', 'B');
      session.toggleRunPause(T0);

      expect(session.autoPauseAll(at(1))).toBe(1);
      expect(session.autoIdleAll(at(2))).toBe(1);
      expect(session.active.map(i => i.status)).toEqual(['idle', 'idle']);
    });
  });

  describe('done, archive, delete and undo', () => {
    it('should move a finished task to done and notify', () => {
      const session = withTasks('A', 'B');
      session.toggleRunPause(T0);

      expect(session.markDone(at(30))).toBe(true);

      expect(titles(session.active)).toEqual(['A']);
      expect(titles(session.done)).toEqual(['B']);
      expect(session.done[0]?.status).toBe('done');
      expect(session.done[0]?.completedAt).toEqual(at(30));
      expect(session.done[0]?.elapsed).toBe(minutes(30));
      expect(session.selectedRowIndex).toBe(0);
      expect(notify).toHaveBeenCalledWith('task-done', 'B');
    });

    it('should undo done back to the same position', () => {
      const session = withTasks('A', 'B', 'C');
      session.moveSelectionUp();
      session.markDone(at(5));

      expect(session.undo(at(6))).toBe(true);

      expect(titles(session.active)).toEqual(['A', 'B', 'C']);
      expect(session.done).toEqual([]);
      expect(session.active[1]?.status).toBe('idle');
      expect(session.selectedItem()?.title).toBe('B');
      expect(session.undo(at(7))).toBe(false);
    });

    it('should finish a subtask, sync its parent and undo it back under the parent', () => {
      const session = withTasks('Parent');
      session.addSubtask('One', {}, T0);
      session.addSubtask('Two', {}, T0);
      session.moveSelectionUp();
      session.toggleRunPause(T0);
      const parent = session.active[0];

      session.markDone(at(10));
      expect(titles(parent?.subtasks ?? [])).toEqual(['Two']);
      expect(session.done[0]?.isSubtask).toBe(false);
      expect(parent?.status).toBe('paused');

      session.undo(at(11));
      expect(titles(parent?.subtasks ?? [])).toEqual(['Two', 'One']);
      expect(parent?.subtasks[1]?.isSubtask).toBe(true);
      expect(parent?.status).toBe('running');
      expect(session.done).toEqual([]);
    });

    it('should archive and pause a running task', () => {
      const session = withTasks('A');
      session.toggleRunPause(T0);

      session.archiveSelected(at(20));

      expect(session.active).toEqual([]);
      expect(session.archived[0]?.status).toBe('paused');
      expect(session.archived[0]?.elapsed).toBe(minutes(20));

      session.undo(at(21));
      expect(session.archived).toEqual([]);
      expect(titles(session.active)).toEqual(['A']);
    });

    it('should keep a parent that still owns subtasks', () => {
      const session = withTasks('Parent');
      session.addSubtask('Child', {}, T0);
      session.moveSelectionUp();

      expect(session.deleteSelected(at(1))).toBe(false);
      expect(session.active).toHaveLength(1);
    });

    it('should delete and restore a task', () => {
      const session = withTasks('A', 'B');

      expect(session.deleteSelected(at(1))).toBe(true);
      expect(titles(session.active)).toEqual(['A']);

      session.undo(at(2));
      expect(titles(session.active)).toEqual(['A', 'B']);
    });

    it('should keep only as many undo entries as configured', () => {
      const settings = { ...DEFAULT_SETTINGS, tasks: { ...DEFAULT_SETTINGS.tasks, undoCapacity: 2 } };
      const session = createSession([], settings);
      for (const title of ['A', 'B', 'C']) session.addTask(title, {}, T0);

      session.deleteSelected(at(1));
      session.deleteSelected(at(1));
      session.deleteSelected(at(1));

      expect(session.undoDepth).toBe(2);
    });
  });

  describe('postpone', () => {
    it('should move the selected task to tomorrow\'s file as idle', async () => {
      const session = withTasks('Now', 'Later');
      session.toggleRunPause(T0);

      expect(session.postponeSelected(at(30))).toBe(true);

      expect(titles(session.active)).toEqual(['Now']);
      const content = await fs.readFile(dailyFilePath(dataDir, TOMORROW), 'utf-8');
      const parsed = parseDailyFile(content, { now: at(30) });
      expect(parsed.date).toBe(TOMORROW);
      expect(titles(parsed.active)).toEqual(['Later']);
      expect(parsed.active[0]?.status).toBe('idle');
      expect(parsed.active[0]?.elapsed).toBe(minutes(30));
    });

    it('should append to an existing tomorrow file', async () => {
      await fs.writeFile(dailyFilePath(dataDir, TOMORROW), ['## ACTIVE', '', '- [IDLE] Planned', ''].join('\n'));
      const session = withTasks('Later');

      session.postponeSelected(at(1));

      const parsed = parseDailyFile(await fs.readFile(dailyFilePath(dataDir, TOMORROW), 'utf-8'));
      expect(titles(parsed.active)).toEqual(['Planned', 'Later']);
    });

    it('should leave the item in place when tomorrow\'s file cannot be written', async () => {
      await fs.mkdir(dailyFilePath(dataDir, TOMORROW));
      const session = withTasks('Later');

      expect(() => session.postponeSelected(at(1))).toThrow(StorageError);
      expect(titles(session.active)).toEqual(['Later']);
    });
  });

  describe('estimate breaches', () => {
    function overEstimate(): DaySession {
      const session = createSession();
      session.addTask('Short', { estimate: minutes(10) }, T0);
      session.toggleRunPause(T0);
      session.tick(at(10));
      return session;
    }

    it('should open one prompt for an item over its estimate', () => {
      const session = overEstimate();
      const item = session.active[0];

      const breach = session.checkEstimateBreaches();
      session.checkEstimateBreaches();

      expect(breach).toEqual({ itemId: item?.id, title: 'Short', estimate: minutes(10) });
      expect(notify).toHaveBeenCalledTimes(1);
      expect(notify).toHaveBeenCalledWith('estimate-reached', 'Short');
    });

    it('should not prompt below the estimate', () => {
      const session = createSession();
      session.addTask('Short', { estimate: minutes(10) }, T0);
      session.toggleRunPause(T0);
      session.tick(at(9));
      expect(session.checkEstimateBreaches()).toBeNull();
    });

    it('should extend by the step or a given amount', () => {
      const session = overEstimate();
      session.checkEstimateBreaches();

      expect(session.resolveBreach('extend', undefined, at(10))).toBe(true);
      expect(session.active[0]?.estimate).toBe(minutes(25));
      expect(session.pendingBreach).toBeNull();

      session.tick(at(25));
      session.checkEstimateBreaches();
      session.resolveBreach('extend', minutes(5), at(25));
      expect(session.active[0]?.estimate).toBe(minutes(30));
    });

    it('should resolve by finishing, pausing or postponing', async () => {
      const done = overEstimate();
      done.checkEstimateBreaches();
      done.resolveBreach('done', undefined, at(10));
      expect(titles(done.done)).toEqual(['Short']);

      const paused = overEstimate();
      paused.checkEstimateBreaches();
      paused.resolveBreach('pause', undefined, at(10));
      expect(paused.active[0]?.status).toBe('paused');

      const later = overEstimate();
      later.checkEstimateBreaches();
      later.resolveBreach('postpone', undefined, at(10));
      expect(later.active).toEqual([]);
      await expect(fs.access(dailyFilePath(dataDir, TOMORROW))).resolves.toBeUndefined();
    });

    it('should do nothing without a pending prompt', () => {
      expect(createSession().resolveBreach('done')).toBe(false);
    });
  });

  describe('idle check', () => {
    it('should ask after the quiet period and pause when the grace window lapses', () => {
      const session = withTasks('Work');
      session.toggleRunPause(T0);

      expect(session.checkIdle(at(29))).toBe('none');
      expect(session.checkIdle(at(30))).toBe('opened');
      expect(session.idleCheck).toEqual({ openedAt: at(30), deadline: at(60) });
      expect(notify).toHaveBeenCalledWith('idle-check', 'Still working?');

      expect(session.checkIdle(at(45))).toBe('pending');
      expect(session.checkIdle(at(60))).toBe('auto-paused');
      expect(session.active[0]?.status).toBe('paused');
      expect(session.idleCheck).toBeNull();
    });

    it('should restart the quiet period on confirmation', () => {
      const session = withTasks('Work');
      session.toggleRunPause(T0);
      session.checkIdle(at(30));

      session.confirmWorking(at(31));

      expect(session.idleCheck).toBeNull();
      expect(session.checkIdle(at(60))).toBe('none');
      expect(session.checkIdle(at(61))).toBe('opened');
    });

    it('should not count time when nothing runs', () => {
      const session = withTasks('Work');
      expect(session.checkIdle(at(40))).toBe('none');

      session.toggleRunPause(at(40));
      expect(session.checkIdle(at(60))).toBe('none');
    });
  });

  describe('queries', () => {
    it('should total leaves across active and done', () => {
      const session = createSession();
      session.addTask('Parent', { estimate: minutes(90) }, T0);
      session.addSubtask('Child', { estimate: minutes(20) }, T0);
      session.addTask('Done', { estimate: minutes(15) }, T0);
      session.toggleRunPause(T0);
      session.markDone(at(10));

      expect(session.totals()).toEqual({ estimate: minutes(35), elapsed: minutes(10) });
    });

    it('should notice a change of local date', () => {
      const session = createSession();
      expect(session.hasDayChanged(new Date(2024, 4, 2, 23, 59))).toBe(false);
      expect(session.hasDayChanged(new Date(2024, 4, 3, 0, 0))).toBe(true);
    });
  });

  describe('persistence', () => {
    it('should write the daily file and metadata', async () => {
      const session = withTasks('A', 'B');
      session.toggleRunPause(T0);

      session.save(at(10));

      expect(session.isDirty).toBe(false);
      const parsed = parseDailyFile(await fs.readFile(dailyFilePath(dataDir, TODAY), 'utf-8'));
      expect(parsed.date).toBe(TODAY);
      expect(titles(parsed.active)).toEqual(['A', 'B']);
      expect(parsed.active[1]?.status).toBe('running');

      const meta = JSON.parse(await fs.readFile(metadataFilePath(dataDir), 'utf-8'));
      expect(meta.globalMode).toBe('working');
      expect(meta.modeSeconds.working).toBe(600);
      expect(meta.lastSessionDate).toBe(TODAY);
    });

    it('should stay dirty when the write fails', async () => {
      await fs.mkdir(dailyFilePath(dataDir, TODAY));
      const session = withTasks('A');

      expect(() => session.save(at(1))).toThrow(StorageError);
      expect(session.isDirty).toBe(true);
    });

    it('should write the journal only when changed', async () => {
      const session = createSession();
      expect(session.saveJournal()).toBe(false);

      session.setJournal('Felt productive');
      expect(session.isDirty).toBe(true);
      expect(session.saveJournal()).toBe(true);
      expect(session.saveJournal()).toBe(false);
      await expect(fs.readFile(journalFilePath(dataDir, TODAY), 'utf-8')).resolves.toBe('Felt productive');
    });
  });

  describe('rollover', () => {
    it('should close the day and carry active work into the new one', async () => {
      await fs.writeFile(dailyFilePath(dataDir, TOMORROW), ['## ACTIVE', '', '- [IDLE] Postponed earlier', ''].join('\n'));
      await fs.writeFile(journalFilePath(dataDir, TOMORROW), 'new day');
      const session = withTasks('Carry', 'Finish');
      session.markDone(at(5));
      session.addTask('Scrap', {}, T0);
      session.deleteSelected(at(6));
      const midnight = new Date(2024, 4, 3, 0, 5);

      expect(session.rollover(midnight)).toBe(TODAY);

      expect(session.date).toBe(TOMORROW);
      expect(titles(session.active)).toEqual(['Carry', 'Postponed earlier']);
      expect(session.done).toEqual([]);
      expect(session.undoDepth).toBe(0);
      expect(session.journal).toBe('new day');
      expect(session.modeTimes(midnight)).toEqual(emptyModeSeconds());

      const ended = parseDailyFile(await fs.readFile(dailyFilePath(dataDir, TODAY), 'utf-8'));
      expect(titles(ended.done)).toEqual(['Finish']);
    });
  });
});
