/**
 * @fileoverview Notification and report helper tests
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';

const warn = vi.hoisted(() => vi.fn());

vi.mock('../../logging/index.js', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn,
    error: vi.fn(),
    trace: vi.fn(),
  }),
}));

import { LogNotificationSink, safeNotify } from '../notifications.js';
import { generateReport } from '../reports.js';

describe('safeNotify', () => {
  beforeEach(() => {
    warn.mockClear();
  });

  it('should deliver to the sink', () => {
    const notify = vi.fn();
    safeNotify({ notify }, 'task-done', 'Write report');
    expect(notify).toHaveBeenCalledWith('task-done', 'Write report');
  });

  it('should log a throwing sink instead of failing', () => {
    const notify = vi.fn(() => {
      throw new Error('no display');
    });

    expect(() => safeNotify({ notify }, 'idle-check', 'Still working?')).not.toThrow();
    expect(warn).toHaveBeenCalledWith('Notification failed', {
      kind: 'idle-check',
      title: 'Still working?',
      error: 'Error: no display',
    });
  });

  it('should log a rejecting sink', async () => {
    const notify = vi.fn(() => Promise.reject(new Error('offline')));

    safeNotify({ notify }, 'estimate-reached', 'Review');
    await Promise.resolve();
    await Promise.resolve();

    expect(warn).toHaveBeenCalledWith('Notification failed', {
      kind: 'estimate-reached',
      title: 'Review',
      error: 'Error: offline',
    });
  });

  it('should accept the log sink', () => {
    expect(() => new LogNotificationSink().notify('task-done', 'A')).not.toThrow();
  });
});

describe('generateReport', () => {
  it('should report success', async () => {
    const generate = vi.fn();
    await expect(generateReport({ generate }, '2024-05-01')).resolves.toBe(true);
    expect(generate).toHaveBeenCalledWith('2024-05-01');
  });

  it('should swallow generator failures', async () => {
    const generate = vi.fn(() => Promise.reject(new Error('disk full')));
    await expect(generateReport({ generate }, '2024-05-01')).resolves.toBe(false);
  });

  it('should skip without a generator', async () => {
    await expect(generateReport(undefined, '2024-05-01')).resolves.toBe(false);
  });
});
