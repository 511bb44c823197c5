/**
 * @fileoverview Reader for the older done.log.md append log
 *
 * Entries look like:
 *
 *   ## 2024-05-01T14:22:08+02:00
 *   Task: "Write report"
 *   Elapsed: 1.50h
 *   Estimate: 2.00h
 *   History:
 *     - 2024-05-01 09:00:00: IDLE
 *     - 2024-05-01 09:05:00: IDLE -> RUNNING
 *   Notes:
 *   free text
 */

import { createLogger } from '../logging/index.js';
import { localDateKey, parseHours, parseTimestamp } from '../domain/duration.js';
import { Item } from '../domain/item.js';
import type { StateEvent } from '../domain/types.js';
import { parseHistoryEntry, parseTagList } from './parser.js';

const logger = createLogger('persistence:legacy');

const DERIVED_FIELDS = new Set(['Status', 'Calendar Time', 'Active Time', 'Interruptions', 'Sessions']);
const KNOWN_FIELDS = new Set([
  'Task',
  'Elapsed',
  'Estimate',
  'Estimate at finish',
  'Tags',
  'History',
  'Notes',
  ...DERIVED_FIELDS,
]);

interface DoneLogEntry {
  finishedAt: Date;
  lines: string[];
}

function splitEntries(content: string): DoneLogEntry[] {
  const entries: DoneLogEntry[] = [];
  let current: DoneLogEntry | null = null;

  for (const line of content.split(/\r?\n/)) {
    if (line.startsWith('## ')) {
      const finishedAt = parseTimestamp(line.slice(3));
      if (!finishedAt) {
        logger.warn('Skipping done log entry with bad timestamp', { header: line });
      }
      current = finishedAt ? { finishedAt, lines: [] } : null;
      if (current) entries.push(current);
      continue;
    }
    current?.lines.push(line);
  }

  return entries;
}

function entryToItem(entry: DoneLogEntry): Item | null {
  let title = '';
  let elapsed = 0;
  let estimate = 0;
  let tags: string[] = [];
  const history: StateEvent[] = [];
  const notes: string[] = [];
  let block: 'history' | 'notes' | null = null;

  for (const line of entry.lines) {
    const fieldMatch = /^([A-Za-z][A-Za-z ]*):\s*(.*)$/.exec(line);
    if (fieldMatch?.[1] && KNOWN_FIELDS.has(fieldMatch[1])) {
      const [, key = '', value = ''] = fieldMatch;
      block = null;
      switch (key) {
        case 'Task':
          title = value.replace(/^"/, '').replace(/"$/, '').trim();
          break;
        case 'Elapsed':
          elapsed = parseHours(value) ?? 0;
          break;
        case 'Estimate':
        case 'Estimate at finish':
          estimate = parseHours(value) ?? 0;
          break;
        case 'Tags':
          tags = parseTagList(value);
          break;
        case 'History':
          block = 'history';
          break;
        case 'Notes':
          block = 'notes';
          break;
        default:
          // derived values are recomputed from history
          break;
      }
      continue;
    }

    if (block === 'history' && line.trim().startsWith('-')) {
      const event = parseHistoryEntry(line.trim());
      if (event) history.push(event);
      else logger.warn('Dropping malformed history entry', { entry: line.trim() });
    } else if (block === 'notes' && line.trim()) {
      notes.push(line);
    }
  }

  if (!title) {
    logger.warn('Skipping done log entry without a title', { finishedAt: entry.finishedAt.toISOString() });
    return null;
  }

  const item = new Item({
    title,
    estimate,
    elapsed,
    tags,
    notes: notes.join('\n'),
    status: 'done',
    createdAt: history[0]?.timestamp ?? entry.finishedAt,
    completedAt: entry.finishedAt,
    history,
  });
  if (history.length === 0 || history[history.length - 1]?.to !== 'done') {
    item.history.push({ timestamp: entry.finishedAt, from: history[history.length - 1]?.to, to: 'done' });
  }
  return item;
}

/**
 * Items completed on `today`'s local date, in log order
 */
export function parseDoneLogForDay(content: string, today: Date = new Date()): Item[] {
  const dayKey = localDateKey(today);
  return splitEntries(content)
    .filter(entry => localDateKey(entry.finishedAt) === dayKey)
    .map(entryToItem)
    .filter((item): item is Item => item !== null);
}
