/**
 * @fileoverview Daily file serializer
 *
 * Pure formatting; never fails. Relative to an item's `-`, fields sit two
 * columns in, block contents and subtask items four.
 */

import { formatDuration, formatHours } from '../domain/duration.js';
import type { Item } from '../domain/item.js';
import { isActiveStatus, statusToTag, type StateEvent } from '../domain/types.js';

export interface DailyFileContent {
  date: string;
  active: readonly Item[];
  done: readonly Item[];
  archived: readonly Item[];
}

type SectionKind = 'active' | 'done' | 'archived';

function formatTimestamp(date: Date): string {
  return date.toISOString();
}

export function formatHistoryEntry(event: StateEvent): string {
  const transition = event.from
    ? `${statusToTag(event.from)} -> ${statusToTag(event.to)}`
    : statusToTag(event.to);
  return `- ${formatTimestamp(event.timestamp)}: ${transition}`;
}

function shouldWriteSubtask(parent: Item, sub: Item): boolean {
  if (parent.status === 'done') return true;
  return isActiveStatus(sub.status) || sub.status === 'done';
}

/**
 * Note lines without leading or trailing whitespace-only lines
 */
function trimBlankLines(notes: string): string[] {
  const lines = notes.split('\n');
  while (lines.length > 0 && lines[0]?.trim() === '') lines.shift();
  while (lines.length > 0 && lines[lines.length - 1]?.trim() === '') lines.pop();
  return lines;
}

/**
 * Lines for one item (and its subtasks) at the given indent
 */
export function serializeItem(item: Item, indent = 0, section: SectionKind = 'active', now: Date = new Date()): string[] {
  const pad = ' '.repeat(indent);
  const field = ' '.repeat(indent + 2);
  const content = ' '.repeat(indent + 4);
  const title = item.title.replace(/\s*\n\s*/g, ' ');
  const lines: string[] = [];

  lines.push(`${pad}- [${statusToTag(item.status)}] ${title}`);
  lines.push(`${field}est: ${formatHours(item.estimate)}`);
  lines.push(`${field}elapsed: ${formatHours(item.elapsed)}`);

  if (item.completedAt) {
    lines.push(`${field}completed: ${formatTimestamp(item.completedAt)}`);
  }

  if (item.tags.length > 0) {
    lines.push(`${field}tags: ${item.tags.join(', ')}`);
  }

  const notes = trimBlankLines(item.notes);
  if (notes.length > 0) {
    lines.push(`${field}notes: |`);
    for (const noteLine of notes) {
      lines.push(noteLine === '' ? '' : `${content}${noteLine}`);
    }
  }

  if (section === 'done' && item.status === 'done') {
    lines.push(`${field}Analytics:`);
    lines.push(`${content}Calendar Time: ${formatDuration(item.calendarTime() ?? 0)}`);
    lines.push(`${content}Active Time: ${formatDuration(item.runningTime(now))}`);
    lines.push(`${content}Interruptions: ${item.interruptionCount()}`);
    lines.push(`${content}Sessions: ${item.sessionCount()}`);
  }

  lines.push(`${field}created: ${formatTimestamp(item.createdAt)}`);

  if (item.history.length > 0) {
    lines.push(`${field}history:`);
    for (const event of item.history) {
      lines.push(`${content}${formatHistoryEntry(event)}`);
    }
  }

  const subtasks = item.subtasks.filter(sub => shouldWriteSubtask(item, sub));
  if (subtasks.length > 0) {
    lines.push(`${field}subtasks:`);
    for (const sub of subtasks) {
      lines.push(...serializeItem(sub, indent + 4, section, now));
    }
  }

  return lines;
}

function serializeSection(header: string, items: readonly Item[], section: SectionKind, now: Date): string[] {
  const lines = [`## ${header}`, ''];
  for (const item of items) {
    lines.push(...serializeItem(item, 0, section, now), '');
  }
  return lines;
}

/**
 * Render a daily file. ACTIVE is always written (running, paused and idle
 * items only); DONE and ARCHIVED only when non-empty.
 */
export function serializeDailyFile(file: DailyFileContent, now: Date = new Date()): string {
  const lines: string[] = [`# ${file.date}`, ''];

  lines.push(...serializeSection('ACTIVE', file.active.filter(i => isActiveStatus(i.status)), 'active', now));

  if (file.done.length > 0) {
    lines.push(...serializeSection('DONE', file.done, 'done', now));
  }

  if (file.archived.length > 0) {
    lines.push(...serializeSection('ARCHIVED', file.archived, 'archived', now));
  }

  return `${lines.join('\n').trimEnd()}\n`;
}
