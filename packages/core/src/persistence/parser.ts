/**
 * @fileoverview Daily file parser
 *
 * Structure is read from indentation. An item owns every following line
 * indented deeper than its `- [` marker; a field block (notes, history,
 * subtasks, Analytics) owns the lines indented deeper than its field line.
 *
 * A malformed record is logged and skipped together with its indented
 * lines. Malformed field values fall back to safe defaults.
 */

import { createLogger } from '../logging/index.js';
import { RecordParseError } from '../errors/index.js';
import { parseDateKey, parseHours, parseTimestamp } from '../domain/duration.js';
import { Item } from '../domain/item.js';
import { statusFromTag, type RunStatus, type StateEvent } from '../domain/types.js';

const logger = createLogger('persistence:parser');

// =============================================================================
// Types
// =============================================================================

export type SectionName = 'active' | 'done' | 'archived';

export interface ParsedDailyFile {
  /** Date from the `# YYYY-MM-DD` header, when present and valid */
  date?: string;
  active: Item[];
  done: Item[];
  archived: Item[];
}

export interface ParseOptions {
  /** Fallback for malformed `created` values */
  now?: Date;
}

interface Line {
  /** 1-based line number */
  number: number;
  /** Width of the leading whitespace; a tab counts as two columns */
  indent: number;
  text: string;
  raw: string;
}

interface Cursor {
  lines: Line[];
  now: Date;
}

// =============================================================================
// Line helpers
// =============================================================================

function columnWidth(whitespace: string): number {
  let width = 0;
  for (const ch of whitespace) width += ch === '\t' ? 2 : 1;
  return width;
}

function toLines(content: string): Line[] {
  return content.split(/\r?\n/).map((raw, i) => {
    const leading = /^[ \t]*/.exec(raw)?.[0] ?? '';
    return { number: i + 1, indent: columnWidth(leading), text: raw.trim(), raw };
  });
}

/**
 * Remove up to `columns` columns of indentation; the rest of the line is
 * returned as written
 */
function stripIndent(raw: string, columns: number): string {
  let width = 0;
  let i = 0;
  while (i < raw.length && width < columns) {
    const ch = raw[i];
    if (ch === ' ') width += 1;
    else if (ch === '\t') width += 2;
    else break;
    i++;
  }
  return raw.slice(i);
}

function isBlank(line: Line): boolean {
  return line.text === '';
}

/**
 * Index just past the lines owned by lines[start]: everything after it that
 * is blank or indented deeper than `indent`. Trailing blanks are excluded.
 */
function blockEnd(lines: Line[], start: number, indent: number): number {
  let end = start + 1;
  let lastContent = start;
  while (end < lines.length) {
    const line = lines[end];
    if (!line) break;
    if (!isBlank(line)) {
      if (line.indent <= indent) break;
      lastContent = end;
    }
    end++;
  }
  return lastContent + 1;
}

function sectionFromHeader(text: string): SectionName | null | undefined {
  const match = /^##\s+(.+)$/.exec(text);
  if (!match?.[1]) return undefined;
  switch (match[1].trim().toUpperCase()) {
    case 'ACTIVE':
      return 'active';
    case 'DONE':
      return 'done';
    case 'ARCHIVED':
      return 'archived';
    default:
      return null;
  }
}

// =============================================================================
// Field parsers
// =============================================================================

/**
 * Split `- [STATUS] Title`
 */
export function parseItemHeader(text: string, lineNumber: number): { status: RunStatus; title: string } {
  const body = text.replace(/^-\s*/, '');
  if (!body.startsWith('[')) {
    throw new RecordParseError('Missing status tag', lineNumber);
  }
  const close = body.indexOf(']');
  if (close === -1) {
    throw new RecordParseError('Unterminated status tag', lineNumber);
  }
  const tag = body.slice(1, close);
  const status = statusFromTag(tag);
  if (!status) {
    throw new RecordParseError(`Unknown status "${tag}"`, lineNumber);
  }
  const title = body.slice(close + 1).trim();
  if (!title) {
    throw new RecordParseError('Empty title', lineNumber);
  }
  return { status, title };
}

/**
 * Parse `<timestamp>: STATUS` or `<timestamp>: FROM -> TO`
 */
export function parseHistoryEntry(text: string): StateEvent | null {
  const body = text.replace(/^-\s*/, '');
  const split = body.lastIndexOf(': ');
  if (split === -1) return null;

  const timestamp = parseTimestamp(body.slice(0, split));
  if (!timestamp) return null;

  const transition = body.slice(split + 2);
  const arrow = transition.indexOf('->');
  if (arrow === -1) {
    const to = statusFromTag(transition);
    return to ? { timestamp, to } : null;
  }

  const from = statusFromTag(transition.slice(0, arrow));
  const to = statusFromTag(transition.slice(arrow + 2));
  return from && to ? { timestamp, from, to } : null;
}

export function parseTagList(value: string): string[] {
  return value
    .split(',')
    .map(t => t.trim())
    .filter(t => t.length > 0);
}

/**
 * Block text with the block's indentation removed and surrounding blank
 * lines dropped. Line content, tabs and trailing spaces included, is kept.
 */
function blockText(cursor: Cursor, start: number, end: number, contentIndent: number): string {
  const text: string[] = [];
  for (let i = start; i < end; i++) {
    const line = cursor.lines[i];
    if (line) text.push(stripIndent(line.raw, contentIndent));
  }
  while (text.length > 0 && text[0]?.trim() === '') text.shift();
  while (text.length > 0 && text[text.length - 1]?.trim() === '') text.pop();
  return text.join('\n');
}

// =============================================================================
// Records
// =============================================================================

interface RecordFields {
  estimate: number;
  elapsed: number;
  notes: string;
  tags: string[];
  createdAt?: Date;
  completedAt?: Date;
  history: StateEvent[];
  subtasks: Item[];
}

/**
 * Parse the record whose header is lines[start] and which ends before `end`
 */
function parseRecord(cursor: Cursor, start: number, end: number, depth: number): Item {
  const headerLine = cursor.lines[start];
  if (!headerLine) throw new RecordParseError('Missing record', 0);
  const { status, title } = parseItemHeader(headerLine.text, headerLine.number);

  const fields: RecordFields = {
    estimate: 0,
    elapsed: 0,
    notes: '',
    tags: [],
    history: [],
    subtasks: [],
  };

  let i = start + 1;
  while (i < end) {
    const line = cursor.lines[i];
    if (!line || isBlank(line)) {
      i++;
      continue;
    }
    const fieldEnd = Math.min(blockEnd(cursor.lines, i, line.indent), end);
    parseField(cursor, fields, line, i + 1, fieldEnd, depth, title);
    i = fieldEnd;
  }

  const item = new Item({
    title,
    status,
    estimate: fields.estimate,
    elapsed: fields.elapsed,
    notes: fields.notes,
    tags: fields.tags,
    createdAt: fields.createdAt ?? cursor.now,
    completedAt: fields.completedAt,
    history: fields.history,
  });
  for (const sub of fields.subtasks) item.addSubtask(sub);
  return item;
}

function parseField(
  cursor: Cursor,
  fields: RecordFields,
  line: Line,
  blockStart: number,
  blockStop: number,
  depth: number,
  title: string
): void {
  const colon = line.text.indexOf(':');
  if (colon === -1) {
    logger.debug('Skipping unrecognized line', { line: line.number, title });
    return;
  }
  const key = line.text.slice(0, colon).trim().toLowerCase();
  const value = line.text.slice(colon + 1).trim();

  switch (key) {
    case 'est':
    case 'elapsed': {
      const parsed = parseHours(value);
      if (parsed === null) {
        logger.warn(`Malformed ${key} value, using zero`, { line: line.number, title, value });
      }
      if (key === 'est') fields.estimate = parsed ?? 0;
      else fields.elapsed = parsed ?? 0;
      return;
    }

    case 'tags':
      fields.tags = parseTagList(value);
      return;

    case 'notes':
      fields.notes = value === '|' || value === '' ? blockText(cursor, blockStart, blockStop, line.indent + 2) : value;
      return;

    case 'created': {
      const parsed = parseTimestamp(value);
      if (!parsed) {
        logger.warn('Malformed created timestamp, using load time', { line: line.number, title, value });
      }
      fields.createdAt = parsed ?? cursor.now;
      return;
    }

    case 'completed': {
      const parsed = parseTimestamp(value);
      if (!parsed) {
        logger.warn('Malformed completed timestamp, ignoring', { line: line.number, title, value });
      }
      fields.completedAt = parsed ?? undefined;
      return;
    }

    case 'history':
      fields.history = parseHistoryBlock(cursor, blockStart, blockStop, title);
      return;

    case 'subtasks':
      if (depth >= 1) {
        logger.warn('Subtasks nested deeper than one level, skipping', { line: line.number, title });
        return;
      }
      fields.subtasks = parseItemBlock(cursor, blockStart, blockStop, depth + 1);
      return;

    case 'analytics':
      // derived on write
      return;

    default:
      logger.debug('Skipping unknown field', { line: line.number, field: key, title });
  }
}

function parseHistoryBlock(cursor: Cursor, start: number, end: number, title: string): StateEvent[] {
  const events: StateEvent[] = [];
  for (let i = start; i < end; i++) {
    const line = cursor.lines[i];
    if (!line || isBlank(line)) continue;
    const event = parseHistoryEntry(line.text);
    if (event) {
      events.push(event);
    } else {
      logger.warn('Dropping malformed history entry', { line: line.number, title, entry: line.text });
    }
  }
  return events;
}

/**
 * Parse every record in lines[start, end). Lines outside any record are
 * ignored; a failing record is skipped.
 */
function parseItemBlock(cursor: Cursor, start: number, end: number, depth: number): Item[] {
  const items: Item[] = [];
  let i = start;
  while (i < end) {
    const line = cursor.lines[i];
    if (!line || isBlank(line) || !line.text.startsWith('-')) {
      i++;
      continue;
    }
    const recordEnd = Math.min(blockEnd(cursor.lines, i, line.indent), end);
    const item = tryParseRecord(cursor, i, recordEnd, depth);
    if (item) items.push(item);
    i = recordEnd;
  }
  return items;
}

function tryParseRecord(cursor: Cursor, start: number, end: number, depth: number): Item | null {
  try {
    return parseRecord(cursor, start, end, depth);
  } catch (error) {
    if (error instanceof RecordParseError) {
      logger.warn('Skipping malformed record', { line: error.line, reason: error.message });
      return null;
    }
    throw error;
  }
}

// =============================================================================
// Daily file
// =============================================================================

/**
 * Parse a daily file. Items before any section header belong to ACTIVE;
 * items under an unknown header are skipped.
 */
export function parseDailyFile(content: string, options: ParseOptions = {}): ParsedDailyFile {
  const cursor: Cursor = { lines: toLines(content), now: options.now ?? new Date() };
  const result: ParsedDailyFile = { active: [], done: [], archived: [] };
  let section: SectionName | null = 'active';

  const { lines } = cursor;
  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    if (!line || isBlank(line)) {
      i++;
      continue;
    }

    if (line.indent === 0 && line.text.startsWith('## ')) {
      const next = sectionFromHeader(line.text);
      if (next === null) {
        logger.warn('Unknown section, skipping its items', { line: line.number, header: line.text });
      }
      section = next ?? null;
      i++;
      continue;
    }

    if (line.indent === 0 && /^#\s/.test(line.text)) {
      const key = line.text.replace(/^#\s+/, '').trim();
      if (parseDateKey(key)) result.date = key;
      i++;
      continue;
    }

    if (line.text.startsWith('-')) {
      const end = blockEnd(lines, i, line.indent);
      if (section) {
        const item = tryParseRecord(cursor, i, end, 0);
        if (item) result[section].push(item);
      }
      i = end;
      continue;
    }

    i++;
  }

  return result;
}
