/**
 * @fileoverview meta.json: life mode, mode timers and the auto-paused set
 *
 * Item ids are regenerated on every load, so the set of items paused by
 * leaving Working is stored as durable keys: the item's position plus its
 * title (`2:Write report`, `2.0:Outline` for a subtask).
 */

import { z } from 'zod';
import { createLogger } from '../logging/index.js';
import { localDateKey } from '../domain/duration.js';
import type { Item } from '../domain/item.js';
import type { LifeMode } from '../domain/types.js';
import { atomicWrite, readFileIfExists } from './files.js';

const logger = createLogger('persistence:metadata');

// =============================================================================
// Schema
// =============================================================================

const lifeModeSchema = z.enum(['working', 'break', 'lunch', 'gym', 'dinner', 'personal', 'sleep']);

const seconds = z.number().int().nonnegative().default(0);

const metadataSchema = z.object({
  globalMode: lifeModeSchema.default('working'),
  modePausedItems: z.array(z.string()).default([]),
  modeSeconds: z
    .object({
      working: seconds,
      break: seconds,
      lunch: seconds,
      gym: seconds,
      dinner: seconds,
      personal: seconds,
      sleep: seconds,
    })
    .default({}),
  lastModeChangeTimestamp: z.string().datetime({ offset: true }).optional(),
  lastSessionDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .optional(),
});

export type MetadataFile = z.infer<typeof metadataSchema>;

export interface AppMetadata {
  globalMode: LifeMode;
  /** Durable keys of items paused by leaving Working */
  modePausedItems: string[];
  /** Cumulative whole seconds per mode for the current day */
  modeSeconds: Record<LifeMode, number>;
  /** Instant up to which modeSeconds is accounted */
  lastModeChange?: Date;
  /** Daily file (YYYY-MM-DD) the last session saved to */
  sessionDate?: string;
}

export function emptyModeSeconds(): Record<LifeMode, number> {
  return { working: 0, break: 0, lunch: 0, gym: 0, dinner: 0, personal: 0, sleep: 0 };
}

export function defaultMetadata(): AppMetadata {
  return { globalMode: 'working', modePausedItems: [], modeSeconds: emptyModeSeconds() };
}

// =============================================================================
// Load / Save
// =============================================================================

/**
 * Load meta.json. Missing or invalid files yield defaults; counters from an
 * earlier day are reset.
 */
export function loadMetadata(filePath: string, now: Date = new Date()): AppMetadata {
  const content = readFileIfExists(filePath);
  if (content === null) return defaultMetadata();

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    logger.warn('meta.json is not valid JSON, using defaults', { filePath, error: String(error) });
    return defaultMetadata();
  }

  const result = metadataSchema.safeParse(raw);
  if (!result.success) {
    logger.warn('Invalid meta.json, using defaults', {
      filePath,
      issues: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    });
    return defaultMetadata();
  }

  const data = result.data;
  const lastModeChange = data.lastModeChangeTimestamp ? new Date(data.lastModeChangeTimestamp) : undefined;
  const metadata: AppMetadata = {
    globalMode: data.globalMode,
    modePausedItems: data.modePausedItems,
    modeSeconds: { ...data.modeSeconds },
    lastModeChange,
    sessionDate: data.lastSessionDate,
  };

  if (!lastModeChange || localDateKey(lastModeChange) !== localDateKey(now)) {
    if (lastModeChange) logger.info('New day, resetting mode counters', { previous: localDateKey(lastModeChange) });
    metadata.modeSeconds = emptyModeSeconds();
    metadata.lastModeChange = now;
  }

  return metadata;
}

export function saveMetadata(filePath: string, metadata: AppMetadata): void {
  const file: MetadataFile = {
    globalMode: metadata.globalMode,
    modePausedItems: metadata.modePausedItems,
    modeSeconds: metadata.modeSeconds,
    lastModeChangeTimestamp: metadata.lastModeChange?.toISOString(),
    lastSessionDate: metadata.sessionDate,
  };
  atomicWrite(filePath, `${JSON.stringify(file, null, 2)}\n`);
}

// =============================================================================
// Durable keys
// =============================================================================

export function itemKey(title: string, taskIndex: number, subtaskIndex?: number): string {
  const position = subtaskIndex === undefined ? `${taskIndex}` : `${taskIndex}.${subtaskIndex}`;
  return `${position}:${title}`;
}

/**
 * Durable keys for the items (and subtasks) whose ids are in `ids`
 */
export function keysForIds(ids: ReadonlySet<string>, items: readonly Item[]): string[] {
  const keys: string[] = [];
  items.forEach((item, taskIndex) => {
    if (ids.has(item.id)) keys.push(itemKey(item.title, taskIndex));
    item.subtasks.forEach((sub, subtaskIndex) => {
      if (ids.has(sub.id)) keys.push(itemKey(sub.title, taskIndex, subtaskIndex));
    });
  });
  return keys;
}

/**
 * Map durable keys back to current ids. A key whose position no longer
 * holds an item of that title is dropped.
 */
export function idsForKeys(keys: readonly string[], items: readonly Item[]): Set<string> {
  const ids = new Set<string>();
  for (const key of keys) {
    const match = /^(\d+)(?:\.(\d+))?:([\s\S]*)$/.exec(key);
    if (!match) {
      logger.debug('Ignoring malformed item key', { key });
      continue;
    }
    const [, taskPart = '', subPart, title] = match;
    const task = items[Number(taskPart)];
    const target = subPart === undefined ? task : task?.subtasks[Number(subPart)];
    if (target && target.title === title) {
      ids.add(target.id);
    } else {
      logger.debug('Item key no longer matches', { key });
    }
  }
  return ids;
}
