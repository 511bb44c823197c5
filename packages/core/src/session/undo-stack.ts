/**
 * @fileoverview Bounded undo history
 *
 * Holds full snapshots of items taken before they left the active list.
 * When full, the oldest entry is discarded.
 */

import type { Item } from '../domain/item.js';

export type UndoKind = 'done' | 'archived' | 'deleted';

export interface UndoEntry {
  kind: UndoKind;
  /** Snapshot taken before the action */
  item: Item;
  taskIndex: number;
  /** Set when the item was a subtask of the task at taskIndex */
  subtaskIndex?: number;
}

export class UndoStack {
  private entries: UndoEntry[] = [];

  constructor(private readonly capacity = 10) {}

  push(entry: UndoEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  pop(): UndoEntry | undefined {
    return this.entries.pop();
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }
}
