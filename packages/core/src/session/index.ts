/**
 * @fileoverview Session exports
 */

export {
  DaySession,
  type Selection,
  type AddItemOptions,
  type ItemEdit,
  type BreachResolution,
  type EstimateBreach,
  type IdleCheck,
  type IdleCheckResult,
  type DaySessionOptions,
} from './day-session.js';
export { ModeTracker } from './mode-tracker.js';
export { UndoStack, type UndoEntry, type UndoKind } from './undo-stack.js';
