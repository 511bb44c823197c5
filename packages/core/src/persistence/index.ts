/**
 * @fileoverview Persistence exports
 */

export * from './files.js';
export {
  parseDailyFile,
  parseItemHeader,
  parseHistoryEntry,
  parseTagList,
  type ParsedDailyFile,
  type ParseOptions,
  type SectionName,
} from './parser.js';
export { serializeDailyFile, serializeItem, formatHistoryEntry, type DailyFileContent } from './serializer.js';
export { parseDoneLogForDay } from './legacy.js';
export {
  loadAndMigrate,
  migrateLegacyLayout,
  resyncAndPause,
  type LoadedDay,
  type LoadOptions,
  type LoadSource,
} from './migration.js';
export {
  loadMetadata,
  saveMetadata,
  defaultMetadata,
  emptyModeSeconds,
  itemKey,
  keysForIds,
  idsForKeys,
  type AppMetadata,
  type MetadataFile,
} from './metadata.js';
