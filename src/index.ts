export { createJournalEntry, normalizeTags, parseTagList } from './journal/entry.js';
export {
  JournalError,
  MalformedStoreError,
  NoTagsError,
  NotFoundError,
  StoreLockedError,
  ValidationError,
} from './journal/errors.js';
export {
  countWords,
  filterByTags,
  fuzzySearchTitles,
  mostCommonTag,
  searchByTagExact,
  searchByTitleSubstring,
  similarityRatio,
  stats,
  type FilterByTagsOptions,
} from './journal/query/queryEngine.js';
export { loadSeedEntries, type SeedEntry } from './journal/seed.js';
export {
  EntryStore,
  type EntryStoreOptions,
  type LoadOutcome,
} from './journal/storage/entryStore.js';
export type { FileLockOptions } from './journal/storage/fileLock.js';
export { resolveBaseDir, resolveJournalFile } from './journal/storage/paths.js';
export {
  MAX_CONTENT_LENGTH,
  MAX_TITLE_LENGTH,
  type JournalEntry,
  type JournalStats,
  type TagMatchMode,
} from './journal/types.js';
export { createLogger } from './logger.js';
