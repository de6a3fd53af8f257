/**
 * @arch lintcache.util
 *
 * Cache module exports.
 */
export { LinterCache } from './linter-cache.js';
export { openLinterCache, type OpenCacheOptions, type OpenCacheResult } from './session.js';
export { toFindingRecord, fromFindingRecord, readFileEntry } from './finding-record.js';
export { toReferenceSeconds, fromReferenceSeconds } from './reference-date.js';
export type {
  CacheDocument,
  CacheStats,
  FileEntryRecord,
  FindingRecord,
} from './types.js';
export { REFERENCE_EPOCH_MS, DEFAULT_CACHE_PATH } from './types.js';
