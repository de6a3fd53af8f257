/**
 * @arch lintcache.core.types
 *
 * Types for the persisted findings cache.
 * Field names of the persisted shapes are part of the on-disk format.
 */

/**
 * Cached finding as written to disk.
 */
export interface FindingRecord {
  /** Line number (null if not applicable) */
  line: number | null;
  /** Column number (null if not applicable) */
  character: number | null;
  /** Severity level ("warning" | "error") */
  severity: string;
  /** Rule name */
  type: string;
  /** Rule identifier */
  rule_id: string;
  /** Human-readable message */
  reason: string;
}

/**
 * Entry written for a file whose findings were cached.
 * A cleared file is stored as an empty array instead.
 */
export interface FileEntryRecord {
  violations: FindingRecord[];
}

/**
 * Root document stored on disk.
 */
export interface CacheDocument {
  /** Tool version that produced the document */
  version: string;
  /** Fingerprint of the active configuration, omitted when absent */
  configuration_hash?: number;
  /** Seconds since REFERENCE_EPOCH_MS of the last save, omitted when absent */
  last_run_date?: number;
  /**
   * Map of file path to entry. Values are kept as loaded and
   * reinterpreted on every read.
   */
  files: Record<string, unknown>;
}

/**
 * Cache statistics for logging.
 */
export interface CacheStats {
  /** Number of lookups that returned findings */
  hits: number;
  /** Number of lookups that returned nothing */
  misses: number;
  /** Total files with an entry */
  totalCached: number;
}

/**
 * 2001-01-01T00:00:00Z, the epoch `last_run_date` is measured from.
 */
export const REFERENCE_EPOCH_MS = Date.UTC(2001, 0, 1);

/**
 * Default cache file path relative to the project root.
 */
export const DEFAULT_CACHE_PATH = '.lintcache/cache.json';
