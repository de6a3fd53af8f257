/**
 * @arch lintcache.core.domain
 *
 * LinterCache - persisted findings per file, invalidated wholesale when the
 * tool version, the configuration fingerprint, or the last run date do not
 * match the current run.
 */
import type { Finding } from '../findings/types.js';
import { readFile, writeFileAtomic } from '../../utils/file-system.js';
import { CacheError, SystemError, ErrorCodes, getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { asInteger, isRecord, readFileEntry, toFindingRecord } from './finding-record.js';
import { fromReferenceSeconds, toReferenceSeconds } from './reference-date.js';
import type { CacheDocument, CacheStats, FileEntryRecord } from './types.js';

const log = logger.child('cache');

/**
 * In-memory findings cache for one run of the analyzer.
 *
 * Every method except save() is synchronous and completes without yielding,
 * so concurrent async workers sharing one instance never observe a partial
 * update. save() snapshots the store before its first await.
 */
export class LinterCache {
  private readonly version: string;
  private configurationHash: number | undefined;
  private lastRunSeconds: number | undefined;
  /** File path -> raw entry, reinterpreted on every read */
  private entries = new Map<string, unknown>();
  private stats = { hits: 0, misses: 0 };

  /**
   * Create an empty cache for the given tool version and configuration.
   */
  constructor(currentVersion: string, configurationFingerprint?: number) {
    this.version = currentVersion;
    this.configurationHash = configurationFingerprint;
  }

  /**
   * Rebuild a cache from a parsed document.
   * Checks run in a fixed order: format, version, configuration, last run date.
   * @throws CacheError with the code of the first check that fails
   */
  static fromDocument(
    document: unknown,
    currentVersion: string,
    configurationFingerprint?: number,
    now: Date = new Date()
  ): LinterCache {
    if (!isRecord(document)) {
      throw new CacheError(ErrorCodes.INVALID_FORMAT, 'Cache document is not an object');
    }

    const version = typeof document.version === 'string' ? document.version : undefined;
    if (version !== currentVersion) {
      throw new CacheError(
        ErrorCodes.DIFFERENT_VERSION,
        `Cache was written by version ${version ?? '(none)'}, current version is ${currentVersion}`,
        { cached: version, current: currentVersion }
      );
    }

    const configurationHash = asInteger(document.configuration_hash);
    if (configurationHash !== configurationFingerprint) {
      throw new CacheError(
        ErrorCodes.DIFFERENT_CONFIGURATION,
        'Cache was written with a different configuration',
        { cached: configurationHash, current: configurationFingerprint }
      );
    }

    const lastRunSeconds = typeof document.last_run_date === 'number' ? document.last_run_date : undefined;
    if (lastRunSeconds !== undefined && lastRunSeconds > toReferenceSeconds(now)) {
      throw new CacheError(
        ErrorCodes.INCONSISTENT_LAST_RUN_DATE,
        'Cache last run date is in the future',
        { lastRunDate: fromReferenceSeconds(lastRunSeconds).toISOString(), now: now.toISOString() }
      );
    }

    const cache = new LinterCache(currentVersion, configurationHash);
    cache.lastRunSeconds = lastRunSeconds;
    // A non-object `files` reads as empty; the next write replaces it.
    if (isRecord(document.files)) {
      cache.entries = new Map(Object.entries(structuredClone(document.files)));
    }
    return cache;
  }

  /**
   * Read and parse a cache file, then validate it like fromDocument().
   * @throws SystemError when the file cannot be read (S006) or is not JSON (S001)
   * @throws CacheError when the document is not usable for this run
   */
  static async fromFile(
    filePath: string,
    currentVersion: string,
    configurationFingerprint?: number
  ): Promise<LinterCache> {
    let content: string;
    try {
      content = await readFile(filePath);
    } catch (error) {
      throw new SystemError(
        ErrorCodes.IO_ERROR,
        `Failed to read cache file: ${filePath}`,
        { filePath, error: getErrorMessage(error) }
      );
    }

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      throw new SystemError(
        ErrorCodes.PARSE_ERROR,
        `Failed to parse cache file: ${filePath}`,
        { filePath, error: getErrorMessage(error) }
      );
    }

    return LinterCache.fromDocument(document, currentVersion, configurationFingerprint);
  }

  get formatVersion(): string {
    return this.version;
  }

  get configurationFingerprint(): number | undefined {
    return this.configurationHash;
  }

  get lastRunDate(): Date | undefined {
    return this.lastRunSeconds === undefined ? undefined : fromReferenceSeconds(this.lastRunSeconds);
  }

  set lastRunDate(date: Date | undefined) {
    this.lastRunSeconds = date === undefined ? undefined : toReferenceSeconds(date);
  }

  /**
   * Replace the cached findings of a file. Previous findings are discarded.
   */
  cacheFindings(findings: readonly Finding[], file: string): void {
    const entry: FileEntryRecord = { violations: findings.map(toFindingRecord) };
    this.entries.set(file, entry);
  }

  /**
   * Forget the findings of a file. Later lookups return undefined.
   * The entry is kept as an empty array, matching what older caches contain.
   */
  clearFindings(file: string): void {
    this.entries.set(file, []);
  }

  /**
   * Cached findings of a file, in the order they were cached.
   * Returns undefined when the file has no readable entry.
   */
  findings(file: string): Finding[] | undefined {
    const findings = readFileEntry(this.entries.get(file), file);
    if (findings) {
      this.stats.hits++;
    } else {
      this.stats.misses++;
    }
    return findings;
  }

  /**
   * Paths that have an entry, including cleared ones.
   */
  cachedFiles(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Remove entries for files that no longer exist.
   * @param existingFiles Paths that currently exist
   * @returns Number of entries pruned
   */
  prune(existingFiles: Set<string>): number {
    let pruned = 0;
    for (const file of [...this.entries.keys()]) {
      if (!existingFiles.has(file)) {
        this.entries.delete(file);
        pruned++;
      }
    }
    return pruned;
  }

  getStats(): CacheStats {
    return {
      ...this.stats,
      totalCached: this.entries.size,
    };
  }

  /**
   * The document save() writes, as a detached copy.
   */
  toDocument(): CacheDocument {
    return {
      version: this.version,
      ...(this.configurationHash !== undefined ? { configuration_hash: this.configurationHash } : {}),
      ...(this.lastRunSeconds !== undefined ? { last_run_date: this.lastRunSeconds } : {}),
      files: structuredClone(Object.fromEntries(this.entries)),
    };
  }

  /**
   * Stamp the last run date and write the cache atomically.
   * The document is serialized before the write starts, so calls made
   * while the write is pending are not part of it.
   * @throws SystemError (S006) when the file cannot be written
   */
  async save(filePath: string): Promise<void> {
    this.lastRunDate = new Date();
    const content = JSON.stringify(this.toDocument(), null, 2);

    try {
      await writeFileAtomic(filePath, content);
    } catch (error) {
      throw new SystemError(
        ErrorCodes.IO_ERROR,
        `Failed to write cache file: ${filePath}`,
        { filePath, error: getErrorMessage(error) }
      );
    }

    log.debug(`Saved ${this.entries.size} file entries to ${filePath}`);
  }
}
