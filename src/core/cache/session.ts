/**
 * @arch lintcache.core.domain
 *
 * Open the cache for a run: load it if it is usable, otherwise start fresh.
 */
import { fileExists } from '../../utils/file-system.js';
import { CacheError, SystemError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { LinterCache } from './linter-cache.js';

const log = logger.child('cache');

export interface OpenCacheOptions {
  /** Absolute path of the cache file */
  path: string;
  currentVersion: string;
  configurationFingerprint?: number;
  /** When false, no cache is used at all */
  enabled?: boolean;
}

export type OpenCacheResult =
  | { status: 'disabled'; cache: undefined }
  | { status: 'missing'; cache: LinterCache }
  | { status: 'loaded'; cache: LinterCache }
  | { status: 'invalidated'; cache: LinterCache; reason: CacheError | SystemError };

/**
 * Load the persisted cache, or fall back to an empty one.
 * A cache that fails validation, cannot be read, or is not valid JSON is
 * discarded; the returned result carries the reason.
 */
export async function openLinterCache(options: OpenCacheOptions): Promise<OpenCacheResult> {
  const { path: cachePath, currentVersion, configurationFingerprint } = options;

  if (options.enabled === false) {
    log.debug('Caching disabled');
    return { status: 'disabled', cache: undefined };
  }

  const fresh = (): LinterCache => new LinterCache(currentVersion, configurationFingerprint);

  if (!(await fileExists(cachePath))) {
    log.debug(`No cache at ${cachePath}, starting fresh`);
    return { status: 'missing', cache: fresh() };
  }

  try {
    const cache = await LinterCache.fromFile(cachePath, currentVersion, configurationFingerprint);
    log.debug(`Loaded cache from ${cachePath}`, { files: cache.cachedFiles().length });
    return { status: 'loaded', cache };
  } catch (error) {
    if (error instanceof CacheError || error instanceof SystemError) {
      log.debug(`Discarding cache at ${cachePath}: ${error.message}`, { code: error.code });
      return { status: 'invalidated', cache: fresh(), reason: error };
    }
    throw error;
  }
}
