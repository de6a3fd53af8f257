/**
 * @arch lintcache.cli.helpers
 *
 * Shared setup for commands that operate on a project's cache file.
 */
import type { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig, resolveCachePath } from '../../core/config/loader.js';
import { computeConfigurationFingerprint } from '../../core/config/fingerprint.js';
import type { Config } from '../../core/config/schema.js';
import { getCurrentVersion } from '../../core/version.js';
import { logger, isLogLevel } from '../../utils/logger.js';

export interface CacheCommandOptions {
  config?: string;
  cachePath?: string;
  verbose?: boolean;
}

export interface CacheContext {
  projectRoot: string;
  config: Config;
  /** Absolute cache file path */
  cachePath: string;
  currentVersion: string;
  configurationFingerprint: number;
}

/**
 * Register the options every cache command accepts.
 */
export function withCacheOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to config file', '.lintcache.yaml')
    .option('--cache-path <path>', 'Cache file (overrides cache.path from config)')
    .option('-v, --verbose', 'Show debug output');
}

export async function resolveCacheContext(options: CacheCommandOptions): Promise<CacheContext> {
  const envLevel = process.env.LINTCACHE_LOG_LEVEL;
  if (isLogLevel(envLevel)) {
    logger.setLevel(envLevel);
  }
  if (options.verbose) {
    logger.setLevel('debug');
  }

  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  const cachePath = options.cachePath
    ? path.resolve(projectRoot, options.cachePath)
    : resolveCachePath(projectRoot, config);

  return {
    projectRoot,
    config,
    cachePath,
    currentVersion: getCurrentVersion(),
    configurationFingerprint: computeConfigurationFingerprint(config),
  };
}
