/**
 * @arch lintcache.cli.command
 * @intent:cli-output
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { openLinterCache } from '../../core/cache/session.js';
import { removeFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { resolveCacheContext, withCacheOptions, type CacheCommandOptions } from './cache-context.js';

interface ClearOptions extends CacheCommandOptions {
  all?: boolean;
}

/**
 * Create the clear command.
 */
export function createClearCommand(): Command {
  return withCacheOptions(
    new Command('clear')
      .description('Forget the cached findings of files so the next run analyzes them again')
      .argument('[files...]', 'File paths as recorded in the cache')
  )
    .option('--all', 'Delete the whole cache file')
    .action(async (files: string[], options: ClearOptions) => {
      try {
        await runClear(files, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runClear(files: string[], options: ClearOptions): Promise<void> {
  const context = await resolveCacheContext(options);

  if (options.all) {
    await removeFile(context.cachePath);
    log.success(`Removed ${context.cachePath}`);
    return;
  }

  if (files.length === 0) {
    log.error('Specify files to clear, or --all');
    process.exit(1);
  }

  const result = await openLinterCache({
    path: context.cachePath,
    currentVersion: context.currentVersion,
    configurationFingerprint: context.configurationFingerprint,
  });

  if (result.status !== 'loaded') {
    console.log(chalk.yellow('No usable cache, nothing to clear'));
    return;
  }

  const { cache } = result;
  for (const file of files) {
    cache.clearFindings(file);
  }
  await cache.save(context.cachePath);

  log.success(`Cleared ${files.length} file(s)`);
}
