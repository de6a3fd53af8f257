/**
 * @arch lintcache.cli.command
 * @intent:cli-output
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { openLinterCache } from '../../core/cache/session.js';
import { formatFinding } from '../../core/findings/format.js';
import type { Finding } from '../../core/findings/types.js';
import { logger as log } from '../../utils/logger.js';
import { resolveCacheContext, withCacheOptions, type CacheCommandOptions } from './cache-context.js';

interface ShowOptions extends CacheCommandOptions {
  json?: boolean;
}

/**
 * Create the show command.
 */
export function createShowCommand(): Command {
  return withCacheOptions(
    new Command('show')
      .description('Print the cached findings of one or more files')
      .argument('<files...>', 'File paths as recorded in the cache')
  )
    .option('--json', 'Output as JSON')
    .action(async (files: string[], options: ShowOptions) => {
      try {
        await runShow(files, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runShow(files: string[], options: ShowOptions): Promise<void> {
  const context = await resolveCacheContext(options);
  const result = await openLinterCache({
    path: context.cachePath,
    currentVersion: context.currentVersion,
    configurationFingerprint: context.configurationFingerprint,
  });

  if (result.status !== 'loaded') {
    const detail = result.status === 'invalidated' ? `: ${result.reason.message}` : '';
    log.warn(`No usable cache at ${context.cachePath}${detail}`);
    process.exit(1);
  }

  const { cache } = result;
  const byFile: Record<string, Finding[] | null> = Object.fromEntries(
    files.map((file) => [file, cache.findings(file) ?? null])
  );

  if (options.json) {
    console.log(JSON.stringify(byFile, null, 2));
    return;
  }

  for (const [file, findings] of Object.entries(byFile)) {
    if (findings === null) {
      console.log(chalk.gray(`${file}: no cached findings`));
    } else if (findings.length === 0) {
      console.log(chalk.green(`${file}: clean`));
    } else {
      for (const finding of findings) {
        const line = formatFinding(finding);
        console.log(finding.severity === 'error' ? chalk.red(line) : chalk.yellow(line));
      }
    }
  }
}
