/**
 * @arch lintcache.cli.command
 * @intent:cli-output
 */
import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'node:path';
import { openLinterCache, type OpenCacheResult } from '../../core/cache/session.js';
import { logger as log } from '../../utils/logger.js';
import { resolveCacheContext, withCacheOptions, type CacheCommandOptions, type CacheContext } from './cache-context.js';

interface InfoOptions extends CacheCommandOptions {
  json?: boolean;
}

export interface CacheInfo {
  path: string;
  status: OpenCacheResult['status'];
  reason?: { code: string; message: string };
  version: string;
  configurationFingerprint: number;
  lastRunDate: string | null;
  files: number;
}

/**
 * Create the info command.
 */
export function createInfoCommand(): Command {
  return withCacheOptions(
    new Command('info').description('Show whether the cache is usable for the current version and configuration')
  )
    .option('--json', 'Output as JSON')
    .action(async (options: InfoOptions) => {
      try {
        await runInfo(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runInfo(options: InfoOptions): Promise<void> {
  const context = await resolveCacheContext(options);
  const result = await openLinterCache({
    path: context.cachePath,
    currentVersion: context.currentVersion,
    configurationFingerprint: context.configurationFingerprint,
    enabled: context.config.cache.enabled,
  });

  const info = buildCacheInfo(context, result);

  if (options.json) {
    console.log(JSON.stringify(info, null, 2));
    return;
  }

  printCacheInfo(info, context.projectRoot);
}

export function buildCacheInfo(context: CacheContext, result: OpenCacheResult): CacheInfo {
  const loaded = result.status === 'loaded' ? result.cache : undefined;
  return {
    path: context.cachePath,
    status: result.status,
    ...(result.status === 'invalidated'
      ? { reason: { code: result.reason.code, message: result.reason.message } }
      : {}),
    version: context.currentVersion,
    configurationFingerprint: context.configurationFingerprint,
    lastRunDate: loaded?.lastRunDate?.toISOString() ?? null,
    files: loaded?.cachedFiles().length ?? 0,
  };
}

const STATUS_LABELS: Record<CacheInfo['status'], string> = {
  loaded: chalk.green('usable'),
  missing: chalk.yellow('not found'),
  invalidated: chalk.red('invalid'),
  disabled: chalk.gray('disabled'),
};

function printCacheInfo(info: CacheInfo, projectRoot: string): void {
  console.log(`${chalk.bold('Cache:')}         ${path.relative(projectRoot, info.path) || info.path}`);
  console.log(`${chalk.bold('Status:')}        ${STATUS_LABELS[info.status]}`);
  if (info.reason) {
    console.log(`${chalk.bold('Reason:')}        ${info.reason.message} (${info.reason.code})`);
  }
  console.log(`${chalk.bold('Version:')}       ${info.version}`);
  console.log(`${chalk.bold('Fingerprint:')}   ${info.configurationFingerprint}`);
  if (info.status === 'loaded') {
    console.log(`${chalk.bold('Last run:')}      ${info.lastRunDate ?? 'never'}`);
    console.log(`${chalk.bold('Cached files:')}  ${info.files}`);
  }
}
