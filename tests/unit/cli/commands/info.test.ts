/**
 * @arch lintcache.test.unit
 * @intent:cli-output
 */
/**
 * Tests for the info command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import chalk from 'chalk';
import { createInfoCommand } from '../../../../src/cli/commands/info.js';
import { LinterCache } from '../../../../src/core/cache/linter-cache.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import { computeConfigurationFingerprint } from '../../../../src/core/config/fingerprint.js';
import { getCurrentVersion } from '../../../../src/core/version.js';

const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
vi.spyOn(process, 'exit').mockImplementation((code) => {
  throw new Error(`process.exit(${code})`);
});

function lastJsonOutput(): unknown {
  const call = consoleSpy.mock.calls.at(-1);
  return JSON.parse(String(call?.[0]));
}

describe('info command', () => {
  let testDir: string;
  let cachePath: string;
  const fingerprint = computeConfigurationFingerprint(getDefaultConfig());

  beforeEach(async () => {
    vi.clearAllMocks();
    chalk.level = 0;
    testDir = join(tmpdir(), `lintcache-info-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    cachePath = join(testDir, '.lintcache', 'cache.json');
    vi.spyOn(process, 'cwd').mockReturnValue(testDir);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should create a command with correct name and options', () => {
    const command = createInfoCommand();
    expect(command.name()).toBe('info');
    expect(command.options.map((o) => o.long)).toEqual(['--config', '--cache-path', '--verbose', '--json']);
  });

  it('should report a missing cache', async () => {
    await createInfoCommand().parseAsync(['node', 'test', '--json']);

    expect(lastJsonOutput()).toEqual({
      path: cachePath,
      status: 'missing',
      version: getCurrentVersion(),
      configurationFingerprint: fingerprint,
      lastRunDate: null,
      files: 0,
    });
  });

  it('should report a usable cache', async () => {
    const cache = new LinterCache(getCurrentVersion(), fingerprint);
    cache.cacheFindings([], 'a.ts');
    cache.cacheFindings([], 'b.ts');
    await cache.save(cachePath);

    await createInfoCommand().parseAsync(['node', 'test', '--json']);

    expect(lastJsonOutput()).toMatchObject({
      status: 'loaded',
      files: 2,
      lastRunDate: cache.lastRunDate?.toISOString(),
    });
  });

  it('should report why a cache is invalid', async () => {
    await new LinterCache('0.0.0-old', fingerprint).save(cachePath);

    await createInfoCommand().parseAsync(['node', 'test', '--json']);

    expect(lastJsonOutput()).toMatchObject({
      status: 'invalidated',
      reason: { code: 'C002' },
      files: 0,
    });
  });

  it('should report a cache at a custom path', async () => {
    const customPath = join(testDir, 'elsewhere.json');
    await new LinterCache(getCurrentVersion(), fingerprint).save(customPath);

    await createInfoCommand().parseAsync(['node', 'test', '--json', '--cache-path', 'elsewhere.json']);

    expect(lastJsonOutput()).toMatchObject({ path: customPath, status: 'loaded' });
  });

  it('should report a disabled cache', async () => {
    await writeFile(join(testDir, '.lintcache.yaml'), 'cache:\n  enabled: false\n');

    await createInfoCommand().parseAsync(['node', 'test', '--json']);

    expect(lastJsonOutput()).toMatchObject({ status: 'disabled' });
  });

  it('should print a human-readable summary', async () => {
    await new LinterCache(getCurrentVersion(), fingerprint).save(cachePath);

    await createInfoCommand().parseAsync(['node', 'test']);

    const lines = consoleSpy.mock.calls.map((call) => String(call[0]));
    expect(lines[0]).toBe('Cache:         .lintcache/cache.json');
    expect(lines[1]).toContain('usable');
    expect(lines).toContain(`Fingerprint:   ${fingerprint}`);
    expect(lines).toContain('Cached files:  0');
  });

  it('should exit with code 1 when the config is invalid', async () => {
    await writeFile(join(testDir, '.lintcache.yaml'), 'cache:\n  path: ""\n');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(createInfoCommand().parseAsync(['node', 'test'])).rejects.toThrow('process.exit(1)');

    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Failed to load config'));
  });
});
