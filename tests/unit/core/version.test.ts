/**
 * @arch lintcache.test.unit
 */
import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { getCurrentVersion } from '../../../src/core/version.js';

describe('getCurrentVersion', () => {
  it('should return the version from package.json', () => {
    const pkg: unknown = JSON.parse(readFileSync(join(process.cwd(), 'package.json'), 'utf-8'));
    expect(pkg).toMatchObject({ version: getCurrentVersion() });
  });

  it('should return the same value on repeated calls', () => {
    expect(getCurrentVersion()).toBe(getCurrentVersion());
  });
});
