/**
 * @arch lintcache.core.domain
 *
 * Version of this package, written into every cache it saves.
 */
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PackageJsonSchema = z.object({ version: z.string() });

let currentVersion: string | undefined;

/**
 * Read the version from package.json once and reuse it.
 */
export function getCurrentVersion(): string {
  if (currentVersion === undefined) {
    const raw: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
    currentVersion = PackageJsonSchema.parse(raw).version;
  }
  return currentVersion;
}
