/**
 * @arch lintcache.infra.fs
 *
 * File system operations used by the cache and config loaders.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';

let tempCounter = 0;

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write content to a temporary sibling file, then rename it over the target.
 * Readers see either the old content or the new content, never a partial write.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);

  tempCounter += 1;
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${tempCounter}.tmp`);

  try {
    await fs.promises.writeFile(tempPath, content, 'utf-8');
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Remove a file if it exists.
 */
export async function removeFile(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}
