/**
 * @arch lintcache.util
 *
 * SHA-256 helpers for fingerprinting configuration.
 */
import { createHash } from 'node:crypto';

/**
 * Compute a SHA-256 checksum of the given content.
 * Returns the first 16 characters of the hex digest.
 */
export function computeChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}

/**
 * Compute a non-negative integer from the first 48 bits of the SHA-256 digest.
 * The result always fits in Number.MAX_SAFE_INTEGER, so it survives a JSON round trip.
 */
export function computeIntegerChecksum(content: string): number {
  return Number.parseInt(computeChecksum(content).slice(0, 12), 16);
}
