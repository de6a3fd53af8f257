/**
 * @arch lintcache.core.domain
 *
 * Configuration fingerprint stored as `configuration_hash` in the cache.
 */
import { computeIntegerChecksum } from '../../utils/checksum.js';
import type { Config } from './schema.js';

/**
 * JSON with object keys sorted at every level, so that equal values
 * serialize identically regardless of key order.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (typeof val !== 'object' || val === null || Array.isArray(val)) {
      return val;
    }
    return Object.fromEntries(
      Object.keys(val).sort().map((key) => [key, Reflect.get(val, key)])
    );
  });
}

/**
 * Fingerprint of the rule configuration, as a non-negative safe integer.
 */
export function computeConfigurationFingerprint(config: Config): number {
  return computeIntegerChecksum(canonicalJson(config.rules));
}
