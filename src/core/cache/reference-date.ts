/**
 * @arch lintcache.util
 *
 * `last_run_date` is stored as fractional seconds since 2001-01-01T00:00:00Z.
 */
import { REFERENCE_EPOCH_MS } from './types.js';

export function toReferenceSeconds(date: Date): number {
  return (date.getTime() - REFERENCE_EPOCH_MS) / 1000;
}

/**
 * Rounds to the millisecond so that a date survives toReferenceSeconds unchanged.
 */
export function fromReferenceSeconds(seconds: number): Date {
  return new Date(Math.round(seconds * 1000 + REFERENCE_EPOCH_MS));
}
