/**
 * @arch lintcache.core.types
 *
 * Findings produced by the analyzer and stored in the cache.
 */

export const SEVERITIES = ['warning', 'error'] as const;

export type Severity = (typeof SEVERITIES)[number];

export interface FindingLocation {
  /** File the finding belongs to */
  readonly file: string;
  /** 1-based line, absent when the finding applies to the whole file */
  readonly line?: number;
  /** 1-based column, absent when only the line is known */
  readonly column?: number;
}

/**
 * A single diagnostic reported by a rule.
 */
export interface Finding {
  /** Stable rule identifier (e.g., "line_length") */
  readonly ruleIdentifier: string;
  /** Human-readable rule name */
  readonly ruleName: string;
  readonly reason: string;
  readonly severity: Severity;
  readonly location: FindingLocation;
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && (SEVERITIES as readonly string[]).includes(value);
}
