/**
 * @arch lintcache.core.domain
 *
 * Conversion between findings and their persisted records.
 * Reading is lenient: a record that cannot be rebuilt is dropped,
 * an unreadable line or column becomes absent.
 */
import { isSeverity, type Finding } from '../findings/types.js';
import type { FindingRecord } from './types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Interpret a persisted value as an integer, or undefined.
 */
export function asInteger(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

export function toFindingRecord(finding: Finding): FindingRecord {
  return {
    line: finding.location.line ?? null,
    character: finding.location.column ?? null,
    severity: finding.severity,
    type: finding.ruleName,
    rule_id: finding.ruleIdentifier,
    reason: finding.reason,
  };
}

/**
 * Rebuild a finding for `file` from a persisted record.
 * Returns undefined when severity, type, rule_id or reason is missing or invalid.
 */
export function fromFindingRecord(raw: unknown, file: string): Finding | undefined {
  if (!isRecord(raw)) return undefined;

  const { severity, type, rule_id: ruleId, reason } = raw;
  if (!isSeverity(severity) || typeof type !== 'string' || typeof ruleId !== 'string' || typeof reason !== 'string') {
    return undefined;
  }

  const line = asInteger(raw.line);
  const column = asInteger(raw.character);

  return {
    ruleIdentifier: ruleId,
    ruleName: type,
    reason,
    severity,
    location: {
      file,
      ...(line !== undefined ? { line } : {}),
      ...(column !== undefined ? { column } : {}),
    },
  };
}

/**
 * Read the findings of a raw file entry.
 * Returns undefined unless the entry is a mapping holding an array of mappings
 * under `violations`. Mappings that do not rebuild into a finding are skipped.
 */
export function readFileEntry(entry: unknown, file: string): Finding[] | undefined {
  if (!isRecord(entry) || !Array.isArray(entry.violations)) {
    return undefined;
  }
  if (entry.violations.some((raw) => !isRecord(raw))) {
    return undefined;
  }

  const findings: Finding[] = [];
  for (const raw of entry.violations) {
    const finding = fromFindingRecord(raw, file);
    if (finding) {
      findings.push(finding);
    }
  }
  return findings;
}
