/**
 * @arch lintcache.core.domain
 */
import type { Finding } from './types.js';

/**
 * Format a finding as a single line: file:line:column: severity: reason (rule)
 * Absent line or column segments are omitted.
 */
export function formatFinding(finding: Finding): string {
  const { file, line, column } = finding.location;
  let position = file;
  if (line !== undefined) {
    position += `:${line}`;
    if (column !== undefined) {
      position += `:${column}`;
    }
  }
  return `${position}: ${finding.severity}: ${finding.reason} (${finding.ruleIdentifier})`;
}

/**
 * Structural equality of two findings.
 */
export function findingsEqual(a: Finding, b: Finding): boolean {
  return (
    a.ruleIdentifier === b.ruleIdentifier &&
    a.ruleName === b.ruleName &&
    a.reason === b.reason &&
    a.severity === b.severity &&
    a.location.file === b.location.file &&
    a.location.line === b.location.line &&
    a.location.column === b.location.column
  );
}
