/**
 * @arch lintcache.test.unit
 */
import { describe, it, expect } from 'vitest';
import { formatFinding, findingsEqual } from '../../../../src/core/findings/format.js';
import { isSeverity, type Finding } from '../../../../src/core/findings/types.js';

const base: Finding = {
  ruleIdentifier: 'line_length',
  ruleName: 'Line Length',
  reason: 'Line should be 120 characters or less.',
  severity: 'warning',
  location: { file: 'src/app.ts', line: 4, column: 121 },
};

describe('formatFinding', () => {
  it('should include line and column', () => {
    expect(formatFinding(base)).toBe(
      'src/app.ts:4:121: warning: Line should be 120 characters or less. (line_length)'
    );
  });

  it('should omit an absent column', () => {
    expect(formatFinding({ ...base, location: { file: 'src/app.ts', line: 4 } })).toBe(
      'src/app.ts:4: warning: Line should be 120 characters or less. (line_length)'
    );
  });

  it('should omit the column when the line is absent', () => {
    expect(formatFinding({ ...base, severity: 'error', location: { file: 'src/app.ts', column: 3 } })).toBe(
      'src/app.ts: error: Line should be 120 characters or less. (line_length)'
    );
  });
});

describe('findingsEqual', () => {
  it('should compare all fields', () => {
    expect(findingsEqual(base, { ...base, location: { ...base.location } })).toBe(true);
    expect(findingsEqual(base, { ...base, reason: 'other' })).toBe(false);
  });

  it('should treat an absent column as different from a present one', () => {
    expect(findingsEqual(base, { ...base, location: { file: 'src/app.ts', line: 4 } })).toBe(false);
  });
});

describe('isSeverity', () => {
  it('should accept known severities only', () => {
    expect(isSeverity('warning')).toBe(true);
    expect(isSeverity('error')).toBe(true);
    expect(isSeverity('info')).toBe(false);
    expect(isSeverity(1)).toBe(false);
  });
});
