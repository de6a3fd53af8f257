/**
 * @arch lintcache.util
 *
 * Finding model exports.
 */
export type { Finding, FindingLocation, Severity } from './types.js';
export { SEVERITIES, isSeverity } from './types.js';
export { formatFinding, findingsEqual } from './format.js';
