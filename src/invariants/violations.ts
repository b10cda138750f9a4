import type { InvariantSeverity, InvariantViolation } from './types.js';

export function getViolationsBySeverity(
  violations: readonly InvariantViolation[],
  severity: InvariantSeverity
): InvariantViolation[] {
  return violations.filter(v => v.severity === severity);
}

export function summarizeViolations(violations: readonly InvariantViolation[]): {
  total: number;
  warn: number;
  error: number;
  fatal: number;
} {
  return {
    total: violations.length,
    warn: getViolationsBySeverity(violations, 'warn').length,
    error: getViolationsBySeverity(violations, 'error').length,
    fatal: getViolationsBySeverity(violations, 'fatal').length,
  };
}
