import { describeError, logger } from '../observability/logger.js';
import { getAllInvariants, getInvariantsByIds } from './registry.js';
import type { InvariantCheckResult, InvariantContext, InvariantID, InvariantViolation } from './types.js';
import { summarizeViolations } from './violations.js';

export function checkInvariants(
  context: InvariantContext,
  invariantIds?: readonly InvariantID[],
  clock: () => number = Date.now
): InvariantCheckResult {
  const invariants = invariantIds ? getInvariantsByIds(invariantIds) : getAllInvariants();
  const violations: InvariantViolation[] = [];

  for (const invariant of invariants) {
    try {
      if (invariant.evaluate(context)) {
        continue;
      }

      violations.push({
        invariantId: invariant.id,
        description: invariant.description,
        severity: invariant.severity,
        timestamp: new Date(clock()).toISOString(),
      });

      logger.warn('invariant_violation', `Invariant violated: ${invariant.id}`, {
        invariantId: invariant.id,
        severity: invariant.severity,
        description: invariant.description,
      });
    } catch (error) {
      logger.error('invariant_check_error', 'Error evaluating invariant', {
        invariantId: invariant.id,
        error: describeError(error),
      });
    }
  }

  return {
    passed: violations.length === 0,
    violations,
  };
}

/** Never throws; violations are logged and returned. */
export function safeCheckInvariants(
  context: InvariantContext,
  invariantIds?: readonly InvariantID[],
  clock?: () => number
): InvariantViolation[] {
  try {
    const result = checkInvariants(context, invariantIds, clock);
    if (!result.passed) {
      logger.error('invariant_summary', 'Enforcement invariants violated', {
        summary: summarizeViolations(result.violations),
        ids: result.violations.map(v => v.invariantId),
      });
    }
    return result.violations;
  } catch (error) {
    logger.error('invariant_safe_check_error', 'Safe invariant check failed', {
      error: describeError(error),
    });
    return [];
  }
}
