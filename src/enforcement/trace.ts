import type { HealthStatus } from '../health/states.js';
import type { InvariantViolation } from '../invariants/types.js';
import type { SuspicionRule } from '../suspicion/detector.js';
import type { ValidationFailureCode } from '../validation/validator.js';

export type EnforcementPath =
  | 'accepted'
  | 'accepted_flagged'
  | 'fallback_unhealthy'
  | 'fallback_exhausted'
  | 'fallback_internal_error';

export type AttemptOutcome = 'accepted' | 'agent_error' | 'validation_failed';

export interface AttemptRecord {
  attempt: number;
  temperature: number;
  outcome: AttemptOutcome;
  reason?: string;
  code?: ValidationFailureCode;
}

export interface EnforcementTrace {
  callId: string;
  path: EnforcementPath;
  attempts: AttemptRecord[];
  agentInvocations: number;
  fallbackUsed: boolean;
  fallbackReason?: string;
  suspicion?: {
    rule: SuspicionRule;
    reason: string;
  };
  health: {
    before: HealthStatus;
    after: HealthStatus;
  };
  temperature: {
    before: number;
    after: number;
  };
  invariantViolations: InvariantViolation[];
  durationMs: number;
}

export function createEnforcementTrace(
  callId: string,
  health: HealthStatus,
  temperature: number
): EnforcementTrace {
  return {
    callId,
    path: 'accepted',
    attempts: [],
    agentInvocations: 0,
    fallbackUsed: false,
    health: { before: health, after: health },
    temperature: { before: temperature, after: temperature },
    invariantViolations: [],
    durationMs: 0,
  };
}

export function recordAttempt(trace: EnforcementTrace, record: AttemptRecord): void {
  trace.attempts.push(record);
}

export function recordAgentInvocation(trace: EnforcementTrace): void {
  trace.agentInvocations++;
}

export function recordPath(trace: EnforcementTrace, path: EnforcementPath): void {
  trace.path = path;
}

export function recordFallback(trace: EnforcementTrace, path: EnforcementPath, reason: string): void {
  trace.path = path;
  trace.fallbackUsed = true;
  trace.fallbackReason = reason;
}

export function recordSuspicion(trace: EnforcementTrace, rule: SuspicionRule, reason: string): void {
  trace.path = 'accepted_flagged';
  trace.suspicion = { rule, reason };
}

export function recordOutcome(
  trace: EnforcementTrace,
  health: HealthStatus,
  temperature: number,
  durationMs: number
): void {
  trace.health.after = health;
  trace.temperature.after = temperature;
  trace.durationMs = durationMs;
}

export function recordInvariantViolations(trace: EnforcementTrace, violations: InvariantViolation[]): void {
  trace.invariantViolations = violations;
}
