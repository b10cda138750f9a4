import type { TemperatureRange } from '../contracts/types.js';
import type { AgentResponse } from '../types.js';

export type InvariantSeverity = 'warn' | 'error' | 'fatal';

export type InvariantID =
  | 'RESPONSE_HAS_REQUIRED_FIELDS'
  | 'ATTEMPTS_WITHIN_RETRY_BUDGET'
  | 'UNHEALTHY_GATE_SKIPS_AGENT'
  | 'FALLBACK_ALWAYS_EXPLAINED'
  | 'TEMPERATURE_WITHIN_RANGE'
  | 'FLAGGED_RESPONSE_HAS_STRIKE_REASON';

/** What one enforced call produced. Absent fields skip the invariants that need them. */
export interface InvariantContext {
  response?: AgentResponse;
  requiredFields?: readonly string[];

  agentInvocations?: number;
  maxRetries?: number;
  gatedUnhealthy?: boolean;

  fallbackUsed?: boolean;
  reasoning?: unknown;

  temperature?: number;
  range?: TemperatureRange;

  flagged?: boolean;
  strikeReason?: unknown;
}

export interface InvariantDefinition {
  id: InvariantID;
  description: string;
  severity: InvariantSeverity;
  evaluate: (context: InvariantContext) => boolean;
}

export interface InvariantViolation {
  invariantId: InvariantID;
  description: string;
  severity: InvariantSeverity;
  timestamp: string;
}

export interface InvariantCheckResult {
  passed: boolean;
  violations: InvariantViolation[];
}
