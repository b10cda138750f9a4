import type { EnforcementPath, EnforcementTrace } from '../enforcement/trace.js';
import type { EscalationReason } from '../escalation/types.js';
import type { HealthSnapshot } from '../health/monitor.js';
import type { TemperatureSnapshot } from '../temperature/controller.js';
import type { ValidationFailureCode } from '../validation/validator.js';

export interface MetricsSnapshot {
  processStartTime: string;
  uptimeSeconds: number;
  calls: {
    total: number;
    byPath: Record<EnforcementPath, number>;
    fallbackRate: number;
  };
  agent: {
    invocationCount: number;
    errorCount: number;
    averageAttemptsPerCall: number;
  };
  validation: {
    failureCount: number;
    byCode: Partial<Record<ValidationFailureCode, number>>;
  };
  strikes: number;
  escalations: {
    total: number;
    byReason: Record<EscalationReason, number>;
  };
  invariantViolations: number;
}

export interface EnforcerSnapshot {
  contract: {
    version: string;
    role: string;
    hash: string;
  };
  health: HealthSnapshot;
  temperature: TemperatureSnapshot;
  metrics: MetricsSnapshot;
}

function emptyPathCounts(): Record<EnforcementPath, number> {
  return {
    accepted: 0,
    accepted_flagged: 0,
    fallback_unhealthy: 0,
    fallback_exhausted: 0,
    fallback_internal_error: 0,
  };
}

/** Counters for one enforcer. Not process-global. */
export class EnforcementMetrics {
  private readonly startTime: Date;
  private readonly clock: () => number;

  private counters = {
    callsTotal: 0,
    agentInvocations: 0,
    agentErrors: 0,
    validationFailures: 0,
    strikes: 0,
    escalations: 0,
    invariantViolations: 0,
  };

  private byPath = emptyPathCounts();
  private byCode: Partial<Record<ValidationFailureCode, number>> = {};
  private byReason: Record<EscalationReason, number> = {
    unexpected_output: 0,
    context_mismatch: 0,
    unhealthy: 0,
  };

  constructor(clock: () => number = Date.now) {
    this.clock = clock;
    this.startTime = new Date(clock());
  }

  recordCall(trace: EnforcementTrace): void {
    this.counters.callsTotal++;
    this.byPath[trace.path]++;
    this.counters.agentInvocations += trace.agentInvocations;
    this.counters.invariantViolations += trace.invariantViolations.length;

    for (const attempt of trace.attempts) {
      if (attempt.outcome === 'agent_error') {
        this.counters.agentErrors++;
      } else if (attempt.outcome === 'validation_failed') {
        this.counters.validationFailures++;
        if (attempt.code) {
          this.byCode[attempt.code] = (this.byCode[attempt.code] ?? 0) + 1;
        }
      }
    }
  }

  recordStrike(): void {
    this.counters.strikes++;
  }

  recordEscalation(reason: EscalationReason): void {
    this.counters.escalations++;
    this.byReason[reason]++;
  }

  snapshot(): MetricsSnapshot {
    const uptimeMs = this.clock() - this.startTime.getTime();
    const total = this.counters.callsTotal;
    const fallbacks =
      this.byPath.fallback_unhealthy + this.byPath.fallback_exhausted + this.byPath.fallback_internal_error;

    const fallbackRate = total > 0 ? fallbacks / total : 0;
    const averageAttempts = total > 0 ? this.counters.agentInvocations / total : 0;

    return {
      processStartTime: this.startTime.toISOString(),
      uptimeSeconds: Math.floor(uptimeMs / 1000),
      calls: {
        total,
        byPath: { ...this.byPath },
        fallbackRate: parseFloat(fallbackRate.toFixed(4)),
      },
      agent: {
        invocationCount: this.counters.agentInvocations,
        errorCount: this.counters.agentErrors,
        averageAttemptsPerCall: parseFloat(averageAttempts.toFixed(4)),
      },
      validation: {
        failureCount: this.counters.validationFailures,
        byCode: { ...this.byCode },
      },
      strikes: this.counters.strikes,
      escalations: {
        total: this.counters.escalations,
        byReason: { ...this.byReason },
      },
      invariantViolations: this.counters.invariantViolations,
    };
  }
}
