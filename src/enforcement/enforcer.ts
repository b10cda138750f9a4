import { Mutex } from '../concurrency/mutex.js';
import { buildContractSpecification, isContractSpecification } from '../contracts/definition.js';
import type { ContractSpecification } from '../contracts/types.js';
import { Escalator } from '../escalation/escalator.js';
import { LoggerEscalationSink } from '../escalation/sinks.js';
import type { EscalationEvent, EscalationReason, EscalationSink } from '../escalation/types.js';
import { HealthMonitor } from '../health/monitor.js';
import { acceptsCalls } from '../health/states.js';
import type { HealthStatus } from '../health/states.js';
import { safeCheckInvariants } from '../invariants/checker.js';
import { EnforcementMetrics } from '../metrics/metrics.js';
import type { EnforcerSnapshot } from '../metrics/metrics.js';
import { describeError, generateCallId, logger } from '../observability/logger.js';
import { SuspiciousBehaviorDetector } from '../suspicion/detector.js';
import { DEFAULT_TEMPERATURE_STEP, TemperatureController } from '../temperature/controller.js';
import { resolveCallContext } from '../types.js';
import type { AgentCall, AgentResponse, CallArguments } from '../types.js';
import { normalizeResponse } from '../validation/normalize.js';
import { ResponseValidator } from '../validation/validator.js';
import type { ValidationFailureCode } from '../validation/validator.js';
import {
  createEnforcementTrace,
  recordAgentInvocation,
  recordAttempt,
  recordFallback,
  recordInvariantViolations,
  recordOutcome,
  recordPath,
  recordSuspicion,
} from './trace.js';
import type { EnforcementTrace } from './trace.js';

export const UNHEALTHY_REASON = 'agent is unhealthy';

export interface ContractEnforcerOptions {
  sink?: EscalationSink;
  /** Register a health strike when a validated response is flagged as suspicious. */
  strikeOnSuspicion?: boolean;
  clock?: () => number;
  temperatureStep?: number;
}

export interface EnforcementResult {
  response: AgentResponse;
  trace: EnforcementTrace;
}

interface AttemptFailure {
  reason: string;
  code?: ValidationFailureCode;
}

/**
 * Wraps agent calls with one behavioral contract: health gating, bounded
 * retries, validation, drift detection, adaptive temperature and escalation.
 *
 * Health, temperature and metrics are owned by the instance and shared by
 * every call made through it. `enforce` never throws.
 */
export class ContractEnforcer {
  readonly spec: ContractSpecification;

  private readonly validator: ResponseValidator;
  private readonly detector: SuspiciousBehaviorDetector;
  private readonly health: HealthMonitor;
  private readonly temperature: TemperatureController;
  private readonly escalator: Escalator;
  private readonly metrics: EnforcementMetrics;
  private readonly lock = new Mutex();
  private readonly strikeOnSuspicion: boolean;
  private readonly clock: () => number;

  constructor(specOrInput: unknown, options: ContractEnforcerOptions = {}) {
    this.spec = isContractSpecification(specOrInput) ? specOrInput : buildContractSpecification(specOrInput);
    this.clock = options.clock ?? Date.now;
    this.strikeOnSuspicion = options.strikeOnSuspicion ?? true;

    this.validator = new ResponseValidator(this.spec, this.clock);
    this.detector = new SuspiciousBehaviorDetector(this.spec);
    this.health = new HealthMonitor(this.spec.health, this.clock);
    this.temperature = new TemperatureController(
      this.spec.behavioral_flags.temperature_control,
      options.temperatureStep ?? DEFAULT_TEMPERATURE_STEP
    );
    this.escalator = new Escalator(this.spec, options.sink ?? new LoggerEscalationSink(), this.clock);
    this.metrics = new EnforcementMetrics(this.clock);

    logger.info('enforcer_created', 'Contract enforcer created', {
      contractVersion: this.spec.version,
      role: this.spec.role,
      contractHash: this.spec.contract_hash,
    });
  }

  get status(): HealthStatus {
    return this.health.status;
  }

  getTemperature(): number {
    return this.temperature.getTemperature();
  }

  async enforce<TArgs extends CallArguments>(agent: AgentCall<TArgs>, args: TArgs): Promise<AgentResponse> {
    const { response } = await this.enforceWithTrace(agent, args);
    return response;
  }

  async enforceWithTrace<TArgs extends CallArguments>(
    agent: AgentCall<TArgs>,
    args: TArgs
  ): Promise<EnforcementResult> {
    const callId = generateCallId();
    const startedAt = this.clock();
    const trace = createEnforcementTrace(callId, this.health.status, this.temperature.getTemperature());
    let gated = false;
    let response: AgentResponse;

    try {
      if (!acceptsCalls(this.health.status)) {
        gated = true;
        logger.warn('enforcement_gated', 'Agent is unhealthy, using fallback response', {
          callId,
          strikes: this.health.strikes,
        });
        response = this.buildFallback(UNHEALTHY_REASON);
        recordFallback(trace, 'fallback_unhealthy', UNHEALTHY_REASON);
      } else {
        response = await this.runAttempts(agent, args, trace);
      }
    } catch (error) {
      const reason = `unexpected enforcement error: ${describeError(error)}`;
      logger.error('enforcement_internal_error', 'Enforcement failed unexpectedly', {
        callId,
        error: describeError(error),
      });
      response = this.buildFallback(reason);
      recordFallback(trace, 'fallback_internal_error', reason);
    }

    recordOutcome(trace, this.health.status, this.temperature.getTemperature(), this.clock() - startedAt);
    recordInvariantViolations(
      trace,
      safeCheckInvariants(
        {
          response,
          requiredFields: this.spec.response_contract.required_fields,
          agentInvocations: trace.agentInvocations,
          maxRetries: this.spec.response_contract.on_failure.max_retries,
          gatedUnhealthy: gated,
          fallbackUsed: trace.fallbackUsed,
          reasoning: response.reasoning,
          temperature: this.temperature.getTemperature(),
          range: this.temperature.getRange(),
          flagged: trace.path === 'accepted_flagged',
          strikeReason: response.strike_reason,
        },
        undefined,
        this.clock
      )
    );
    this.metrics.recordCall(trace);

    logger.info('enforcement_complete', 'Enforced call completed', {
      callId,
      path: trace.path,
      attempts: trace.attempts.length,
      durationMs: trace.durationMs,
    });

    return { response, trace };
  }

  /** Binds an agent to this contract. */
  wrap<TArgs extends CallArguments>(agent: AgentCall<TArgs>): (args: TArgs) => Promise<AgentResponse> {
    return (args: TArgs) => this.enforce(agent, args);
  }

  async resetHealth(): Promise<void> {
    await this.lock.runExclusive(() => this.health.reset());
  }

  snapshot(): EnforcerSnapshot {
    return {
      contract: {
        version: this.spec.version,
        role: this.spec.role,
        hash: this.spec.contract_hash,
      },
      health: this.health.snapshot(),
      temperature: this.temperature.snapshot(),
      metrics: this.metrics.snapshot(),
    };
  }

  private async runAttempts<TArgs extends CallArguments>(
    agent: AgentCall<TArgs>,
    args: TArgs,
    trace: EnforcementTrace
  ): Promise<AgentResponse> {
    const maxRetries = this.spec.response_contract.on_failure.max_retries;
    let lastFailure: AttemptFailure = { reason: 'no attempts made' };

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const temperature = this.temperature.getTemperature();
      const attemptStartedAt = this.clock();

      let raw: unknown;
      try {
        recordAgentInvocation(trace);
        raw = await agent(args, { temperature, attempt });
      } catch (error) {
        const reason = `agent call failed: ${describeError(error)}`;
        recordAttempt(trace, { attempt, temperature, outcome: 'agent_error', reason });
        logger.warn('agent_call_failed', 'Agent call failed', { callId: trace.callId, attempt, error: reason });
        await this.strike(reason);
        await this.adjustTemperature(false);
        lastFailure = { reason };
        continue;
      }
      const completedAt = this.clock();

      const normalized = normalizeResponse(raw);
      if (!normalized.ok) {
        lastFailure = { reason: normalized.reason, code: 'unparseable_response' };
        await this.failAttempt(trace, attempt, temperature, lastFailure);
        continue;
      }

      const validation = this.validator.validate(normalized.response, { startedAt: attemptStartedAt, completedAt });
      if (!validation.accepted) {
        lastFailure = { reason: validation.reason, code: validation.code };
        await this.failAttempt(trace, attempt, temperature, lastFailure);
        continue;
      }

      const response = normalized.response;
      recordAttempt(trace, { attempt, temperature, outcome: 'accepted' });
      recordPath(trace, 'accepted');

      const verdict = this.detector.inspect(response, resolveCallContext(args));
      if (verdict.suspicious) {
        response.flagged_for_review = true;
        response.strike_reason = verdict.reason;
        recordSuspicion(trace, verdict.rule, verdict.reason);
        if (this.strikeOnSuspicion) {
          await this.strike(verdict.reason);
        }
        this.escalate(verdict.rule === 'context_contradiction' ? 'context_mismatch' : 'unexpected_output', verdict.reason);
      }

      await this.adjustTemperature(true);
      return response;
    }

    logger.warn('enforcement_exhausted', 'All attempts failed, escalating to fallback', {
      callId: trace.callId,
      attempts: trace.attempts.length,
      reason: lastFailure.reason,
    });
    this.escalate('unexpected_output', lastFailure.reason);
    recordFallback(trace, 'fallback_exhausted', lastFailure.reason);
    return this.buildFallback(lastFailure.reason, lastFailure.code);
  }

  private async failAttempt(
    trace: EnforcementTrace,
    attempt: number,
    temperature: number,
    failure: AttemptFailure
  ): Promise<void> {
    recordAttempt(trace, { attempt, temperature, outcome: 'validation_failed', ...failure });
    logger.warn('validation_failed', 'Response failed validation', {
      callId: trace.callId,
      attempt,
      reason: failure.reason,
      code: failure.code,
    });
    await this.adjustTemperature(false);
    await this.strike(failure.reason);
  }

  private buildFallback(reason: string, code?: ValidationFailureCode): AgentResponse {
    return {
      ...structuredClone(this.spec.response_contract.on_failure.fallback),
      ...this.validator.getFallbackResponse(reason, code),
    };
  }

  private async strike(reason: string): Promise<void> {
    const transition = await this.lock.runExclusive(() => this.health.addStrike(reason));
    this.metrics.recordStrike();
    if (transition?.to === 'unhealthy') {
      this.escalate('unhealthy', reason);
    }
  }

  private async adjustTemperature(success: boolean): Promise<void> {
    await this.lock.runExclusive(() => this.temperature.adjust(success));
  }

  private escalate(reason: EscalationReason, detail: string): EscalationEvent {
    this.metrics.recordEscalation(reason);
    return this.escalator.escalate(reason, detail);
  }
}
