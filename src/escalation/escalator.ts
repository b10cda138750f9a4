import type { ContractSpecification } from '../contracts/types.js';
import { describeError, logger } from '../observability/logger.js';
import { LoggerEscalationSink } from './sinks.js';
import { resolveEscalationAction } from './types.js';
import type { EscalationEvent, EscalationReason, EscalationSink } from './types.js';

/**
 * Builds escalation events for one contract and hands them to a sink.
 * Delivery is fire-and-forget: the caller never waits on the sink and a
 * failing sink is only logged.
 */
export class Escalator {
  private readonly spec: ContractSpecification;
  private readonly sink: EscalationSink;
  private readonly clock: () => number;

  constructor(spec: ContractSpecification, sink: EscalationSink = new LoggerEscalationSink(), clock: () => number = Date.now) {
    this.spec = spec;
    this.sink = sink;
    this.clock = clock;
  }

  resolveAction(reason: EscalationReason): string {
    return resolveEscalationAction(this.spec.escalation, reason);
  }

  escalate(reason: EscalationReason, detail?: string): EscalationEvent {
    const event: EscalationEvent = {
      timestamp: new Date(this.clock()).toISOString(),
      event_type: 'escalation',
      contract_version: this.spec.version,
      role: this.spec.role,
      reason,
      action: this.resolveAction(reason),
    };
    if (detail !== undefined) {
      event.detail = detail;
    }

    logger.warn('escalation', `Escalating ${reason}`, {
      action: event.action,
      detail,
      fallbackRole: this.spec.escalation.fallback_role,
    });

    this.deliver(event);
    return event;
  }

  private deliver(event: EscalationEvent): void {
    void Promise.resolve()
      .then(() => this.sink.append(event))
      .catch((error: unknown) => {
        logger.error('escalation_sink_error', 'Failed to deliver escalation event', {
          reason: event.reason,
          error: describeError(error),
        });
      });
  }
}
