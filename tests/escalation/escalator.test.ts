import { afterEach, describe, expect, it, vi } from 'vitest';
import { buildContractSpecification } from '../../src/contracts/definition.js';
import { Escalator } from '../../src/escalation/escalator.js';
import { InMemoryEscalationSink } from '../../src/escalation/sinks.js';
import { DEFAULT_ESCALATION_ACTION, resolveEscalationAction } from '../../src/escalation/types.js';
import type { EscalationSink } from '../../src/escalation/types.js';
import { logger } from '../../src/observability/logger.js';
import { analystContract, flushPromises } from '../helpers.js';

const spec = buildContractSpecification(analystContract());
const JAN_FIRST = Date.UTC(2024, 0, 1);

describe('resolveEscalationAction', () => {
  it('uses the configured action and falls back to the default', () => {
    expect(resolveEscalationAction(spec.escalation, 'unexpected_output')).toBe('flag_for_review');
    expect(resolveEscalationAction(spec.escalation, 'context_mismatch')).toBe('escalate_to_human');
    expect(resolveEscalationAction(spec.escalation, 'unhealthy')).toBe(DEFAULT_ESCALATION_ACTION);
    expect(DEFAULT_ESCALATION_ACTION).toBe('fallback');
  });
});

describe('Escalator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds the event and delivers it to the sink', async () => {
    const sink = new InMemoryEscalationSink();
    const escalator = new Escalator(spec, sink, () => JAN_FIRST);

    const event = escalator.escalate('unexpected_output', 'missing required field: confidence');
    await flushPromises();

    expect(event).toEqual({
      timestamp: '2024-01-01T00:00:00.000Z',
      event_type: 'escalation',
      contract_version: '1.1',
      role: 'analyst',
      reason: 'unexpected_output',
      action: 'flag_for_review',
      detail: 'missing required field: confidence',
    });
    expect(sink.getRecent()).toEqual([event]);
  });

  it('omits detail when none is given', () => {
    const escalator = new Escalator(spec, new InMemoryEscalationSink(), () => JAN_FIRST);
    expect('detail' in escalator.escalate('unhealthy')).toBe(false);
  });

  it('does not wait for the sink', () => {
    const sink = new InMemoryEscalationSink();
    const escalator = new Escalator(spec, sink, () => JAN_FIRST);

    escalator.escalate('unhealthy');

    expect(sink.getRecent()).toEqual([]);
  });

  it('logs sink failures instead of throwing', async () => {
    const errorSpy = vi.spyOn(logger, 'error');
    const throwing: EscalationSink = {
      append: () => {
        throw new Error('sink down');
      },
    };
    const rejecting: EscalationSink = {
      append: async () => {
        throw new Error('sink rejected');
      },
    };

    expect(() => new Escalator(spec, throwing).escalate('unhealthy')).not.toThrow();
    expect(() => new Escalator(spec, rejecting).escalate('unhealthy')).not.toThrow();
    await flushPromises();

    const errors = errorSpy.mock.calls.map(call => call[2]?.error);
    expect(errors).toEqual(['sink down', 'sink rejected']);
  });
});
