import { describe, expect, it } from 'vitest';
import { buildContractSpecification } from '../../src/contracts/definition.js';
import { SuspiciousBehaviorDetector } from '../../src/suspicion/detector.js';
import type { CallContext } from '../../src/types.js';
import { analystContract } from '../helpers.js';

const detector = new SuspiciousBehaviorDetector(buildContractSpecification(analystContract()));

function memoryOf(decision: string, confidence: string): CallContext['memory'] {
  return [{ analysis: { decision, confidence } }];
}

describe('SuspiciousBehaviorDetector', () => {
  it('flags a high-confidence flip against a high-confidence memory', () => {
    const verdict = detector.inspect(
      { decision: 'sell', confidence: 'high' },
      { memory: memoryOf('buy', 'high') }
    );

    expect(verdict).toEqual({
      suspicious: true,
      rule: 'confidence_consistency',
      reason: 'high confidence decision changed from buy to sell',
    });
  });

  it('flags a contradiction of the context suggestion', () => {
    const verdict = detector.inspect(
      { decision: 'sell', confidence: 'high' },
      { memory: memoryOf('buy', 'medium'), context_suggestion: 'BUY' }
    );

    expect(verdict).toEqual({
      suspicious: true,
      rule: 'context_contradiction',
      reason: 'decision sell contradicts context suggestion buy',
    });
  });

  it('flags a break from an established pattern', () => {
    const verdict = detector.inspect(
      { decision: 'sell', confidence: 'high' },
      { memory: memoryOf('buy', 'medium'), pattern_history: ['hold', 'buy', 'buy', 'buy'] }
    );

    expect(verdict).toEqual({
      suspicious: true,
      rule: 'pattern_break',
      reason: 'decision sell breaks established pattern of buy',
    });
  });

  it('ignores a mixed recent pattern', () => {
    const context = { memory: memoryOf('buy', 'medium'), pattern_history: ['buy', 'hold', 'buy'] };
    expect(detector.isSuspicious({ decision: 'sell', confidence: 'high' }, context)).toBe(false);
  });

  it('compares values case-insensitively', () => {
    expect(detector.isSuspicious({ decision: 'buy', confidence: 'HIGH' }, { memory: memoryOf('BUY', 'high') })).toBe(false);
  });

  it.each<[string, Record<string, unknown>, CallContext | undefined]>([
    ['there is no context', { decision: 'sell', confidence: 'high' }, undefined],
    ['memory is empty', { decision: 'sell', confidence: 'high' }, { memory: [] }],
    ['confidence is not high', { decision: 'sell', confidence: 'medium' }, { memory: memoryOf('buy', 'high') }],
    ['the current decision is missing', { confidence: 'high' }, { memory: memoryOf('buy', 'high') }],
    ['the prior decision is missing', { decision: 'sell', confidence: 'high' }, { memory: [{ analysis: {} }] }],
  ])('is not suspicious when %s', (_label, response, context) => {
    expect(detector.inspect(response, context)).toEqual({ suspicious: false });
  });

  it('tracks the configured behavior key', () => {
    const verdictDetector = new SuspiciousBehaviorDetector(
      buildContractSpecification(analystContract({ behaviorKey: 'verdict' }))
    );

    const verdict = verdictDetector.inspect(
      { verdict: 'reject', confidence: 'high' },
      { memory: [{ analysis: { verdict: 'approve', confidence: 'high' } }] }
    );

    expect(verdict).toMatchObject({ rule: 'confidence_consistency', reason: 'high confidence verdict changed from approve to reject' });
  });

  it('does not modify the response', () => {
    const response = { decision: 'sell', confidence: 'high' };
    detector.inspect(response, { memory: memoryOf('buy', 'high') });

    expect(response).toEqual({ decision: 'sell', confidence: 'high' });
  });
});
