import { describe, expect, it } from 'vitest';
import { buildContractSpecification } from '../../src/contracts/definition.js';
import { ResponseValidator } from '../../src/validation/validator.js';
import { analystContract } from '../helpers.js';
import type { ContractOverrides } from '../helpers.js';

function validatorFor(overrides: ContractOverrides = {}, clock: () => number = () => 0): ResponseValidator {
  return new ResponseValidator(buildContractSpecification(analystContract(overrides)), clock);
}

const VALID = { decision: 'buy', confidence: 'high', summary: 'Revenue grew for four quarters' };

describe('ResponseValidator.validate', () => {
  it('accepts a conforming response', () => {
    expect(validatorFor().validate(VALID)).toEqual({ accepted: true, reason: '' });
  });

  it('reports the first missing required field', () => {
    const { confidence: _confidence, ...response } = VALID;

    expect(validatorFor().validate(response)).toEqual({
      accepted: false,
      reason: 'missing required field: confidence',
      code: 'missing_required_field',
    });
  });

  it('rejects PII when it is not allowed', () => {
    const response = { ...VALID, summary: 'contact us at test@example.com' };

    expect(validatorFor().validate(response)).toEqual({
      accepted: false,
      reason: 'pii detected in response',
      code: 'pii_detected',
    });
    expect(validatorFor({ piiAllowed: true }).validate(response).accepted).toBe(true);
  });

  it('detects SSN-like groups', () => {
    const response = { ...VALID, summary: 'holder 123-45-6789' };
    expect(validatorFor().validate(response)).toMatchObject({ code: 'pii_detected' });
  });

  it('requires every policy compliance tag', () => {
    const validator = validatorFor({ complianceTags: ['EU-AI-ACT', 'SOX'] });

    expect(validator.validate(VALID)).toMatchObject({ reason: 'missing compliance tags' });
    expect(validator.validate({ ...VALID, compliance_tags: ['EU-AI-ACT'] })).toMatchObject({
      reason: 'missing required compliance tag: SOX',
      code: 'missing_compliance_tag',
    });
    expect(validator.validate({ ...VALID, compliance_tags: ['SOX', 'EU-AI-ACT'] }).accepted).toBe(true);
  });

  it('only allows listed tools', () => {
    const validator = validatorFor();

    expect(validator.validate({ ...VALID, tools: ['search'] }).accepted).toBe(true);
    expect(validator.validate({ ...VALID, tools: ['search', 'trade'] })).toEqual({
      accepted: false,
      reason: 'unauthorized tool used: trade',
      code: 'unauthorized_tool',
    });
    expect(validator.validate({ ...VALID, tools: 'search' })).toMatchObject({ reason: 'malformed tools list' });
  });

  it('flags an inline decision regression', () => {
    const validator = validatorFor();

    expect(validator.validate({ ...VALID, previous_decision: 'Buy' }).accepted).toBe(true);
    expect(validator.validate({ ...VALID, previous_decision: 'sell' })).toEqual({
      accepted: false,
      reason: 'high confidence decision changed',
      code: 'decision_regression',
    });
  });

  it('checks temperature_used against the range', () => {
    const validator = validatorFor();

    expect(validator.validate({ ...VALID, temperature_used: 0.6 }).accepted).toBe(true);
    expect(validator.validate({ ...VALID, temperature_used: 0.9 })).toEqual({
      accepted: false,
      reason: 'temperature out of range: 0.9 not in [0.2, 0.6]',
      code: 'temperature_out_of_range',
    });
    expect(validator.validate({ ...VALID, temperature_used: 'warm' })).toMatchObject({
      code: 'temperature_out_of_range',
    });
  });

  it('enforces the response time budget', () => {
    const validator = validatorFor();

    expect(validator.validate(VALID, { startedAt: 1000, completedAt: 6000 }).accepted).toBe(true);
    expect(validator.validate(VALID, { startedAt: 1000, completedAt: 6001 })).toEqual({
      accepted: false,
      reason: 'response time exceeded: 5001ms > 5000ms',
      code: 'response_time_exceeded',
    });
  });

  it('reads its clock when the completion time is omitted', () => {
    const validator = validatorFor({}, () => 9000);
    expect(validator.validate(VALID, { startedAt: 1000 })).toMatchObject({ code: 'response_time_exceeded' });
  });

  it('applies checks in a fixed order', () => {
    const response = { confidence: 'high', summary: 'mail test@example.com', tools: ['trade'] };
    expect(validatorFor().validate(response)).toMatchObject({ code: 'missing_required_field' });
  });

  it('is idempotent', () => {
    const validator = validatorFor();
    const response = { ...VALID, tools: ['trade'] };

    expect(validator.validate(response)).toEqual(validator.validate(response));
    expect(response).toEqual({ ...VALID, tools: ['trade'] });
  });
});

describe('ResponseValidator value lists', () => {
  it('rejects a confidence outside the default levels', () => {
    expect(validatorFor().validate({ ...VALID, confidence: 'HIGHEST' })).toEqual({
      accepted: false,
      reason: 'invalid confidence level: HIGHEST',
      code: 'invalid_confidence',
    });
  });

  it('uses configured confidence levels', () => {
    const validator = validatorFor({ confidenceLevels: ['sure', 'unsure'] });

    expect(validator.validate({ ...VALID, confidence: 'unsure' }).accepted).toBe(true);
    expect(validator.validate(VALID)).toMatchObject({ code: 'invalid_confidence' });
  });

  it('accepts any behavior value when no list is configured', () => {
    expect(validatorFor().validate({ ...VALID, decision: 'short' }).accepted).toBe(true);
  });

  it('rejects a behavior value outside the allowed list', () => {
    const validator = validatorFor({ allowedDecisions: ['buy', 'hold', 'sell'] });

    expect(validator.validate(VALID).accepted).toBe(true);
    expect(validator.validate({ ...VALID, decision: 'short' })).toEqual({
      accepted: false,
      reason: 'invalid decision: short',
      code: 'disallowed_decision',
    });
  });

  it('names the configured behavior key', () => {
    const validator = validatorFor({ behaviorKey: 'verdict', allowedDecisions: ['approve'] });

    expect(validator.validate({ verdict: 'reject', confidence: 'high', summary: 'Looks off' })).toMatchObject({
      reason: 'invalid verdict: reject',
    });
  });

  it('runs after the timing checks', () => {
    const response = { ...VALID, confidence: 'HIGHEST', temperature_used: 0.9 };

    expect(validatorFor().validate(response)).toMatchObject({ code: 'temperature_out_of_range' });
  });
});

describe('ResponseValidator.getFallbackResponse', () => {
  it('builds the canonical fallback fields', () => {
    expect(validatorFor().getFallbackResponse('pii detected in response')).toEqual({
      decision: 'unknown',
      confidence: 'low',
      reasoning: 'Fallback response: pii detected in response',
    });
  });

  it('uses the configured behavior key and flags regressions', () => {
    expect(validatorFor({ behaviorKey: 'verdict' }).getFallbackResponse('x', 'decision_regression')).toEqual({
      verdict: 'unknown',
      confidence: 'low',
      reasoning: 'Fallback response: x',
      flagged_for_review: true,
    });
  });
});
