import { getBehaviorKey } from '../contracts/types.js';
import type {
  BehavioralFlags,
  ContractPolicy,
  ContractSpecification,
  ResponseContract,
} from '../contracts/types.js';
import { logger } from '../observability/logger.js';
import type { AgentResponse } from '../types.js';
import { findPII } from './patterns.js';

export type ValidationFailureCode =
  | 'missing_required_field'
  | 'pii_detected'
  | 'missing_compliance_tag'
  | 'unauthorized_tool'
  | 'decision_regression'
  | 'temperature_out_of_range'
  | 'response_time_exceeded'
  | 'invalid_confidence'
  | 'disallowed_decision'
  | 'unparseable_response';

export type ValidationResult =
  | { accepted: true; reason: '' }
  | { accepted: false; reason: string; code: ValidationFailureCode };

export interface ValidationTiming {
  startedAt?: number;
  completedAt?: number;
}

export const DECISION_CHANGED_REASON = 'high confidence decision changed';

const ACCEPTED: ValidationResult = { accepted: true, reason: '' };

function reject(code: ValidationFailureCode, reason: string): ValidationResult {
  return { accepted: false, reason, code };
}

function normalizeValue(value: unknown): unknown {
  return typeof value === 'string' ? value.trim().toLowerCase() : value;
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

/**
 * Structural, content and timing checks for one response. Checks run in a
 * fixed order and the first failure wins.
 */
export class ResponseValidator {
  private readonly policy: ContractPolicy;
  private readonly flags: BehavioralFlags;
  private readonly contract: ResponseContract;
  private readonly behaviorKey: string;
  private readonly clock: () => number;

  constructor(spec: ContractSpecification, clock: () => number = Date.now) {
    this.policy = spec.policy;
    this.flags = spec.behavioral_flags;
    this.contract = spec.response_contract;
    this.behaviorKey = getBehaviorKey(spec);
    this.clock = clock;
  }

  validate(response: AgentResponse, timing: ValidationTiming = {}): ValidationResult {
    for (const field of this.contract.required_fields) {
      if (!(field in response)) {
        return reject('missing_required_field', `missing required field: ${field}`);
      }
    }

    if (!this.policy.pii_allowed) {
      const found = findPII(JSON.stringify(response));
      if (found.length > 0) {
        logger.warn('validation_pii', 'PII detected in response', { kinds: found });
        return reject('pii_detected', 'pii detected in response');
      }
    }

    if (this.policy.compliance_tags.length > 0) {
      const tags = response.compliance_tags;
      if (!isStringList(tags)) {
        return reject('missing_compliance_tag', 'missing compliance tags');
      }
      const missing = this.policy.compliance_tags.find(tag => !tags.includes(tag));
      if (missing !== undefined) {
        return reject('missing_compliance_tag', `missing required compliance tag: ${missing}`);
      }
    }

    if ('tools' in response) {
      const tools = response.tools;
      if (!isStringList(tools)) {
        return reject('unauthorized_tool', 'malformed tools list');
      }
      const unauthorized = tools.find(tool => !this.policy.allowed_tools.includes(tool));
      if (unauthorized !== undefined) {
        return reject('unauthorized_tool', `unauthorized tool used: ${unauthorized}`);
      }
    }

    const previousKey = `previous_${this.behaviorKey}`;
    if (previousKey in response) {
      logger.warn('validation_legacy_field', `Deprecated field ${previousKey} in response; memory-based drift detection is preferred`, {
        field: previousKey,
      });
      if (normalizeValue(response[previousKey]) !== normalizeValue(response[this.behaviorKey])) {
        return reject('decision_regression', DECISION_CHANGED_REASON);
      }
    }

    if ('temperature_used' in response) {
      const used = response.temperature_used;
      const [min, max] = this.flags.temperature_control.range;
      if (typeof used !== 'number' || Number.isNaN(used) || used < min || used > max) {
        return reject(
          'temperature_out_of_range',
          `temperature out of range: ${String(used)} not in [${min}, ${max}]`
        );
      }
    }

    if (timing.startedAt !== undefined) {
      const completedAt = timing.completedAt ?? this.clock();
      const elapsedMs = completedAt - timing.startedAt;
      if (elapsedMs > this.contract.max_response_time_ms) {
        return reject(
          'response_time_exceeded',
          `response time exceeded: ${elapsedMs}ms > ${this.contract.max_response_time_ms}ms`
        );
      }
    }

    if ('confidence' in response && !this.contract.confidence_levels.some(level => level === response.confidence)) {
      return reject('invalid_confidence', `invalid confidence level: ${String(response.confidence)}`);
    }

    const allowed = this.contract.allowed_decisions;
    if (allowed.length > 0 && this.behaviorKey in response) {
      const value = response[this.behaviorKey];
      if (!allowed.some(option => option === value)) {
        return reject('disallowed_decision', `invalid ${this.behaviorKey}: ${String(value)}`);
      }
    }

    return ACCEPTED;
  }

  /**
   * Canonical fallback fields. Callers merge these over the contract's
   * configured fallback defaults.
   */
  getFallbackResponse(reason: string, code?: ValidationFailureCode): AgentResponse {
    const fallback: AgentResponse = {
      [this.behaviorKey]: 'unknown',
      confidence: 'low',
      reasoning: `Fallback response: ${reason}`,
    };
    if (code === 'decision_regression') {
      fallback.flagged_for_review = true;
    }
    return fallback;
  }
}
