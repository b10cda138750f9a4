import { getBehaviorKey } from '../contracts/types.js';
import type { ContractSpecification } from '../contracts/types.js';
import { logger } from '../observability/logger.js';
import { isRecord } from '../types.js';
import type { AgentResponse, CallContext } from '../types.js';

export type SuspicionRule = 'confidence_consistency' | 'context_contradiction' | 'pattern_break';

export type SuspicionVerdict =
  | { suspicious: false }
  | { suspicious: true; rule: SuspicionRule; reason: string };

const PATTERN_WINDOW = 3;
const NOT_SUSPICIOUS: SuspicionVerdict = { suspicious: false };

function comparable(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    return normalized.length > 0 ? normalized : undefined;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value).toLowerCase();
  }
  return undefined;
}

/**
 * Compares a high-confidence response against the most recent memory entry
 * and the caller-supplied context to flag behavioral drift.
 */
export class SuspiciousBehaviorDetector {
  private readonly behaviorKey: string;

  constructor(spec: ContractSpecification) {
    this.behaviorKey = getBehaviorKey(spec);
  }

  isSuspicious(response: AgentResponse, context?: CallContext): boolean {
    return this.inspect(response, context).suspicious;
  }

  inspect(response: AgentResponse, context?: CallContext): SuspicionVerdict {
    const memory = context?.memory;
    if (!Array.isArray(memory) || memory.length === 0) {
      return NOT_SUSPICIOUS;
    }

    if (comparable(response.confidence) !== 'high') {
      return NOT_SUSPICIOUS;
    }

    const current = comparable(response[this.behaviorKey]);
    if (current === undefined) {
      return NOT_SUSPICIOUS;
    }

    const latest: unknown = memory[0];
    const analysis = isRecord(latest) && isRecord(latest.analysis) ? latest.analysis : {};
    const prior = comparable(analysis[this.behaviorKey]);
    if (prior === undefined) {
      return NOT_SUSPICIOUS;
    }
    const priorConfidence = comparable(analysis.confidence);
    const key = this.behaviorKey;

    if (priorConfidence === 'high' && prior !== current) {
      return this.flag('confidence_consistency', `high confidence ${key} changed from ${prior} to ${current}`);
    }

    const suggestion = comparable(context?.context_suggestion);
    if (suggestion !== undefined && suggestion === prior && current !== suggestion) {
      return this.flag('context_contradiction', `${key} ${current} contradicts context suggestion ${suggestion}`);
    }

    const history = context?.pattern_history;
    if (Array.isArray(history) && history.length > 0) {
      const recent = history.slice(-PATTERN_WINDOW).map(comparable);
      if (recent.every(entry => entry === prior) && current !== prior) {
        return this.flag('pattern_break', `${key} ${current} breaks established pattern of ${prior}`);
      }
    }

    return NOT_SUSPICIOUS;
  }

  private flag(rule: SuspicionRule, reason: string): SuspicionVerdict {
    logger.warn('suspicious_behavior', 'Suspicious behavior detected', { rule, reason });
    return { suspicious: true, rule, reason };
  }
}
