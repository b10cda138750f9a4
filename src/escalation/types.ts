import { isRecord } from '../types.js';
import type { EscalationKey, EscalationPolicy, EscalationReason } from '../contracts/types.js';

export type { EscalationReason } from '../contracts/types.js';

export const ESCALATION_REASONS: readonly EscalationReason[] = [
  'unexpected_output',
  'context_mismatch',
  'unhealthy',
];

export const DEFAULT_ESCALATION_ACTION = 'fallback';

const ESCALATION_KEYS: Record<EscalationReason, EscalationKey> = {
  unexpected_output: 'on_unexpected_output',
  context_mismatch: 'on_context_mismatch',
  unhealthy: 'on_unhealthy',
};

export function resolveEscalationAction(policy: EscalationPolicy, reason: EscalationReason): string {
  return policy[ESCALATION_KEYS[reason]] ?? DEFAULT_ESCALATION_ACTION;
}

export interface EscalationEvent {
  timestamp: string;
  event_type: 'escalation';
  contract_version: string;
  role: string;
  reason: EscalationReason;
  action: string;
  detail?: string;
}

/** Append-only destination for escalation events. */
export interface EscalationSink {
  append(event: EscalationEvent): Promise<void> | void;
}

export function isEscalationEvent(value: unknown): value is EscalationEvent {
  if (!isRecord(value)) {
    return false;
  }
  const event = value;
  return (
    event.event_type === 'escalation' &&
    typeof event.timestamp === 'string' &&
    typeof event.contract_version === 'string' &&
    typeof event.role === 'string' &&
    typeof event.action === 'string' &&
    ESCALATION_REASONS.some(reason => reason === event.reason) &&
    (event.detail === undefined || typeof event.detail === 'string')
  );
}
