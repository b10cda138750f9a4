export type TemperatureMode = 'fixed' | 'adaptive';

export type EscalationReason = 'unexpected_output' | 'context_mismatch' | 'unhealthy';

export type EscalationKey = `on_${EscalationReason}`;

export type TemperatureRange = readonly [min: number, max: number];

export interface ContractPolicy {
  readonly pii_allowed: boolean;
  readonly compliance_tags: readonly string[];
  readonly allowed_tools: readonly string[];
}

export interface TemperatureControl {
  readonly mode: TemperatureMode;
  readonly range: TemperatureRange;
  readonly value?: number;
}

export interface BehavioralFlags {
  readonly conservatism: string;
  readonly verbosity: string;
  readonly temperature_control: TemperatureControl;
}

export interface FailurePolicy {
  readonly max_retries: number;
  readonly fallback: Readonly<Record<string, unknown>>;
}

export interface BehaviorSignature {
  readonly key: string;
}

export interface ResponseContract {
  readonly required_fields: readonly string[];
  readonly max_response_time_ms: number;
  readonly on_failure: FailurePolicy;
  readonly behavior_signature?: BehaviorSignature;
  /** Accepted `confidence` values. */
  readonly confidence_levels: readonly string[];
  /** Accepted behavior-key values; empty accepts any. */
  readonly allowed_decisions: readonly string[];
}

export interface HealthPolicy {
  readonly max_strikes: number;
  readonly strike_window_seconds: number;
}

export type EscalationPolicy = Readonly<Partial<Record<EscalationKey, string>>> & {
  readonly fallback_role?: string;
};

/**
 * Validated, immutable contract for one wrapped agent.
 *
 * Built only through `buildContractSpecification`, which deep-freezes the
 * value and stamps `contract_hash`.
 */
export interface ContractSpecification {
  readonly version: string;
  readonly description: string;
  readonly role: string;
  readonly policy: ContractPolicy;
  readonly behavioral_flags: BehavioralFlags;
  readonly response_contract: ResponseContract;
  readonly health: HealthPolicy;
  readonly escalation: EscalationPolicy;
  readonly contract_hash: string;
}

export const DEFAULT_BEHAVIOR_KEY = 'decision';

export const DEFAULT_CONFIDENCE_LEVELS: readonly string[] = ['low', 'medium', 'high'];

export function getBehaviorKey(spec: ContractSpecification): string {
  return spec.response_contract.behavior_signature?.key ?? DEFAULT_BEHAVIOR_KEY;
}

export interface ContractIssue {
  path: string;
  message: string;
}

export class ContractSpecificationError extends Error {
  constructor(public readonly issues: ContractIssue[]) {
    super(`Invalid contract specification: ${issues.map(i => `${i.path || '<root>'}: ${i.message}`).join('; ')}`);
    this.name = 'ContractSpecificationError';
  }
}
