import type { ContractSpecificationInput } from '../src/contracts/schema.js';

export interface ContractOverrides {
  piiAllowed?: boolean;
  complianceTags?: string[];
  maxRetries?: number;
  maxStrikes?: number;
  mode?: 'fixed' | 'adaptive';
  value?: number;
  behaviorKey?: string;
  confidenceLevels?: string[];
  allowedDecisions?: string[];
}

/** Analyst contract without compliance tags, range [0.2, 0.6], 5s budget. */
export function analystContract(overrides: ContractOverrides = {}): ContractSpecificationInput {
  return {
    version: '1.1',
    role: 'analyst',
    policy: {
      pii_allowed: overrides.piiAllowed ?? false,
      compliance_tags: overrides.complianceTags ?? [],
      allowed_tools: ['search', 'summary'],
    },
    behavioral_flags: {
      conservatism: 'moderate',
      verbosity: 'compact',
      temperature_control: {
        mode: overrides.mode ?? 'adaptive',
        range: [0.2, 0.6],
        value: overrides.value,
      },
    },
    response_contract: {
      required_fields: [overrides.behaviorKey ?? 'decision', 'confidence', 'summary'],
      max_response_time_ms: 5000,
      on_failure: {
        max_retries: overrides.maxRetries ?? 1,
        fallback: { summary: 'No analysis available' },
      },
      behavior_signature: overrides.behaviorKey ? { key: overrides.behaviorKey } : undefined,
      confidence_levels: overrides.confidenceLevels,
      allowed_decisions: overrides.allowedDecisions,
    },
    health: {
      max_strikes: overrides.maxStrikes ?? 3,
      strike_window_seconds: 60,
    },
    escalation: {
      on_unexpected_output: 'flag_for_review',
      on_context_mismatch: 'escalate_to_human',
    },
  };
}

export class FakeClock {
  private current: number;

  constructor(start: number = 0) {
    this.current = start;
  }

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

/** Lets fire-and-forget escalation deliveries settle. */
export async function flushPromises(): Promise<void> {
  await new Promise<void>(resolve => setImmediate(resolve));
}
