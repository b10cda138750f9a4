import crypto from 'crypto';
import { contractSpecificationSchema } from './schema.js';
import { ContractSpecificationError, DEFAULT_CONFIDENCE_LEVELS } from './types.js';
import type { ContractIssue, ContractSpecification } from './types.js';

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function generateDeterministicHash(data: unknown): string {
  return crypto.createHash('sha256').update(stableStringify(data)).digest('hex').substring(0, 16);
}

const builtSpecifications = new WeakSet<object>();

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function cloneFallback(fallback: Record<string, unknown>): Record<string, unknown> {
  try {
    return structuredClone(fallback);
  } catch (error) {
    throw new ContractSpecificationError([
      {
        path: 'response_contract.on_failure.fallback',
        message: 'fallback values must be plain data',
      },
    ]);
  }
}

/**
 * Validates raw contract input and returns the frozen specification.
 * Throws ContractSpecificationError listing every problem found.
 */
export function buildContractSpecification(input: unknown): ContractSpecification {
  const parsed = contractSpecificationSchema.safeParse(input);

  if (!parsed.success) {
    const issues: ContractIssue[] = parsed.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ContractSpecificationError(issues);
  }

  const spec = parsed.data;
  const [min, max] = spec.behavioral_flags.temperature_control.range;

  const contractData = {
    version: spec.version,
    description: spec.description ?? '',
    role: spec.role,
    policy: {
      pii_allowed: spec.policy.pii_allowed,
      compliance_tags: [...new Set(spec.policy.compliance_tags)],
      allowed_tools: [...new Set(spec.policy.allowed_tools)],
    },
    behavioral_flags: {
      conservatism: spec.behavioral_flags.conservatism,
      verbosity: spec.behavioral_flags.verbosity,
      temperature_control: {
        mode: spec.behavioral_flags.temperature_control.mode,
        range: [min, max] as const,
        value: spec.behavioral_flags.temperature_control.value,
      },
    },
    response_contract: {
      required_fields: [...spec.response_contract.required_fields],
      max_response_time_ms: spec.response_contract.max_response_time_ms,
      on_failure: {
        max_retries: spec.response_contract.on_failure.max_retries,
        fallback: cloneFallback(spec.response_contract.on_failure.fallback),
      },
      behavior_signature: spec.response_contract.behavior_signature
        ? { key: spec.response_contract.behavior_signature.key }
        : undefined,
      confidence_levels: [...new Set(spec.response_contract.confidence_levels ?? DEFAULT_CONFIDENCE_LEVELS)],
      allowed_decisions: [...new Set(spec.response_contract.allowed_decisions ?? [])],
    },
    health: {
      max_strikes: spec.health.max_strikes,
      strike_window_seconds: spec.health.strike_window_seconds,
    },
    escalation: { ...spec.escalation },
  };

  const contract: ContractSpecification = {
    ...contractData,
    contract_hash: generateDeterministicHash(contractData),
  };

  deepFreeze(contract);
  builtSpecifications.add(contract);
  return contract;
}

/** True only for values returned by `buildContractSpecification`; copies are not trusted. */
export function isContractSpecification(value: unknown): value is ContractSpecification {
  return value !== null && typeof value === 'object' && builtSpecifications.has(value);
}
