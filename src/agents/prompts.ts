import { getBehaviorKey } from '../contracts/types.js';
import type { ContractSpecification } from '../contracts/types.js';
import { isRecord, resolveCallContext } from '../types.js';
import type { CallArguments } from '../types.js';

const MAX_MEMORY_ENTRIES = 5;

function listOrNone(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : 'None';
}

/** A reply the response validator accepts, shown to the model as the expected shape. */
export function buildResponseExample(spec: ContractSpecification): Record<string, unknown> {
  const key = getBehaviorKey(spec);
  const { policy, response_contract: contract } = spec;

  const example: Record<string, unknown> = {};
  for (const field of contract.required_fields) {
    example[field] = '...';
  }
  example[key] = contract.allowed_decisions[0] ?? '...';
  example.confidence = contract.confidence_levels[0];
  if (policy.compliance_tags.length > 0) {
    example.compliance_tags = [...policy.compliance_tags];
  }
  return example;
}

export function buildSystemPrompt(spec: ContractSpecification): string {
  const key = getBehaviorKey(spec);
  const { policy, behavioral_flags: flags, response_contract: contract } = spec;
  const example = buildResponseExample(spec);
  const decisionRule =
    contract.allowed_decisions.length > 0 ? `\n- "${key}" must be one of: ${contract.allowed_decisions.join(', ')}` : '';

  return `You are acting as: ${spec.role}.
${spec.description ? `\n${spec.description}\n` : ''}
Behavior:
- Conservatism: ${flags.conservatism}
- Verbosity: ${flags.verbosity}
- Report your main outcome in the "${key}" field and your certainty in "confidence".
- "confidence" must be one of: ${contract.confidence_levels.join(', ')}${decisionRule}

Policy:
- Personal data (emails, phone numbers, identity numbers) allowed: ${policy.pii_allowed ? 'yes' : 'no'}
- Allowed tools: ${listOrNone(policy.allowed_tools)}
- Required compliance tags (echo them in "compliance_tags"): ${listOrNone(policy.compliance_tags)}

Required fields: ${contract.required_fields.join(', ')}

Respond ONLY with a single JSON object shaped like:
${JSON.stringify(example, null, 2)}

Do not include any text outside the JSON structure.`;
}

export function buildUserPrompt(args: CallArguments, spec: ContractSpecification): string {
  const key = getBehaviorKey(spec);
  const context = resolveCallContext(args);
  const input = args.input ?? args.prompt ?? '';
  const renderedInput = typeof input === 'string' ? input : JSON.stringify(input, null, 2);

  let prompt = `Task input:\n${renderedInput}\n`;

  const memory = context.memory ?? [];
  if (memory.length > 0) {
    const lines = memory.slice(0, MAX_MEMORY_ENTRIES).map((entry, index) => {
      const analysis = isRecord(entry.analysis) ? entry.analysis : {};
      return `${index + 1}. ${key}=${String(analysis[key] ?? 'unknown')} confidence=${String(analysis.confidence ?? 'unknown')}`;
    });
    prompt += `\nPrevious analyses (most recent first):\n${lines.join('\n')}\n`;
  }

  if (context.context_suggestion) {
    prompt += `\nContext suggests: ${context.context_suggestion}\n`;
  }

  if (context.indicators && Object.keys(context.indicators).length > 0) {
    prompt += `\nIndicators:\n${JSON.stringify(context.indicators, null, 2)}\n`;
  }

  prompt += '\nProvide your answer as JSON.';
  return prompt;
}
