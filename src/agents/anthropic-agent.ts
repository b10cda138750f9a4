import type { ContractSpecification } from '../contracts/types.js';
import { logger } from '../observability/logger.js';
import type { AgentCallOptions, CallArguments } from '../types.js';
import { buildSystemPrompt, buildUserPrompt } from './prompts.js';
import type { CompletionClient } from './types.js';

/**
 * Agent backed by a completion client. Returns the raw model text; the
 * enforcer parses and validates it.
 */
export function createAnthropicAgent(
  client: CompletionClient,
  spec: ContractSpecification
): (args: CallArguments, options: AgentCallOptions) => Promise<string> {
  const system = buildSystemPrompt(spec);

  return async (args: CallArguments, options: AgentCallOptions): Promise<string> => {
    const result = await client.complete({
      system,
      prompt: buildUserPrompt(args, spec),
      temperature: options.temperature,
    });

    logger.info('agent_completion', 'Model completion received', {
      attempt: options.attempt,
      temperature: options.temperature,
      stopReason: result.stopReason,
      inputTokens: result.usage?.inputTokens,
      outputTokens: result.usage?.outputTokens,
    });

    return result.text;
  };
}
