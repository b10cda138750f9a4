import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../observability/logger.js';
import type { CompletionClient, CompletionRequest, CompletionResult } from './types.js';

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_TIMEOUT_MS = 30000;
const MAX_RETRIES = 1;

export interface ClaudeClientOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  timeoutMs?: number;
}

export class ClaudeClient implements CompletionClient {
  private client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(options: ClaudeClientOptions) {
    if (!options.apiKey) {
      throw new Error('Anthropic API key is required');
    }

    this.model = options.model ?? DEFAULT_MODEL;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: MAX_RETRIES,
    });
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: request.temperature,
        system: request.system,
        messages: [
          {
            role: 'user',
            content: request.prompt,
          },
        ],
      });

      let text = '';
      for (const block of response.content) {
        if (block.type === 'text') {
          text += block.text;
        }
      }

      return {
        text,
        stopReason: response.stop_reason,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        logger.error('claude_api_error', 'Claude API call failed', {
          status: error.status,
          message: error.message,
        });
        throw new Error(`Claude API failed: ${error.message}`);
      }
      throw error;
    }
  }
}
