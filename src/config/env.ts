import { z } from 'zod';
import type { LogThreshold } from '../observability/logger.js';

export class ConfigurationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

const optionalString = z
  .string()
  .trim()
  .transform(value => (value.length > 0 ? value : undefined))
  .optional();

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(['info', 'warn', 'error', 'silent']).default('info'),
  CONTRACT_PATH: z.string().trim().min(1, 'CONTRACT_PATH is required'),
  REDIS_URL: optionalString,
  ESCALATION_LIST_KEY: z.string().trim().min(1).default('escalations:events'),
  ESCALATION_LIST_MAX: z.coerce.number().int().positive().default(500),
  ANTHROPIC_API_KEY: z.string().trim().min(1, 'ANTHROPIC_API_KEY is required'),
  ANTHROPIC_MODEL: z.string().trim().min(1).default('claude-sonnet-4-20250514'),
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  ANTHROPIC_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
});

export interface ServiceConfig {
  port: number;
  logLevel: LogThreshold;
  contractPath: string;
  redisUrl?: string;
  escalationListKey: string;
  escalationListMax: number;
  anthropic: {
    apiKey: string;
    model: string;
    maxTokens: number;
    timeoutMs: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || '<env>'}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    contractPath: values.CONTRACT_PATH,
    redisUrl: values.REDIS_URL,
    escalationListKey: values.ESCALATION_LIST_KEY,
    escalationListMax: values.ESCALATION_LIST_MAX,
    anthropic: {
      apiKey: values.ANTHROPIC_API_KEY,
      model: values.ANTHROPIC_MODEL,
      maxTokens: values.ANTHROPIC_MAX_TOKENS,
      timeoutMs: values.ANTHROPIC_TIMEOUT_MS,
    },
  };
}
