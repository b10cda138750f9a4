import { z } from 'zod';
import type { ContractEnforcer } from '../enforcement/enforcer.js';
import type { CallArguments } from '../types.js';

export const DEFAULT_ESCALATION_LIMIT = 20;
export const MAX_ESCALATION_LIMIT = 100;

export interface HandlerResult<T> {
  statusCode: number;
  body: T;
}

const memoryEntrySchema = z.object({
  analysis: z.record(z.unknown()),
});

const callContextSchema = z
  .object({
    memory: z.array(memoryEntrySchema).optional(),
    pattern_history: z.array(z.string()).optional(),
    context_suggestion: z.string().optional(),
    indicators: z.record(z.unknown()).optional(),
  })
  .strict();

export const enforceRequestSchema = z
  .object({
    input: z.union([z.string().min(1), z.record(z.unknown())]),
    context: callContextSchema.optional(),
    memory: z.array(memoryEntrySchema).optional(),
    indicators: z.record(z.unknown()).optional(),
  })
  .strict();

export type EnforceRequest = z.infer<typeof enforceRequestSchema>;

export type ParseResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };

export function parseEnforceRequest(body: unknown): ParseResult<CallArguments> {
  const parsed = enforceRequestSchema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map(issue => `${issue.path.join('.') || '<body>'}: ${issue.message}`),
    };
  }
  return { ok: true, value: parsed.data };
}

/** Missing means the default; anything but an integer in 1..100 is rejected. */
export function parseEscalationLimit(raw: unknown): ParseResult<number> {
  if (raw === undefined) {
    return { ok: true, value: DEFAULT_ESCALATION_LIMIT };
  }
  if (typeof raw !== 'string' || !/^\d+$/.test(raw)) {
    return { ok: false, errors: ['limit must be a positive integer'] };
  }
  const limit = Number(raw);
  if (limit < 1 || limit > MAX_ESCALATION_LIMIT) {
    return { ok: false, errors: [`limit must be between 1 and ${MAX_ESCALATION_LIMIT}`] };
  }
  return { ok: true, value: limit };
}

export interface HealthBody {
  status: 'healthy' | 'unhealthy';
  contractVersion: string;
  role: string;
  strikes: number;
  maxStrikes: number;
  temperature: number;
}

export function buildHealthResponse(enforcer: ContractEnforcer): HandlerResult<HealthBody> {
  const snapshot = enforcer.snapshot();
  return {
    statusCode: snapshot.health.status === 'healthy' ? 200 : 503,
    body: {
      status: snapshot.health.status,
      contractVersion: snapshot.contract.version,
      role: snapshot.contract.role,
      strikes: snapshot.health.strikes,
      maxStrikes: snapshot.health.maxStrikes,
      temperature: snapshot.temperature.current,
    },
  };
}
