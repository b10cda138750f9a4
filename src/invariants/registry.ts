import type { InvariantContext, InvariantDefinition, InvariantID } from './types.js';

function isNonEmptyString(value: unknown): boolean {
  return typeof value === 'string' && value.trim().length > 0;
}

const INVARIANTS: Record<InvariantID, InvariantDefinition> = {
  RESPONSE_HAS_REQUIRED_FIELDS: {
    id: 'RESPONSE_HAS_REQUIRED_FIELDS',
    description: 'Every returned response must contain all required fields',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      const { response, requiredFields } = ctx;
      if (!response || !requiredFields) return true;
      return requiredFields.every(field => field in response);
    },
  },

  ATTEMPTS_WITHIN_RETRY_BUDGET: {
    id: 'ATTEMPTS_WITHIN_RETRY_BUDGET',
    description: 'Agent invocations must not exceed max_retries + 1',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.agentInvocations === undefined || ctx.maxRetries === undefined) return true;
      return ctx.agentInvocations <= ctx.maxRetries + 1;
    },
  },

  UNHEALTHY_GATE_SKIPS_AGENT: {
    id: 'UNHEALTHY_GATE_SKIPS_AGENT',
    description: 'The agent must not be invoked while the monitor is unhealthy',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.gatedUnhealthy || ctx.agentInvocations === undefined) return true;
      return ctx.agentInvocations === 0;
    },
  },

  FALLBACK_ALWAYS_EXPLAINED: {
    id: 'FALLBACK_ALWAYS_EXPLAINED',
    description: 'Fallback responses must always carry an explicit reasoning',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.fallbackUsed) return true;
      return isNonEmptyString(ctx.reasoning);
    },
  },

  TEMPERATURE_WITHIN_RANGE: {
    id: 'TEMPERATURE_WITHIN_RANGE',
    description: 'Controller temperature must stay inside the configured range',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.temperature === undefined || !ctx.range) return true;
      const [min, max] = ctx.range;
      return ctx.temperature >= min && ctx.temperature <= max;
    },
  },

  FLAGGED_RESPONSE_HAS_STRIKE_REASON: {
    id: 'FLAGGED_RESPONSE_HAS_STRIKE_REASON',
    description: 'Responses flagged by drift detection must carry a strike reason',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.flagged) return true;
      return isNonEmptyString(ctx.strikeReason);
    },
  },
};

export function getAllInvariants(): InvariantDefinition[] {
  return Object.values(INVARIANTS);
}

export function getInvariantsByIds(ids: readonly InvariantID[]): InvariantDefinition[] {
  return ids.map(id => INVARIANTS[id]);
}
