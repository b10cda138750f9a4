import express from 'express';
import type { Express, Request, Response } from 'express';
import type { ContractEnforcer } from '../enforcement/enforcer.js';
import type { InMemoryEscalationSink } from '../escalation/sinks.js';
import { describeError, logger } from '../observability/logger.js';
import type { AgentCall, CallArguments } from '../types.js';
import { buildHealthResponse, parseEnforceRequest, parseEscalationLimit } from './handlers.js';

export interface ServerDependencies {
  enforcer: ContractEnforcer;
  agent: AgentCall<CallArguments>;
  escalations: InMemoryEscalationSink;
}

export function createServer({ enforcer, agent, escalations }: ServerDependencies): Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    const { statusCode, body } = buildHealthResponse(enforcer);
    res.status(statusCode).json(body);
  });

  app.get('/metrics', (_req: Request, res: Response) => {
    res.status(200).json(enforcer.snapshot());
  });

  app.get('/escalations', (req: Request, res: Response) => {
    const limit = parseEscalationLimit(req.query.limit);
    if (!limit.ok) {
      res.status(400).json({ error: 'Invalid limit', details: limit.errors });
      return;
    }
    res.status(200).json({
      events: escalations.getRecent(limit.value),
      stats: escalations.getStats(),
    });
  });

  app.post('/enforce', async (req: Request, res: Response) => {
    const parsed = parseEnforceRequest(req.body);
    if (!parsed.ok) {
      logger.warn('enforce_request_invalid', 'Rejected enforce request', { errors: parsed.errors });
      res.status(400).json({ error: 'Invalid request body', details: parsed.errors });
      return;
    }

    try {
      const { response, trace } = await enforcer.enforceWithTrace(agent, parsed.value);
      res.status(200).json({ response, callId: trace.callId, path: trace.path });
    } catch (error) {
      logger.error('enforce_endpoint_error', 'Unexpected error in enforce endpoint', {
        error: describeError(error),
      });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return app;
}
