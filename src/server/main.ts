import dotenv from 'dotenv';
import { ClaudeClient } from '../agents/claude-client.js';
import { createAnthropicAgent } from '../agents/anthropic-agent.js';
import { ConfigurationError, loadConfig } from '../config/env.js';
import { loadContractFile } from '../contracts/loader.js';
import { ContractSpecificationError } from '../contracts/types.js';
import { ContractEnforcer } from '../enforcement/enforcer.js';
import {
  FanOutEscalationSink,
  InMemoryEscalationSink,
  LoggerEscalationSink,
  RedisEscalationSink,
} from '../escalation/sinks.js';
import type { EscalationSink } from '../escalation/types.js';
import { describeError, logger } from '../observability/logger.js';
import { createRedisClient, shutdownRedis } from '../persistence/redis-client.js';
import { createServer } from './app.js';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  const spec = await loadContractFile(config.contractPath);
  logger.setContext({ contractVersion: spec.version, role: spec.role, service: 'enforcer' });

  const escalations = new InMemoryEscalationSink();
  const sinks: EscalationSink[] = [new LoggerEscalationSink(), escalations];

  const redis = config.redisUrl ? createRedisClient(config.redisUrl) : null;
  if (redis) {
    sinks.push(
      new RedisEscalationSink(redis, {
        key: config.escalationListKey,
        maxEvents: config.escalationListMax,
      })
    );
    logger.info('escalation_sinks', 'Escalations are also written to Redis', { key: config.escalationListKey });
  } else {
    logger.info('escalation_sinks', 'REDIS_URL not provided, keeping escalations in memory');
  }

  const enforcer = new ContractEnforcer(spec, { sink: new FanOutEscalationSink(sinks) });
  const client = new ClaudeClient({
    apiKey: config.anthropic.apiKey,
    model: config.anthropic.model,
    maxTokens: config.anthropic.maxTokens,
    timeoutMs: config.anthropic.timeoutMs,
  });
  const agent = createAnthropicAgent(client, spec);

  const app = createServer({ enforcer, agent, escalations });
  const server = app.listen(config.port, () => {
    logger.info('server_start', 'Enforcement service started', {
      port: config.port,
      contractHash: spec.contract_hash,
    });
  });

  const shutdown = (signal: string): void => {
    logger.info('server_shutdown', 'Shutting down', { signal });
    server.close(() => {
      const closeRedis = redis ? shutdownRedis(redis) : Promise.resolve();
      void closeRedis
        .catch((error: unknown) => {
          logger.error('server_shutdown', 'Shutdown error', { error: describeError(error) });
        })
        .finally(() => process.exit(0));
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError || error instanceof ContractSpecificationError) {
    logger.error('startup', 'Invalid configuration, the service cannot start', {
      error: error.message,
    });
  } else {
    logger.error('startup', 'Service failed to start', { error: describeError(error) });
  }
  process.exit(1);
});
