import { describeError, logger } from '../observability/logger.js';
import { isEscalationEvent } from './types.js';
import type { EscalationEvent, EscalationSink } from './types.js';

const MAX_IN_MEMORY_EVENTS = 100;
const MAX_REDIS_EVENTS = 500;
const DEFAULT_REDIS_KEY = 'escalations:events';

export class LoggerEscalationSink implements EscalationSink {
  append(event: EscalationEvent): void {
    logger.warn('escalation_event', `Escalation: ${event.reason} -> ${event.action}`, { ...event });
  }
}

export class InMemoryEscalationSink implements EscalationSink {
  private events: EscalationEvent[] = [];

  constructor(private readonly maxSize: number = MAX_IN_MEMORY_EVENTS) {
    if (maxSize <= 0) {
      throw new Error('InMemoryEscalationSink maxSize must be > 0');
    }
  }

  append(event: EscalationEvent): void {
    this.events.push(event);

    if (this.events.length > this.maxSize) {
      this.events.shift();
    }
  }

  /** Most recent first. */
  getRecent(limit: number = 50): EscalationEvent[] {
    const actualLimit = Math.max(0, Math.min(limit, this.events.length));
    return this.events.slice(this.events.length - actualLimit).reverse();
  }

  getStats(): { count: number; maxSize: number; type: 'memory' } {
    return {
      count: this.events.length,
      maxSize: this.maxSize,
      type: 'memory',
    };
  }
}

/** The list commands RedisEscalationSink needs; an ioredis client satisfies it. */
export interface EscalationListClient {
  lpush(key: string, ...elements: string[]): Promise<number>;
  ltrim(key: string, start: number, stop: number): Promise<unknown>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
}

export interface RedisEscalationSinkOptions {
  key?: string;
  maxEvents?: number;
}

function parseEntry(entry: string): EscalationEvent | null {
  try {
    const parsed: unknown = JSON.parse(entry);
    return isEscalationEvent(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export class RedisEscalationSink implements EscalationSink {
  private readonly key: string;
  private readonly maxEvents: number;

  constructor(private readonly client: EscalationListClient, options: RedisEscalationSinkOptions = {}) {
    this.key = options.key ?? DEFAULT_REDIS_KEY;
    this.maxEvents = options.maxEvents ?? MAX_REDIS_EVENTS;
  }

  async append(event: EscalationEvent): Promise<void> {
    await this.client.lpush(this.key, JSON.stringify(event));
    await this.client.ltrim(this.key, 0, this.maxEvents - 1);
  }

  async getRecent(limit: number = 50): Promise<EscalationEvent[]> {
    const actualLimit = Math.min(limit, this.maxEvents);
    if (actualLimit <= 0) {
      return [];
    }

    try {
      const serialized = await this.client.lrange(this.key, 0, actualLimit - 1);
      const events: EscalationEvent[] = [];
      for (const entry of serialized) {
        const parsed = parseEntry(entry);
        if (parsed) {
          events.push(parsed);
        } else {
          logger.warn('escalation_sink_corrupt_entry', 'Skipping unreadable escalation entry', { key: this.key });
        }
      }
      return events;
    } catch (error) {
      logger.error('escalation_sink_error', 'Failed to read escalations from Redis', {
        key: this.key,
        error: describeError(error),
      });
      return [];
    }
  }
}

/** Delivers each event to every sink; one failing sink does not stop the others. */
export class FanOutEscalationSink implements EscalationSink {
  constructor(private readonly sinks: readonly EscalationSink[]) {}

  async append(event: EscalationEvent): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map(async sink => sink.append(event)));
    const failures = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');

    for (const failure of failures) {
      logger.error('escalation_sink_error', 'Escalation sink failed', {
        reason: event.reason,
        error: describeError(failure.reason),
      });
    }
  }
}
