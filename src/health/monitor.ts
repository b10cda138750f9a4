import type { HealthPolicy } from '../contracts/types.js';
import { logger } from '../observability/logger.js';
import { deriveStatus } from './states.js';
import type { HealthStatus, HealthTransition } from './states.js';

export interface Strike {
  reason: string;
  timestamp: number;
}

export interface HealthSnapshot {
  status: HealthStatus;
  strikes: number;
  maxStrikes: number;
  strikeWindowSeconds: number;
  recentStrikes: Array<{ reason: string; timestamp: string }>;
  transitions: HealthTransition[];
}

const MAX_TRANSITION_HISTORY = 50;

/**
 * Sliding-window strike counter. Status only changes inside addStrike/reset;
 * expired strikes are pruned lazily on the next strike.
 */
export class HealthMonitor {
  private strikeLog: Strike[] = [];
  private currentStatus: HealthStatus = 'healthy';
  private transitions: HealthTransition[] = [];
  private readonly maxStrikes: number;
  private readonly windowMs: number;
  private readonly clock: () => number;

  constructor(policy: HealthPolicy, clock: () => number = Date.now) {
    if (policy.max_strikes <= 0) {
      throw new Error('HealthMonitor max_strikes must be > 0');
    }
    if (policy.strike_window_seconds <= 0) {
      throw new Error('HealthMonitor strike_window_seconds must be > 0');
    }
    this.maxStrikes = policy.max_strikes;
    this.windowMs = policy.strike_window_seconds * 1000;
    this.clock = clock;
  }

  get status(): HealthStatus {
    return this.currentStatus;
  }

  get strikes(): number {
    return this.strikeLog.length;
  }

  getStrikes(): readonly Strike[] {
    return [...this.strikeLog];
  }

  getTransitionHistory(): HealthTransition[] {
    return [...this.transitions];
  }

  /** Returns the transition when this strike changed the status, else null. */
  addStrike(reason: string): HealthTransition | null {
    const now = this.clock();
    this.strikeLog.push({ reason, timestamp: now });
    this.strikeLog = this.strikeLog.filter(s => now - s.timestamp <= this.windowMs);

    const next = deriveStatus(this.strikeLog.length, this.maxStrikes);

    logger.warn('health_strike', 'Strike registered', {
      reason,
      strikes: this.strikeLog.length,
      maxStrikes: this.maxStrikes,
      status: next,
    });

    return this.moveTo(next, reason, now);
  }

  reset(): HealthTransition | null {
    this.strikeLog = [];
    logger.info('health_reset', 'Health monitor reset', { previousStatus: this.currentStatus });
    return this.moveTo('healthy', 'reset', this.clock());
  }

  snapshot(): HealthSnapshot {
    return {
      status: this.currentStatus,
      strikes: this.strikeLog.length,
      maxStrikes: this.maxStrikes,
      strikeWindowSeconds: this.windowMs / 1000,
      recentStrikes: this.strikeLog.map(s => ({
        reason: s.reason,
        timestamp: new Date(s.timestamp).toISOString(),
      })),
      transitions: this.getTransitionHistory(),
    };
  }

  private moveTo(next: HealthStatus, reason: string, now: number): HealthTransition | null {
    if (next === this.currentStatus) {
      return null;
    }

    const transition: HealthTransition = {
      from: this.currentStatus,
      to: next,
      reason,
      timestamp: new Date(now).toISOString(),
    };
    this.currentStatus = next;
    this.transitions.push(transition);
    if (this.transitions.length > MAX_TRANSITION_HISTORY) {
      this.transitions.shift();
    }

    logger.warn('health_transition', 'Health status changed', {
      from: transition.from,
      to: transition.to,
      reason,
    });

    return transition;
  }
}
