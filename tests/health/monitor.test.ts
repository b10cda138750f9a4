import { describe, expect, it } from 'vitest';
import { HealthMonitor } from '../../src/health/monitor.js';
import { acceptsCalls, getHealthStateMetadata } from '../../src/health/states.js';
import { FakeClock } from '../helpers.js';

const POLICY = { max_strikes: 3, strike_window_seconds: 60 };

describe('HealthMonitor', () => {
  it('turns unhealthy when strikes reach the limit', () => {
    const clock = new FakeClock();
    const monitor = new HealthMonitor(POLICY, clock.now);

    expect(monitor.addStrike('first')).toBeNull();
    clock.advance(1000);
    expect(monitor.addStrike('second')).toBeNull();
    clock.advance(1000);
    const transition = monitor.addStrike('third');

    expect(transition).toEqual({
      from: 'healthy',
      to: 'unhealthy',
      reason: 'third',
      timestamp: '1970-01-01T00:00:02.000Z',
    });
    expect(monitor.status).toBe('unhealthy');
    expect(monitor.strikes).toBe(3);
  });

  it('prunes strikes older than the window on the next strike', () => {
    const clock = new FakeClock();
    const monitor = new HealthMonitor(POLICY, clock.now);

    monitor.addStrike('a');
    clock.advance(1000);
    monitor.addStrike('b');
    clock.advance(61_000);
    monitor.addStrike('c');

    expect(monitor.strikes).toBe(1);
    expect(monitor.getStrikes().map(s => s.reason)).toEqual(['c']);
    expect(monitor.status).toBe('healthy');
  });

  it('keeps a strike exactly one window old', () => {
    const clock = new FakeClock();
    const monitor = new HealthMonitor(POLICY, clock.now);

    monitor.addStrike('a');
    clock.advance(60_000);
    monitor.addStrike('b');

    expect(monitor.strikes).toBe(2);
  });

  it('recovers once the window has elapsed and a new strike arrives', () => {
    const clock = new FakeClock();
    const monitor = new HealthMonitor(POLICY, clock.now);

    monitor.addStrike('a');
    monitor.addStrike('b');
    monitor.addStrike('c');
    clock.advance(120_000);

    // Staleness is only evaluated on the next strike.
    expect(monitor.status).toBe('unhealthy');

    const transition = monitor.addStrike('d');
    expect(transition?.to).toBe('healthy');
    expect(monitor.strikes).toBe(1);
  });

  it('resets to healthy with no strikes', () => {
    const monitor = new HealthMonitor({ max_strikes: 1, strike_window_seconds: 60 }, () => 0);
    monitor.addStrike('boom');

    const transition = monitor.reset();

    expect(transition).toMatchObject({ from: 'unhealthy', to: 'healthy', reason: 'reset' });
    expect(monitor.status).toBe('healthy');
    expect(monitor.strikes).toBe(0);
    expect(monitor.reset()).toBeNull();
  });

  it('records transitions and a snapshot', () => {
    const monitor = new HealthMonitor({ max_strikes: 1, strike_window_seconds: 30 }, () => 0);
    monitor.addStrike('boom');
    monitor.reset();

    const snapshot = monitor.snapshot();
    expect(snapshot.status).toBe('healthy');
    expect(snapshot.maxStrikes).toBe(1);
    expect(snapshot.strikeWindowSeconds).toBe(30);
    expect(snapshot.recentStrikes).toEqual([]);
    expect(snapshot.transitions.map(t => `${t.from}->${t.to}`)).toEqual(['healthy->unhealthy', 'unhealthy->healthy']);
  });
});

describe('health states', () => {
  it('only the healthy state accepts calls', () => {
    expect(acceptsCalls('healthy')).toBe(true);
    expect(acceptsCalls('unhealthy')).toBe(false);
    expect(getHealthStateMetadata('unhealthy').acceptsCalls).toBe(false);
  });
});
