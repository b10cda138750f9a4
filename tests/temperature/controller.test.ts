import { describe, expect, it } from 'vitest';
import { TemperatureController } from '../../src/temperature/controller.js';

describe('TemperatureController', () => {
  it('starts adaptive mode at the midpoint', () => {
    const controller = new TemperatureController({ mode: 'adaptive', range: [0.2, 0.6] });
    expect(controller.getTemperature()).toBe(0.4);
  });

  it('heats on failure and cools on success, clamped to the range', () => {
    const controller = new TemperatureController({ mode: 'adaptive', range: [0.2, 0.6] });

    expect(controller.adjust(false)).toBe(0.5);
    expect(controller.adjust(false)).toBe(0.6);
    expect(controller.adjust(false)).toBe(0.6);
    expect(controller.adjust(true)).toBe(0.5);
  });

  it('does not accumulate float drift', () => {
    const controller = new TemperatureController({ mode: 'adaptive', range: [0, 1] });

    expect(controller.adjust(true)).toBe(0.4);
    expect(controller.adjust(true)).toBe(0.3);
    expect(controller.adjust(true)).toBe(0.2);
    expect(controller.adjust(true)).toBe(0.1);
    expect(controller.adjust(true)).toBe(0);
    expect(controller.adjust(true)).toBe(0);
  });

  it('honors a custom step', () => {
    const controller = new TemperatureController({ mode: 'adaptive', range: [0.2, 0.6] }, 0.05);
    expect(controller.adjust(true)).toBe(0.35);
  });

  it('keeps fixed mode constant', () => {
    const midpoint = new TemperatureController({ mode: 'fixed', range: [0.2, 0.6] });
    const pinned = new TemperatureController({ mode: 'fixed', range: [0.2, 0.6], value: 0.3 });

    expect(midpoint.adjust(false)).toBe(0.4);
    expect(pinned.getTemperature()).toBe(0.3);
    expect(pinned.adjust(true)).toBe(0.3);
  });

  it('reports a snapshot', () => {
    const controller = new TemperatureController({ mode: 'adaptive', range: [0.2, 0.6] });
    controller.adjust(false);

    expect(controller.snapshot()).toEqual({ mode: 'adaptive', current: 0.5, min: 0.2, max: 0.6, step: 0.1 });
  });

  it('rejects an invalid range or step', () => {
    expect(() => new TemperatureController({ mode: 'adaptive', range: [0.5, 0.5] })).toThrow(/min must be less than max/);
    expect(() => new TemperatureController({ mode: 'adaptive', range: [0.2, 0.6] }, 0)).toThrow(/step must be > 0/);
  });
});
