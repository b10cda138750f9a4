import type { TemperatureControl, TemperatureMode, TemperatureRange } from '../contracts/types.js';

export const DEFAULT_TEMPERATURE_STEP = 0.1;

export interface TemperatureSnapshot {
  mode: TemperatureMode;
  current: number;
  min: number;
  max: number;
  step: number;
}

function round(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

export class TemperatureController {
  private readonly mode: TemperatureMode;
  private readonly min: number;
  private readonly max: number;
  private readonly step: number;
  private current: number;

  constructor(control: TemperatureControl, step: number = DEFAULT_TEMPERATURE_STEP) {
    const [min, max] = control.range;
    if (!(min < max)) {
      throw new Error(`Temperature range min must be less than max, got [${min}, ${max}]`);
    }
    if (!(step > 0)) {
      throw new Error('Temperature step must be > 0');
    }

    this.mode = control.mode;
    this.min = min;
    this.max = max;
    this.step = step;

    const initial = control.mode === 'fixed' && control.value !== undefined
      ? control.value
      : (min + max) / 2;
    this.current = this.clamp(round(initial));
  }

  getTemperature(): number {
    return this.current;
  }

  getMode(): TemperatureMode {
    return this.mode;
  }

  getRange(): TemperatureRange {
    return [this.min, this.max];
  }

  /** Success cools toward min, failure heats toward max. Fixed mode ignores feedback. */
  adjust(success: boolean): number {
    if (this.mode === 'fixed') {
      return this.current;
    }

    const next = success ? this.current - this.step : this.current + this.step;
    this.current = this.clamp(round(next));
    return this.current;
  }

  snapshot(): TemperatureSnapshot {
    return {
      mode: this.mode,
      current: this.current,
      min: this.min,
      max: this.max,
      step: this.step,
    };
  }

  private clamp(value: number): number {
    return Math.min(this.max, Math.max(this.min, value));
  }
}
