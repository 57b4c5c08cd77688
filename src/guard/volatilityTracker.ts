import { mean } from '../analytics/indicators';

export interface VolatilitySettings {
  period: number;
  bufferSize: number;
  historySize: number;
  baselineMinSamples: number;
}

export const DEFAULT_VOLATILITY_SETTINGS: VolatilitySettings = {
  period: 14,
  bufferSize: 100,
  historySize: 50,
  baselineMinSamples: 20,
};

/**
 * ATR-style volatility from absolute deltas between consecutive processed
 * prices. The baseline is the mean of the reading history, taken once.
 */
export class VolatilityTracker {
  private readonly prices: number[] = [];
  private readonly history: number[] = [];
  private currentValue = 0;

  constructor(
    private baselineValue: number | null = null,
    private readonly settings: VolatilitySettings = DEFAULT_VOLATILITY_SETTINGS
  ) {}

  get current() {
    return this.currentValue;
  }

  get baseline() {
    return this.baselineValue;
  }

  get samples() {
    return this.history.length;
  }

  /** Records a price and returns the refreshed reading (0 until enough prices). */
  record(price: number): number {
    this.prices.push(price);
    if (this.prices.length > this.settings.bufferSize) {
      this.prices.shift();
    }
    if (this.prices.length < this.settings.period + 1) {
      this.currentValue = 0;
      return 0;
    }

    const recent = this.prices.slice(-(this.settings.period + 1));
    const deltas: number[] = [];
    for (let i = 1; i < recent.length; i++) {
      deltas.push(Math.abs(recent[i] - recent[i - 1]));
    }
    this.currentValue = mean(deltas);

    this.history.push(this.currentValue);
    if (this.history.length > this.settings.historySize) {
      this.history.shift();
    }
    if (this.baselineValue === null && this.history.length >= this.settings.baselineMinSamples) {
      this.baselineValue = mean(this.history);
    }
    return this.currentValue;
  }
}
