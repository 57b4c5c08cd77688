import type { MarketGateway } from '../exchanges/adapters/types';
import { logger } from '../utils/logger';
import { computeTrendSignal, gridAdjustmentFor } from './trendSignal';
import type { GridAdjustment, TrendSignal, TrendSignalSettings } from './trendSignal';

export interface SignalAdapterSettings extends TrendSignalSettings {
  timeframe: string;
  historyLimit: number;
}

/**
 * Tracks the trend classification of the traded instrument and reports a
 * spacing adjustment only when the classification changes.
 */
export class SignalAdapter {
  private current: TrendSignal | null = null;

  constructor(
    private readonly gateway: Pick<MarketGateway, 'fetchKlines'>,
    private readonly settings: SignalAdapterSettings
  ) {}

  get signal(): TrendSignal | null {
    return this.current;
  }

  async initialize(): Promise<TrendSignal> {
    const signal = await this.compute();
    this.current = signal;
    logger.info('signal_initialized', {
      event: 'signal_initialized',
      classification: signal.classification,
      adx: signal.adx,
      insufficientData: signal.insufficientData,
    });
    return signal;
  }

  async refresh(): Promise<GridAdjustment | null> {
    const signal = await this.compute();
    const previous = this.current;
    this.current = signal;
    if (previous && previous.classification === signal.classification) {
      logger.debug('signal_unchanged', {
        event: 'signal_unchanged',
        classification: signal.classification,
        adx: signal.adx,
      });
      return null;
    }
    const adjustment = gridAdjustmentFor(signal.classification);
    logger.info('signal_changed', {
      event: 'signal_changed',
      from: previous?.classification ?? null,
      to: signal.classification,
      confidence: signal.confidence,
      adx: signal.adx,
      adjustment,
    });
    return adjustment;
  }

  private async compute() {
    const bars = await this.gateway.fetchKlines(this.settings.timeframe, this.settings.historyLimit);
    return computeTrendSignal(bars, this.settings);
  }
}
