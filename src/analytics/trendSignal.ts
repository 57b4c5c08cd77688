import type { OhlcvBar } from '../exchanges/adapters/types';
import { adx, ema } from './indicators';

export type TrendClassification = 'ranging' | 'strong_up' | 'strong_down';

export interface TrendSignalSettings {
  emaShort: number;
  emaMedium: number;
  emaLong: number;
  adxPeriod: number;
  adxThreshold: number;
}

export interface TrendSignal {
  classification: TrendClassification;
  confidence: number;
  adx: number;
  emaShort: number | null;
  emaMedium: number | null;
  emaLong: number | null;
  close: number | null;
  insufficientData: boolean;
}

export interface SpacingMultiplier {
  replenish: number;
  takeProfit: number;
}

export interface GridAdjustment {
  classification: TrendClassification;
  long: SpacingMultiplier;
  short: SpacingMultiplier;
}

export const DEFAULT_TREND_SETTINGS: TrendSignalSettings = {
  emaShort: 20,
  emaMedium: 50,
  emaLong: 200,
  adxPeriod: 14,
  adxThreshold: 25,
};

export function requiredBars(settings: TrendSignalSettings) {
  return settings.emaLong + 50;
}

export function computeTrendSignal(bars: OhlcvBar[], settings: TrendSignalSettings = DEFAULT_TREND_SETTINGS): TrendSignal {
  if (bars.length < requiredBars(settings)) {
    return {
      classification: 'ranging',
      confidence: 0,
      adx: 0,
      emaShort: null,
      emaMedium: null,
      emaLong: null,
      close: null,
      insufficientData: true,
    };
  }

  const closes = bars.map((bar) => bar.close);
  const shortSeries = ema(closes, settings.emaShort);
  const medium = ema(closes, settings.emaMedium).at(-1) ?? NaN;
  const long = ema(closes, settings.emaLong).at(-1) ?? NaN;
  const short = shortSeries.at(-1) ?? NaN;
  const prevShort = shortSeries.at(-2) ?? short;
  const close = closes[closes.length - 1];
  const rawAdx = adx(bars, settings.adxPeriod).at(-1) ?? NaN;
  const adxValue = Number.isFinite(rawAdx) ? rawAdx : 0;

  const slope = short - prevShort;
  const strong = adxValue > settings.adxThreshold;
  const bullish = close > long && short > medium && medium > long && strong && !(slope < 0);
  const bearish = close < long && short < medium && medium < long && strong && !(slope > 0);

  const classification: TrendClassification = bullish ? 'strong_up' : bearish ? 'strong_down' : 'ranging';
  const confidence =
    classification === 'ranging'
      ? 0
      : Math.min(100, Math.max(0, ((adxValue - settings.adxThreshold) / settings.adxThreshold) * 100));

  return {
    classification,
    confidence,
    adx: adxValue,
    emaShort: short,
    emaMedium: medium,
    emaLong: long,
    close,
    insufficientData: false,
  };
}

const NEUTRAL: SpacingMultiplier = { replenish: 1, takeProfit: 1 };
const WIDENED: SpacingMultiplier = { replenish: 2, takeProfit: 2 };

// The counter-trend side gets both spacings doubled; the trend-favoured side is untouched.
export function gridAdjustmentFor(classification: TrendClassification): GridAdjustment {
  switch (classification) {
    case 'strong_up':
      return { classification, long: { ...NEUTRAL }, short: { ...WIDENED } };
    case 'strong_down':
      return { classification, long: { ...WIDENED }, short: { ...NEUTRAL } };
    default:
      return { classification, long: { ...NEUTRAL }, short: { ...NEUTRAL } };
  }
}
