import type { OhlcvBar } from '../exchanges/adapters/types';

export type TrendDirection = 'neutral' | 'up' | 'down';

export interface KlineBar extends OhlcvBar {
  direction: TrendDirection;
  changePct: number;
}

/** Moves smaller than this (in percent, either way) count as neutral. */
export const DIRECTION_NOISE_PCT = 0.1;

export function toKlineBar(bar: OhlcvBar, noisePct = DIRECTION_NOISE_PCT): KlineBar {
  const changePct = bar.open > 0 ? ((bar.close - bar.open) / bar.open) * 100 : 0;
  let direction: TrendDirection = 'neutral';
  if (changePct > noisePct) {
    direction = 'up';
  } else if (changePct < -noisePct) {
    direction = 'down';
  }
  return { ...bar, direction, changePct };
}
