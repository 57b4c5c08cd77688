import type { KlineBar, TrendDirection } from './klines';

export interface RunState {
  direction: TrendDirection;
  consecutiveBars: number;
  cumulativeMovePct: number;
  runStartPrice: number | null;
  runStartedAt: number | null;
}

export function emptyRun(): RunState {
  return {
    direction: 'neutral',
    consecutiveBars: 0,
    cumulativeMovePct: 0,
    runStartPrice: null,
    runStartedAt: null,
  };
}

/**
 * Folds one closed bar into the directional run. A neutral bar ends the run
 * outright; an opposite bar starts a new one anchored at its open.
 */
export function advanceRun(state: RunState, bar: KlineBar): RunState {
  if (bar.direction === 'neutral') {
    return emptyRun();
  }

  if (bar.direction === state.direction) {
    const start = state.runStartPrice;
    let cumulative = state.cumulativeMovePct;
    if (start !== null && start > 0) {
      cumulative = ((bar.close - start) / start) * 100;
      if (state.direction === 'down') {
        cumulative = Math.abs(cumulative);
      }
    }
    return {
      ...state,
      consecutiveBars: state.consecutiveBars + 1,
      cumulativeMovePct: cumulative,
    };
  }

  return {
    direction: bar.direction,
    consecutiveBars: 1,
    cumulativeMovePct: Math.abs(bar.changePct),
    runStartPrice: bar.open,
    runStartedAt: bar.timestamp,
  };
}
