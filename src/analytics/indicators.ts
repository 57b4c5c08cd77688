import type { OhlcvBar } from '../exchanges/adapters/types';

export function mean(values: number[]): number {
  if (!values.length) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Recursive EMA seeded with the first value (alpha = 2 / (period + 1)). */
export function ema(values: number[], period: number): number[] {
  if (!values.length || period <= 0) return [];
  const alpha = 2 / (period + 1);
  const out: number[] = [values[0]];
  for (let i = 1; i < values.length; i++) {
    out.push(alpha * values[i] + (1 - alpha) * out[i - 1]);
  }
  return out;
}

/**
 * Average directional index with Wilder smoothing of TR/+DM/-DM and a simple
 * moving average of DX. Entries before enough history are NaN; the result is
 * aligned with `bars`.
 */
export function adx(bars: OhlcvBar[], period = 14): number[] {
  const result: number[] = bars.map(() => NaN);
  if (period <= 0 || bars.length < period * 2 + 1) return result;

  const tr: number[] = [];
  const plusDm: number[] = [];
  const minusDm: number[] = [];
  for (let i = 1; i < bars.length; i++) {
    const { high, low } = bars[i];
    const prev = bars[i - 1];
    tr.push(Math.max(high - low, Math.abs(high - prev.close), Math.abs(low - prev.close)));
    const up = high - prev.high;
    const down = prev.low - low;
    plusDm.push(up > 0 && up > down ? up : 0);
    minusDm.push(down > 0 && down >= up ? down : 0);
  }

  const smooth = (series: number[]) => {
    const out: number[] = series.map(() => NaN);
    out[period - 1] = mean(series.slice(0, period));
    for (let i = period; i < series.length; i++) {
      out[i] = out[i - 1] - out[i - 1] / period + series[i];
    }
    return out;
  };

  const trS = smooth(tr);
  const plusS = smooth(plusDm);
  const minusS = smooth(minusDm);

  const dx: number[] = tr.map((_, i) => {
    if (!Number.isFinite(trS[i]) || trS[i] === 0) return NaN;
    const plusDi = (100 * plusS[i]) / trS[i];
    const minusDi = (100 * minusS[i]) / trS[i];
    const total = plusDi + minusDi;
    return total === 0 ? 0 : (100 * Math.abs(plusDi - minusDi)) / total;
  });

  for (let i = period - 1 + period - 1; i < dx.length; i++) {
    const window = dx.slice(i - period + 1, i + 1);
    if (window.every(Number.isFinite)) {
      // dx[i] belongs to bars[i + 1]
      result[i + 1] = mean(window);
    }
  }
  return result;
}
