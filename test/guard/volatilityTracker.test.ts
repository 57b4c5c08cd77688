import { describe, expect, it } from 'vitest';
import { VolatilityTracker } from '../../src/guard/volatilityTracker';

function feed(tracker: VolatilityTracker, count: number, low: number, high: number) {
  let last = 0;
  for (let i = 0; i < count; i++) {
    last = tracker.record(i % 2 === 0 ? low : high);
  }
  return last;
}

describe('VolatilityTracker', () => {
  it('reads zero until fifteen prices are buffered', () => {
    const tracker = new VolatilityTracker();

    expect(feed(tracker, 14, 1, 1.002)).toBe(0);
    expect(tracker.record(1)).toBeCloseTo(0.002, 10);
    expect(tracker.samples).toBe(1);
  });

  it('averages only the most recent fourteen deltas', () => {
    const tracker = new VolatilityTracker();
    feed(tracker, 15, 1, 1.01);
    feed(tracker, 15, 1, 1.002);

    expect(tracker.current).toBeCloseTo(0.002, 10);
  });

  it('captures the baseline once twenty readings exist', () => {
    const tracker = new VolatilityTracker();
    feed(tracker, 33, 1, 1.002);
    expect(tracker.baseline).toBeNull();

    tracker.record(1.002);
    expect(tracker.samples).toBe(20);
    expect(tracker.baseline).toBeCloseTo(0.002, 10);

    feed(tracker, 30, 1, 1.01);
    expect(tracker.baseline).toBeCloseTo(0.002, 10);
  });

  it('keeps a persisted baseline', () => {
    const tracker = new VolatilityTracker(0.004);
    feed(tracker, 40, 1, 1.001);

    expect(tracker.baseline).toBe(0.004);
  });
});
