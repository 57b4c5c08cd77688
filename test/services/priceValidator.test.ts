import { describe, expect, it } from 'vitest';
import { PriceTracker, validatePrice } from '../../src/services/marketData/priceValidator';

describe('validatePrice', () => {
  it('accepts the first finite positive price', () => {
    expect(validatePrice(0.52, null)).toEqual({ accepted: true, price: 0.52 });
  });

  it('rejects non-finite and non-positive candidates, keeping the last known price', () => {
    expect(validatePrice(Number.NaN, 0.5)).toEqual({ accepted: false, reason: 'non_finite', price: 0.5 });
    expect(validatePrice(Number.POSITIVE_INFINITY, null)).toEqual({ accepted: false, reason: 'non_finite', price: null });
    expect(validatePrice(0, 0.5)).toEqual({ accepted: false, reason: 'non_positive', price: 0.5 });
    expect(validatePrice(-1, 0.5)).toEqual({ accepted: false, reason: 'non_positive', price: 0.5 });
  });

  it('rejects a jump beyond the allowed percentage', () => {
    expect(validatePrice(0.56, 0.5)).toEqual({ accepted: false, reason: 'implausible_jump', price: 0.5 });
    expect(validatePrice(0.54, 0.5)).toEqual({ accepted: true, price: 0.54 });
    expect(validatePrice(0.54, 0.5, 5)).toEqual({ accepted: false, reason: 'implausible_jump', price: 0.5 });
  });
});

describe('PriceTracker', () => {
  it('tracks the mid of accepted quotes', () => {
    const tracker = new PriceTracker();

    expect(tracker.update(0.5, 0.5002, 1).accepted).toBe(true);
    expect(tracker.latest).toEqual({ bid: 0.5, ask: 0.5002, mid: (0.5 + 0.5002) / 2, receivedAt: 1 });
  });

  it('counts consecutive jump rejections until a price is accepted', () => {
    const tracker = new PriceTracker();
    tracker.update(1, 1, 1);

    tracker.update(2, 2, 2);
    tracker.update(2, 2, 3);
    tracker.update(Number.NaN, 1, 4);
    expect(tracker.consecutiveJumpRejects).toBe(2);
    expect(tracker.latest?.mid).toBe(1);

    tracker.update(1.01, 1.01, 5);
    expect(tracker.consecutiveJumpRejects).toBe(0);
  });

  it('re-anchors past the jump check on a confirmed quote', () => {
    const tracker = new PriceTracker();
    tracker.update(1, 1, 1);
    tracker.update(2, 2, 2);

    expect(tracker.reanchor(2, 2.002, 3)).toBe(true);
    expect(tracker.consecutiveJumpRejects).toBe(0);
    expect(tracker.update(2.01, 2.01, 4).accepted).toBe(true);
    expect(tracker.reanchor(0, 0, 5)).toBe(false);
  });

  it('refuses a quote with a zero or negative side even when the mid looks plausible', () => {
    const tracker = new PriceTracker();
    tracker.update(1, 1, 1);

    expect(tracker.update(0, 2, 2)).toEqual({ accepted: false, reason: 'non_positive', price: 1 });
    expect(tracker.update(2.1, -0.1, 3)).toEqual({ accepted: false, reason: 'non_positive', price: 1 });
    expect(tracker.latest).toEqual({ bid: 1, ask: 1, mid: 1, receivedAt: 1 });
    expect(tracker.consecutiveJumpRejects).toBe(0);

    expect(tracker.reanchor(0, 2, 4)).toBe(false);
    expect(tracker.reanchor(1.05, Number.NaN, 5)).toBe(false);
    expect(tracker.latest?.receivedAt).toBe(1);
  });
});
