import { describe, expect, it } from 'vitest';
import { belongsToSide, classifyOrder, counterKeyFor, countersFromOrders } from '../../src/strategies/hedgeGrid/orderClassifier';

describe('classifyOrder', () => {
  it('maps the four grid roles by side, position side and reduce-only flag', () => {
    expect(classifyOrder({ side: 'buy', positionSide: 'long', reduceOnly: false })).toBe('buyLong');
    expect(classifyOrder({ side: 'sell', positionSide: 'long', reduceOnly: true })).toBe('sellLong');
    expect(classifyOrder({ side: 'sell', positionSide: 'short', reduceOnly: false })).toBe('sellShort');
    expect(classifyOrder({ side: 'buy', positionSide: 'short', reduceOnly: true })).toBe('buyShort');
  });

  it('ignores combinations with no grid role', () => {
    expect(classifyOrder({ side: 'buy', positionSide: 'long', reduceOnly: true })).toBeNull();
    expect(classifyOrder({ side: 'sell', positionSide: 'short', reduceOnly: true })).toBeNull();
    expect(classifyOrder({ side: 'sell', positionSide: 'long', reduceOnly: false })).toBeNull();
  });

  it('names counters by role', () => {
    expect(counterKeyFor('long', 'take_profit')).toBe('sellLong');
    expect(counterKeyFor('short', 'entry')).toBe('sellShort');
  });

  it('assigns orders to their position side only', () => {
    expect(belongsToSide({ side: 'buy', positionSide: 'short', reduceOnly: true }, 'short')).toBe(true);
    expect(belongsToSide({ side: 'buy', positionSide: 'short', reduceOnly: true }, 'long')).toBe(false);
  });

  it('sums remaining quantity per counter', () => {
    const counters = countersFromOrders([
      { side: 'buy', positionSide: 'long', reduceOnly: false, remaining: 3 },
      { side: 'buy', positionSide: 'long', reduceOnly: false, remaining: 1.5 },
      { side: 'buy', positionSide: 'short', reduceOnly: true, remaining: 2 },
      { side: 'sell', positionSide: 'short', reduceOnly: true, remaining: 9 },
    ]);

    expect(counters).toEqual({ buyLong: 4.5, sellLong: 0, sellShort: 0, buyShort: 2 });
  });
});
