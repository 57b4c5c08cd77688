import { describe, expect, it } from 'vitest';
import { InMemoryTradeLedger, summarizeTrades } from '../../src/jobs/tradeLedger';
import type { TradeRecord } from '../../src/jobs/tradeLedger';

const HOUR = 3_600_000;

function trade(timestamp: number, price: number, quantity: number, realizedPnl = 0): TradeRecord {
  return { timestamp, orderId: `o-${timestamp}`, side: 'sell', positionSide: 'long', price, quantity, realizedPnl };
}

describe('summarizeTrades', () => {
  it('totals count, volume, notional and pnl', () => {
    expect(summarizeTrades([trade(1, 0.5, 4, 0.25), trade(2, 0.25, 8, -0.5)])).toEqual({
      trades: 2,
      volume: 12,
      notional: 4,
      realizedPnl: -0.25,
    });
    expect(summarizeTrades([])).toEqual({ trades: 0, volume: 0, notional: 0, realizedPnl: 0 });
  });
});

describe('InMemoryTradeLedger', () => {
  it('filters by window and prunes old entries', async () => {
    const ledger = new InMemoryTradeLedger();
    await ledger.recordTrade(trade(HOUR, 0.5, 3));
    await ledger.recordTrade(trade(5 * HOUR, 0.5, 3));

    expect(await ledger.recentTrades(2, 6 * HOUR)).toHaveLength(1);
    expect(await ledger.pruneBefore(2 * HOUR)).toBe(1);
    expect(await ledger.recentTrades(100, 6 * HOUR)).toEqual([trade(5 * HOUR, 0.5, 3)]);
  });
});
