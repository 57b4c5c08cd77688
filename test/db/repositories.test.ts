import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { newDb } from 'pg-mem';
import { runMigrations } from '../../src/db/migrations';
import type { Queryable } from '../../src/db/migrations';
import { PgProtectionStateRepository } from '../../src/db/protectionStateRepo';
import { PgTradeRepository } from '../../src/db/tradesRepo';
import { defaultProtectionState } from '../../src/guard/protectionState';
import type { TradeRecord } from '../../src/jobs/tradeLedger';

type TestPool = Queryable & { end(): Promise<void> };

function createInMemoryPool(): TestPool {
  const db = newDb();
  const adapter = db.adapters.createPg();
  return new adapter.Pool();
}

const HOUR = 3_600_000;

function trade(overrides: Partial<TradeRecord>): TradeRecord {
  return {
    timestamp: 10 * HOUR,
    orderId: 'o-1',
    side: 'buy',
    positionSide: 'long',
    price: 0.5,
    quantity: 3,
    realizedPnl: 0,
    ...overrides,
  };
}

describe('Postgres repositories', () => {
  let pool: TestPool;

  beforeEach(async () => {
    pool = createInMemoryPool();
    await runMigrations(pool);
  });

  afterEach(async () => {
    await pool.end();
  });

  it('runs migrations once per pool', async () => {
    await runMigrations(pool);
    const res = await pool.query('SELECT COUNT(*)::int AS n FROM protection_state');
    expect(res.rows[0].n).toBe(0);
  });

  describe('PgProtectionStateRepository', () => {
    it('returns null before anything is stored', async () => {
      const repo = new PgProtectionStateRepository(pool, 'XRPUSDC');

      expect(await repo.load()).toBeNull();
    });

    it('upserts and restores the full state', async () => {
      const repo = new PgProtectionStateRepository(pool, 'XRPUSDC');
      const state = {
        ...defaultProtectionState(),
        direction: 'up' as const,
        consecutiveBars: 2,
        cumulativeMovePct: 6.25,
        runStartPrice: 0.5,
        runStartedAt: 7 * HOUR,
        baselineVolatility: 0.002,
        lastBarAt: 8 * HOUR,
      };

      await repo.save(state);
      await repo.save({ ...state, protectionActive: true, hibernationStartedAt: 9 * HOUR });

      expect(await repo.load()).toEqual({ ...state, protectionActive: true, hibernationStartedAt: 9 * HOUR });
      const rows = await pool.query('SELECT state_key FROM protection_state');
      expect(rows.rows).toHaveLength(1);
    });

    it('keeps separate records per state key', async () => {
      await new PgProtectionStateRepository(pool, 'A').save({ ...defaultProtectionState(), baselineVolatility: 0.1 });
      await new PgProtectionStateRepository(pool, 'B').save({ ...defaultProtectionState(), baselineVolatility: 0.2 });

      expect((await new PgProtectionStateRepository(pool, 'A').load())?.baselineVolatility).toBe(0.1);
      expect((await new PgProtectionStateRepository(pool, 'B').load())?.baselineVolatility).toBe(0.2);
    });
  });

  describe('PgTradeRepository', () => {
    it('lists trades inside the window in time order for its symbol only', async () => {
      const repo = new PgTradeRepository(pool, 'XRP/USDC:USDC');
      const other = new PgTradeRepository(pool, 'ETH/USDC:USDC');
      await repo.recordTrade(trade({ orderId: 'late', timestamp: 11 * HOUR, side: 'sell', realizedPnl: 0.12 }));
      await repo.recordTrade(trade({ orderId: 'early', timestamp: 10 * HOUR }));
      await repo.recordTrade(trade({ orderId: 'stale', timestamp: 2 * HOUR }));
      await other.recordTrade(trade({ orderId: 'foreign', timestamp: 11 * HOUR }));

      const recent = await repo.recentTrades(3, 12 * HOUR);

      expect(recent.map((t) => t.orderId)).toEqual(['early', 'late']);
      expect(recent[1]).toEqual(trade({ orderId: 'late', timestamp: 11 * HOUR, side: 'sell', realizedPnl: 0.12 }));
    });

    it('prunes trades older than the cutoff', async () => {
      const repo = new PgTradeRepository(pool, 'XRP/USDC:USDC');
      await repo.recordTrade(trade({ orderId: 'old', timestamp: HOUR }));
      await repo.recordTrade(trade({ orderId: 'new', timestamp: 5 * HOUR }));

      expect(await repo.pruneBefore(2 * HOUR)).toBe(1);
      expect((await repo.recentTrades(100, 6 * HOUR)).map((t) => t.orderId)).toEqual(['new']);
    });
  });
});
