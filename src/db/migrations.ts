import type { Pool } from 'pg';

export type Queryable = Pick<Pool, 'query'>;

const MIGRATION_QUERIES: string[] = [
  `CREATE TABLE IF NOT EXISTS protection_state (
      state_key TEXT PRIMARY KEY,
      direction TEXT NOT NULL DEFAULT 'neutral',
      consecutive_bars INTEGER NOT NULL DEFAULT 0,
      cumulative_move_pct DOUBLE PRECISION NOT NULL DEFAULT 0,
      run_start_price DOUBLE PRECISION,
      run_started_at BIGINT,
      baseline_volatility DOUBLE PRECISION,
      protection_active BOOLEAN NOT NULL DEFAULT FALSE,
      hibernation_started_at BIGINT,
      last_bar_at BIGINT,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );`,
  `CREATE TABLE IF NOT EXISTS grid_trades (
      id SERIAL PRIMARY KEY,
      symbol TEXT NOT NULL,
      order_id TEXT NOT NULL,
      side TEXT NOT NULL,
      position_side TEXT NOT NULL,
      price DOUBLE PRECISION NOT NULL,
      quantity DOUBLE PRECISION NOT NULL,
      realized_pnl DOUBLE PRECISION NOT NULL DEFAULT 0,
      executed_at BIGINT NOT NULL
    );`,
  `CREATE INDEX IF NOT EXISTS idx_grid_trades_symbol_time ON grid_trades(symbol, executed_at);`,
];

const ranPools = new WeakSet<object>();

export async function runMigrations(pool: Queryable) {
  if (ranPools.has(pool)) return;
  for (const query of MIGRATION_QUERIES) {
    await pool.query(query);
  }
  ranPools.add(pool);
}
