import type { Queryable } from './migrations';
import { coerceProtectionState } from '../guard/protectionState';
import type { ProtectionState, ProtectionStateStore } from '../guard/protectionState';

type ProtectionStateRow = {
  direction: unknown;
  consecutive_bars: unknown;
  cumulative_move_pct: unknown;
  run_start_price: unknown;
  run_started_at: unknown;
  baseline_volatility: unknown;
  protection_active: unknown;
  hibernation_started_at: unknown;
  last_bar_at: unknown;
};

export class PgProtectionStateRepository implements ProtectionStateStore {
  constructor(private pool: Queryable, private stateKey: string) {}

  async load(): Promise<ProtectionState | null> {
    const res = await this.pool.query<ProtectionStateRow>(
      `SELECT direction, consecutive_bars, cumulative_move_pct, run_start_price, run_started_at,
              baseline_volatility, protection_active, hibernation_started_at, last_bar_at
       FROM protection_state WHERE state_key = $1`,
      [this.stateKey]
    );
    if (!res.rows.length) {
      return null;
    }
    const row = res.rows[0];
    return coerceProtectionState({
      direction: row.direction,
      consecutiveBars: row.consecutive_bars,
      cumulativeMovePct: row.cumulative_move_pct,
      runStartPrice: row.run_start_price,
      runStartedAt: row.run_started_at,
      baselineVolatility: row.baseline_volatility,
      protectionActive: row.protection_active,
      hibernationStartedAt: row.hibernation_started_at,
      lastBarAt: row.last_bar_at,
    });
  }

  async save(state: ProtectionState) {
    await this.pool.query(
      `INSERT INTO protection_state (state_key, direction, consecutive_bars, cumulative_move_pct, run_start_price, run_started_at, baseline_volatility, protection_active, hibernation_started_at, last_bar_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, NOW())
       ON CONFLICT (state_key) DO UPDATE
       SET direction = EXCLUDED.direction,
           consecutive_bars = EXCLUDED.consecutive_bars,
           cumulative_move_pct = EXCLUDED.cumulative_move_pct,
           run_start_price = EXCLUDED.run_start_price,
           run_started_at = EXCLUDED.run_started_at,
           baseline_volatility = EXCLUDED.baseline_volatility,
           protection_active = EXCLUDED.protection_active,
           hibernation_started_at = EXCLUDED.hibernation_started_at,
           last_bar_at = EXCLUDED.last_bar_at,
           updated_at = EXCLUDED.updated_at`,
      [
        this.stateKey,
        state.direction,
        state.consecutiveBars,
        state.cumulativeMovePct,
        state.runStartPrice,
        state.runStartedAt,
        state.baselineVolatility,
        state.protectionActive,
        state.hibernationStartedAt,
        state.lastBarAt,
      ]
    );
  }
}
