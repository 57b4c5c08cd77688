import type { Queryable } from './migrations';
import type { TradeRecord, TradeRecorder } from '../jobs/tradeLedger';

type TradeRow = {
  order_id: unknown;
  side: unknown;
  position_side: unknown;
  price: unknown;
  quantity: unknown;
  realized_pnl: unknown;
  executed_at: unknown;
};

function mapRow(row: TradeRow): TradeRecord {
  return {
    orderId: String(row.order_id),
    side: row.side === 'sell' ? 'sell' : 'buy',
    positionSide: row.position_side === 'short' ? 'short' : 'long',
    price: Number(row.price),
    quantity: Number(row.quantity),
    realizedPnl: Number(row.realized_pnl ?? 0),
    timestamp: Number(row.executed_at),
  };
}

export class PgTradeRepository implements TradeRecorder {
  constructor(private pool: Queryable, private symbol: string) {}

  async recordTrade(record: TradeRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO grid_trades (symbol, order_id, side, position_side, price, quantity, realized_pnl, executed_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        this.symbol,
        record.orderId,
        record.side,
        record.positionSide,
        record.price,
        record.quantity,
        record.realizedPnl,
        record.timestamp,
      ]
    );
  }

  async recentTrades(hours: number, now = Date.now()): Promise<TradeRecord[]> {
    const cutoff = now - hours * 3_600_000;
    const res = await this.pool.query<TradeRow>(
      `SELECT order_id, side, position_side, price, quantity, realized_pnl, executed_at
       FROM grid_trades
       WHERE symbol = $1 AND executed_at >= $2
       ORDER BY executed_at ASC`,
      [this.symbol, cutoff]
    );
    return res.rows.map(mapRow);
  }

  async pruneBefore(cutoff: number): Promise<number> {
    const res = await this.pool.query('DELETE FROM grid_trades WHERE symbol = $1 AND executed_at < $2', [
      this.symbol,
      cutoff,
    ]);
    return res.rowCount ?? 0;
  }
}
