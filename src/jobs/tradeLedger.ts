import type { OrderSide, PositionSide } from '../exchanges/adapters/types';

export interface TradeRecord {
  timestamp: number;
  orderId: string;
  side: OrderSide;
  positionSide: PositionSide;
  price: number;
  quantity: number;
  realizedPnl: number;
}

export interface TradeSummary {
  trades: number;
  volume: number;
  notional: number;
  realizedPnl: number;
}

export interface TradeRecorder {
  recordTrade(record: TradeRecord): Promise<void>;
  recentTrades(hours: number, now?: number): Promise<TradeRecord[]>;
  pruneBefore(cutoff: number): Promise<number>;
}

export function summarizeTrades(trades: TradeRecord[]): TradeSummary {
  return trades.reduce<TradeSummary>(
    (acc, trade) => ({
      trades: acc.trades + 1,
      volume: acc.volume + trade.quantity,
      notional: acc.notional + trade.quantity * trade.price,
      realizedPnl: acc.realizedPnl + trade.realizedPnl,
    }),
    { trades: 0, volume: 0, notional: 0, realizedPnl: 0 }
  );
}

export class InMemoryTradeLedger implements TradeRecorder {
  private readonly trades: TradeRecord[] = [];

  async recordTrade(record: TradeRecord): Promise<void> {
    this.trades.push({ ...record });
  }

  async recentTrades(hours: number, now = Date.now()): Promise<TradeRecord[]> {
    const cutoff = now - hours * 3_600_000;
    return this.trades.filter((trade) => trade.timestamp >= cutoff).map((trade) => ({ ...trade }));
  }

  async pruneBefore(cutoff: number): Promise<number> {
    const before = this.trades.length;
    const kept = this.trades.filter((trade) => trade.timestamp >= cutoff);
    this.trades.splice(0, this.trades.length, ...kept);
    return before - kept.length;
  }
}
