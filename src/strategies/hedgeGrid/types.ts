import type { PositionSide } from '../../exchanges/adapters/types';

/** Resting quantity per order role, named by order direction and position side. */
export interface PendingOrderCounters {
  /** long entry / replenishment */
  buyLong: number;
  /** long take-profit */
  sellLong: number;
  /** short entry / replenishment */
  sellShort: number;
  /** short take-profit */
  buyShort: number;
}

export type CounterKey = keyof PendingOrderCounters;

export type OrderRole = 'entry' | 'take_profit';

export interface SideSpacing {
  replenish: number;
  takeProfit: number;
}

export interface GridBounds {
  mid: number;
  lower: number;
  upper: number;
}

export interface GridSettings {
  baseQuantity: number;
  gridSpacing: number;
  positionThreshold: number;
  positionLimit: number;
  orderFirstTimeMs: number;
  /** Percent through the touch for the opposite-exposure reduction. */
  reduceOffsetPct: number;
}

export type SideAction = 'entry' | 'entry_throttled' | 'in_sync' | 'conservative_take_profit' | 'conservative_hold' | 'grid_refreshed';

export type SideRecord<T> = Record<PositionSide, T>;

export function emptyCounters(): PendingOrderCounters {
  return { buyLong: 0, sellLong: 0, sellShort: 0, buyShort: 0 };
}
