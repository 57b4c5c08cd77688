import type { OrderSide, PositionSide } from '../../exchanges/adapters/types';
import { emptyCounters } from './types';
import type { CounterKey, OrderRole, PendingOrderCounters } from './types';

export interface ClassifiableOrder {
  side: OrderSide;
  positionSide: PositionSide;
  reduceOnly: boolean;
}

const ROLE_KEYS: Record<PositionSide, Record<OrderRole, CounterKey>> = {
  long: { entry: 'buyLong', take_profit: 'sellLong' },
  short: { entry: 'sellShort', take_profit: 'buyShort' },
};

export function counterKeyFor(side: PositionSide, role: OrderRole): CounterKey {
  return ROLE_KEYS[side][role];
}

/**
 * Entry orders add to their position side (buy/long, sell/short) without the
 * reduce-only flag; take-profits trade against it with the flag set. Any other
 * combination has no grid role.
 */
export function classifyOrder(order: ClassifiableOrder): CounterKey | null {
  const opens = (order.positionSide === 'long') === (order.side === 'buy');
  if (opens && !order.reduceOnly) return counterKeyFor(order.positionSide, 'entry');
  if (!opens && order.reduceOnly) return counterKeyFor(order.positionSide, 'take_profit');
  return null;
}

export function belongsToSide(order: ClassifiableOrder, side: PositionSide) {
  return order.positionSide === side && classifyOrder(order) !== null;
}

export function countersFromOrders(orders: Array<ClassifiableOrder & { remaining: number }>): PendingOrderCounters {
  const counters = emptyCounters();
  for (const order of orders) {
    const key = classifyOrder(order);
    if (key) {
      counters[key] += order.remaining;
    }
  }
  return counters;
}
