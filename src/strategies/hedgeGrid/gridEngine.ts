import type { MarketGateway, PositionSide, PositionSnapshot } from '../../exchanges/adapters/types';
import type { GridAdjustment } from '../../analytics/trendSignal';
import type { OrderUpdateEvent } from '../../services/streaming/futuresStreamGateway';
import { logger } from '../../utils/logger';
import { errorMessage } from '../../utils/formatError';
import {
  gatewayErrorCounter,
  orderCancelCounter,
  ordersPlacedCounter,
  pendingOrdersGauge,
  positionGauge,
  spacingGauge,
} from '../../telemetry/metrics';
import { belongsToSide, classifyOrder, counterKeyFor, countersFromOrders } from './orderClassifier';
import { emptyCounters } from './types';
import type { GridBounds, GridSettings, PendingOrderCounters, SideAction, SideRecord, SideSpacing } from './types';

export type GridGateway = Pick<
  MarketGateway,
  'symbol' | 'placeOrder' | 'cancelOrder' | 'fetchOpenOrders' | 'fetchPosition'
>;

export interface TouchPrices {
  bid: number;
  ask: number;
}

export interface OrderUpdateResult {
  terminal: boolean;
  filled: boolean;
  filledQuantity: number;
}

const SIDES: PositionSide[] = ['long', 'short'];

/**
 * Position and resting-order bookkeeping for both hedge sides, plus the
 * per-tick placement decisions that keep one take-profit and one
 * replenishment order working on each side.
 */
export class GridEngine {
  private positions: PositionSnapshot = { long: 0, short: 0 };
  private pending: PendingOrderCounters = emptyCounters();
  private spacing: SideRecord<SideSpacing>;
  private lastEntryAt: SideRecord<number> = { long: Number.NEGATIVE_INFINITY, short: Number.NEGATIVE_INFINITY };
  private touch: TouchPrices | null = null;
  private reductionPending = false;
  private readonly clock: () => number;

  constructor(
    private readonly gateway: GridGateway,
    private readonly settings: GridSettings,
    clock?: () => number
  ) {
    this.clock = clock ?? Date.now;
    this.spacing = this.baseSpacing();
  }

  get position(): Readonly<PositionSnapshot> {
    return { ...this.positions };
  }

  get counters(): Readonly<PendingOrderCounters> {
    return { ...this.pending };
  }

  spacingFor(side: PositionSide): Readonly<SideSpacing> {
    return { ...this.spacing[side] };
  }

  setTouch(bid: number, ask: number) {
    this.touch = { bid, ask };
  }

  setPosition(snapshot: PositionSnapshot) {
    this.positions = { long: Math.max(0, snapshot.long), short: Math.max(0, snapshot.short) };
    this.reductionPending = false;
    this.publishGauges();
  }

  async syncPositions() {
    const snapshot = await this.gateway.fetchPosition();
    this.setPosition(snapshot);
    logger.debug('grid_positions_synced', { event: 'grid_positions_synced', ...this.positions });
    return this.position;
  }

  /** Rebuilds all four counters from the exchange's open-order list. */
  async syncPendingOrders() {
    const orders = await this.gateway.fetchOpenOrders();
    this.pending = countersFromOrders(orders);
    this.publishGauges();
    logger.debug('grid_orders_synced', { event: 'grid_orders_synced', ...this.pending, openOrders: orders.length });
    return this.counters;
  }

  async cancelSide(side: PositionSide) {
    const orders = await this.gateway.fetchOpenOrders();
    const targets = orders.filter((order) => belongsToSide(order, side));
    let failed = false;
    for (const order of targets) {
      try {
        await this.gateway.cancelOrder(order.id);
        orderCancelCounter.inc({ symbol: this.gateway.symbol, side });
      } catch (error) {
        failed = true;
        this.recordGatewayError('cancel_order', error, { side, orderId: order.id });
      }
    }
    if (failed) {
      await this.syncPendingOrders();
    }
    return targets.length;
  }

  computeTakeProfitQuantity(position: number) {
    const cap = position > this.settings.positionLimit ? this.settings.baseQuantity * 2 : this.settings.baseQuantity;
    return Math.min(position, cap);
  }

  boundsFor(side: PositionSide, latestPrice: number): GridBounds {
    const { replenish, takeProfit } = this.spacing[side];
    if (side === 'long') {
      return { mid: latestPrice, lower: latestPrice * (1 - replenish), upper: latestPrice * (1 + takeProfit) };
    }
    return { mid: latestPrice, lower: latestPrice * (1 - takeProfit), upper: latestPrice * (1 + replenish) };
  }

  private countersConsistent(side: PositionSide, sizedQuantity: number) {
    const entry = this.pending[counterKeyFor(side, 'entry')];
    const takeProfit = this.pending[counterKeyFor(side, 'take_profit')];
    return entry > 0 && entry <= sizedQuantity && takeProfit > 0 && takeProfit <= sizedQuantity;
  }

  async adjustSide(side: PositionSide, latestPrice: number): Promise<SideAction> {
    const position = this.positions[side];
    if (position === 0) {
      return this.placeEntry(side);
    }

    const sized = this.computeTakeProfitQuantity(position);
    if (this.countersConsistent(side, sized)) {
      return 'in_sync';
    }
    if (position < this.settings.positionThreshold) {
      logger.info('grid_counters_resync', {
        event: 'grid_counters_resync',
        side,
        position,
        counters: this.pending,
      });
      await this.syncPendingOrders();
      if (this.countersConsistent(side, sized)) {
        return 'in_sync';
      }
    }

    if (position > this.settings.positionThreshold) {
      return this.placeConservativeTakeProfit(side, latestPrice, sized);
    }
    return this.refreshGrid(side, latestPrice, sized);
  }

  private async placeEntry(side: PositionSide): Promise<SideAction> {
    const now = this.clock();
    if (now - this.lastEntryAt[side] < this.settings.orderFirstTimeMs) {
      return 'entry_throttled';
    }
    if (!this.touch) {
      throw new Error('grid_touch_unavailable');
    }
    await this.cancelSide(side);
    const price = side === 'long' ? this.touch.bid : this.touch.ask;
    await this.gateway.placeOrder({
      side: side === 'long' ? 'buy' : 'sell',
      price,
      amount: this.settings.baseQuantity,
      reduceOnly: false,
      positionSide: side,
      type: 'limit',
    });
    this.lastEntryAt[side] = this.clock();
    ordersPlacedCounter.inc({ symbol: this.gateway.symbol, side, purpose: 'entry' });
    logger.info('grid_entry_placed', { event: 'grid_entry_placed', side, price, amount: this.settings.baseQuantity });
    return 'entry';
  }

  private async placeConservativeTakeProfit(side: PositionSide, latestPrice: number, quantity: number): Promise<SideAction> {
    if (this.pending[counterKeyFor(side, 'take_profit')] > 0) {
      return 'conservative_hold';
    }
    const own = this.positions[side];
    const opposing = this.positions[side === 'long' ? 'short' : 'long'];
    const ratio = own / Math.max(opposing, 1) / 100 + 1;
    const price = side === 'long' ? latestPrice * ratio : latestPrice / ratio;
    await this.placeTakeProfit(side, price, quantity);
    logger.info('grid_conservative_take_profit', {
      event: 'grid_conservative_take_profit',
      side,
      position: own,
      opposing,
      ratio,
      price,
      quantity,
    });
    return 'conservative_take_profit';
  }

  private async refreshGrid(side: PositionSide, latestPrice: number, quantity: number): Promise<SideAction> {
    const bounds = this.boundsFor(side, latestPrice);
    await this.cancelSide(side);
    const takeProfitPrice = side === 'long' ? bounds.upper : bounds.lower;
    const replenishPrice = side === 'long' ? bounds.lower : bounds.upper;
    await this.placeTakeProfit(side, takeProfitPrice, quantity);
    await this.gateway.placeOrder({
      side: side === 'long' ? 'buy' : 'sell',
      price: replenishPrice,
      amount: quantity,
      reduceOnly: false,
      positionSide: side,
      type: 'limit',
    });
    ordersPlacedCounter.inc({ symbol: this.gateway.symbol, side, purpose: 'replenish' });
    logger.info('grid_side_refreshed', {
      event: 'grid_side_refreshed',
      side,
      mid: bounds.mid,
      takeProfitPrice,
      replenishPrice,
      quantity,
    });
    return 'grid_refreshed';
  }

  private async placeTakeProfit(side: PositionSide, price: number, quantity: number) {
    await this.gateway.placeOrder({
      side: side === 'long' ? 'sell' : 'buy',
      price,
      amount: quantity,
      reduceOnly: true,
      positionSide: side,
      type: 'limit',
    });
    ordersPlacedCounter.inc({ symbol: this.gateway.symbol, side, purpose: 'take_profit' });
  }

  /**
   * When both sides sit above the threshold, closes half of the smaller
   * position on each side through the touch. Not repeated until the next
   * position sync or fill.
   */
  async reduceOppositeExposure() {
    const { long, short } = this.positions;
    const threshold = this.settings.positionThreshold;
    if (!(long > threshold && short > threshold) || this.reductionPending || !this.touch) {
      return false;
    }
    const quantity = Math.min(long, short) * 0.5;
    if (quantity <= 0) return false;
    const offset = this.settings.reduceOffsetPct / 100;
    const sellPrice = this.touch.bid * (1 - offset);
    const buyPrice = this.touch.ask * (1 + offset);
    logger.warn('grid_reduce_exposure', {
      event: 'grid_reduce_exposure',
      long,
      short,
      quantity,
      sellPrice,
      buyPrice,
    });
    this.reductionPending = true;
    try {
      await this.gateway.placeOrder({
        side: 'sell',
        price: sellPrice,
        amount: quantity,
        reduceOnly: true,
        positionSide: 'long',
        type: 'limit',
      });
      await this.gateway.placeOrder({
        side: 'buy',
        price: buyPrice,
        amount: quantity,
        reduceOnly: true,
        positionSide: 'short',
        type: 'limit',
      });
    } catch (error) {
      this.reductionPending = false;
      throw error;
    }
    ordersPlacedCounter.inc({ symbol: this.gateway.symbol, side: 'long', purpose: 'reduce' });
    ordersPlacedCounter.inc({ symbol: this.gateway.symbol, side: 'short', purpose: 'reduce' });
    return true;
  }

  /** One adjustment cycle; a gateway failure abandons only the side it happened on. */
  async adjustGrid(latestPrice: number): Promise<SideRecord<SideAction | 'failed'>> {
    try {
      await this.reduceOppositeExposure();
    } catch (error) {
      this.recordGatewayError('reduce_exposure', error);
    }
    const result: SideRecord<SideAction | 'failed'> = { long: 'failed', short: 'failed' };
    for (const side of SIDES) {
      try {
        result[side] = await this.adjustSide(side, latestPrice);
      } catch (error) {
        this.recordGatewayError('adjust_side', error, { side });
      }
    }
    return result;
  }

  applyOrderUpdate(update: OrderUpdateEvent): OrderUpdateResult {
    const key = classifyOrder(update);
    const remaining = Math.max(0, update.quantity - update.cumulativeFilled);
    const result: OrderUpdateResult = { terminal: false, filled: false, filledQuantity: 0 };

    switch (update.status) {
      case 'NEW':
        if (key) this.pending[key] += remaining;
        break;
      case 'FILLED': {
        const filled = update.cumulativeFilled > 0 ? update.cumulativeFilled : update.quantity;
        const side = update.positionSide;
        this.positions[side] = update.reduceOnly
          ? Math.max(0, this.positions[side] - filled)
          : this.positions[side] + filled;
        if (key) this.pending[key] = Math.max(0, this.pending[key] - update.quantity);
        this.reductionPending = false;
        Object.assign(result, { terminal: true, filled: true, filledQuantity: filled });
        break;
      }
      case 'CANCELED':
      case 'EXPIRED':
      case 'EXPIRED_IN_MATCH':
      case 'REJECTED':
        if (key) this.pending[key] = Math.max(0, this.pending[key] - remaining);
        result.terminal = true;
        break;
      default:
        break;
    }
    this.publishGauges();
    return result;
  }

  /** Multiplies current spacings; successive adjustments compound. */
  applySpacingMultipliers(adjustment: GridAdjustment) {
    for (const side of SIDES) {
      this.spacing[side] = {
        replenish: this.spacing[side].replenish * adjustment[side].replenish,
        takeProfit: this.spacing[side].takeProfit * adjustment[side].takeProfit,
      };
    }
    this.publishGauges();
    logger.info('grid_spacing_adjusted', {
      event: 'grid_spacing_adjusted',
      classification: adjustment.classification,
      long: this.spacing.long,
      short: this.spacing.short,
    });
  }

  resetSpacing() {
    this.spacing = this.baseSpacing();
    this.publishGauges();
  }

  /** Clears local books after an emergency flatten and restarts the entry gate. */
  resetAfterFlatten() {
    this.positions = { long: 0, short: 0 };
    this.pending = emptyCounters();
    this.lastEntryAt = { long: Number.NEGATIVE_INFINITY, short: Number.NEGATIVE_INFINITY };
    this.reductionPending = false;
    this.publishGauges();
  }

  private baseSpacing(): SideRecord<SideSpacing> {
    const spacing = this.settings.gridSpacing;
    return {
      long: { replenish: spacing, takeProfit: spacing },
      short: { replenish: spacing, takeProfit: spacing },
    };
  }

  private recordGatewayError(operation: string, error: unknown, meta: Record<string, unknown> = {}) {
    gatewayErrorCounter.inc({ symbol: this.gateway.symbol, operation });
    logger.error('grid_gateway_error', {
      event: 'grid_gateway_error',
      operation,
      error: errorMessage(error),
      ...meta,
    });
  }

  private publishGauges() {
    const symbol = this.gateway.symbol;
    for (const side of SIDES) {
      positionGauge.set({ symbol, side }, this.positions[side]);
      spacingGauge.set({ symbol, side, kind: 'replenish' }, this.spacing[side].replenish);
      spacingGauge.set({ symbol, side, kind: 'take_profit' }, this.spacing[side].takeProfit);
    }
    for (const [role, value] of Object.entries(this.pending)) {
      pendingOrdersGauge.set({ symbol, role }, value);
    }
  }
}
