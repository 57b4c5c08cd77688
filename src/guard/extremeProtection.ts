import type { GatewayOrder, MarketGateway, OhlcvBar, PositionSide, PositionSnapshot } from '../exchanges/adapters/types';
import type { Notifier } from '../alerts/notifier';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/formatError';
import { sleep as defaultSleep } from '../utils/retry';
import { SingleFlight } from '../utils/mutex';
import {
  flattenOrderCounter,
  gatewayErrorCounter,
  protectionActiveGauge,
  protectionTriggerCounter,
  runMoveGauge,
  volatilityGauge,
} from '../telemetry/metrics';
import { toKlineBar } from './klines';
import type { KlineBar } from './klines';
import { advanceRun, emptyRun } from './runDetector';
import { VolatilityTracker } from './volatilityTracker';
import { coerceProtectionState, defaultProtectionState } from './protectionState';
import type { ProtectionState, ProtectionStateStore } from './protectionState';

export interface ProtectionSettings {
  extremeThresholdPct: number;
  hibernationHours: number;
  recoveryMultiplier: number;
  emergencyCloseTimeoutMs: number;
  fillPollIntervalMs: number;
  /** Percent through the touch for flatten orders. */
  closeOffsetPct: number;
}

type FlattenFillResult = 'filled' | 'unconfirmed' | 'terminal';

export type ProtectionOutcome = 'normal' | 'hibernating' | 'resumed' | 'triggered' | 'trigger_failed';

export interface TouchQuote {
  bid: number;
  ask: number;
}

export type ProtectionGateway = Pick<
  MarketGateway,
  'symbol' | 'fetchOpenOrders' | 'cancelOrder' | 'fetchPosition' | 'placeOrder' | 'fetchOrder'
>;

export interface ExtremeProtectionDeps {
  gateway: ProtectionGateway;
  store: ProtectionStateStore;
  notifier: Notifier;
  settings: ProtectionSettings;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface ProtectionStatus {
  protectionActive: boolean;
  direction: ProtectionState['direction'];
  consecutiveBars: number;
  cumulativeMovePct: number;
  currentVolatility: number;
  baselineVolatility: number | null;
  hibernationStartedAt: number | null;
  elapsedHours: number | null;
  remainingHours: number | null;
}

const HOUR_MS = 3_600_000;

export class ExtremeProtection {
  private state: ProtectionState = defaultProtectionState();
  private volatility = new VolatilityTracker();
  private readonly triggerFlight = new SingleFlight<boolean>();
  private readonly clock: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly deps: ExtremeProtectionDeps) {
    this.clock = deps.clock ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get snapshot(): Readonly<ProtectionState> {
    return { ...this.state, baselineVolatility: this.volatility.baseline };
  }

  get active() {
    return this.state.protectionActive;
  }

  get currentVolatility() {
    return this.volatility.current;
  }

  async load() {
    const persisted = await this.deps.store.load();
    this.state = persisted ? coerceProtectionState(persisted, this.clock()) : defaultProtectionState();
    this.volatility = new VolatilityTracker(this.state.baselineVolatility);
    this.publishGauges();
    logger.info('protection_state_loaded', {
      event: 'protection_state_loaded',
      restored: persisted !== null,
      protectionActive: this.state.protectionActive,
      direction: this.state.direction,
      cumulativeMovePct: this.state.cumulativeMovePct,
      baselineVolatility: this.state.baselineVolatility,
    });
    return this.snapshot;
  }

  /** Feeds one processed price into the volatility tracker. */
  async recordPrice(price: number) {
    const hadBaseline = this.volatility.baseline !== null;
    const value = this.volatility.record(price);
    if (!hadBaseline && this.volatility.baseline !== null) {
      this.state.baselineVolatility = this.volatility.baseline;
      logger.info('protection_baseline_captured', {
        event: 'protection_baseline_captured',
        baselineVolatility: this.volatility.baseline,
        samples: this.volatility.samples,
      });
      await this.persist();
    }
    return value;
  }

  /** Folds a closed bar into run detection. Returns null for bars already seen. */
  async ingestBar(bar: OhlcvBar): Promise<KlineBar | null> {
    if (this.state.lastBarAt !== null && bar.timestamp <= this.state.lastBarAt) {
      return null;
    }
    const kline = toKlineBar(bar);
    const before = this.state.direction;
    const next = advanceRun(this.state, kline);
    this.state = { ...this.state, ...next, lastBarAt: bar.timestamp };
    if (before !== 'neutral' && kline.direction === 'neutral') {
      logger.info('protection_run_ended', { event: 'protection_run_ended', previousDirection: before });
    } else if (next.consecutiveBars === 1) {
      logger.info('protection_run_started', {
        event: 'protection_run_started',
        direction: next.direction,
        startPrice: next.runStartPrice,
      });
    }
    logger.debug('protection_run_state', {
      event: 'protection_run_state',
      direction: this.state.direction,
      consecutiveBars: this.state.consecutiveBars,
      cumulativeMovePct: this.state.cumulativeMovePct,
    });
    await this.persist();
    return kline;
  }

  isExtreme() {
    return (
      this.state.direction !== 'neutral' &&
      Math.abs(this.state.cumulativeMovePct) >= this.deps.settings.extremeThresholdPct
    );
  }

  /**
   * One protection pass for a processed price. While hibernating only the
   * hibernation-end check runs.
   */
  async evaluate(quote: TouchQuote): Promise<ProtectionOutcome> {
    if (this.state.protectionActive) {
      const resumed = await this.checkHibernationEnd();
      return resumed ? 'resumed' : 'hibernating';
    }
    if (!this.isExtreme()) {
      return 'normal';
    }
    const activated = await this.trigger(quote);
    return activated ? 'triggered' : 'trigger_failed';
  }

  async checkHibernationEnd(): Promise<boolean> {
    const startedAt = this.state.hibernationStartedAt;
    if (!this.state.protectionActive || startedAt === null) return false;
    const elapsedHours = (this.clock() - startedAt) / HOUR_MS;
    if (elapsedHours < this.deps.settings.hibernationHours) {
      return false;
    }
    const current = this.volatility.current;
    const baseline = this.volatility.baseline;
    if (!this.isVolatilityRecovered(current, baseline)) {
      logger.debug('protection_hibernation_waiting_volatility', {
        event: 'protection_hibernation_waiting_volatility',
        elapsedHours,
        currentVolatility: current,
        baselineVolatility: baseline,
      });
      return false;
    }

    this.state.protectionActive = false;
    this.state.hibernationStartedAt = null;
    await this.persist();
    logger.critical('protection_hibernation_ended', {
      event: 'protection_hibernation_ended',
      elapsedHours,
      currentVolatility: current,
      baselineVolatility: baseline,
    });
    await this.deps.notifier.notifyCritical(
      `Hibernation ended after ${elapsedHours.toFixed(1)}h; volatility ${current.toFixed(6)} vs baseline ${(baseline ?? 0).toFixed(6)}. Grid resumes.`
    );
    return true;
  }

  isVolatilityRecovered(current: number, baseline: number | null) {
    if (baseline === null || baseline <= 0 || current <= 0) return false;
    return current <= baseline * this.deps.settings.recoveryMultiplier;
  }

  /** Runs the emergency sequence; concurrent callers share one execution. */
  trigger(quote: TouchQuote): Promise<boolean> {
    return this.triggerFlight.run(() => this.runEmergencySequence(quote));
  }

  get triggering() {
    return this.triggerFlight.running;
  }

  private async runEmergencySequence(quote: TouchQuote): Promise<boolean> {
    const symbol = this.deps.gateway.symbol;
    logger.critical('protection_emergency_start', {
      event: 'protection_emergency_start',
      direction: this.state.direction,
      consecutiveBars: this.state.consecutiveBars,
      cumulativeMovePct: this.state.cumulativeMovePct,
      runStartPrice: this.state.runStartPrice,
      bid: quote.bid,
      ask: quote.ask,
    });

    const cancelled = await this.cancelAllOrders();
    const flattened = await this.flattenPositions(quote);

    if (!cancelled || !flattened) {
      protectionTriggerCounter.inc({ symbol, outcome: 'failed' });
      logger.critical('protection_emergency_failed', {
        event: 'protection_emergency_failed',
        cancelled,
        flattened,
      });
      await this.deps.notifier.notifyCritical(
        `Emergency sequence incomplete (cancel=${cancelled}, flatten=${flattened}). Protection NOT active; manual review required.`
      );
      return false;
    }

    const runMove = this.state.cumulativeMovePct;
    const runDirection = this.state.direction;
    this.state = {
      ...this.state,
      ...emptyRun(),
      protectionActive: true,
      hibernationStartedAt: this.clock(),
    };
    await this.persist();
    protectionTriggerCounter.inc({ symbol, outcome: 'activated' });
    logger.critical('protection_hibernation_started', {
      event: 'protection_hibernation_started',
      hibernationStartedAt: this.state.hibernationStartedAt,
      hibernationHours: this.deps.settings.hibernationHours,
      runDirection,
      runMove,
    });
    await this.deps.notifier.notifyCritical(
      `Extreme ${runDirection} move of ${runMove.toFixed(2)}%: orders cancelled, positions flattened, hibernating ${this.deps.settings.hibernationHours}h.`
    );
    return true;
  }

  private async cancelAllOrders(): Promise<boolean> {
    let orders: GatewayOrder[];
    try {
      orders = await this.deps.gateway.fetchOpenOrders();
    } catch (error) {
      this.recordGatewayError('fetch_open_orders', error);
      return false;
    }
    if (!orders.length) return true;

    const results = await Promise.allSettled(orders.map((order) => this.deps.gateway.cancelOrder(order.id)));
    let failures = 0;
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        failures += 1;
        logger.error('protection_cancel_failed', {
          event: 'protection_cancel_failed',
          orderId: orders[index].id,
          error: errorMessage(result.reason),
        });
      }
    });
    logger.info('protection_cancel_summary', {
      event: 'protection_cancel_summary',
      total: orders.length,
      failures,
    });
    return failures === 0;
  }

  private async flattenPositions(quote: TouchQuote): Promise<boolean> {
    let position: PositionSnapshot;
    try {
      position = await this.deps.gateway.fetchPosition();
    } catch (error) {
      this.recordGatewayError('fetch_position', error);
      return false;
    }
    const tasks: Promise<boolean>[] = [];
    if (position.long > 0) tasks.push(this.closeSide('long', position.long, quote));
    if (position.short > 0) tasks.push(this.closeSide('short', position.short, quote));
    if (!tasks.length) return true;
    const results = await Promise.all(tasks);
    return results.every(Boolean);
  }

  private async closeSide(side: PositionSide, quantity: number, quote: TouchQuote): Promise<boolean> {
    const offset = this.deps.settings.closeOffsetPct / 100;
    const price = side === 'long' ? quote.bid * (1 - offset) : quote.ask * (1 + offset);
    let order: GatewayOrder;
    try {
      order = await this.deps.gateway.placeOrder({
        side: side === 'long' ? 'sell' : 'buy',
        price,
        amount: quantity,
        reduceOnly: true,
        positionSide: side,
        type: 'limit',
      });
    } catch (error) {
      this.recordGatewayError('emergency_close', error);
      return false;
    }
    logger.critical('protection_close_order_placed', {
      event: 'protection_close_order_placed',
      side,
      quantity,
      price,
      orderId: order.id,
    });
    const result = order.status === 'filled' ? 'filled' : await this.waitForFill(order.id);
    flattenOrderCounter.inc({ symbol: this.deps.gateway.symbol, side, result });
    // A resting close order still counts as flattening; only a dead order fails the sequence.
    return result !== 'terminal';
  }

  private async waitForFill(orderId: string): Promise<FlattenFillResult> {
    const deadline = this.clock() + this.deps.settings.emergencyCloseTimeoutMs;
    while (this.clock() < deadline) {
      try {
        const order = await this.deps.gateway.fetchOrder(orderId);
        if (order.status === 'filled') {
          return 'filled';
        }
        if (order.status !== 'open') {
          logger.warn('protection_close_order_terminal', {
            event: 'protection_close_order_terminal',
            orderId,
            status: order.status,
          });
          return 'terminal';
        }
      } catch (error) {
        this.recordGatewayError('fetch_order', error);
      }
      await this.sleep(this.deps.settings.fillPollIntervalMs);
    }
    logger.warn('protection_close_order_unconfirmed', {
      event: 'protection_close_order_unconfirmed',
      orderId,
      timeoutMs: this.deps.settings.emergencyCloseTimeoutMs,
    });
    return 'unconfirmed';
  }

  getStatus(): ProtectionStatus {
    const startedAt = this.state.hibernationStartedAt;
    const elapsedHours = startedAt === null ? null : (this.clock() - startedAt) / HOUR_MS;
    return {
      protectionActive: this.state.protectionActive,
      direction: this.state.direction,
      consecutiveBars: this.state.consecutiveBars,
      cumulativeMovePct: this.state.cumulativeMovePct,
      currentVolatility: this.volatility.current,
      baselineVolatility: this.volatility.baseline,
      hibernationStartedAt: startedAt,
      elapsedHours,
      remainingHours:
        elapsedHours === null ? null : Math.max(0, this.deps.settings.hibernationHours - elapsedHours),
    };
  }

  /** Operator override: leaves hibernation and clears the run, keeping the baseline. */
  async forceReset() {
    this.state = {
      ...this.state,
      ...emptyRun(),
      protectionActive: false,
      hibernationStartedAt: null,
    };
    await this.persist();
    logger.warn('protection_force_reset', { event: 'protection_force_reset' });
  }

  private recordGatewayError(operation: string, error: unknown) {
    gatewayErrorCounter.inc({ symbol: this.deps.gateway.symbol, operation });
    logger.error('protection_gateway_error', {
      event: 'protection_gateway_error',
      operation,
      error: errorMessage(error),
    });
  }

  private publishGauges() {
    const symbol = this.deps.gateway.symbol;
    protectionActiveGauge.set({ symbol }, this.state.protectionActive ? 1 : 0);
    runMoveGauge.set({ symbol }, this.state.cumulativeMovePct);
    volatilityGauge.set({ symbol, kind: 'current' }, this.volatility.current);
    if (this.volatility.baseline !== null) {
      volatilityGauge.set({ symbol, kind: 'baseline' }, this.volatility.baseline);
    }
  }

  private async persist() {
    this.state.baselineVolatility = this.volatility.baseline;
    this.publishGauges();
    try {
      await this.deps.store.save({ ...this.state });
    } catch (error) {
      logger.error('protection_state_persist_failed', {
        event: 'protection_state_persist_failed',
        error: errorMessage(error),
      });
    }
  }
}
