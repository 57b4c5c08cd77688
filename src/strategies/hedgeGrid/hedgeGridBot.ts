import type { MarketGateway } from '../../exchanges/adapters/types';
import type { ExtremeProtection } from '../../guard/extremeProtection';
import type { SignalAdapter } from '../../analytics/signalAdapter';
import type {
  BarClosedEvent,
  BookTickerEvent,
  OrderUpdateEvent,
  StreamEvent,
} from '../../services/streaming/futuresStreamGateway';
import { PriceTracker } from '../../services/marketData/priceValidator';
import type { Quote } from '../../services/marketData/priceValidator';
import type { TaskScheduler } from '../../jobs/taskScheduler';
import { summarizeTrades } from '../../jobs/tradeLedger';
import type { TradeRecorder } from '../../jobs/tradeLedger';
import { logger } from '../../utils/logger';
import { errorMessage, isTransientGatewayError } from '../../utils/formatError';
import { retry } from '../../utils/retry';
import { Mutex, SingleFlight, TickThrottle } from '../../utils/mutex';
import { fillCounter, gatewayErrorCounter, rejectedPriceCounter } from '../../telemetry/metrics';
import type { GridEngine } from './gridEngine';
import type { BotSettings } from './settings';

export interface Stoppable {
  stop(): Promise<void>;
}

export interface BotStream extends Stoppable {
  onEvent(listener: (event: StreamEvent) => void | Promise<void>): () => void;
  start(): Promise<void>;
  readonly lastMessageTime: number | null;
}

export type StreamFactory = (listenKeyProvider: () => Promise<string | null>) => BotStream;

export interface HedgeGridBotDeps {
  gateway: MarketGateway;
  engine: GridEngine;
  /** Null when extreme-move protection is disabled. */
  protection: ExtremeProtection | null;
  /** Null when trend-driven spacing is disabled. */
  signal: SignalAdapter | null;
  createStream: StreamFactory;
  scheduler: TaskScheduler;
  trades: TradeRecorder;
  settings: BotSettings;
  clock?: () => number;
}

type BotPhase = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

/**
 * Wires the stream, gateway, protection and grid engine into one event loop:
 * every accepted price passes protection first, then periodic reconciliation,
 * then one grid adjustment cycle.
 */
export class HedgeGridBot implements Stoppable {
  private phase: BotPhase = 'idle';
  private stream: BotStream | null = null;
  private unsubscribe: (() => void) | null = null;
  private readonly prices: PriceTracker;
  private readonly throttle: TickThrottle;
  private readonly tickFlight = new SingleFlight<void>();
  private readonly orderMutex = new Mutex();
  // Serializes run/volatility state between price evaluation and closed bars.
  private readonly protectionMutex = new Mutex();
  private readonly stopFlight = new SingleFlight<void>();
  private readonly clock: () => number;
  private listenKey: string | null = null;
  private keepaliveTimer: NodeJS.Timeout | null = null;
  private keepaliveRetryTimer: NodeJS.Timeout | null = null;
  private watchdogTimer: NodeJS.Timeout | null = null;
  private lastPositionSync = Number.NEGATIVE_INFINITY;
  private lastOrderSync = Number.NEGATIVE_INFINITY;
  private lastSignalRefresh = Number.NEGATIVE_INFINITY;
  private lastBarPoll = Number.NEGATIVE_INFINITY;

  constructor(private readonly deps: HedgeGridBotDeps) {
    this.clock = deps.clock ?? Date.now;
    this.prices = new PriceTracker(deps.settings.maxPriceJumpPct);
    this.throttle = new TickThrottle(deps.settings.tickIntervalMs);
  }

  get state(): BotPhase {
    return this.phase;
  }

  get latestQuote(): Quote | null {
    return this.prices.latest;
  }

  async start() {
    if (this.phase !== 'idle') {
      throw new Error(`bot_already_started:${this.phase}`);
    }
    this.phase = 'starting';
    const { gateway, settings } = this.deps;

    await retry(() => gateway.connect(), {
      attempts: settings.connectAttempts,
      delayMs: settings.connectDelayMs,
      backoffFactor: settings.connectBackoff,
      retryable: isTransientGatewayError,
      onRetry: (error, attempt) =>
        logger.warn('bot_connect_retry', { event: 'bot_connect_retry', attempt, error: errorMessage(error) }),
    });

    if (this.deps.protection) {
      await this.deps.protection.load();
    }
    await this.initializeSignal();

    const now = this.clock();
    await this.deps.engine.syncPositions();
    this.lastPositionSync = now;
    await this.deps.engine.syncPendingOrders();
    this.lastOrderSync = now;
    await this.pollBars();

    this.registerJobs();
    this.deps.scheduler.start();

    this.stream = this.deps.createStream(() => this.resolveListenKey());
    this.unsubscribe = this.stream.onEvent((event) => this.handleStreamEvent(event));
    await this.stream.start();

    this.watchdogTimer = setInterval(() => {
      void this.hibernationWatchdog();
    }, settings.watchdogIntervalMs);

    this.phase = 'running';
    logger.info('bot_started', {
      event: 'bot_started',
      symbol: gateway.symbol,
      position: this.deps.engine.position,
      counters: this.deps.engine.counters,
      protection: this.deps.protection?.getStatus() ?? null,
    });
  }

  private async initializeSignal() {
    const signal = this.deps.signal;
    if (!signal) return;
    try {
      await signal.initialize();
      this.lastSignalRefresh = this.clock();
    } catch (error) {
      logger.warn('bot_signal_init_failed', { event: 'bot_signal_init_failed', error: errorMessage(error) });
    }
  }

  private registerJobs() {
    const { scheduler, trades, settings } = this.deps;
    scheduler.register('trade_summary', settings.tradeSummaryIntervalMs, async () => {
      const recent = await trades.recentTrades(settings.tradeSummaryIntervalMs / 3_600_000, this.clock());
      logger.info('trade_summary', {
        event: 'trade_summary',
        ...summarizeTrades(recent),
        position: this.deps.engine.position,
      });
    });
    scheduler.register('trade_prune', settings.tradeSummaryIntervalMs, async () => {
      const removed = await trades.pruneBefore(this.clock() - settings.tradeRetentionHours * 3_600_000);
      if (removed > 0) {
        logger.info('trade_pruned', { event: 'trade_pruned', removed });
      }
    });
  }

  /** Handed to the stream; resolved on every (re)connect. Null runs on periodic order sync only. */
  async resolveListenKey(): Promise<string | null> {
    try {
      this.listenKey = await this.deps.gateway.createListenKey();
    } catch (error) {
      this.listenKey = null;
      logger.warn('bot_listen_key_unavailable', { event: 'bot_listen_key_unavailable', error: errorMessage(error) });
      return null;
    }
    if (!this.keepaliveTimer) {
      this.keepaliveTimer = setInterval(() => {
        void this.keepAliveListenKey();
      }, this.deps.settings.listenKeyKeepaliveMs);
    }
    return this.listenKey;
  }

  async keepAliveListenKey(): Promise<boolean> {
    if (!this.listenKey) return false;
    try {
      await this.deps.gateway.keepAliveListenKey();
      logger.debug('bot_listen_key_extended', { event: 'bot_listen_key_extended' });
      return true;
    } catch (error) {
      logger.warn('bot_listen_key_keepalive_failed', {
        event: 'bot_listen_key_keepalive_failed',
        error: errorMessage(error),
        retryInMs: this.deps.settings.listenKeyRetryMs,
      });
      if (!this.keepaliveRetryTimer) {
        this.keepaliveRetryTimer = setTimeout(() => {
          this.keepaliveRetryTimer = null;
          void this.retryKeepAlive();
        }, this.deps.settings.listenKeyRetryMs);
      }
      return false;
    }
  }

  private async retryKeepAlive() {
    try {
      await this.deps.gateway.keepAliveListenKey();
      logger.info('bot_listen_key_keepalive_recovered', { event: 'bot_listen_key_keepalive_recovered' });
    } catch (error) {
      logger.error('bot_listen_key_keepalive_retry_failed', {
        event: 'bot_listen_key_keepalive_retry_failed',
        error: errorMessage(error),
      });
    }
  }

  async handleStreamEvent(event: StreamEvent) {
    if (this.phase !== 'running' && this.phase !== 'starting') return;
    switch (event.kind) {
      case 'ticker':
        await this.handleTicker(event);
        return;
      case 'order':
        await this.handleOrderUpdate(event);
        return;
      case 'bar':
        await this.handleBar(event);
        return;
      case 'listenKeyExpired':
        logger.warn('bot_listen_key_expired', { event: 'bot_listen_key_expired' });
        this.listenKey = null;
        return;
    }
  }

  /** Drops the tick when the previous one is still being processed. */
  async handleTicker(event: BookTickerEvent) {
    if (event.symbol !== this.deps.settings.streamSymbol) return;
    if (this.tickFlight.running) return;
    const now = this.clock();
    if (!this.throttle.tryAcquire(now)) return;
    await this.tickFlight.run(() => this.processTicker(event.bid, event.ask, now));
  }

  private async processTicker(bid: number, ask: number, now: number) {
    const decision = this.prices.update(bid, ask, now);
    if (!decision.accepted) {
      rejectedPriceCounter.inc({ symbol: this.deps.gateway.symbol, reason: decision.reason });
      logger.warn('bot_price_rejected', {
        event: 'bot_price_rejected',
        reason: decision.reason,
        bid,
        ask,
        lastKnown: decision.price,
      });
      if (
        decision.reason !== 'implausible_jump' ||
        this.prices.consecutiveJumpRejects < this.deps.settings.jumpReanchorAfter
      ) {
        return;
      }
      if (!(await this.reanchorFromTicker(now))) return;
    }
    const quote = this.prices.latest;
    if (!quote) return;
    await this.processPrice(quote, now);
  }

  private async reanchorFromTicker(now: number) {
    try {
      const ticker = await this.deps.gateway.fetchTicker();
      const bid = ticker.bid ?? ticker.last;
      const ask = ticker.ask ?? ticker.last;
      if (bid === null || ask === null) return false;
      const anchored = this.prices.reanchor(bid, ask, now);
      if (anchored) {
        logger.warn('bot_price_reanchored', { event: 'bot_price_reanchored', bid, ask });
      }
      return anchored;
    } catch (error) {
      this.recordGatewayError('fetch_ticker', error);
      return false;
    }
  }

  private async processPrice(quote: Quote, now: number) {
    const { protection, engine } = this.deps;
    if (protection) {
      const outcome = await this.protectionMutex.runExclusive(async () => {
        await protection.recordPrice(quote.mid);
        if (protection.triggering) return null;
        return protection.evaluate({ bid: quote.bid, ask: quote.ask });
      });
      switch (outcome) {
        case null:
          return;
        case 'triggered':
          engine.resetAfterFlatten();
          return;
        case 'hibernating':
        case 'trigger_failed':
          return;
        case 'resumed':
          this.lastPositionSync = Number.NEGATIVE_INFINITY;
          this.lastOrderSync = Number.NEGATIVE_INFINITY;
          break;
        case 'normal':
          break;
      }
    }

    engine.setTouch(quote.bid, quote.ask);
    await this.reconcile(now);
    await engine.adjustGrid(quote.mid);
  }

  /** Timer-gated reconciliation; each failed check is retried on its next interval. */
  private async reconcile(now: number) {
    const { engine, settings, signal } = this.deps;
    if (now - this.lastPositionSync >= settings.positionSyncMs) {
      this.lastPositionSync = now;
      try {
        await engine.syncPositions();
      } catch (error) {
        this.recordGatewayError('fetch_position', error);
      }
    }
    if (now - this.lastOrderSync >= settings.orderSyncMs) {
      this.lastOrderSync = now;
      try {
        await engine.syncPendingOrders();
      } catch (error) {
        this.recordGatewayError('fetch_open_orders', error);
      }
    }
    if (signal && now - this.lastSignalRefresh >= settings.signalRefreshMs) {
      this.lastSignalRefresh = now;
      try {
        const adjustment = await signal.refresh();
        if (adjustment) engine.applySpacingMultipliers(adjustment);
      } catch (error) {
        this.recordGatewayError('fetch_klines', error);
      }
    }
    if (this.deps.protection && now - this.lastBarPoll >= settings.barPollMs) {
      await this.pollBars();
    }
  }

  /** REST fallback for closed bars; already-seen bars are skipped by protection. */
  private async pollBars() {
    const protection = this.deps.protection;
    if (!protection) return;
    this.lastBarPoll = this.clock();
    try {
      const bars = await this.deps.gateway.fetchKlines(this.deps.settings.barTimeframe, this.deps.settings.barSeedLimit);
      // the newest row is the bar still forming
      for (const bar of bars.slice(0, -1)) {
        await this.protectionMutex.runExclusive(() => protection.ingestBar(bar));
      }
    } catch (error) {
      this.recordGatewayError('fetch_klines', error);
    }
  }

  async handleOrderUpdate(event: OrderUpdateEvent) {
    if (event.symbol !== this.deps.settings.streamSymbol) return;
    await this.orderMutex.runExclusive(async () => {
      const { engine, trades } = this.deps;
      const result = engine.applyOrderUpdate(event);
      logger.info('bot_order_update', {
        event: 'bot_order_update',
        orderId: event.orderId,
        status: event.status,
        side: event.side,
        positionSide: event.positionSide,
        quantity: event.quantity,
        filled: event.cumulativeFilled,
      });
      if (result.filled) {
        fillCounter.inc({ symbol: this.deps.gateway.symbol, side: event.positionSide });
        try {
          await trades.recordTrade({
            timestamp: event.eventTime,
            orderId: event.orderId,
            side: event.side,
            positionSide: event.positionSide,
            price: event.lastFilledPrice > 0 ? event.lastFilledPrice : event.price,
            quantity: result.filledQuantity,
            realizedPnl: event.realizedPnl,
          });
        } catch (error) {
          logger.error('bot_trade_record_failed', {
            event: 'bot_trade_record_failed',
            orderId: event.orderId,
            error: errorMessage(error),
          });
        }
      }
      if (!result.terminal) return;
      try {
        await engine.syncPendingOrders();
        this.lastOrderSync = this.clock();
        if (result.filled) {
          await engine.syncPositions();
          this.lastPositionSync = this.clock();
        }
      } catch (error) {
        this.recordGatewayError('order_resync', error);
      }
    });
  }

  async handleBar(event: BarClosedEvent) {
    const protection = this.deps.protection;
    if (event.symbol !== this.deps.settings.streamSymbol || !protection) return;
    await this.protectionMutex.runExclusive(() => protection.ingestBar(event.bar));
  }

  /**
   * During hibernation a silent feed would stall the recovery check, so the
   * REST ticker stands in once the stream has been quiet past the stale limit.
   */
  async hibernationWatchdog() {
    const protection = this.deps.protection;
    if (!protection || !protection.active || this.phase !== 'running') return;
    const lastMessage = this.stream?.lastMessageTime ?? null;
    const now = this.clock();
    if (lastMessage !== null && now - lastMessage < this.deps.settings.staleFeedMs) return;
    try {
      const ticker = await this.deps.gateway.fetchTicker();
      const bid = ticker.bid ?? ticker.last;
      const ask = ticker.ask ?? ticker.last;
      if (bid === null || ask === null) return;
      logger.info('bot_watchdog_tick', { event: 'bot_watchdog_tick', bid, ask, lastMessage });
      await this.tickFlight.run(async () => {
        if (!this.prices.reanchor(bid, ask, now)) return;
        const quote = this.prices.latest;
        if (quote) await this.processPrice(quote, now);
      });
    } catch (error) {
      this.recordGatewayError('watchdog', error);
    }
  }

  stop(): Promise<void> {
    return this.stopFlight.run(() => this.shutdown());
  }

  private async shutdown() {
    if (this.phase === 'stopped') return;
    this.phase = 'stopping';
    logger.info('bot_stopping', { event: 'bot_stopping' });
    this.clearTimers();
    this.unsubscribe?.();
    this.unsubscribe = null;
    const stoppables: Array<[string, Stoppable]> = [['scheduler', this.deps.scheduler]];
    if (this.stream) stoppables.push(['stream', this.stream]);
    for (const [name, stoppable] of stoppables) {
      try {
        await stoppable.stop();
      } catch (error) {
        logger.error('bot_stop_failed', { event: 'bot_stop_failed', component: name, error: errorMessage(error) });
      }
    }
    try {
      await this.deps.gateway.disconnect();
    } catch (error) {
      logger.error('bot_stop_failed', { event: 'bot_stop_failed', component: 'gateway', error: errorMessage(error) });
    }
    this.stream = null;
    this.phase = 'stopped';
    logger.info('bot_stopped', { event: 'bot_stopped' });
  }

  private clearTimers() {
    if (this.keepaliveTimer) clearInterval(this.keepaliveTimer);
    if (this.keepaliveRetryTimer) clearTimeout(this.keepaliveRetryTimer);
    if (this.watchdogTimer) clearInterval(this.watchdogTimer);
    this.keepaliveTimer = null;
    this.keepaliveRetryTimer = null;
    this.watchdogTimer = null;
  }

  private recordGatewayError(operation: string, error: unknown) {
    gatewayErrorCounter.inc({ symbol: this.deps.gateway.symbol, operation });
    logger.error('bot_gateway_error', { event: 'bot_gateway_error', operation, error: errorMessage(error) });
  }
}
