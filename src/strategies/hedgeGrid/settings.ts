import { CONFIG } from '../../config';
import type { AppConfig } from '../../config';
import type { ProtectionSettings } from '../../guard/extremeProtection';
import type { SignalAdapterSettings } from '../../analytics/signalAdapter';
import type { GridSettings } from './types';

export interface BotSettings {
  streamSymbol: string;
  tickIntervalMs: number;
  maxPriceJumpPct: number;
  /** Consecutive implausible-jump rejections before re-anchoring on the REST ticker. */
  jumpReanchorAfter: number;
  positionSyncMs: number;
  orderSyncMs: number;
  signalRefreshMs: number;
  barPollMs: number;
  barTimeframe: string;
  barSeedLimit: number;
  listenKeyKeepaliveMs: number;
  listenKeyRetryMs: number;
  staleFeedMs: number;
  watchdogIntervalMs: number;
  tradeSummaryIntervalMs: number;
  tradeRetentionHours: number;
  connectAttempts: number;
  connectDelayMs: number;
  connectBackoff: number;
}

function requirePositive(name: string, value: number) {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`invalid_setting:${name}`);
  }
  return value;
}

function requireNonNegative(name: string, value: number) {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`invalid_setting:${name}`);
  }
  return value;
}

function requireCount(name: string, value: number, min: number) {
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`invalid_setting:${name}`);
  }
  return value;
}

export function buildGridSettings(config: AppConfig = CONFIG): GridSettings {
  const grid = config.GRID;
  const spacing = requirePositive('GRID_SPACING', grid.SPACING);
  if (spacing >= 1) {
    throw new Error('invalid_setting:GRID_SPACING');
  }
  return {
    baseQuantity: requirePositive('GRID_BASE_QUANTITY', grid.BASE_QUANTITY),
    gridSpacing: spacing,
    positionThreshold: requirePositive('GRID_POSITION_THRESHOLD', grid.POSITION_THRESHOLD),
    positionLimit: requirePositive('GRID_POSITION_LIMIT', grid.POSITION_LIMIT),
    orderFirstTimeMs: requireNonNegative('GRID_ORDER_FIRST_TIME_MS', grid.ORDER_FIRST_TIME_MS),
    reduceOffsetPct: requireNonNegative('GRID_REDUCE_OFFSET_PCT', grid.REDUCE_OFFSET_PCT),
  };
}

export function buildProtectionSettings(config: AppConfig = CONFIG): ProtectionSettings {
  const protection = config.PROTECTION;
  const multiplier = requirePositive('PROTECTION_RECOVERY_MULTIPLIER', protection.RECOVERY_MULTIPLIER);
  if (multiplier < 1) {
    throw new Error('invalid_setting:PROTECTION_RECOVERY_MULTIPLIER');
  }
  return {
    extremeThresholdPct: requirePositive('PROTECTION_EXTREME_THRESHOLD_PCT', protection.EXTREME_THRESHOLD_PCT),
    hibernationHours: requireNonNegative('PROTECTION_HIBERNATION_HOURS', protection.HIBERNATION_HOURS),
    recoveryMultiplier: multiplier,
    emergencyCloseTimeoutMs: requirePositive('PROTECTION_EMERGENCY_CLOSE_TIMEOUT_MS', protection.EMERGENCY_CLOSE_TIMEOUT_MS),
    fillPollIntervalMs: requirePositive('PROTECTION_FILL_POLL_INTERVAL_MS', protection.FILL_POLL_INTERVAL_MS),
    closeOffsetPct: requireNonNegative('PROTECTION_CLOSE_OFFSET_PCT', protection.CLOSE_OFFSET_PCT),
  };
}

export function buildSignalSettings(config: AppConfig = CONFIG): SignalAdapterSettings {
  const signal = config.SIGNAL;
  const emaShort = requirePositive('SIGNAL_EMA_SHORT', signal.EMA_SHORT);
  const emaMedium = requirePositive('SIGNAL_EMA_MEDIUM', signal.EMA_MEDIUM);
  const emaLong = requirePositive('SIGNAL_EMA_LONG', signal.EMA_LONG);
  if (!(emaShort < emaMedium && emaMedium < emaLong)) {
    throw new Error('invalid_setting:SIGNAL_EMA_ORDER');
  }
  return {
    timeframe: signal.TIMEFRAME,
    historyLimit: requirePositive('SIGNAL_HISTORY_LIMIT', signal.HISTORY_LIMIT),
    emaShort,
    emaMedium,
    emaLong,
    adxPeriod: requirePositive('SIGNAL_ADX_PERIOD', signal.ADX_PERIOD),
    adxThreshold: requirePositive('SIGNAL_ADX_THRESHOLD', signal.ADX_THRESHOLD),
  };
}

export function buildBotSettings(config: AppConfig = CONFIG): BotSettings {
  return {
    streamSymbol: config.EXCHANGE.STREAM_SYMBOL,
    tickIntervalMs: requireNonNegative('GRID_TICK_INTERVAL_MS', config.GRID.TICK_INTERVAL_MS),
    maxPriceJumpPct: requirePositive('GRID_MAX_PRICE_JUMP_PCT', config.GRID.MAX_PRICE_JUMP_PCT),
    jumpReanchorAfter: requireCount('GRID_JUMP_REANCHOR_AFTER', config.GRID.JUMP_REANCHOR_AFTER, 1),
    positionSyncMs: requirePositive('SYNC_POSITION_INTERVAL_MS', config.SYNC.POSITION_INTERVAL_MS),
    orderSyncMs: requirePositive('SYNC_ORDER_INTERVAL_MS', config.SYNC.ORDER_INTERVAL_MS),
    signalRefreshMs: requirePositive('SYNC_SIGNAL_INTERVAL_MS', config.SYNC.SIGNAL_INTERVAL_MS),
    barPollMs: requirePositive('SYNC_BAR_POLL_INTERVAL_MS', config.SYNC.BAR_POLL_INTERVAL_MS),
    barTimeframe: config.PROTECTION.BAR_TIMEFRAME,
    // the newest polled bar is still forming, so at least one closed bar needs two rows
    barSeedLimit: requireCount('PROTECTION_BAR_SEED_LIMIT', config.PROTECTION.BAR_SEED_LIMIT, 2),
    listenKeyKeepaliveMs: requirePositive('LISTEN_KEY_KEEPALIVE_MS', config.STREAMING.LISTEN_KEY_KEEPALIVE_MS),
    listenKeyRetryMs: requirePositive('LISTEN_KEY_RETRY_MS', config.STREAMING.LISTEN_KEY_RETRY_MS),
    staleFeedMs: requirePositive('STREAMING_STALE_FEED_MS', config.STREAMING.STALE_FEED_MS),
    watchdogIntervalMs: requirePositive('HIBERNATION_WATCHDOG_INTERVAL_MS', config.STREAMING.WATCHDOG_INTERVAL_MS),
    tradeSummaryIntervalMs: requirePositive('TRADE_SUMMARY_INTERVAL_MS', config.JOBS.TRADE_SUMMARY_INTERVAL_MS),
    tradeRetentionHours: requirePositive('TRADE_RETENTION_HOURS', config.JOBS.TRADE_RETENTION_HOURS),
    connectAttempts: requirePositive('EXCHANGE_RETRY_ATTEMPTS', config.EXCHANGE_RETRY.ATTEMPTS),
    connectDelayMs: requireNonNegative('EXCHANGE_RETRY_DELAY_MS', config.EXCHANGE_RETRY.DELAY_MS),
    connectBackoff: requirePositive('EXCHANGE_RETRY_BACKOFF', config.EXCHANGE_RETRY.BACKOFF),
  };
}
