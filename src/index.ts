import { CONFIG } from './config';
import { BinanceFuturesAdapter } from './exchanges/adapters/binanceFuturesAdapter';
import { FuturesStreamGateway } from './services/streaming/futuresStreamGateway';
import { ExtremeProtection } from './guard/extremeProtection';
import { FileProtectionStateStore } from './guard/protectionState';
import type { ProtectionStateStore } from './guard/protectionState';
import { SignalAdapter } from './analytics/signalAdapter';
import { createNotifier } from './alerts/notifier';
import { IntervalTaskScheduler } from './jobs/taskScheduler';
import { InMemoryTradeLedger } from './jobs/tradeLedger';
import type { TradeRecorder } from './jobs/tradeLedger';
import { getPool, closePool } from './db/pool';
import { runMigrations } from './db/migrations';
import { PgProtectionStateRepository } from './db/protectionStateRepo';
import { PgTradeRepository } from './db/tradesRepo';
import { startMetricsServer, stopMetricsServer } from './telemetry/metrics';
import { logger, setLogContext, setLogIngestionWebhook, setLogLevel } from './utils/logger';
import { errorMessage } from './utils/formatError';
import {
  GridEngine,
  HedgeGridBot,
  buildBotSettings,
  buildGridSettings,
  buildProtectionSettings,
  buildSignalSettings,
} from './strategies/hedgeGrid';

interface Persistence {
  store: ProtectionStateStore;
  trades: TradeRecorder;
  close(): Promise<void>;
}

async function createPersistence(symbol: string): Promise<Persistence> {
  if (CONFIG.STATE.STORE === 'postgres') {
    const pool = getPool();
    await runMigrations(pool);
    return {
      store: new PgProtectionStateRepository(pool, CONFIG.STATE.STATE_KEY),
      trades: new PgTradeRepository(pool, symbol),
      close: closePool,
    };
  }
  return {
    store: new FileProtectionStateStore(CONFIG.STATE.FILE_PATH),
    trades: new InMemoryTradeLedger(),
    close: async () => undefined,
  };
}

async function main() {
  setLogLevel(CONFIG.LOG_LEVEL);
  if (CONFIG.LOG_INGEST_WEBHOOK) {
    setLogIngestionWebhook(CONFIG.LOG_INGEST_WEBHOOK);
  }
  const symbol = CONFIG.EXCHANGE.SYMBOL;
  setLogContext({ symbol });

  const gridSettings = buildGridSettings();
  const botSettings = buildBotSettings();
  const protectionSettings = buildProtectionSettings();
  const signalSettings = buildSignalSettings();

  const gateway = new BinanceFuturesAdapter({
    id: 'binanceusdm',
    symbol,
    apiKey: CONFIG.EXCHANGE.API_KEY,
    apiSecret: CONFIG.EXCHANGE.API_SECRET,
    leverage: CONFIG.GRID.LEVERAGE,
    sandbox: CONFIG.EXCHANGE.SANDBOX,
  });
  const persistence = await createPersistence(symbol);
  const notifier = createNotifier(
    { token: CONFIG.TELEGRAM_TOKEN, chatId: CONFIG.TELEGRAM_CHAT_ID },
    CONFIG.EXCHANGE.STREAM_SYMBOL.toUpperCase()
  );

  const bot = new HedgeGridBot({
    gateway,
    engine: new GridEngine(gateway, gridSettings),
    protection: CONFIG.PROTECTION.ENABLED
      ? new ExtremeProtection({ gateway, store: persistence.store, notifier, settings: protectionSettings })
      : null,
    signal: CONFIG.SIGNAL.ENABLED ? new SignalAdapter(gateway, signalSettings) : null,
    createStream: (listenKeyProvider) =>
      new FuturesStreamGateway({
        url: CONFIG.STREAMING.FUTURES_WS_URL,
        streamSymbol: CONFIG.EXCHANGE.STREAM_SYMBOL,
        barTimeframe: CONFIG.PROTECTION.BAR_TIMEFRAME,
        reconnectDelayMs: CONFIG.STREAMING.RECONNECT_DELAY_MS,
        pingIntervalMs: CONFIG.STREAMING.PING_INTERVAL_MS,
        listenKeyProvider,
      }),
    scheduler: new IntervalTaskScheduler(),
    trades: persistence.trades,
    settings: botSettings,
  });

  startMetricsServer(CONFIG.METRICS_PORT);

  const shutdown = async (signal: string) => {
    logger.info('shutdown_requested', { event: 'shutdown_requested', signal });
    await bot.stop();
    await persistence.close();
    await stopMetricsServer();
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('shutdown_failed', { event: 'shutdown_failed', error: errorMessage(error) });
          process.exit(1);
        });
    });
  }

  try {
    await bot.start();
  } catch (error) {
    logger.critical('startup_failed', { event: 'startup_failed', error: errorMessage(error) });
    await shutdown('startup_failed');
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.critical('fatal', { event: 'fatal', error: errorMessage(error) });
  process.exit(1);
});
