import { randomUUID } from 'crypto';
import { binanceusdm } from 'ccxt';
import { BaseExchangeAdapter } from './baseAdapter';
import type {
  ExchangeAdapterConfig,
  GatewayOrder,
  GatewayOrderStatus,
  OhlcvBar,
  OrderSide,
  PlaceOrderRequest,
  PositionSide,
  PositionSnapshot,
  QuoteTick,
} from './types';
import { logger } from '../../utils/logger';

/** Structural view of the ccxt unified order fields the adapter reads. */
export interface RawExchangeOrder {
  id: string;
  side?: string;
  status?: string;
  amount?: number;
  remaining?: number;
  price?: number;
  timestamp?: number;
  reduceOnly?: boolean;
  info?: unknown;
}

interface RawExchangePosition {
  side?: string;
  contracts?: number;
  info?: unknown;
}

function readField(source: unknown, key: string): unknown {
  if (typeof source !== 'object' || source === null) return undefined;
  return Object.prototype.hasOwnProperty.call(source, key) ? Reflect.get(source, key) : undefined;
}

function toFinite(value: unknown, fallback: number) {
  const parsed = typeof value === 'string' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : fallback;
}

export function mapOrderStatus(status: string | undefined): GatewayOrderStatus {
  switch (status) {
    case 'closed':
    case 'filled':
      return 'filled';
    case 'canceled':
    case 'cancelled':
      return 'canceled';
    case 'expired':
      return 'expired';
    case 'rejected':
      return 'rejected';
    default:
      return 'open';
  }
}

function parsePositionSide(value: unknown): PositionSide | null {
  if (typeof value !== 'string') return null;
  const lower = value.toLowerCase();
  if (lower === 'long' || lower === 'short') return lower;
  return null;
}

/**
 * Hedge-mode orders carry positionSide LONG/SHORT; the exchange does not echo a
 * reduce-only flag for them, so an order that trades against its position side
 * is treated as reduce-only.
 */
export function normalizeOrder(raw: RawExchangeOrder): GatewayOrder {
  const side: OrderSide = raw.side === 'sell' ? 'sell' : 'buy';
  const positionSide = parsePositionSide(readField(raw.info, 'positionSide')) ?? (side === 'buy' ? 'long' : 'short');
  const closesPosition = (positionSide === 'long' && side === 'sell') || (positionSide === 'short' && side === 'buy');
  const infoReduceOnly = readField(raw.info, 'reduceOnly');
  const amount = toFinite(raw.amount ?? readField(raw.info, 'origQty'), 0);
  const remaining = toFinite(raw.remaining, amount);
  return {
    id: String(raw.id),
    side,
    positionSide,
    reduceOnly: raw.reduceOnly === true || infoReduceOnly === true || infoReduceOnly === 'true' || closesPosition,
    amount,
    remaining,
    price: typeof raw.price === 'number' && Number.isFinite(raw.price) ? raw.price : null,
    status: mapOrderStatus(raw.status),
    timestamp: toFinite(raw.timestamp, Date.now()),
  };
}

export function aggregatePositions(positions: RawExchangePosition[]): PositionSnapshot {
  const snapshot: PositionSnapshot = { long: 0, short: 0 };
  for (const position of positions) {
    const side = parsePositionSide(position.side) ?? parsePositionSide(readField(position.info, 'positionSide'));
    if (!side) continue;
    const contracts = Math.abs(toFinite(position.contracts ?? readField(position.info, 'positionAmt'), 0));
    snapshot[side] += contracts;
  }
  return snapshot;
}

function isHedgedMode(value: unknown) {
  return readField(value, 'hedged') === true;
}

export class BinanceFuturesAdapter extends BaseExchangeAdapter {
  private readonly exchange: InstanceType<typeof binanceusdm>;
  private listenKey: string | null = null;

  constructor(config: ExchangeAdapterConfig) {
    super(config);
    this.exchange = new binanceusdm({
      apiKey: config.apiKey,
      secret: config.apiSecret,
      enableRateLimit: true,
      options: {
        defaultType: 'future',
        adjustForTimeDifference: true,
      },
    });
    if (config.sandbox) {
      this.exchange.setSandboxMode(true);
    }
  }

  override async connect(): Promise<void> {
    await this.exchange.loadMarkets();
    await super.connect();
    await this.ensureHedgeMode();
    await this.exchange.setLeverage(this.config.leverage, this.symbol);
    logger.info('futures_adapter_connected', {
      event: 'futures_adapter_connected',
      exchange: this.id,
      symbol: this.symbol,
      leverage: this.config.leverage,
    });
  }

  override async disconnect(): Promise<void> {
    await super.disconnect();
    this.listenKey = null;
  }

  private async ensureHedgeMode() {
    const mode: unknown = await this.exchange.fetchPositionMode(this.symbol);
    if (isHedgedMode(mode)) return;
    logger.info('futures_adapter_enable_hedge_mode', {
      event: 'futures_adapter_enable_hedge_mode',
      symbol: this.symbol,
    });
    await this.exchange.setPositionMode(true, this.symbol);
  }

  async placeOrder(request: PlaceOrderRequest): Promise<GatewayOrder> {
    this.assertConnected();
    const type = request.type ?? (request.price === null ? 'market' : 'limit');
    const amount = this.roundAmount(request.amount);
    if (amount <= 0) {
      throw new Error('order_amount_below_precision');
    }
    const price = request.price === null ? undefined : this.roundPrice(request.price);
    if (type === 'limit' && price === undefined) {
      throw new Error('limit_order_price_missing');
    }
    // Binance rejects an explicit reduceOnly flag in hedge mode; positionSide carries it.
    const params: Record<string, unknown> = {
      positionSide: request.positionSide.toUpperCase(),
      newClientOrderId: `hg-${randomUUID().replace(/-/g, '').slice(0, 24)}`,
    };
    const order = await this.exchange.createOrder(this.symbol, type, request.side, amount, price, params);
    const normalized = normalizeOrder(order);
    return {
      ...normalized,
      side: request.side,
      positionSide: request.positionSide,
      reduceOnly: request.reduceOnly || normalized.reduceOnly,
    };
  }

  async cancelOrder(id: string): Promise<void> {
    this.assertConnected();
    await this.exchange.cancelOrder(id, this.symbol);
  }

  async fetchOpenOrders(): Promise<GatewayOrder[]> {
    this.assertConnected();
    const orders = await this.exchange.fetchOpenOrders(this.symbol);
    return orders.map((order) => normalizeOrder(order));
  }

  async fetchOrder(id: string): Promise<GatewayOrder> {
    this.assertConnected();
    const order = await this.exchange.fetchOrder(id, this.symbol);
    return normalizeOrder(order);
  }

  async fetchPosition(): Promise<PositionSnapshot> {
    this.assertConnected();
    const positions = await this.exchange.fetchPositions([this.symbol]);
    return aggregatePositions(positions);
  }

  async fetchTicker(): Promise<QuoteTick> {
    this.assertConnected();
    const ticker = await this.exchange.fetchTicker(this.symbol);
    return {
      bid: ticker.bid ?? null,
      ask: ticker.ask ?? null,
      last: ticker.last ?? null,
      timestamp: ticker.timestamp ?? Date.now(),
    };
  }

  async fetchKlines(timeframe: string, limit: number): Promise<OhlcvBar[]> {
    this.assertConnected();
    const rows = await this.exchange.fetchOHLCV(this.symbol, timeframe, undefined, limit);
    const bars: OhlcvBar[] = [];
    for (const row of rows) {
      const [timestamp, open, high, low, close, volume] = row;
      if (
        typeof timestamp !== 'number' ||
        typeof open !== 'number' ||
        typeof high !== 'number' ||
        typeof low !== 'number' ||
        typeof close !== 'number'
      ) {
        continue;
      }
      bars.push({ timestamp, open, high, low, close, volume: typeof volume === 'number' ? volume : 0 });
    }
    return bars;
  }

  roundPrice(price: number): number {
    return Number(this.exchange.priceToPrecision(this.symbol, price));
  }

  roundAmount(amount: number): number {
    return Number(this.exchange.amountToPrecision(this.symbol, amount));
  }

  async createListenKey(): Promise<string> {
    this.assertConnected();
    const response: unknown = await this.exchange.fapiPrivatePostListenKey();
    const key = readField(response, 'listenKey');
    if (typeof key !== 'string' || !key) {
      throw new Error('listen_key_missing');
    }
    this.listenKey = key;
    return key;
  }

  async keepAliveListenKey(): Promise<void> {
    this.assertConnected();
    if (!this.listenKey) {
      throw new Error('listen_key_not_created');
    }
    await this.exchange.fapiPrivatePutListenKey();
  }
}
