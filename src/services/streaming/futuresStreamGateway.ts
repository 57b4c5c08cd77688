import WebSocket from 'ws';
import type { RawData } from 'ws';
import { logger } from '../../utils/logger';
import { errorMessage } from '../../utils/formatError';
import type { OhlcvBar, OrderSide, PositionSide } from '../../exchanges/adapters/types';

export type ExecutionStatus =
  | 'NEW'
  | 'PARTIALLY_FILLED'
  | 'FILLED'
  | 'CANCELED'
  | 'EXPIRED'
  | 'REJECTED'
  | 'EXPIRED_IN_MATCH';

export interface BookTickerEvent {
  kind: 'ticker';
  symbol: string;
  bid: number;
  ask: number;
  eventTime: number;
}

export interface OrderUpdateEvent {
  kind: 'order';
  orderId: string;
  symbol: string;
  side: OrderSide;
  positionSide: PositionSide;
  reduceOnly: boolean;
  status: ExecutionStatus;
  quantity: number;
  lastFilledQuantity: number;
  cumulativeFilled: number;
  price: number;
  lastFilledPrice: number;
  realizedPnl: number;
  eventTime: number;
}

export interface BarClosedEvent {
  kind: 'bar';
  symbol: string;
  bar: OhlcvBar;
}

export interface ListenKeyExpiredEvent {
  kind: 'listenKeyExpired';
  eventTime: number;
}

export type StreamEvent = BookTickerEvent | OrderUpdateEvent | BarClosedEvent | ListenKeyExpiredEvent;

type StreamListener = (event: StreamEvent) => void | Promise<void>;

const EXECUTION_STATUSES: readonly ExecutionStatus[] = [
  'NEW',
  'PARTIALLY_FILLED',
  'FILLED',
  'CANCELED',
  'EXPIRED',
  'REJECTED',
  'EXPIRED_IN_MATCH',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> | null {
  return isRecord(value) ? value : null;
}

function num(value: unknown, fallback = NaN) {
  const parsed = typeof value === 'string' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : fallback;
}

function str(value: unknown) {
  return typeof value === 'string' ? value : typeof value === 'number' ? String(value) : '';
}

function parseStatus(value: unknown): ExecutionStatus | null {
  return EXECUTION_STATUSES.find((status) => status === value) ?? null;
}

function parseOrderUpdate(message: Record<string, unknown>): OrderUpdateEvent | null {
  const order = asRecord(message.o);
  if (!order) return null;
  const status = parseStatus(order.X);
  const rawPositionSide = str(order.ps).toLowerCase();
  if (!status || (rawPositionSide !== 'long' && rawPositionSide !== 'short')) return null;
  const side: OrderSide = str(order.S).toUpperCase() === 'SELL' ? 'sell' : 'buy';
  const positionSide: PositionSide = rawPositionSide;
  const closesPosition = (positionSide === 'long' && side === 'sell') || (positionSide === 'short' && side === 'buy');
  return {
    kind: 'order',
    orderId: str(order.i),
    symbol: str(order.s).toLowerCase(),
    side,
    positionSide,
    reduceOnly: order.R === true || closesPosition,
    status,
    quantity: num(order.q, 0),
    lastFilledQuantity: num(order.l, 0),
    cumulativeFilled: num(order.z, 0),
    price: num(order.p, 0),
    lastFilledPrice: num(order.L, 0),
    realizedPnl: num(order.rp, 0),
    eventTime: num(message.E, Date.now()),
  };
}

function parseBookTicker(message: Record<string, unknown>): BookTickerEvent | null {
  const bid = num(message.b);
  const ask = num(message.a);
  if (!Number.isFinite(bid) && !Number.isFinite(ask)) return null;
  return {
    kind: 'ticker',
    symbol: str(message.s).toLowerCase(),
    bid: Number.isFinite(bid) ? bid : ask,
    ask: Number.isFinite(ask) ? ask : bid,
    eventTime: num(message.E, num(message.T, Date.now())),
  };
}

function parseKline(message: Record<string, unknown>): BarClosedEvent | null {
  const kline = asRecord(message.k);
  if (!kline || kline.x !== true) return null;
  const bar: OhlcvBar = {
    timestamp: num(kline.t),
    open: num(kline.o),
    high: num(kline.h),
    low: num(kline.l),
    close: num(kline.c),
    volume: num(kline.v, 0),
  };
  if (![bar.timestamp, bar.open, bar.high, bar.low, bar.close].every(Number.isFinite)) return null;
  return { kind: 'bar', symbol: str(message.s).toLowerCase(), bar };
}

/**
 * Maps one futures stream frame to a typed event. Subscription acks, open
 * (unfinished) klines and unrelated payloads yield null.
 */
export function parseStreamMessage(payload: unknown): StreamEvent | null {
  const outer = asRecord(payload);
  if (!outer || outer.result !== undefined) return null;
  const message = asRecord(outer.data) ?? outer;
  switch (message.e) {
    case 'bookTicker':
      return parseBookTicker(message);
    case 'ORDER_TRADE_UPDATE':
      return parseOrderUpdate(message);
    case 'kline':
      return parseKline(message);
    case 'listenKeyExpired':
      return { kind: 'listenKeyExpired', eventTime: num(message.E, Date.now()) };
    default:
      return null;
  }
}

export interface FuturesStreamOptions {
  url: string;
  streamSymbol: string;
  barTimeframe: string;
  reconnectDelayMs: number;
  pingIntervalMs: number;
  /** Resolved on every (re)connect; null runs without the user-data stream. */
  listenKeyProvider?: () => Promise<string | null>;
}

export class FuturesStreamGateway {
  private ws: WebSocket | null = null;
  private connecting = false;
  private stopped = true;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private readonly listeners = new Set<StreamListener>();
  private requestId = 1;
  private reconnects = 0;
  private lastMessageAt: number | null = null;

  constructor(private readonly options: FuturesStreamOptions) {}

  get lastMessageTime() {
    return this.lastMessageAt;
  }

  get reconnectCount() {
    return this.reconnects;
  }

  onEvent(listener: StreamListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async start() {
    this.stopped = false;
    await this.connect();
  }

  async stop() {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.cleanupSocket();
  }

  private async connect() {
    if (this.connecting || this.ws || this.stopped) return;
    this.connecting = true;

    let listenKey: string | null = null;
    if (this.options.listenKeyProvider) {
      try {
        listenKey = await this.options.listenKeyProvider();
      } catch (error) {
        logger.warn('futures_stream_listen_key_failed', {
          event: 'futures_stream_listen_key_failed',
          error: errorMessage(error),
        });
      }
    }
    if (this.stopped) {
      this.connecting = false;
      return;
    }

    const url = this.options.url;
    let socket: WebSocket;
    try {
      socket = new WebSocket(url);
    } catch (error) {
      this.connecting = false;
      logger.warn('futures_stream_connect_failed', {
        event: 'futures_stream_connect_failed',
        url,
        error: errorMessage(error),
      });
      this.scheduleReconnect();
      return;
    }
    this.ws = socket;
    socket.on('open', () => this.handleOpen(listenKey));
    socket.on('message', (data: RawData) => this.handleMessage(data));
    socket.on('error', (error: Error) => this.handleError(error));
    socket.on('close', (code: number) => this.handleClose(code));
  }

  private handleOpen(listenKey: string | null) {
    this.connecting = false;
    const params = [
      `${this.options.streamSymbol}@bookTicker`,
      `${this.options.streamSymbol}@kline_${this.options.barTimeframe}`,
    ];
    if (listenKey) params.push(listenKey);
    logger.info('futures_stream_connected', {
      event: 'futures_stream_connected',
      url: this.options.url,
      userStream: Boolean(listenKey),
      reconnects: this.reconnects,
    });
    this.sendSubscribe(params);
    this.startPing();
  }

  private handleMessage(data: RawData) {
    this.lastMessageAt = Date.now();
    let payload: unknown;
    try {
      payload = JSON.parse(this.rawDataToString(data));
    } catch (error) {
      logger.warn('futures_stream_parse_error', {
        event: 'futures_stream_parse_error',
        error: errorMessage(error),
      });
      return;
    }
    const event = parseStreamMessage(payload);
    if (!event) return;
    if (event.kind === 'listenKeyExpired') {
      logger.warn('futures_stream_listen_key_expired', { event: 'futures_stream_listen_key_expired' });
      this.notify(event);
      // Dropping the socket makes the close handler reconnect with a fresh key.
      this.ws?.close();
      return;
    }
    this.notify(event);
  }

  private notify(event: StreamEvent) {
    for (const listener of this.listeners) {
      try {
        const result = listener(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.logListenerError(event, error));
        }
      } catch (error) {
        this.logListenerError(event, error);
      }
    }
  }

  private logListenerError(event: StreamEvent, error: unknown) {
    logger.warn('futures_stream_listener_error', {
      event: 'futures_stream_listener_error',
      kind: event.kind,
      error: errorMessage(error),
    });
  }

  private rawDataToString(data: RawData): string {
    if (Array.isArray(data)) {
      return Buffer.concat(data).toString('utf8');
    }
    if (data instanceof ArrayBuffer) {
      return Buffer.from(data).toString('utf8');
    }
    return data.toString('utf8');
  }

  private handleError(error: Error) {
    logger.warn('futures_stream_error', {
      event: 'futures_stream_error',
      error: error.message,
    });
  }

  private handleClose(code: number) {
    logger.warn('futures_stream_disconnected', {
      event: 'futures_stream_disconnected',
      code,
    });
    this.cleanupSocket();
    this.scheduleReconnect();
  }

  // Fixed delay, no cap on attempts.
  private scheduleReconnect() {
    if (this.stopped || this.reconnectTimer) return;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.reconnects += 1;
      this.connect().catch((error: unknown) => {
        logger.warn('futures_stream_reconnect_failed', {
          event: 'futures_stream_reconnect_failed',
          error: errorMessage(error),
        });
        this.scheduleReconnect();
      });
    }, this.options.reconnectDelayMs);
  }

  private cleanupSocket() {
    this.connecting = false;
    const socket = this.ws;
    this.ws = null;
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    if (!socket) return;
    socket.removeAllListeners();
    // Aborting a handshake emits 'error' on a later tick.
    socket.on('error', (error: Error) => {
      logger.debug('futures_stream_discarded_socket_error', {
        event: 'futures_stream_discarded_socket_error',
        error: errorMessage(error),
      });
    });
    if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
      try {
        if (socket.readyState === WebSocket.CONNECTING) {
          socket.terminate();
        } else {
          socket.close();
        }
      } catch (error) {
        logger.debug('futures_stream_close_failed', {
          event: 'futures_stream_close_failed',
          error: errorMessage(error),
        });
      }
    }
  }

  private startPing() {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
    }
    this.pingTimer = setInterval(() => {
      if (!this.ws || this.ws.readyState !== WebSocket.OPEN) return;
      try {
        this.ws.ping();
      } catch (error) {
        logger.warn('futures_stream_ping_failed', {
          event: 'futures_stream_ping_failed',
          error: errorMessage(error),
        });
      }
    }, this.options.pingIntervalMs);
  }

  private sendSubscribe(params: string[]) {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) return;
    const payload = {
      method: 'SUBSCRIBE',
      params,
      id: this.requestId++,
    };
    try {
      this.ws.send(JSON.stringify(payload));
    } catch (error) {
      logger.warn('futures_stream_subscribe_failed', {
        event: 'futures_stream_subscribe_failed',
        params,
        error: errorMessage(error),
      });
    }
  }
}
