import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FuturesStreamGateway, parseStreamMessage } from '../../src/services/streaming/futuresStreamGateway';
import type { StreamEvent } from '../../src/services/streaming/futuresStreamGateway';

interface FakeSocket {
  url: string;
  sent: string[];
  pings: number;
  readyState: number;
  terminated: boolean;
  emit(event: string, ...args: unknown[]): boolean;
  listenerCount(event: string): number;
  close(): void;
}

const sockets = vi.hoisted(() => {
  const created: FakeSocket[] = [];
  return created;
});

vi.mock('ws', async () => {
  const { EventEmitter } = await import('events');
  class FakeWebSocket extends EventEmitter {
    static CONNECTING = 0;
    static OPEN = 1;
    static CLOSED = 3;
    readyState = 0;
    sent: string[] = [];
    pings = 0;

    constructor(public url: string) {
      super();
      sockets.push(this);
    }

    send(data: string) {
      this.sent.push(data);
    }

    ping() {
      this.pings += 1;
    }

    terminated = false;

    close() {
      if (this.readyState === 3) return;
      if (this.readyState === 0) {
        this.abortHandshake();
        return;
      }
      this.readyState = 3;
      this.emit('close', 1000);
    }

    terminate() {
      this.terminated = true;
      if (this.readyState === 0) {
        this.abortHandshake();
        return;
      }
      this.close();
    }

    private abortHandshake() {
      this.readyState = 2;
      process.nextTick(() => {
        this.readyState = 3;
        this.emit('error', new Error('WebSocket was closed before the connection was established'));
        this.emit('close', 1006);
      });
    }
  }
  return { default: FakeWebSocket };
});

function open(socket: FakeSocket) {
  socket.readyState = 1;
  socket.emit('open');
}

function deliver(socket: FakeSocket, payload: unknown) {
  socket.emit('message', Buffer.from(JSON.stringify(payload)));
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

function createGateway(listenKeyProvider?: () => Promise<string | null>) {
  return new FuturesStreamGateway({
    url: 'wss://stream.test/ws',
    streamSymbol: 'xrpusdc',
    barTimeframe: '1h',
    reconnectDelayMs: 5_000,
    pingIntervalMs: 25_000,
    listenKeyProvider,
  });
}

describe('parseStreamMessage', () => {
  it('maps a book ticker frame', () => {
    expect(parseStreamMessage({ e: 'bookTicker', s: 'XRPUSDC', b: '0.5', a: '0.5002', E: 123 })).toEqual({
      kind: 'ticker',
      symbol: 'xrpusdc',
      bid: 0.5,
      ask: 0.5002,
      eventTime: 123,
    });
  });

  it('maps an order update and infers reduce-only for closing orders', () => {
    const event = parseStreamMessage({
      e: 'ORDER_TRADE_UPDATE',
      E: 1000,
      o: { s: 'XRPUSDC', i: 42, S: 'SELL', ps: 'LONG', X: 'FILLED', q: '3', l: '3', z: '3', p: '0.51', L: '0.51', rp: '0.03', R: false },
    });

    expect(event).toEqual({
      kind: 'order',
      orderId: '42',
      symbol: 'xrpusdc',
      side: 'sell',
      positionSide: 'long',
      reduceOnly: true,
      status: 'FILLED',
      quantity: 3,
      lastFilledQuantity: 3,
      cumulativeFilled: 3,
      price: 0.51,
      lastFilledPrice: 0.51,
      realizedPnl: 0.03,
      eventTime: 1000,
    });
  });

  it('unwraps combined-stream envelopes and emits only closed klines', () => {
    const kline = { t: 3_600_000, o: '0.5', h: '0.52', l: '0.49', c: '0.51', v: '1000', x: true };

    expect(parseStreamMessage({ stream: 'xrpusdc@kline_1h', data: { e: 'kline', s: 'XRPUSDC', k: kline } })).toEqual({
      kind: 'bar',
      symbol: 'xrpusdc',
      bar: { timestamp: 3_600_000, open: 0.5, high: 0.52, low: 0.49, close: 0.51, volume: 1000 },
    });
    expect(parseStreamMessage({ e: 'kline', s: 'XRPUSDC', k: { ...kline, x: false } })).toBeNull();
  });

  it('ignores acknowledgements and one-way mode orders', () => {
    expect(parseStreamMessage({ result: null, id: 1 })).toBeNull();
    expect(parseStreamMessage({ e: 'ORDER_TRADE_UPDATE', o: { s: 'XRPUSDC', S: 'BUY', ps: 'BOTH', X: 'NEW' } })).toBeNull();
    expect(parseStreamMessage('not-an-object')).toBeNull();
    expect(parseStreamMessage({ e: 'listenKeyExpired', E: 5 })).toEqual({ kind: 'listenKeyExpired', eventTime: 5 });
  });
});

describe('FuturesStreamGateway', () => {
  beforeEach(() => {
    sockets.length = 0;
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'setInterval', 'clearInterval'] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('subscribes to the ticker, bar and user streams on open', async () => {
    const gateway = createGateway(async () => 'listen-key-1');
    await gateway.start();

    expect(sockets).toHaveLength(1);
    expect(sockets[0].url).toBe('wss://stream.test/ws');
    open(sockets[0]);

    expect(JSON.parse(sockets[0].sent[0])).toEqual({
      method: 'SUBSCRIBE',
      params: ['xrpusdc@bookTicker', 'xrpusdc@kline_1h', 'listen-key-1'],
      id: 1,
    });
    await gateway.stop();
  });

  it('runs without the user stream when no listen key is available', async () => {
    const gateway = createGateway(async () => {
      throw new Error('listen_key_missing');
    });
    await gateway.start();
    open(sockets[0]);

    expect(JSON.parse(sockets[0].sent[0]).params).toEqual(['xrpusdc@bookTicker', 'xrpusdc@kline_1h']);
    await gateway.stop();
  });

  it('delivers parsed events to every listener even when one throws', async () => {
    const gateway = createGateway();
    const received: StreamEvent[] = [];
    gateway.onEvent(() => {
      throw new Error('listener_broken');
    });
    const unsubscribe = gateway.onEvent((event) => {
      received.push(event);
    });
    await gateway.start();
    open(sockets[0]);

    deliver(sockets[0], { e: 'bookTicker', s: 'XRPUSDC', b: '0.5', a: '0.5002', E: 1 });
    sockets[0].emit('message', Buffer.from('{broken'));
    unsubscribe();
    deliver(sockets[0], { e: 'bookTicker', s: 'XRPUSDC', b: '0.6', a: '0.6002', E: 2 });

    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({ kind: 'ticker', bid: 0.5 });
    expect(gateway.lastMessageTime).not.toBeNull();
    await gateway.stop();
  });

  it('reconnects after a fixed delay when the socket closes', async () => {
    const gateway = createGateway();
    await gateway.start();
    open(sockets[0]);

    sockets[0].close();
    await vi.advanceTimersByTimeAsync(4_999);
    expect(sockets).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(sockets).toHaveLength(2);
    expect(gateway.reconnectCount).toBe(1);

    sockets[1].close();
    await vi.advanceTimersByTimeAsync(5_000);
    expect(sockets).toHaveLength(3);
    await gateway.stop();
  });

  it('drops the socket and fetches a fresh key when the listen key expires', async () => {
    const provider = vi.fn().mockResolvedValueOnce('listen-key-1').mockResolvedValueOnce('listen-key-2');
    const gateway = createGateway(provider);
    const received: StreamEvent[] = [];
    gateway.onEvent((event) => {
      received.push(event);
    });
    await gateway.start();
    open(sockets[0]);

    deliver(sockets[0], { e: 'listenKeyExpired', E: 9 });
    expect(received).toEqual([{ kind: 'listenKeyExpired', eventTime: 9 }]);
    expect(sockets[0].readyState).toBe(3);

    await vi.advanceTimersByTimeAsync(5_000);
    await flush();
    expect(provider).toHaveBeenCalledTimes(2);
    expect(sockets).toHaveLength(2);
    open(sockets[1]);
    expect(JSON.parse(sockets[1].sent[0]).params).toContain('listen-key-2');
    await gateway.stop();
  });

  it('pings on the configured interval while open', async () => {
    const gateway = createGateway();
    await gateway.start();
    open(sockets[0]);

    await vi.advanceTimersByTimeAsync(50_000);

    expect(sockets[0].pings).toBe(2);
    await gateway.stop();
  });

  it('stops cleanly while the handshake is still pending', async () => {
    const gateway = createGateway();
    await gateway.start();
    expect(sockets[0].readyState).toBe(0);

    await gateway.stop();
    await flush();

    expect(sockets[0].terminated).toBe(true);
    expect(sockets[0].readyState).toBe(3);
    expect(sockets[0].listenerCount('error')).toBe(1);
    await vi.advanceTimersByTimeAsync(20_000);
    expect(sockets).toHaveLength(1);
  });

  it('does not reconnect after stop', async () => {
    const gateway = createGateway();
    await gateway.start();
    open(sockets[0]);

    await gateway.stop();
    await vi.advanceTimersByTimeAsync(20_000);

    expect(sockets).toHaveLength(1);
    expect(sockets[0].readyState).toBe(3);
  });
});
