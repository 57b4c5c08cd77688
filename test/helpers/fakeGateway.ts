import type {
  GatewayOrder,
  GatewayOrderStatus,
  MarketGateway,
  OhlcvBar,
  PlaceOrderRequest,
  PositionSnapshot,
  QuoteTick,
} from '../../src/exchanges/adapters/types';

/** In-memory exchange bound to one symbol. Placed orders rest until cancelled or settled by the test. */
export class FakeGateway implements MarketGateway {
  readonly id = 'fake';
  readonly symbol = 'XRP/USDC:USDC';
  connected = false;
  position: PositionSnapshot = { long: 0, short: 0 };
  ticker: QuoteTick = { bid: 0.5, ask: 0.5002, last: 0.5001, timestamp: 0 };
  klines: OhlcvBar[] = [];
  readonly orders = new Map<string, GatewayOrder>();
  readonly placed: PlaceOrderRequest[] = [];
  readonly cancelled: string[] = [];
  /** Status fetchOrder reports for orders placed from now on. */
  settleStatus: GatewayOrderStatus = 'open';
  failCancelIds = new Set<string>();
  failPlace = false;
  failFetchOpenOrders = false;
  listenKeyCalls = 0;
  keepAliveCalls = 0;
  private seq = 0;

  seedOrder(order: Omit<GatewayOrder, 'id' | 'status' | 'timestamp' | 'remaining'> & { remaining?: number }) {
    this.seq += 1;
    const id = `seed-${this.seq}`;
    this.orders.set(id, {
      ...order,
      id,
      remaining: order.remaining ?? order.amount,
      status: 'open',
      timestamp: 0,
    });
    return id;
  }

  async connect() {
    this.connected = true;
  }

  async disconnect() {
    this.connected = false;
  }

  async placeOrder(request: PlaceOrderRequest): Promise<GatewayOrder> {
    if (this.failPlace) throw new Error('place_failed');
    this.placed.push({ ...request });
    this.seq += 1;
    const order: GatewayOrder = {
      id: `ord-${this.seq}`,
      side: request.side,
      positionSide: request.positionSide,
      reduceOnly: request.reduceOnly,
      amount: request.amount,
      remaining: request.amount,
      price: request.price,
      status: 'open',
      timestamp: this.seq,
    };
    this.orders.set(order.id, order);
    return { ...order };
  }

  async cancelOrder(id: string) {
    if (this.failCancelIds.has(id)) throw new Error(`cancel_failed:${id}`);
    this.cancelled.push(id);
    this.orders.delete(id);
  }

  async fetchOpenOrders() {
    if (this.failFetchOpenOrders) throw new Error('open_orders_failed');
    return [...this.orders.values()].filter((order) => order.status === 'open').map((order) => ({ ...order }));
  }

  async fetchOrder(id: string): Promise<GatewayOrder> {
    const order = this.orders.get(id);
    if (!order) throw new Error(`order_not_found:${id}`);
    return { ...order, status: this.settleStatus };
  }

  async fetchPosition() {
    return { ...this.position };
  }

  async fetchTicker() {
    return { ...this.ticker };
  }

  async fetchKlines(_timeframe: string, limit: number) {
    return this.klines.slice(-limit);
  }

  roundPrice(price: number) {
    return Number(price.toFixed(4));
  }

  roundAmount(amount: number) {
    return Number(amount.toFixed(1));
  }

  async createListenKey() {
    this.listenKeyCalls += 1;
    return 'listen-key-test';
  }

  async keepAliveListenKey() {
    this.keepAliveCalls += 1;
  }
}
