export type OrderSide = 'buy' | 'sell';
export type PositionSide = 'long' | 'short';
export type OrderType = 'limit' | 'market';

export type GatewayOrderStatus = 'open' | 'filled' | 'canceled' | 'expired' | 'rejected';

export interface PlaceOrderRequest {
  side: OrderSide;
  /** null for market orders */
  price: number | null;
  amount: number;
  reduceOnly: boolean;
  positionSide: PositionSide;
  type?: OrderType;
}

export interface GatewayOrder {
  id: string;
  side: OrderSide;
  positionSide: PositionSide;
  reduceOnly: boolean;
  amount: number;
  remaining: number;
  price: number | null;
  status: GatewayOrderStatus;
  timestamp: number;
}

export interface PositionSnapshot {
  long: number;
  short: number;
}

export interface QuoteTick {
  bid: number | null;
  ask: number | null;
  last: number | null;
  timestamp: number;
}

export interface OhlcvBar {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface ExchangeAdapterConfig {
  id: string;
  symbol: string;
  apiKey?: string;
  apiSecret?: string;
  leverage: number;
  sandbox?: boolean;
}

/**
 * Capability surface the grid engine, protection and signal components trade through.
 * One instance is bound to a single instrument.
 */
export interface MarketGateway {
  readonly id: string;
  readonly symbol: string;

  connect(): Promise<void>;
  disconnect(): Promise<void>;

  placeOrder(request: PlaceOrderRequest): Promise<GatewayOrder>;
  cancelOrder(id: string): Promise<void>;
  fetchOpenOrders(): Promise<GatewayOrder[]>;
  fetchOrder(id: string): Promise<GatewayOrder>;
  fetchPosition(): Promise<PositionSnapshot>;
  fetchTicker(): Promise<QuoteTick>;
  fetchKlines(timeframe: string, limit: number): Promise<OhlcvBar[]>;

  roundPrice(price: number): number;
  roundAmount(amount: number): number;

  createListenKey(): Promise<string>;
  keepAliveListenKey(): Promise<void>;
}
