import type {
  ExchangeAdapterConfig,
  GatewayOrder,
  MarketGateway,
  OhlcvBar,
  PlaceOrderRequest,
  PositionSnapshot,
  QuoteTick,
} from './types';

export abstract class BaseExchangeAdapter implements MarketGateway {
  public readonly id: string;
  public readonly symbol: string;
  protected config: ExchangeAdapterConfig;
  protected connected = false;

  protected constructor(config: ExchangeAdapterConfig) {
    this.config = config;
    this.id = config.id;
    this.symbol = config.symbol;
  }

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  assertConnected() {
    if (!this.connected) {
      throw new Error(`adapter_not_connected:${this.id}`);
    }
  }

  abstract placeOrder(request: PlaceOrderRequest): Promise<GatewayOrder>;
  abstract cancelOrder(id: string): Promise<void>;
  abstract fetchOpenOrders(): Promise<GatewayOrder[]>;
  abstract fetchOrder(id: string): Promise<GatewayOrder>;
  abstract fetchPosition(): Promise<PositionSnapshot>;
  abstract fetchTicker(): Promise<QuoteTick>;
  abstract fetchKlines(timeframe: string, limit: number): Promise<OhlcvBar[]>;
  abstract roundPrice(price: number): number;
  abstract roundAmount(amount: number): number;
  abstract createListenKey(): Promise<string>;
  abstract keepAliveListenKey(): Promise<void>;
}
