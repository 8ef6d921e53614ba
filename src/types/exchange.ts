import type { Balance, BookTicker, ExchangeRules } from './market.js';
import type {
  Fill,
  LimitOrderRequest,
  MarketOrderRequest,
  OrderInfo,
  PlacedOrder,
} from './order.js';

/**
 * 엔진이 의존하는 현물 거래소 기능.
 * 실제 구현(PionexSpotApi)과 드라이런 시뮬레이터가 같은 계약을 따른다.
 * 실패는 errors.ts의 타입 에러로 throw.
 */
export interface SpotExchange {
  readonly dryRun: boolean;
  getPrice(symbol: string): Promise<number>;
  getBookTicker(symbol: string): Promise<BookTicker>;
  getSymbolRules(symbol: string): Promise<ExchangeRules>;
  placeMarketOrder(req: MarketOrderRequest): Promise<PlacedOrder>;
  placeLimitOrder(req: LimitOrderRequest): Promise<PlacedOrder>;
  cancelOrder(symbol: string, orderId: string): Promise<void>;
  getOrder(symbol: string, orderId: string): Promise<OrderInfo>;
  getOpenOrders(symbol: string): Promise<OrderInfo[]>;
  getFills(symbol: string, range?: { startTime?: number; endTime?: number }): Promise<Fill[]>;
  getFillsByOrderId(symbol: string, orderId: string): Promise<Fill[]>;
  getBalances(): Promise<Balance[]>;
}
