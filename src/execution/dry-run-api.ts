import { createChildLogger } from '../logger.js';
import { ExchangeRejectedError } from '../errors.js';
import type {
  Balance,
  BookTicker,
  ExchangeRules,
  Fill,
  LimitOrderRequest,
  MarketOrderRequest,
  OrderInfo,
  PlacedOrder,
  SpotExchange,
} from '../types/index.js';
import { normalizeSymbol } from './symbols.js';

const log = createChildLogger('dry-run');

/** 드라이런에서도 실제 거래소에서 읽는 공개 시세 */
export type MarketDataSource = Pick<SpotExchange, 'getPrice' | 'getBookTicker' | 'getSymbolRules'>;

/**
 * 드라이런 거래소: 공개 시세는 실거래소, 주문/잔고는 결정적 시뮬레이션
 * - 주문 ID: dry-<n>
 * - 지정가: 첫 조회 시 지정가로 전량 체결
 * - 시장가 매수: amount / 마지막 가격, 매도: 마지막 가격
 * - 잔고/체결 내역 없음
 * - 보관하는 주문은 아직 CLOSED 로 조회되지 않은 것뿐
 */
export class DryRunSpotApi implements SpotExchange {
  readonly dryRun = true;
  private seq = 0;
  private readonly orders = new Map<string, OrderInfo>();
  private readonly lastPrices = new Map<string, number>();

  constructor(private readonly market: MarketDataSource) {}

  async getPrice(symbol: string): Promise<number> {
    const price = await this.market.getPrice(symbol);
    this.lastPrices.set(normalizeSymbol(symbol), price);
    return price;
  }

  async getBookTicker(symbol: string): Promise<BookTicker> {
    const book = await this.market.getBookTicker(symbol);
    this.lastPrices.set(normalizeSymbol(symbol), (book.bid + book.ask) / 2);
    return book;
  }

  getSymbolRules(symbol: string): Promise<ExchangeRules> {
    return this.market.getSymbolRules(symbol);
  }

  async placeMarketOrder(req: MarketOrderRequest): Promise<PlacedOrder> {
    const symbol = normalizeSymbol(req.symbol);
    const price = await this.referencePrice(symbol);
    const orderId = this.nextId();
    const filledSize = req.side === 'BUY' ? (req.amount ?? 0) / price : (req.size ?? 0);
    this.orders.set(orderId, {
      orderId,
      symbol,
      side: req.side,
      type: 'MARKET',
      price: 0,
      size: req.side === 'SELL' ? filledSize : 0,
      amount: req.side === 'BUY' ? (req.amount ?? 0) : 0,
      filledSize,
      filledAmount: filledSize * price,
      status: 'CLOSED',
    });
    log.info({ symbol, side: req.side, orderId, price, filledSize }, '[DRY] market order filled');
    return { orderId, ...(req.clientOrderId ? { clientOrderId: req.clientOrderId } : {}) };
  }

  async placeLimitOrder(req: LimitOrderRequest): Promise<PlacedOrder> {
    const symbol = normalizeSymbol(req.symbol);
    const orderId = this.nextId();
    this.orders.set(orderId, {
      orderId,
      symbol,
      side: req.side,
      type: 'LIMIT',
      price: req.price,
      size: req.size,
      amount: 0,
      filledSize: 0,
      filledAmount: 0,
      status: 'OPEN',
    });
    log.info({ symbol, side: req.side, orderId, price: req.price, size: req.size }, '[DRY] limit order placed');
    return { orderId, ...(req.clientOrderId ? { clientOrderId: req.clientOrderId } : {}) };
  }

  async cancelOrder(_symbol: string, orderId: string): Promise<void> {
    const order = this.require(orderId);
    if (order.status === 'CLOSED') {
      throw new ExchangeRejectedError('ORDER_CLOSED', `order ${orderId} already closed`);
    }
    this.orders.set(orderId, { ...order, status: 'CLOSED' });
  }

  /**
   * OPEN 지정가 주문은 조회 시점에 지정가로 전량 체결.
   * CLOSED 상태로 조회된 주문은 맵에서 제거한다 (이후 조회는 ORDER_NOT_FOUND).
   */
  async getOrder(_symbol: string, orderId: string): Promise<OrderInfo> {
    const order = this.require(orderId);
    const closed: OrderInfo =
      order.status === 'OPEN'
        ? { ...order, filledSize: order.size, filledAmount: order.size * order.price, status: 'CLOSED' }
        : order;
    this.orders.delete(orderId);
    return closed;
  }

  async getOpenOrders(symbol: string): Promise<OrderInfo[]> {
    const sym = normalizeSymbol(symbol);
    return [...this.orders.values()].filter((o) => o.symbol === sym && o.status === 'OPEN');
  }

  async getFills(): Promise<Fill[]> {
    return [];
  }

  async getFillsByOrderId(): Promise<Fill[]> {
    return [];
  }

  async getBalances(): Promise<Balance[]> {
    return [];
  }

  private nextId(): string {
    this.seq++;
    return `dry-${this.seq}`;
  }

  private require(orderId: string): OrderInfo {
    const order = this.orders.get(orderId);
    if (!order) throw new ExchangeRejectedError('ORDER_NOT_FOUND', `unknown order ${orderId}`);
    return order;
  }

  private async referencePrice(symbol: string): Promise<number> {
    return this.lastPrices.get(symbol) ?? (await this.getPrice(symbol));
  }
}
