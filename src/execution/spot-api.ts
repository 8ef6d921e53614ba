import { createChildLogger } from '../logger.js';
import { ResponseParseError } from '../errors.js';
import type { PionexRest } from '../exchange/pionex/rest.js';
import type { FillData, OrderData } from '../exchange/pionex/schemas.js';
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
import { toDecimalString } from './rules.js';

const log = createChildLogger('spot-api');

/**
 * Pionex 현물 API: 엔진이 쓰는 도메인 계약(SpotExchange) 구현
 *
 * - 심볼은 매 호출 BASE_QUOTE로 정규화
 * - 가격 조회: ticker close → book mid → 최근 체결가 순서로 시도
 * - 재시도/레이트리밋/에러 분류는 PionexHttpClient 담당
 */
export class PionexSpotApi implements SpotExchange {
  readonly dryRun = false;

  constructor(private readonly rest: PionexRest) {}

  async getPrice(symbol: string): Promise<number> {
    const sym = normalizeSymbol(symbol);
    const sources: Array<[string, () => Promise<number>]> = [
      ['ticker', async () => {
        const data = await this.rest.getTickers(sym);
        return pickBySymbol(data.tickers, sym).close;
      }],
      ['book', async () => {
        const book = await this.getBookTicker(sym);
        return (book.bid + book.ask) / 2;
      }],
      ['trade', async () => {
        const data = await this.rest.getTrades(sym, 1);
        return pickBySymbol(data.trades, sym).price;
      }],
    ];

    let lastError: unknown = null;
    for (const [source, fetchPrice] of sources) {
      try {
        const price = await fetchPrice();
        if (Number.isFinite(price) && price > 0) return price;
        lastError = new ResponseParseError(source, `unusable price ${price}`);
      } catch (err) {
        lastError = err;
        log.debug({ symbol: sym, source, err }, 'Price source failed, trying next');
      }
    }
    log.warn({ symbol: sym, err: lastError }, 'All price sources failed');
    throw new Error(`No usable price for ${sym}: ${describe(lastError)}`, { cause: lastError });
  }

  async getBookTicker(symbol: string): Promise<BookTicker> {
    const sym = normalizeSymbol(symbol);
    const data = await this.rest.getBookTickers(sym);
    const item = pickBySymbol(data.tickers, sym);
    return { bid: item.bidPrice, ask: item.askPrice };
  }

  async getSymbolRules(symbol: string): Promise<ExchangeRules> {
    const sym = normalizeSymbol(symbol);
    const data = await this.rest.getSymbols(sym);
    const info = data.symbols.find((s) => s.symbol === sym);
    if (!info) throw new ResponseParseError('symbols', `no trading rules for ${sym}`);
    return {
      symbol: sym,
      basePrecision: info.basePrecision,
      quotePrecision: info.quotePrecision,
      minTradeSize: info.minTradeSize,
      maxTradeSize: info.maxTradeSize && info.maxTradeSize > 0 ? info.maxTradeSize : Number.POSITIVE_INFINITY,
      minAmount: info.minAmount ?? 0,
    };
  }

  /** 매수: amount(quote), 매도: size(base) */
  async placeMarketOrder(req: MarketOrderRequest): Promise<PlacedOrder> {
    const sym = normalizeSymbol(req.symbol);
    const placed = await this.rest.newOrder({
      symbol: sym,
      side: req.side,
      type: 'MARKET',
      ...(req.side === 'BUY'
        ? { amount: toDecimalString(req.amount ?? 0) }
        : { size: toDecimalString(req.size ?? 0) }),
      ...(req.clientOrderId ? { clientOrderId: req.clientOrderId } : {}),
    });
    log.info({ symbol: sym, side: req.side, amount: req.amount, size: req.size, orderId: placed.orderId }, 'Market order placed');
    return placed;
  }

  async placeLimitOrder(req: LimitOrderRequest): Promise<PlacedOrder> {
    const sym = normalizeSymbol(req.symbol);
    const placed = await this.rest.newOrder({
      symbol: sym,
      side: req.side,
      type: 'LIMIT',
      price: toDecimalString(req.price),
      size: toDecimalString(req.size),
      ...(req.clientOrderId ? { clientOrderId: req.clientOrderId } : {}),
    });
    log.info({ symbol: sym, side: req.side, price: req.price, size: req.size, orderId: placed.orderId }, 'Limit order placed');
    return placed;
  }

  async cancelOrder(symbol: string, orderId: string): Promise<void> {
    await this.rest.cancelOrder(normalizeSymbol(symbol), orderId);
  }

  async getOrder(symbol: string, orderId: string): Promise<OrderInfo> {
    return toOrderInfo(await this.rest.getOrder(normalizeSymbol(symbol), orderId));
  }

  async getOpenOrders(symbol: string): Promise<OrderInfo[]> {
    const data = await this.rest.getOpenOrders(normalizeSymbol(symbol));
    return data.orders.map(toOrderInfo);
  }

  async getFills(symbol: string, range: { startTime?: number; endTime?: number } = {}): Promise<Fill[]> {
    const data = await this.rest.getFills(normalizeSymbol(symbol), range.startTime, range.endTime);
    return data.fills.map(toFill);
  }

  async getFillsByOrderId(symbol: string, orderId: string): Promise<Fill[]> {
    const data = await this.rest.getFillsByOrderId(normalizeSymbol(symbol), orderId);
    return data.fills.map(toFill);
  }

  async getBalances(): Promise<Balance[]> {
    const data = await this.rest.getBalances();
    return data.balances.map((b) => ({ coin: b.coin.toUpperCase(), free: b.free, frozen: b.frozen }));
  }
}

/** 요청 심볼과 일치하는 항목, 없으면 첫 항목 (단일 심볼 조회) */
function pickBySymbol<T extends { symbol: string }>(items: readonly T[], symbol: string): T {
  const match = items.find((i) => i.symbol === symbol) ?? items[0];
  if (!match) throw new ResponseParseError(symbol, 'empty list');
  return match;
}

function toOrderInfo(o: OrderData): OrderInfo {
  return {
    orderId: o.orderId,
    symbol: o.symbol,
    side: o.side,
    type: o.type,
    price: o.price ?? 0,
    size: o.size ?? 0,
    amount: o.amount ?? 0,
    filledSize: o.filledSize,
    filledAmount: o.filledAmount,
    status: o.status,
  };
}

function toFill(f: FillData): Fill {
  return {
    orderId: f.orderId,
    symbol: f.symbol,
    side: f.side,
    price: f.price,
    size: f.size,
    fee: f.fee,
    timestamp: f.timestamp,
  };
}

function describe(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
