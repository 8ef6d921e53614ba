/**
 * Pionex REST API: endpoints 상수 + client + zod 전용.
 * 응답 data 부분만 검증해 돌려준다. 도메인 변환은 execution/spot-api.ts에서.
 */

import {
  PUBLIC_SYMBOLS,
  PUBLIC_TICKERS,
  PUBLIC_BOOK_TICKERS,
  PUBLIC_TRADES,
  PRIVATE_ORDER,
  PRIVATE_OPEN_ORDERS,
  PRIVATE_FILLS,
  PRIVATE_FILLS_BY_ORDER,
  PRIVATE_BALANCES,
} from './endpoints.js';
import type { PionexHttpClient } from './client.js';
import {
  symbolsDataSchema,
  tickersDataSchema,
  bookTickersDataSchema,
  tradesDataSchema,
  orderPlacedDataSchema,
  orderCancelDataSchema,
  orderDataSchema,
  openOrdersDataSchema,
  fillsDataSchema,
  balancesDataSchema,
} from './schemas.js';

export interface NewOrderBody {
  symbol: string;
  side: 'BUY' | 'SELL';
  type: 'MARKET' | 'LIMIT';
  /** LIMIT 및 MARKET SELL: base 수량 */
  size?: string;
  /** LIMIT 가격 */
  price?: string;
  /** MARKET BUY: quote 금액 */
  amount?: string;
  clientOrderId?: string;
}

export class PionexRest {
  constructor(private readonly client: PionexHttpClient) {}

  // ─── PUBLIC ─────────────────────────────────────────────────────────────

  async getSymbols(symbol?: string) {
    const query: Record<string, string> = symbol ? { symbols: symbol } : {};
    return this.client.requestPublic(PUBLIC_SYMBOLS, query, symbolsDataSchema);
  }

  async getTickers(symbol: string) {
    return this.client.requestPublic(PUBLIC_TICKERS, { symbol }, tickersDataSchema);
  }

  async getBookTickers(symbol: string) {
    return this.client.requestPublic(PUBLIC_BOOK_TICKERS, { symbol }, bookTickersDataSchema);
  }

  async getTrades(symbol: string, limit: number = 1) {
    return this.client.requestPublic(PUBLIC_TRADES, { symbol, limit: String(limit) }, tradesDataSchema);
  }

  // ─── PRIVATE ────────────────────────────────────────────────────────────

  async newOrder(order: NewOrderBody) {
    const body: Record<string, string> = { symbol: order.symbol, side: order.side, type: order.type };
    if (order.size !== undefined) body.size = order.size;
    if (order.price !== undefined) body.price = order.price;
    if (order.amount !== undefined) body.amount = order.amount;
    if (order.clientOrderId !== undefined) body.clientOrderId = order.clientOrderId;
    return this.client.requestPrivate('POST', PRIVATE_ORDER, { body }, orderPlacedDataSchema);
  }

  async getOrder(symbol: string, orderId: string) {
    return this.client.requestPrivate(
      'GET',
      PRIVATE_ORDER,
      { query: { symbol, orderId } },
      orderDataSchema,
    );
  }

  /** 취소 응답의 data는 비어 있을 수 있다 */
  async cancelOrder(symbol: string, orderId: string) {
    await this.client.requestPrivate(
      'DELETE',
      PRIVATE_ORDER,
      { body: { symbol, orderId } },
      orderCancelDataSchema,
    );
  }

  async getOpenOrders(symbol: string) {
    return this.client.requestPrivate('GET', PRIVATE_OPEN_ORDERS, { query: { symbol } }, openOrdersDataSchema);
  }

  /** startTime/endTime: ms */
  async getFills(symbol: string, startTime?: number, endTime?: number) {
    const query: Record<string, string> = { symbol };
    if (startTime != null) query.startTime = String(startTime);
    if (endTime != null) query.endTime = String(endTime);
    return this.client.requestPrivate('GET', PRIVATE_FILLS, { query }, fillsDataSchema);
  }

  async getFillsByOrderId(symbol: string, orderId: string) {
    return this.client.requestPrivate(
      'GET',
      PRIVATE_FILLS_BY_ORDER,
      { query: { symbol, orderId } },
      fillsDataSchema,
    );
  }

  async getBalances() {
    return this.client.requestPrivate('GET', PRIVATE_BALANCES, {}, balancesDataSchema);
  }
}
