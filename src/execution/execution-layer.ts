import { createChildLogger } from '../logger.js';
import { ConstraintViolationError, PartialExitError, TransportError } from '../errors.js';
import type { ExecutionConfig } from '../config.js';
import type {
  BookTicker,
  ExchangeRules,
  OrderKind,
  OrderSide,
  SpotExchange,
} from '../types/index.js';
import { confirmCancel, waitForFill, type FillResult } from './order-poller.js';
import { PendingOrderRegistry } from './pending-orders.js';
import {
  normalizeLimitBuy,
  normalizeMakerExit,
  normalizeMarketBuy,
  normalizeSellQuantity,
} from './rules.js';

const log = createChildLogger('execution');

/** 잔량 비교 허용 오차 */
const QTY_EPSILON = 1e-12;

export type ExecutionOptions = Pick<
  ExecutionConfig,
  | 'preferMaker'
  | 'makerOffsetBps'
  | 'entryLimitTimeoutMs'
  | 'exitLimitTimeoutMs'
  | 'pollIntervalMs'
  | 'cancelConfirmMs'
>;

export interface EntryResult {
  readonly orderIds: string[];
  /** 체결 수량 (base) */
  readonly quantity: number;
  /** 가중 평균 체결가 */
  readonly avgPrice: number;
  /** 사용 금액 (quote) */
  readonly notional: number;
  readonly usedMaker: boolean;
}

export interface ExitResult {
  readonly orderIds: string[];
  readonly executedQty: number;
  /** 팔지 못한 잔량 (dust) */
  readonly residualQty: number;
  /** 가중 평균 체결가: 거래소가 체결가를 주지 않으면 null */
  readonly avgPrice: number | null;
  readonly usedMaker: boolean;
}

interface Leg {
  orderId: string;
  qty: number;
  quote: number;
}

/**
 * 실행 계층: 진입/청산 의도를 거래소 주문으로 실현
 *
 * 진입: 메이커 선호 시 bid 아래 지정가 → 타임아웃 시 취소 확인 → 잔여 금액 시장가
 * 청산: 시장가(SL/FORCE) 또는 메이커 지정가(TP/TRAIL) → 타임아웃 시 잔량 시장가
 *   잔량 시장가가 실패하면 체결분을 PartialExitError 로 올려 보낸다.
 * 모든 수량/가격은 캐시된 ExchangeRules 로 정규화 후 전송한다.
 * 워커 간 공유 인스턴스: 심볼별 상태는 규칙 캐시뿐.
 */
export class ExecutionLayer {
  private readonly rulesCache = new Map<string, ExchangeRules>();

  constructor(
    private readonly exchange: SpotExchange,
    private readonly options: ExecutionOptions,
    readonly pending: PendingOrderRegistry = new PendingOrderRegistry(),
  ) {}

  /** 심볼 거래 규칙: 첫 사용 시 조회, 프로세스 수명 동안 캐시 */
  async getRules(symbol: string): Promise<ExchangeRules> {
    const cached = this.rulesCache.get(symbol);
    if (cached) return cached;
    const rules = await this.exchange.getSymbolRules(symbol);
    this.rulesCache.set(symbol, rules);
    log.info({ symbol, rules }, 'Trading rules cached');
    return rules;
  }

  /**
   * 최우선 호가. 호가 조회 실패 시 가격에서 합성 호가(mid ± s/2, s = max(1e-6, mid·0.0001)).
   * 둘 다 실패하면 null.
   */
  async getBookTicker(symbol: string): Promise<BookTicker | null> {
    try {
      return await this.exchange.getBookTicker(symbol);
    } catch (err) {
      log.warn({ err, symbol }, 'Book ticker unavailable, deriving synthetic book');
    }
    try {
      const mid = await this.exchange.getPrice(symbol);
      const spread = Math.max(1e-6, mid * 0.0001);
      return { bid: mid - spread / 2, ask: mid + spread / 2 };
    } catch (err) {
      log.warn({ err, symbol }, 'Price unavailable, no book');
      return null;
    }
  }

  /** 진입 (매수): notional: quote 금액 */
  async enter(symbol: string, notional: number, clientOrderId?: string): Promise<EntryResult> {
    const rules = await this.getRules(symbol);

    if (!this.options.preferMaker) {
      const leg = await this.marketBuy(symbol, rules, notional, clientOrderId, null);
      return summarizeEntry([leg], false);
    }

    const book = await this.getBookTicker(symbol);
    if (!book) {
      log.info({ symbol, notional }, 'No book available, entering at market');
      const leg = await this.marketBuy(symbol, rules, notional, clientOrderId, null);
      return summarizeEntry([leg], false);
    }

    const rawPrice = book.bid * (1 - this.options.makerOffsetBps / 10_000);
    const limit = normalizeLimitBuy(rules, notional, rawPrice);
    const placed = await this.exchange.placeLimitOrder({
      symbol,
      side: 'BUY',
      price: limit.price,
      size: limit.size,
      ...(clientOrderId ? { clientOrderId } : {}),
    });
    log.info({ symbol, orderId: placed.orderId, price: limit.price, size: limit.size }, 'Maker entry placed');

    const result = await this.runMakerLeg(symbol, placed.orderId, 'BUY', 'entry', limit.price, limit.size, this.options.entryLimitTimeoutMs);
    const makerLeg: Leg = {
      orderId: placed.orderId,
      qty: result.filledSize,
      quote: quoteOf(result, limit.price),
    };

    if (result.filled) {
      return summarizeEntry([makerLeg], true);
    }

    const remaining = notional - makerLeg.quote;
    if (makerLeg.qty > 0 && remaining < Math.max(rules.minAmount, QTY_EPSILON)) {
      log.info({ symbol, filled: makerLeg.qty, remaining }, 'Partial maker entry, remainder below minimum');
      return summarizeEntry([makerLeg], true);
    }

    log.info({ symbol, filled: makerLeg.qty, remaining }, 'Maker entry not filled, falling back to market');
    try {
      const fallback = await this.marketBuy(
        symbol,
        rules,
        remaining,
        clientOrderId ? `${clientOrderId}-m` : undefined,
        book.ask,
      );
      return summarizeEntry(makerLeg.qty > 0 ? [makerLeg, fallback] : [fallback], makerLeg.qty > 0);
    } catch (err) {
      // 부분 체결분이 있으면 그것만으로 포지션을 연다
      if (makerLeg.qty > 0) {
        log.error({ err, symbol, filled: makerLeg.qty }, 'Market fallback failed, keeping partial maker fill');
        return summarizeEntry([makerLeg], true);
      }
      throw err;
    }
  }

  /** 시장가 청산 (SL / FORCE, 메이커 폴백) */
  async exitMarket(symbol: string, quantity: number, priceHint?: number): Promise<ExitResult> {
    const rules = await this.getRules(symbol);
    const leg = await this.marketSell(symbol, rules, quantity, priceHint);
    return summarizeExit([leg], quantity, false);
  }

  /**
   * 메이커 청산 (TP / TRAIL): targetPrice 이상, 최우선 매도호가 이상으로 지정가 매도
   * 제약 불충족이면 ConstraintViolationError(exit). 미체결 잔량은 시장가로 처리하고
   * 최소 수량 미만 잔량은 residual 로 보고한다.
   */
  async exitMaker(symbol: string, quantity: number, targetPrice: number): Promise<ExitResult> {
    const rules = await this.getRules(symbol);
    const book = await this.getBookTicker(symbol);
    const rawPrice = book ? Math.max(targetPrice, book.ask) : targetPrice;
    const limit = normalizeMakerExit(rules, quantity, rawPrice);

    const placed = await this.exchange.placeLimitOrder({
      symbol,
      side: 'SELL',
      price: limit.price,
      size: limit.size,
    });
    log.info({ symbol, orderId: placed.orderId, price: limit.price, size: limit.size }, 'Maker exit placed');

    const result = await this.runMakerLeg(symbol, placed.orderId, 'SELL', 'exit', limit.price, limit.size, this.options.exitLimitTimeoutMs);
    const legs: Leg[] = [];
    if (result.filledSize > 0) {
      legs.push({ orderId: placed.orderId, qty: result.filledSize, quote: quoteOf(result, limit.price) });
    }

    const remainder = quantity - result.filledSize;
    if (remainder <= QTY_EPSILON) return summarizeExit(legs, quantity, true);

    const hint = book ? book.bid : targetPrice;
    try {
      legs.push(await this.marketSell(symbol, rules, remainder, hint));
    } catch (err) {
      if (result.filledSize <= 0) throw err;
      if (err instanceof ConstraintViolationError && err.isTooSmallToExit) {
        log.info({ symbol, residual: remainder }, 'Exit remainder below minimum, left as dust');
        return summarizeExit(legs, quantity, true);
      }
      const partial = summarizeExit(legs, quantity, true);
      log.error({ err, symbol, executedQty: partial.executedQty, remainder }, 'Market remainder failed after partial maker exit');
      throw new PartialExitError(symbol, partial.executedQty, partial.avgPrice, partial.orderIds, { cause: err });
    }
    return summarizeExit(legs, quantity, result.filledSize > 0);
  }

  /**
   * 이전 청산에서 취소가 확정되지 않은 지정가 매도 정리: 취소 → CLOSED 확인 → pending 제거.
   * 정리된 주문의 체결분을 합산해 반환 (남은 주문이 없으면 null).
   * 하나라도 여전히 미확정이면 TransportError: 이 상태에서 새 청산 주문을 내면 이중 매도가 된다.
   */
  async settlePendingExits(symbol: string): Promise<ExitResult | null> {
    const stale = this.pending.list(symbol).filter((o) => o.kind === 'exit');
    if (stale.length === 0) return null;

    const legs: Leg[] = [];
    let requested = 0;
    for (const order of stale) {
      const settled = await this.cancelAndConfirm(symbol, order.orderId);
      if (settled.status !== 'CLOSED') {
        log.error({ symbol, orderId: order.orderId, status: settled.status }, 'Previous exit order still unresolved');
        throw new TransportError(`Exit order ${order.orderId} on ${symbol} still unresolved`);
      }
      this.pending.remove(order.orderId);
      requested += order.size;
      if (settled.filledSize > 0) {
        legs.push({ orderId: order.orderId, qty: settled.filledSize, quote: quoteOf(settled, order.price) });
      }
      log.info({ symbol, orderId: order.orderId, filledSize: settled.filledSize }, 'Previous exit order settled');
    }
    return summarizeExit(legs, requested, true);
  }

  /**
   * 지정가 주문 1건 추적: 폴링 → 타임아웃 시 취소 + 확정 확인
   * 취소가 확정되지 않으면 pending 기록을 남긴 채 TransportError.
   */
  private async runMakerLeg(
    symbol: string,
    orderId: string,
    side: OrderSide,
    kind: OrderKind,
    price: number,
    size: number,
    timeoutMs: number,
  ): Promise<FillResult> {
    this.pending.add({ orderId, symbol, side, kind, price, size, placedAt: Date.now(), timeoutMs });

    const polled = await waitForFill(this.exchange, symbol, orderId, {
      timeoutMs,
      intervalMs: this.options.pollIntervalMs,
    });
    if (polled.filled || polled.status === 'CLOSED') {
      this.pending.remove(orderId);
      return polled;
    }

    log.info({ symbol, orderId, filledSize: polled.filledSize }, 'Maker order timed out, canceling');
    const confirmed = await this.cancelAndConfirm(symbol, orderId);
    if (confirmed.status !== 'CLOSED') {
      log.error({ symbol, orderId, side, kind, price, size }, 'Maker order state unresolved, left for reconciliation');
      throw new TransportError(`Cancel of ${symbol} order ${orderId} not confirmed`);
    }
    if (confirmed.filled) {
      log.info({ symbol, orderId }, 'Order filled before cancel took effect');
    }
    this.pending.remove(orderId);
    return confirmed;
  }

  /** 취소 요청 후 확정 확인. 마지막으로 관측한 상태를 반환 */
  private async cancelAndConfirm(symbol: string, orderId: string): Promise<FillResult> {
    try {
      await this.exchange.cancelOrder(symbol, orderId);
    } catch (err) {
      // 이미 체결/취소된 주문이면 거래소가 거절한다: 아래 확인 단계에서 판정
      log.warn({ err, symbol, orderId }, 'Cancel request failed, confirming order state');
    }
    return confirmCancel(this.exchange, symbol, orderId, {
      timeoutMs: this.options.cancelConfirmMs,
      intervalMs: this.options.pollIntervalMs,
    });
  }

  private async marketBuy(
    symbol: string,
    rules: ExchangeRules,
    notional: number,
    clientOrderId: string | undefined,
    priceHint: number | null,
  ): Promise<Leg> {
    const amount = normalizeMarketBuy(rules, notional);
    const placed = await this.exchange.placeMarketOrder({
      symbol,
      side: 'BUY',
      amount,
      ...(clientOrderId ? { clientOrderId } : {}),
    });
    const result = await this.settle(symbol, placed.orderId);
    if (result.filledSize > 0) {
      return { orderId: placed.orderId, qty: result.filledSize, quote: quoteOf(result, amount / result.filledSize) };
    }
    // 체결 정보를 못 받으면 호가/현재가로 수량 추정
    const ref = priceHint ?? (await this.exchange.getPrice(symbol));
    log.warn({ symbol, orderId: placed.orderId, amount, ref }, 'Market buy fill unknown, estimating quantity');
    return { orderId: placed.orderId, qty: amount / ref, quote: amount };
  }

  private async marketSell(
    symbol: string,
    rules: ExchangeRules,
    quantity: number,
    priceHint?: number,
  ): Promise<Leg> {
    const size = normalizeSellQuantity(rules, quantity, priceHint);
    const placed = await this.exchange.placeMarketOrder({ symbol, side: 'SELL', size });
    const result = await this.settle(symbol, placed.orderId);
    if (result.filledSize > 0) {
      return { orderId: placed.orderId, qty: result.filledSize, quote: result.filledAmount };
    }
    log.warn({ symbol, orderId: placed.orderId, size }, 'Market sell fill unknown, assuming full size');
    return { orderId: placed.orderId, qty: size, quote: 0 };
  }

  /** 시장가 주문 체결 확인 (짧은 폴링) */
  private settle(symbol: string, orderId: string): Promise<FillResult> {
    return waitForFill(this.exchange, symbol, orderId, {
      timeoutMs: Math.max(this.options.entryLimitTimeoutMs, this.options.pollIntervalMs),
      intervalMs: this.options.pollIntervalMs,
    });
  }
}

/** 체결 금액: 거래소 값이 없으면 수량 × 기준가 */
function quoteOf(result: FillResult, fallbackPrice: number): number {
  return result.filledAmount > 0 ? result.filledAmount : result.filledSize * fallbackPrice;
}

function summarizeEntry(legs: Leg[], usedMaker: boolean): EntryResult {
  const quantity = legs.reduce((s, l) => s + l.qty, 0);
  const notional = legs.reduce((s, l) => s + l.quote, 0);
  return {
    orderIds: legs.map((l) => l.orderId),
    quantity,
    avgPrice: quantity > 0 ? notional / quantity : 0,
    notional,
    usedMaker,
  };
}

function summarizeExit(legs: Leg[], requested: number, usedMaker: boolean): ExitResult {
  const executedQty = legs.reduce((s, l) => s + l.qty, 0);
  const pricedQty = legs.filter((l) => l.quote > 0).reduce((s, l) => s + l.qty, 0);
  const quote = legs.reduce((s, l) => s + l.quote, 0);
  return {
    orderIds: legs.map((l) => l.orderId),
    executedQty,
    residualQty: Math.max(0, requested - executedQty),
    avgPrice: pricedQty > 0 ? quote / pricedQty : null,
    usedMaker,
  };
}
