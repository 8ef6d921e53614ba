import { ConstraintViolationError } from '../errors.js';
import type { ExchangeRules } from '../types/index.js';

/** 부동소수 오차 보정 (0.29999999 → 0.3 내림 방지) */
const FLOOR_EPSILON = 1e-9;

export interface LimitOrderParams {
  readonly price: number;
  readonly size: number;
}

/** 소수 자릿수 내림 */
export function floorToPrecision(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.floor(value * factor + FLOOR_EPSILON) / factor;
}

/** 소수 자릿수 반올림 */
export function roundToPrecision(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** 소수 자릿수 올림 */
export function ceilToPrecision(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.ceil(value * factor - FLOOR_EPSILON) / factor;
}

/** 주문 파라미터용 10진 문자열 (지수 표기 없음, 유효숫자 15자리, 끝 0 제거) */
export function toDecimalString(value: number): string {
  if (!Number.isFinite(value)) throw new RangeError(`Cannot format ${value} as decimal`);
  const intDigits = Math.max(1, Math.floor(Math.log10(Math.abs(value))) + 1);
  const fixed = value.toFixed(Math.min(12, Math.max(0, 15 - intDigits)));
  if (!fixed.includes('.')) return fixed;
  return fixed.replace(/0+$/, '').replace(/\.$/, '');
}

/**
 * 진입 지정가 매수 정규화
 * 가격: quote 정밀도 내림 / 수량: notional / price 를 base 정밀도 내림 후 [min, max] 클램프.
 * 최소 주문 금액 미달이면 base 정밀도 올림으로 수량을 보정한다.
 */
export function normalizeLimitBuy(
  rules: ExchangeRules,
  notional: number,
  rawPrice: number,
): LimitOrderParams {
  const price = floorToPrecision(rawPrice, rules.quotePrecision);
  if (!(price > 0) || !(notional > 0)) {
    throw new ConstraintViolationError(rules.symbol, 'entry', 'price and notional must be positive', {
      price: rawPrice,
      notional,
    });
  }

  let size = floorToPrecision(notional / price, rules.basePrecision);
  size = Math.max(size, rules.minTradeSize);
  if (price * size < rules.minAmount) {
    size = ceilToPrecision(rules.minAmount / price, rules.basePrecision);
  }
  size = Math.min(size, rules.maxTradeSize);

  if (size < rules.minTradeSize || !(size > 0)) {
    throw new ConstraintViolationError(rules.symbol, 'entry', 'size below minimum trade size', {
      size,
      minTradeSize: rules.minTradeSize,
    });
  }
  if (price * size < rules.minAmount) {
    throw new ConstraintViolationError(rules.symbol, 'entry', 'notional below minimum amount', {
      notional: price * size,
      minAmount: rules.minAmount,
    });
  }
  return { price, size };
}

/** 시장가 매수 금액 정규화 (quote 정밀도 내림) */
export function normalizeMarketBuy(rules: ExchangeRules, notional: number): number {
  const amount = floorToPrecision(notional, rules.quotePrecision);
  if (!(amount > 0) || amount < rules.minAmount) {
    throw new ConstraintViolationError(rules.symbol, 'entry', 'amount below minimum amount', {
      amount,
      minAmount: rules.minAmount,
    });
  }
  return amount;
}

/**
 * 시장가 매도 수량 정규화: base 정밀도 내림, 최대 수량 클램프
 * 최소 수량 미달(또는 priceHint 기준 최소 금액 미달)이면 exit 측 ConstraintViolationError.
 */
export function normalizeSellQuantity(
  rules: ExchangeRules,
  quantity: number,
  priceHint?: number,
): number {
  const size = Math.min(floorToPrecision(quantity, rules.basePrecision), rules.maxTradeSize);
  if (!(size > 0) || size < rules.minTradeSize) {
    throw new ConstraintViolationError(rules.symbol, 'exit', 'quantity below minimum trade size', {
      quantity,
      size,
      minTradeSize: rules.minTradeSize,
    });
  }
  if (priceHint !== undefined && priceHint > 0 && size * priceHint < rules.minAmount) {
    throw new ConstraintViolationError(rules.symbol, 'exit', 'notional below minimum amount', {
      size,
      price: priceHint,
      minAmount: rules.minAmount,
    });
  }
  return size;
}

/**
 * 메이커 청산(지정가 매도) 정규화
 * 가격: quote 정밀도 반올림 / 수량: base 정밀도 내림 후 minTradeSize 배수로 내림 (보유량 초과 금지).
 */
export function normalizeMakerExit(
  rules: ExchangeRules,
  quantity: number,
  targetPrice: number,
): LimitOrderParams {
  const price = roundToPrecision(targetPrice, rules.quotePrecision);
  let size = floorToPrecision(quantity, rules.basePrecision);
  if (rules.minTradeSize > 0) {
    const steps = Math.floor(size / rules.minTradeSize + FLOOR_EPSILON);
    size = roundToPrecision(steps * rules.minTradeSize, rules.basePrecision);
  }
  size = Math.min(size, rules.maxTradeSize);

  if (!(price > 0) || !(size > 0) || size < rules.minTradeSize) {
    throw new ConstraintViolationError(rules.symbol, 'exit', 'maker exit size below minimum', {
      quantity,
      size,
      price,
      minTradeSize: rules.minTradeSize,
    });
  }
  if (price * size < rules.minAmount) {
    throw new ConstraintViolationError(rules.symbol, 'exit', 'maker exit notional below minimum amount', {
      size,
      price,
      minAmount: rules.minAmount,
    });
  }
  return { price, size };
}
