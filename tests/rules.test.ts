import { describe, it, expect } from 'vitest';
import {
  floorToPrecision,
  normalizeLimitBuy,
  normalizeMakerExit,
  normalizeMarketBuy,
  normalizeSellQuantity,
  toDecimalString,
} from '../src/execution/rules.js';
import { ConstraintViolationError } from '../src/errors.js';
import type { ExchangeRules } from '../src/types/index.js';

const rules: ExchangeRules = {
  symbol: 'BTC_USDT',
  basePrecision: 6,
  quotePrecision: 2,
  minTradeSize: 0.0001,
  maxTradeSize: 100,
  minAmount: 10,
};

function violation(fn: () => unknown): ConstraintViolationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConstraintViolationError) return err;
    throw err;
  }
  throw new Error('expected ConstraintViolationError');
}

describe('precision helpers', () => {
  it('should floor without float drift', () => {
    expect(floorToPrecision(0.29, 2)).toBe(0.29);
    expect(floorToPrecision(1.23456, 3)).toBe(1.234);
  });

  it('should format decimals without exponent or trailing zeros', () => {
    expect(toDecimalString(0.0002)).toBe('0.0002');
    expect(toDecimalString(1e-7)).toBe('0.0000001');
    expect(toDecimalString(25)).toBe('25');
    expect(toDecimalString(50000.12)).toBe('50000.12');
  });
});

describe('normalizeLimitBuy', () => {
  it('should floor price and size to exchange precision', () => {
    expect(normalizeLimitBuy(rules, 25, 50000.1234)).toEqual({ price: 50000.12, size: 0.000499 });
  });

  it('should raise size up to minimum trade size and minimum amount', () => {
    expect(normalizeLimitBuy(rules, 2, 50000)).toEqual({ price: 50000, size: 0.0002 });
  });

  it('should clamp size to maximum trade size', () => {
    expect(normalizeLimitBuy({ ...rules, maxTradeSize: 0.0003 }, 1000, 50000)).toEqual({
      price: 50000,
      size: 0.0003,
    });
  });

  it('should reject a non-positive price as entry violation', () => {
    const err = violation(() => normalizeLimitBuy(rules, 25, 0));
    expect(err.side).toBe('entry');
    expect(err.isTooSmallToExit).toBe(false);
  });
});

describe('normalizeMarketBuy', () => {
  it('should floor amount to quote precision', () => {
    expect(normalizeMarketBuy(rules, 25.129)).toBe(25.12);
  });

  it('should reject amount below minimum amount', () => {
    expect(violation(() => normalizeMarketBuy(rules, 9.99)).side).toBe('entry');
  });
});

describe('normalizeSellQuantity', () => {
  it('should floor quantity to base precision', () => {
    expect(normalizeSellQuantity(rules, 0.0012345678)).toBe(0.001234);
  });

  it('should accept quantity exactly at minimum trade size', () => {
    expect(normalizeSellQuantity(rules, 0.0001)).toBe(0.0001);
  });

  it('should report too-small-to-exit below minimum trade size', () => {
    const err = violation(() => normalizeSellQuantity(rules, 0.00005));
    expect(err.isTooSmallToExit).toBe(true);
    expect(err.symbol).toBe('BTC_USDT');
  });

  it('should report too-small-to-exit below minimum amount at the hinted price', () => {
    expect(violation(() => normalizeSellQuantity(rules, 0.0001, 50000)).isTooSmallToExit).toBe(true);
  });

  it('should cap at maximum trade size', () => {
    expect(normalizeSellQuantity({ ...rules, maxTradeSize: 0.5 }, 2)).toBe(0.5);
  });
});

describe('normalizeMakerExit', () => {
  it('should round price and floor size to a minimum-size multiple', () => {
    expect(normalizeMakerExit(rules, 0.00123456, 50123.456)).toEqual({ price: 50123.46, size: 0.0012 });
  });

  it('should never exceed the held quantity', () => {
    const limit = normalizeMakerExit(rules, 0.00029999, 50000);
    expect(limit.size).toBe(0.0002);
  });

  it('should report too-small-to-exit below minimum trade size', () => {
    expect(violation(() => normalizeMakerExit(rules, 0.00009, 50000)).isTooSmallToExit).toBe(true);
  });
});
