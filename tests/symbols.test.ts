import { describe, it, expect } from 'vitest';
import { baseAsset, normalizeSymbol, quoteAsset } from '../src/execution/symbols.js';

describe('normalizeSymbol', () => {
  it('should insert underscore before known quote', () => {
    expect(normalizeSymbol('btcusdt')).toBe('BTC_USDT');
    expect(normalizeSymbol('ETHBTC')).toBe('ETH_BTC');
  });

  it('should keep already normalized symbols', () => {
    expect(normalizeSymbol(' eth_usdt ')).toBe('ETH_USDT');
  });

  it('should return unknown pairs uppercased', () => {
    expect(normalizeSymbol('xyz')).toBe('XYZ');
  });
});

describe('baseAsset / quoteAsset', () => {
  it('should split normalized symbols', () => {
    expect(baseAsset('BTCUSDT')).toBe('BTC');
    expect(quoteAsset('BTC_USDT')).toBe('USDT');
    expect(quoteAsset('XYZ')).toBe('');
  });
});
