import { describe, it, expect } from 'vitest';
import { DryRunSpotApi, type MarketDataSource } from '../src/execution/dry-run-api.js';
import { ExchangeRejectedError } from '../src/errors.js';
import { TEST_RULES } from './helpers/fake-exchange.js';

function market(price: number): MarketDataSource {
  return {
    getPrice: async () => price,
    getBookTicker: async () => ({ bid: price - 0.5, ask: price + 0.5 }),
    getSymbolRules: async () => TEST_RULES,
  };
}

describe('DryRunSpotApi', () => {
  it('should report itself as dry run', () => {
    expect(new DryRunSpotApi(market(100)).dryRun).toBe(true);
  });

  it('should fill market buys at the last seen price', async () => {
    const api = new DryRunSpotApi(market(100));
    await api.getPrice('BTC_USDT');

    const { orderId } = await api.placeMarketOrder({ symbol: 'btcusdt', side: 'BUY', amount: 25 });
    const order = await api.getOrder('BTC_USDT', orderId);

    expect(orderId).toBe('dry-1');
    expect(order).toMatchObject({ symbol: 'BTC_USDT', status: 'CLOSED', filledSize: 0.25, filledAmount: 25 });
  });

  it('should fill limit orders at their limit price on first query', async () => {
    const api = new DryRunSpotApi(market(100));
    const { orderId } = await api.placeLimitOrder({ symbol: 'BTC_USDT', side: 'BUY', price: 99, size: 2 });

    expect(await api.getOpenOrders('BTC_USDT')).toHaveLength(1);
    expect(await api.getOrder('BTC_USDT', orderId)).toMatchObject({ status: 'CLOSED', filledSize: 2, filledAmount: 198 });
    expect(await api.getOpenOrders('BTC_USDT')).toHaveLength(0);
  });

  it('should reject cancelling a closed order', async () => {
    const api = new DryRunSpotApi(market(100));
    const { orderId } = await api.placeMarketOrder({ symbol: 'BTC_USDT', side: 'SELL', size: 1 });

    await expect(api.cancelOrder('BTC_USDT', orderId)).rejects.toBeInstanceOf(ExchangeRejectedError);
  });

  it('should forget an order once it has been reported closed', async () => {
    const api = new DryRunSpotApi(market(100));
    const { orderId } = await api.placeLimitOrder({ symbol: 'BTC_USDT', side: 'SELL', price: 101, size: 1 });
    await api.cancelOrder('BTC_USDT', orderId);

    expect(await api.getOrder('BTC_USDT', orderId)).toMatchObject({ status: 'CLOSED', filledSize: 0 });
    await expect(api.getOrder('BTC_USDT', orderId)).rejects.toThrow('ORDER_NOT_FOUND');
    await expect(api.cancelOrder('BTC_USDT', orderId)).rejects.toThrow('ORDER_NOT_FOUND');
  });

  it('should reject unknown orders', async () => {
    await expect(new DryRunSpotApi(market(100)).getOrder('BTC_USDT', 'nope')).rejects.toThrow('ORDER_NOT_FOUND');
  });

  it('should return no fills or balances', async () => {
    const api = new DryRunSpotApi(market(100));
    expect(await api.getFillsByOrderId()).toEqual([]);
    expect(await api.getBalances()).toEqual([]);
  });
});
