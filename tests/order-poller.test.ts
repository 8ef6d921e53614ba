import { describe, it, expect } from 'vitest';
import { confirmCancel, isFullyFilled, waitForFill } from '../src/execution/order-poller.js';
import type { OrderInfo } from '../src/types/index.js';
import { FakeExchange } from './helpers/fake-exchange.js';

const FAST = { timeoutMs: 40, intervalMs: 5 };

function order(patch: Partial<OrderInfo>): OrderInfo {
  return {
    orderId: 'o-1',
    symbol: 'BTC_USDT',
    side: 'BUY',
    type: 'LIMIT',
    price: 100,
    size: 1,
    amount: 0,
    filledSize: 0,
    filledAmount: 0,
    status: 'OPEN',
    ...patch,
  };
}

describe('isFullyFilled', () => {
  it('should compare filled size against order size', () => {
    expect(isFullyFilled(order({ filledSize: 1 }))).toBe(true);
    expect(isFullyFilled(order({ filledSize: 0.5 }))).toBe(false);
  });

  it('should treat closed amount-based market buys with fills as filled', () => {
    expect(isFullyFilled(order({ type: 'MARKET', size: 0, filledSize: 0.2, status: 'CLOSED' }))).toBe(true);
    expect(isFullyFilled(order({ type: 'MARKET', size: 0, filledSize: 0, status: 'CLOSED' }))).toBe(false);
  });
});

describe('waitForFill', () => {
  it('should return as soon as the order is filled', async () => {
    const ex = new FakeExchange();
    ex.limitFillRatio = 1;
    const { orderId } = await ex.placeLimitOrder({ symbol: 'BTC_USDT', side: 'BUY', price: 100, size: 0.5 });

    const result = await waitForFill(ex, 'BTC_USDT', orderId, { timeoutMs: 1000, intervalMs: 5 });

    expect(result.filled).toBe(true);
    expect(result.status).toBe('CLOSED');
    expect(result.filledSize).toBe(0.5);
  });

  it('should pick up a fill that happens while polling', async () => {
    const ex = new FakeExchange();
    const { orderId } = await ex.placeLimitOrder({ symbol: 'BTC_USDT', side: 'BUY', price: 100, size: 0.5 });
    setTimeout(() => ex.setOrder(orderId, { filledSize: 0.5, filledAmount: 50, status: 'CLOSED' }), 15);

    const result = await waitForFill(ex, 'BTC_USDT', orderId, { timeoutMs: 1000, intervalMs: 5 });

    expect(result.filled).toBe(true);
    expect(result.filledAmount).toBe(50);
  });

  it('should report partial fill when timing out', async () => {
    const ex = new FakeExchange();
    ex.limitFillRatio = 0.5;
    const { orderId } = await ex.placeLimitOrder({ symbol: 'BTC_USDT', side: 'BUY', price: 100, size: 2 });

    const result = await waitForFill(ex, 'BTC_USDT', orderId, FAST);

    expect(result.filled).toBe(false);
    expect(result.status).toBe('OPEN');
    expect(result.filledSize).toBe(1);
  });

  it('should return unknown when the order can never be queried', async () => {
    const ex = new FakeExchange();

    const result = await waitForFill(ex, 'BTC_USDT', 'missing', FAST);

    expect(result).toEqual({ filled: false, filledSize: 0, filledAmount: 0, status: 'unknown', order: null });
  });
});

describe('confirmCancel', () => {
  it('should return closed state after a successful cancel', async () => {
    const ex = new FakeExchange();
    ex.limitFillRatio = 0.25;
    const { orderId } = await ex.placeLimitOrder({ symbol: 'BTC_USDT', side: 'BUY', price: 100, size: 4 });
    await ex.cancelOrder('BTC_USDT', orderId);

    const result = await confirmCancel(ex, 'BTC_USDT', orderId, FAST);

    expect(result.status).toBe('CLOSED');
    expect(result.filled).toBe(false);
    expect(result.filledSize).toBe(1);
  });

  it('should report a fill that raced the cancel', async () => {
    const ex = new FakeExchange();
    ex.cancelBehavior = 'filled-race';
    const { orderId } = await ex.placeLimitOrder({ symbol: 'BTC_USDT', side: 'BUY', price: 100, size: 4 });
    await expect(ex.cancelOrder('BTC_USDT', orderId)).rejects.toThrow('ORDER_CLOSED');

    const result = await confirmCancel(ex, 'BTC_USDT', orderId, FAST);

    expect(result.filled).toBe(true);
    expect(result.filledSize).toBe(4);
  });

  it('should return the open state when the cancel never takes effect', async () => {
    const ex = new FakeExchange();
    ex.cancelBehavior = 'ignore';
    const { orderId } = await ex.placeLimitOrder({ symbol: 'BTC_USDT', side: 'BUY', price: 100, size: 4 });
    await ex.cancelOrder('BTC_USDT', orderId);

    const result = await confirmCancel(ex, 'BTC_USDT', orderId, FAST);

    expect(result.status).toBe('OPEN');
  });
});
