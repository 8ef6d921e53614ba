import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { z } from 'zod';
import { PionexHttpClient } from '../src/exchange/pionex/client.js';
import { PionexRest } from '../src/exchange/pionex/rest.js';
import { RateLimiter } from '../src/execution/rate-limiter.js';
import {
  ExchangeRejectedError,
  ResponseParseError,
  TransportError,
} from '../src/errors.js';

const ORIGIN = 'https://api.test';
const NOW = 1_700_000_000_000;

const tickersPath = '/api/v1/market/tickers?symbol=BTC_USDT';
const tickersBody = { result: true, data: { tickers: [{ symbol: 'BTC_USDT', close: '50000.5' }] } };

describe('PionexHttpClient', () => {
  let agent: MockAgent;
  let client: PionexHttpClient;
  let rest: PionexRest;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    client = new PionexHttpClient({
      baseUrl: ORIGIN,
      apiKey: 'test-key',
      apiSecret: 'test-secret',
      limiter: new RateLimiter(100),
      retryBaseMs: 1,
      maxServerRetries: 2,
      dispatcher: agent,
      now: () => NOW,
    });
    rest = new PionexRest(client);
  });

  afterEach(async () => {
    await agent.close();
  });

  it('should parse public data and coerce numeric strings', async () => {
    agent.get(ORIGIN).intercept({ path: tickersPath, method: 'GET' }).reply(200, tickersBody);

    const data = await rest.getTickers('BTC_USDT');
    expect(data.tickers[0]?.close).toBe(50000.5);
  });

  it('should sign private requests with key, signature and timestamp', async () => {
    let seen: { path: string; headers: unknown } | null = null;
    agent
      .get(ORIGIN)
      .intercept({ path: (p) => p.startsWith('/api/v1/trade/order?'), method: 'GET' })
      .reply((opts) => {
        seen = { path: opts.path, headers: opts.headers };
        return {
          statusCode: 200,
          data: {
            result: true,
            data: {
              orderId: 42,
              symbol: 'BTC_USDT',
              type: 'LIMIT',
              side: 'BUY',
              price: '50000',
              size: '0.001',
              filledSize: '0.001',
              filledAmount: '50',
              status: 'CLOSED',
            },
          },
        };
      });

    const order = await rest.getOrder('BTC_USDT', '42');

    expect(order.orderId).toBe('42');
    expect(order.filledSize).toBe(0.001);
    expect(seen).toEqual({
      path: '/api/v1/trade/order?orderId=42&symbol=BTC_USDT&timestamp=1700000000000',
      headers: expect.objectContaining({
        'PIONEX-KEY': 'test-key',
        'PIONEX-SIGNATURE': '8dfdd19ef16105ee65f1692f63365bc2b6f1633ba3b3b62d276afa044ff482ea',
      }),
    });
  });

  it('should send order parameters as JSON body', async () => {
    let body: unknown = null;
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/v1/trade/order?timestamp=1700000000000', method: 'POST' })
      .reply((opts) => {
        body = opts.body;
        return { statusCode: 200, data: { result: true, data: { orderId: '7' } } };
      });

    const placed = await rest.newOrder({ symbol: 'BTC_USDT', side: 'BUY', type: 'MARKET', amount: '25' });

    expect(placed.orderId).toBe('7');
    expect(body).toBe('{"symbol":"BTC_USDT","side":"BUY","type":"MARKET","amount":"25"}');
  });

  it('should retry 429 with backoff and then succeed', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: tickersPath, method: 'GET' }).reply(429, 'slow down');
    pool.intercept({ path: tickersPath, method: 'GET' }).reply(429, 'slow down');
    pool.intercept({ path: tickersPath, method: 'GET' }).reply(200, tickersBody);

    const data = await rest.getTickers('BTC_USDT');
    expect(data.tickers).toHaveLength(1);
  });

  it('should keep retrying 429 without a retry budget until the request succeeds', async () => {
    const patient = new PionexRest(
      new PionexHttpClient({
        baseUrl: ORIGIN,
        apiKey: 'test-key',
        apiSecret: 'test-secret',
        limiter: new RateLimiter(100),
        retryBaseMs: 0,
        maxServerRetries: 0,
        dispatcher: agent,
        now: () => NOW,
      }),
    );
    const pool = agent.get(ORIGIN);
    for (let i = 0; i < 15; i++) {
      pool.intercept({ path: tickersPath, method: 'GET' }).reply(429, 'slow down');
    }
    pool.intercept({ path: tickersPath, method: 'GET' }).reply(200, tickersBody);

    const data = await patient.getTickers('BTC_USDT');
    expect(data.tickers).toHaveLength(1);
    expect(agent.pendingInterceptors()).toHaveLength(0);
  });

  it('should retry 5xx and raise TransportError when exhausted', async () => {
    const pool = agent.get(ORIGIN);
    for (let i = 0; i < 3; i++) {
      pool.intercept({ path: tickersPath, method: 'GET' }).reply(503, 'unavailable');
    }

    const err = await rest.getTickers('BTC_USDT').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    if (!(err instanceof TransportError)) return;
    expect(err.status).toBe(503);
  });

  it('should recover from a single 5xx', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: tickersPath, method: 'GET' }).reply(502, 'bad gateway');
    pool.intercept({ path: tickersPath, method: 'GET' }).reply(200, tickersBody);

    await expect(rest.getTickers('BTC_USDT')).resolves.toMatchObject({ tickers: [{ close: 50000.5 }] });
  });

  it('should not retry other 4xx statuses', async () => {
    agent.get(ORIGIN).intercept({ path: tickersPath, method: 'GET' }).reply(403, 'forbidden');

    const err = await rest.getTickers('BTC_USDT').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    if (!(err instanceof TransportError)) return;
    expect(err.status).toBe(403);
  });

  it('should raise ExchangeRejectedError on result=false', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: (p) => p.startsWith('/api/v1/trade/order?'), method: 'POST' })
      .reply(200, { result: false, code: 'TRADE_BALANCE_NOT_ENOUGH', message: 'balance not enough' });

    const err = await rest
      .newOrder({ symbol: 'BTC_USDT', side: 'BUY', type: 'MARKET', amount: '25' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExchangeRejectedError);
    if (!(err instanceof ExchangeRejectedError)) return;
    expect(err.code).toBe('TRADE_BALANCE_NOT_ENOUGH');
    expect(err.isInsufficientFunds).toBe(true);
  });

  it('should raise ResponseParseError for non-JSON bodies', async () => {
    agent.get(ORIGIN).intercept({ path: tickersPath, method: 'GET' }).reply(200, '<html>oops</html>');

    await expect(rest.getTickers('BTC_USDT')).rejects.toBeInstanceOf(ResponseParseError);
  });

  it('should raise ResponseParseError when data misses required fields', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: tickersPath, method: 'GET' })
      .reply(200, { result: true, data: { tickers: [{ symbol: 'BTC_USDT' }] } });

    await expect(rest.getTickers('BTC_USDT')).rejects.toBeInstanceOf(ResponseParseError);
  });

  it('should map network failures to TransportError', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/custom', method: 'GET' })
      .replyWithError(new Error('socket hang up'));

    await expect(client.requestPublic('/custom', {}, z.unknown())).rejects.toBeInstanceOf(TransportError);
  });
});
