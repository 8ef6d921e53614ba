import { request as undiciRequest, type Dispatcher } from 'undici';
import type { z } from 'zod';
import { createChildLogger } from '../../logger.js';
import {
  ExchangeRejectedError,
  ResponseParseError,
  TransportError,
} from '../../errors.js';
import type { RateLimiter } from '../../execution/rate-limiter.js';
import { buildSignature, canonicalQuery } from './auth.js';
import { HEADER_API_KEY, HEADER_SIGNATURE } from './endpoints.js';
import { envelopeSchema } from './schemas.js';

const log = createChildLogger('pionex-client');

/** 429 백오프 상한 */
const RATE_LIMIT_BACKOFF_CAP_MS = 60_000;
/** 5xx 백오프 상한 */
const SERVER_BACKOFF_CAP_MS = 10_000;
/** 2^n 지수 상한 (상한 도달 이후 지연은 cap 으로 고정) */
const MAX_BACKOFF_EXPONENT = 30;
/** 검증 실패 시 로그에 남길 raw 응답 길이 */
const RAW_LOG_LIMIT = 500;

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface PionexClientOptions {
  baseUrl: string;
  apiKey: string;
  apiSecret: string;
  limiter: RateLimiter;
  timeoutMs?: number;
  retryBaseMs?: number;
  maxServerRetries?: number;
  /** 테스트용 (undici MockAgent) */
  dispatcher?: Dispatcher;
  now?: () => number;
}

export interface PrivateRequestParams {
  query?: Record<string, string>;
  body?: Record<string, string | number>;
}

interface SendParams {
  method: HttpMethod;
  path: string;
  query: Record<string, string>;
  body?: string;
  signed: boolean;
  weight: number;
}

/**
 * Pionex REST 클라이언트: undici + zod.
 *
 * 재시도 정책:
 *  - 429: min(60s, base * 2^n) 백오프, 횟수 제한 없이 재시도
 *  - 5xx: min(10s, base * 2^n) 백오프, maxServerRetries 소진 시 TransportError
 *  - 그 외 HTTP 상태 / 네트워크 오류: 즉시 TransportError
 *
 * HTTP 200 + result=false → ExchangeRejectedError, 스키마 불일치 → ResponseParseError.
 * 모든 시도는 레이트 리미터를 통과한다 (private 호출은 ip + account).
 */
export class PionexHttpClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly apiSecret: string;
  private readonly limiter: RateLimiter;
  private readonly timeoutMs: number;
  private readonly retryBaseMs: number;
  private readonly maxServerRetries: number;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly now: () => number;

  constructor(options: PionexClientOptions) {
    this.baseUrl = options.baseUrl;
    this.apiKey = options.apiKey;
    this.apiSecret = options.apiSecret;
    this.limiter = options.limiter;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.retryBaseMs = options.retryBaseMs ?? 1000;
    this.maxServerRetries = options.maxServerRetries ?? 5;
    this.dispatcher = options.dispatcher;
    this.now = options.now ?? Date.now;
  }

  /** Public GET: 서명 없음 */
  async requestPublic<T>(
    path: string,
    query: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    weight: number = 1,
  ): Promise<T> {
    const data = await this.send({ method: 'GET', path, query, signed: false, weight });
    return this.validate(path, data, schema);
  }

  /** Private 요청: 매 시도마다 timestamp 갱신 후 서명 */
  async requestPrivate<T>(
    method: HttpMethod,
    path: string,
    params: PrivateRequestParams,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const body = params.body && method !== 'GET' ? JSON.stringify(params.body) : undefined;
    const data = await this.send({
      method,
      path,
      query: params.query ?? {},
      body,
      signed: true,
      weight: 1,
    });
    return this.validate(path, data, schema);
  }

  private async send(params: SendParams): Promise<unknown> {
    const { method, path, body, signed, weight } = params;
    let rateLimitedRetries = 0;
    let serverRetries = 0;

    for (;;) {
      await this.limiter.wait('ip', weight);
      if (signed) await this.limiter.wait('account', weight);

      const query = signed ? { ...params.query, timestamp: String(this.now()) } : params.query;
      const qs = canonicalQuery(query);
      const url = `${this.baseUrl}${path}${qs ? `?${qs}` : ''}`;

      const headers: Record<string, string> = { Accept: 'application/json' };
      if (signed) {
        headers[HEADER_API_KEY] = this.apiKey;
        headers[HEADER_SIGNATURE] = buildSignature(this.apiSecret, method, path, query, body);
      }
      if (body !== undefined) headers['Content-Type'] = 'application/json';

      let statusCode: number;
      let text: string;
      try {
        const res = await undiciRequest(url, {
          method,
          headers,
          body,
          headersTimeout: this.timeoutMs,
          bodyTimeout: this.timeoutMs,
          ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
        });
        statusCode = res.statusCode;
        text = await res.body.text();
      } catch (err) {
        log.warn({ err, method, path }, 'Request failed at transport level');
        throw new TransportError(`${method} ${path} failed: ${errorMessage(err)}`, undefined, {
          cause: err,
        });
      }

      if (statusCode === 429) {
        const delay = Math.min(
          RATE_LIMIT_BACKOFF_CAP_MS,
          this.retryBaseMs * 2 ** Math.min(rateLimitedRetries, MAX_BACKOFF_EXPONENT),
        );
        rateLimitedRetries++;
        log.warn({ path, attempt: rateLimitedRetries, delay }, 'Rate limited (429), backing off');
        await sleep(delay);
        continue;
      }

      if (statusCode >= 500) {
        if (serverRetries >= this.maxServerRetries) {
          log.error({ path, statusCode, attempts: serverRetries + 1 }, 'Server error retries exhausted');
          throw new TransportError(`${method} ${path} returned ${statusCode}`, statusCode);
        }
        const delay = Math.min(SERVER_BACKOFF_CAP_MS, this.retryBaseMs * 2 ** serverRetries);
        serverRetries++;
        log.warn({ path, statusCode, attempt: serverRetries, delay }, 'Server error, backing off');
        await sleep(delay);
        continue;
      }

      if (statusCode !== 200) {
        log.warn({ path, statusCode, body: text.slice(0, RAW_LOG_LIMIT) }, 'Request failed');
        throw new TransportError(`${method} ${path} returned ${statusCode}`, statusCode);
      }

      return this.unwrap(path, text);
    }
  }

  /** envelope 검증 + result=false 처리 → data 반환 */
  private unwrap(path: string, text: string): unknown {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      log.warn({ path, err, body: text.slice(0, RAW_LOG_LIMIT) }, 'Response is not JSON');
      throw new ResponseParseError(path, 'body is not valid JSON');
    }

    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) {
      log.warn({ path, body: text.slice(0, RAW_LOG_LIMIT) }, 'Response envelope validation failed');
      throw new ResponseParseError(path, envelope.error.message);
    }
    if (!envelope.data.result) {
      const code = envelope.data.code ?? 'UNKNOWN';
      const message = envelope.data.message ?? '';
      log.warn({ path, code, message }, 'Exchange rejected request');
      throw new ExchangeRejectedError(code, message, path);
    }
    return envelope.data.data;
  }

  private validate<T>(path: string, data: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const parsed = schema.safeParse(data);
    if (parsed.success) return parsed.data;
    const payload = JSON.stringify(data) ?? 'undefined';
    log.warn({ path, raw: payload.slice(0, RAW_LOG_LIMIT) }, 'Response validation failed');
    throw new ResponseParseError(path, parsed.error.message);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
