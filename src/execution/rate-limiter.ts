import { createChildLogger } from '../logger.js';

const log = createChildLogger('rate-limiter');

/**
 * ip: 모든 호출 (public + private)
 * account: 인증 호출만: private 호출은 두 스코프를 모두 소비한다
 */
export type RateScope = 'ip' | 'account';

/** 윈도우 경계 통과 여유 (ms) */
const EDGE_SLACK_MS = 10;

/**
 * 슬라이딩 윈도우 레이트 리미터
 * 거래소: 스코프별 초당 10회
 *
 * 모든 심볼 워커가 공유한다. 검사-기록은 내부 큐(단일 뮤텍스)로 직렬화되어
 * 동시에 wait()를 호출해도 윈도우 용량을 초과해 승인하지 않는다.
 */
export class RateLimiter {
  private readonly maxPerWindow: number;
  private readonly windowMs: number;
  private readonly events: Record<RateScope, number[]> = { ip: [], account: [] };
  private tail: Promise<void> = Promise.resolve();

  constructor(maxPerSec: number = 10, windowMs: number = 1000) {
    if (maxPerSec < 1) throw new Error('RateLimiter maxPerSec must be >= 1');
    this.maxPerWindow = maxPerSec;
    this.windowMs = windowMs;
  }

  /**
   * weight 만큼 승인될 때까지 대기 후 기록.
   * 대기 시간은 최대 약 1 윈도우 × 앞선 대기자 수로 제한된다.
   */
  wait(scope: RateScope, weight: number = 1): Promise<void> {
    if (weight < 1 || weight > this.maxPerWindow) {
      return Promise.reject(
        new RangeError(`weight ${weight} outside 1..${this.maxPerWindow}`),
      );
    }
    const run = this.tail.then(() => this.admit(scope, weight));
    // 한 호출의 실패가 뒤 대기자를 막지 않도록 tail은 항상 resolve
    this.tail = run.catch((err: unknown) => {
      log.error({ err, scope }, 'Rate limiter admission failed');
    });
    return run;
  }

  /** 현재 윈도우 내 사용량 (테스트/모니터링) */
  inFlight(scope: RateScope, now: number = Date.now()): number {
    this.prune(scope, now);
    return this.events[scope].length;
  }

  private async admit(scope: RateScope, weight: number): Promise<void> {
    const q = this.events[scope];
    this.prune(scope, Date.now());

    while (q.length + weight > this.maxPerWindow) {
      const oldest = q[0] ?? Date.now();
      const waitMs = Math.max(0, oldest + this.windowMs + EDGE_SLACK_MS - Date.now());
      log.debug({ scope, waitMs, used: q.length }, 'Rate window full, waiting');
      await sleep(waitMs);
      this.prune(scope, Date.now());
    }

    const at = Date.now();
    for (let i = 0; i < weight; i++) q.push(at);
  }

  private prune(scope: RateScope, now: number): void {
    const q = this.events[scope];
    const windowStart = now - this.windowMs;
    while (q.length > 0 && (q[0] ?? now) <= windowStart) q.shift();
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
