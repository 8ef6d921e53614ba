import type { SignalConfig } from '../config.js';
import type {
  BookTicker,
  PricePoint,
  Signal,
  SignalDecision,
  SignalMode,
  TickStats,
} from '../types/index.js';
import { EwmVolatility } from '../indicators/ewm-volatility.js';
import { ZScoreHistory } from '../indicators/zscore-history.js';

/** sigma 가 이 값 이하면 z = 0 */
const SIGMA_EPSILON = 1e-9;

const NO_SIGNAL: Signal = { side: null, score: 0 };

/**
 * z 기반 신호
 * contrarian: z <= -k → BUY, z >= k → SELL / momentum: 반대
 */
export function computeSignalZ(changePct: number, sigma: number, k: number, mode: SignalMode): Signal {
  const z = sigma > SIGMA_EPSILON ? changePct / sigma : 0;
  return sideFor(z, k, mode);
}

/** 단순 변화율(%) 기반 신호 (percent 모드) */
export function computeBreakoutSignal(changePct: number, thresholdPct: number, mode: SignalMode): Signal {
  return sideFor(changePct, thresholdPct, mode);
}

function sideFor(value: number, k: number, mode: SignalMode): Signal {
  const down = value <= -k;
  const up = value >= k;
  if (!down && !up) return NO_SIGNAL;
  const score = Math.abs(value);
  if (mode === 'contrarian') return { side: down ? 'BUY' : 'SELL', score };
  return { side: up ? 'BUY' : 'SELL', score };
}

/** 호가 스프레드 (bps, mid 기준) */
export function spreadBps(book: BookTicker): number {
  const mid = (book.ask + book.bid) / 2;
  if (!(mid > 0)) return Number.POSITIVE_INFINITY;
  return ((book.ask - book.bid) / mid) * 10_000;
}

export function shouldEnterBySpread(bps: number, maxSpreadBps: number): boolean {
  return bps <= Math.max(0, maxSpreadBps);
}

/**
 * 심볼별 z-score 브레이크아웃 신호 엔진
 *
 * observe: 매 틱 (포지션 보유 중에도) 변동성/가격 이력/|z| 이력 갱신
 * evaluate: 포지션이 없을 때만 호출: 임계값, 스프레드 필터, 연속 확인(debounce)
 *
 * SELL 신호는 현물 모드에서 정보용이다 (진입/청산 모두 트리거하지 않음).
 */
export class ZScoreBreakout {
  private readonly volatility: EwmVolatility;
  private readonly zHistory: ZScoreHistory;
  private readonly prices: PricePoint[] = [];
  private confirmStreak = 0;
  private lastSignalSide: Signal['side'] = null;

  constructor(private readonly cfg: SignalConfig) {
    this.volatility = new EwmVolatility(cfg.ewmLambda, cfg.volWindowSize);
    this.zHistory = new ZScoreHistory(cfg.zHistorySize);
  }

  observe(price: number, now: number): TickStats {
    const sigma = this.volatility.update(price);

    this.prices.push({ ts: now, price });
    const referencePrice = this.referencePrice(now, price);
    const changePct = referencePrice > 0 ? ((price - referencePrice) / referencePrice) * 100 : 0;
    const z = sigma > SIGMA_EPSILON ? changePct / sigma : 0;
    this.zHistory.push(Math.abs(z));

    return { price, referencePrice, changePct, sigma, z };
  }

  evaluate(stats: TickStats, book: BookTicker | null): SignalDecision {
    let threshold: number;
    let signal: Signal;
    if (this.cfg.thresholdMode === 'percent') {
      threshold = this.cfg.breakoutChangePercent;
      signal = computeBreakoutSignal(stats.changePct, threshold, this.cfg.mode);
    } else {
      threshold = this.cfg.dynamicZEnabled
        ? Math.max(this.cfg.zThreshold, this.zHistory.percentile(this.cfg.dynamicZPercentile))
        : this.cfg.zThreshold;
      signal = computeSignalZ(stats.changePct, stats.sigma, threshold, this.cfg.mode);
    }

    let bps: number | undefined;
    let filteredBySpread = false;
    if (signal.side === 'BUY' && this.cfg.spreadFilterEnabled && book) {
      bps = spreadBps(book);
      if (!shouldEnterBySpread(bps, this.cfg.maxSpreadBps)) {
        filteredBySpread = true;
        signal = { side: null, score: signal.score };
      }
    }

    if (signal.side === null) {
      this.confirmStreak = 0;
    } else if (signal.side === this.lastSignalSide) {
      this.confirmStreak++;
    } else {
      this.confirmStreak = 1;
    }
    this.lastSignalSide = signal.side;

    return {
      signal,
      stats,
      threshold,
      confirmStreak: this.confirmStreak,
      actionable: signal.side === 'BUY' && this.confirmStreak >= this.cfg.confirmTicks,
      ...(bps !== undefined ? { spreadBps: bps } : {}),
      filteredBySpread,
    };
  }

  /** 진입 시도 후 (성공/실패 무관) 연속 확인 카운터 초기화 */
  resetConfirmation(): void {
    this.confirmStreak = 0;
    this.lastSignalSide = null;
  }

  get sigma(): number {
    return this.volatility.sigma;
  }

  get zHistorySize(): number {
    return this.zHistory.size;
  }

  /**
   * lookback 이상 지난 가장 최근 표본. 없으면 현재 가격.
   * 기준 표본보다 오래된 점은 버린다.
   */
  private referencePrice(now: number, fallback: number): number {
    const cutoff = now - this.cfg.lookbackSec * 1000;
    let refIdx = -1;
    for (let i = this.prices.length - 1; i >= 0; i--) {
      const p = this.prices[i];
      if (p && p.ts <= cutoff) {
        refIdx = i;
        break;
      }
    }
    if (refIdx < 0) return fallback;
    if (refIdx > 0) this.prices.splice(0, refIdx);
    return this.prices[0]?.price ?? fallback;
  }
}
