import { createChildLogger } from '../logger.js';
import type { RiskConfig } from '../config.js';
import type { DailyStats, RiskCheck, TradeOutcome } from '../types/index.js';

const log = createChildLogger('risk');

/**
 * 리스크 거버너 (전 심볼 공유)
 * - 당일(UTC) 실현 손익 합계 / 연속 손실 카운터
 * - 한도 초과 시 cool-off: 모든 심볼 신규 진입 금지 (기존 포지션 관리는 계속)
 * - 잔고 부족 거절 시 fundsHaltSec 동안 신규 진입 금지
 * - |pnl| <= pnlEpsilon 은 flat: 승/패 어느 쪽도 아니며 연속 손실 카운터를 건드리지 않는다
 */
export class RiskGovernor {
  private dailyStats: DailyStats;
  private previousDay: DailyStats | null = null;
  private coolOffUntil = 0;
  private haltUntil = 0;
  private haltReason: string | null = null;

  constructor(
    private readonly cfg: RiskConfig,
    private readonly now: () => number = Date.now,
  ) {
    this.dailyStats = newDayStats(utcDate(this.now()));
  }

  /** 신규 진입 가능 여부 */
  checkEntry(now: number = this.now()): RiskCheck {
    this.rollDay(now);

    if (now < this.coolOffUntil) {
      const remainingSec = Math.ceil((this.coolOffUntil - now) / 1000);
      return { allowed: false, reason: `Risk cool-off: ${remainingSec}s remaining` };
    }
    if (now < this.haltUntil) {
      const remainingSec = Math.ceil((this.haltUntil - now) / 1000);
      return { allowed: false, reason: `Entries halted (${this.haltReason ?? 'unknown'}): ${remainingSec}s remaining` };
    }
    return { allowed: true };
  }

  /** 실현 손익 기록 → 승/패/flat 분류, 한도 초과 시 cool-off 시작 */
  recordExit(pnl: number, now: number = this.now()): TradeOutcome {
    this.rollDay(now);
    const outcome = classify(pnl, this.cfg.pnlEpsilon);
    const banded = outcome === 'flat' ? 0 : pnl;

    this.dailyStats.tradeCount++;
    this.dailyStats.totalPnl += banded;
    if (outcome === 'win') {
      this.dailyStats.wins++;
      this.dailyStats.consecutiveLosses = 0;
    } else if (outcome === 'loss') {
      this.dailyStats.losses++;
      this.dailyStats.consecutiveLosses++;
    } else {
      this.dailyStats.flats++;
    }

    if (this.checkDailyLoss(now)) return outcome;
    if (
      this.cfg.maxConsecutiveLosses > 0 &&
      this.dailyStats.consecutiveLosses >= this.cfg.maxConsecutiveLosses
    ) {
      this.startCoolOff(now, `${this.dailyStats.consecutiveLosses} consecutive losses`);
    }
    return outcome;
  }

  /**
   * 포지션 일부 청산의 실현 손익: 당일 손익에만 더한다.
   * 거래 수와 승/패 카운터는 포지션이 닫힐 때 recordExit 가 센다.
   */
  recordPartialExit(pnl: number, now: number = this.now()): void {
    this.rollDay(now);
    if (Math.abs(pnl) <= this.cfg.pnlEpsilon) return;
    this.dailyStats.totalPnl += pnl;
    this.checkDailyLoss(now);
  }

  /** 잔고 부족 등으로 신규 진입 일시 정지 (기존 정지가 더 길면 유지) */
  haltEntries(reason: string, durationSec: number = this.cfg.fundsHaltSec, now: number = this.now()): void {
    const until = now + durationSec * 1000;
    if (until <= this.haltUntil) return;
    this.haltUntil = until;
    this.haltReason = reason;
    log.warn({ reason, durationSec, until: new Date(until).toISOString() }, 'New entries halted');
  }

  getDailyStats(now: number = this.now()): Readonly<DailyStats> {
    this.rollDay(now);
    return { ...this.dailyStats };
  }

  /** 직전 UTC 일자 통계 (날짜가 바뀐 적이 없으면 null) */
  getPreviousDayStats(now: number = this.now()): Readonly<DailyStats> | null {
    this.rollDay(now);
    return this.previousDay ? { ...this.previousDay } : null;
  }

  isCoolingOff(now: number = this.now()): boolean {
    return now < this.coolOffUntil;
  }

  /** 당일 손실 한도 초과면 cool-off 시작 후 true */
  private checkDailyLoss(now: number): boolean {
    if (this.cfg.maxDailyLoss > 0 && this.dailyStats.totalPnl <= -this.cfg.maxDailyLoss) {
      this.startCoolOff(now, `daily loss ${this.dailyStats.totalPnl.toFixed(4)} breached ${-this.cfg.maxDailyLoss}`);
      return true;
    }
    return false;
  }

  private startCoolOff(now: number, reason: string): void {
    this.coolOffUntil = now + this.cfg.coolOffSec * 1000;
    // 연속 손실 카운터는 cool-off 시작 시 초기화
    this.dailyStats.consecutiveLosses = 0;
    log.warn(
      { reason, coolOffSec: this.cfg.coolOffSec, until: new Date(this.coolOffUntil).toISOString() },
      'Risk cool-off started',
    );
  }

  private rollDay(now: number): void {
    const today = utcDate(now);
    if (this.dailyStats.date !== today) {
      log.info({ dailyReport: true, ...this.dailyStats }, 'Day rolled over');
      this.previousDay = this.dailyStats;
      // 연속 손실은 날짜를 넘어 이어진다
      this.dailyStats = { ...newDayStats(today), consecutiveLosses: this.dailyStats.consecutiveLosses };
    }
  }
}

function classify(pnl: number, epsilon: number): TradeOutcome {
  if (Math.abs(pnl) <= epsilon) return 'flat';
  return pnl > 0 ? 'win' : 'loss';
}

function utcDate(ts: number): string {
  return new Date(ts).toISOString().slice(0, 10);
}

function newDayStats(date: string): DailyStats {
  return { date, tradeCount: 0, wins: 0, losses: 0, flats: 0, totalPnl: 0, consecutiveLosses: 0 };
}
