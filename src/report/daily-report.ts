import cron from 'node-cron';
import { createChildLogger } from '../logger.js';
import type { RiskGovernor } from '../risk/risk-governor.js';
import type { PositionScheduler } from '../engine/scheduler.js';

const log = createChildLogger('daily-report');

/** 매일 00:00 UTC */
export const DAILY_REPORT_CRON = '0 0 * * *';

export interface DailyReportHandle {
  stop(): void;
}

/** 직전 UTC 일자 통계 + 현재 슬롯 사용량 로그 */
export function logDailyReport(governor: RiskGovernor, scheduler: PositionScheduler, now: number = Date.now()): void {
  const stats = governor.getPreviousDayStats(now) ?? governor.getDailyStats(now);
  const slots = scheduler.snapshot();
  log.info(
    {
      dailyReport: true,
      date: stats.date,
      tradeCount: stats.tradeCount,
      wins: stats.wins,
      losses: stats.losses,
      flats: stats.flats,
      totalPnl: stats.totalPnl,
      consecutiveLosses: stats.consecutiveLosses,
      openSlots: slots.global,
      maxOpenTrades: slots.maxOpenTrades,
    },
    'Daily report',
  );
}

/**
 * 일일 리포트 스케줄 시작 (node-cron, UTC)
 */
export function startDailyReport(governor: RiskGovernor, scheduler: PositionScheduler): DailyReportHandle {
  const task = cron.schedule(
    DAILY_REPORT_CRON,
    () => {
      try {
        logDailyReport(governor, scheduler);
      } catch (err) {
        log.error({ err }, 'Daily report failed');
      }
    },
    { timezone: 'UTC' },
  );
  log.info('Daily report scheduled (00:00 UTC)');
  return {
    stop: () => {
      task.stop();
    },
  };
}
