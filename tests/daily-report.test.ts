import { describe, it, expect, vi, beforeEach } from 'vitest';

const cronMock = vi.hoisted(() => {
  const stop = vi.fn();
  const schedule = vi.fn((_expr: string, _fn: () => void, _opts: { timezone: string }) => ({ stop }));
  return { schedule, stop };
});

vi.mock('node-cron', () => ({ default: { schedule: cronMock.schedule } }));

import { DAILY_REPORT_CRON, logDailyReport, startDailyReport } from '../src/report/daily-report.js';
import { RiskGovernor } from '../src/risk/risk-governor.js';
import { PositionScheduler } from '../src/engine/scheduler.js';

const riskConfig = {
  maxDailyLoss: 10,
  maxConsecutiveLosses: 3,
  coolOffSec: 60,
  fundsHaltSec: 30,
  pnlEpsilon: 1e-6,
};

const DAY1 = Date.UTC(2024, 0, 1, 12);
const DAY2 = Date.UTC(2024, 0, 2, 0, 0, 5);

describe('daily report', () => {
  beforeEach(() => {
    cronMock.schedule.mockClear();
    cronMock.stop.mockClear();
  });

  it('should schedule at midnight UTC', () => {
    startDailyReport(new RiskGovernor(riskConfig, () => DAY1), new PositionScheduler(3, 1));

    expect(cronMock.schedule).toHaveBeenCalledTimes(1);
    const [expr, , opts] = cronMock.schedule.mock.calls[0] ?? [];
    expect(expr).toBe(DAILY_REPORT_CRON);
    expect(DAILY_REPORT_CRON).toBe('0 0 * * *');
    expect(opts).toEqual({ timezone: 'UTC' });
  });

  it('should stop the scheduled task', () => {
    const handle = startDailyReport(new RiskGovernor(riskConfig, () => DAY1), new PositionScheduler(3, 1));
    handle.stop();
    expect(cronMock.stop).toHaveBeenCalledTimes(1);
  });

  it('should report the previous UTC day once it has rolled', () => {
    const governor = new RiskGovernor(riskConfig, () => DAY1);
    governor.recordExit(2, DAY1);
    const previous = vi.spyOn(governor, 'getPreviousDayStats');
    const current = vi.spyOn(governor, 'getDailyStats');

    governor.checkEntry(DAY2);
    logDailyReport(governor, new PositionScheduler(3, 1), DAY2);

    expect(previous).toHaveBeenCalledWith(DAY2);
    expect(previous.mock.results[0]?.value).toMatchObject({ date: '2024-01-01', tradeCount: 1, totalPnl: 2 });
    expect(current).not.toHaveBeenCalled();
  });

  it('should fall back to the current day before any roll', () => {
    const governor = new RiskGovernor(riskConfig, () => DAY1);
    const current = vi.spyOn(governor, 'getDailyStats');

    logDailyReport(governor, new PositionScheduler(3, 1), DAY1);

    expect(current).toHaveBeenCalledWith(DAY1);
  });

  it('should not throw when the scheduled callback fails', () => {
    const governor = new RiskGovernor(riskConfig, () => DAY1);
    vi.spyOn(governor, 'getPreviousDayStats').mockImplementation(() => {
      throw new Error('boom');
    });
    startDailyReport(governor, new PositionScheduler(3, 1));

    const callback = cronMock.schedule.mock.calls[0]?.[1];
    expect(callback).toBeTypeOf('function');
    expect(() => callback?.()).not.toThrow();
  });
});
