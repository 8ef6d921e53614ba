import type Database from 'better-sqlite3';
import { z } from 'zod';
import { createChildLogger } from '../logger.js';
import type { ExitReason } from '../types/index.js';

const log = createChildLogger('trade-log');

/** PARTIAL_<reason>: 청산 일부 체결 후 포지션이 남은 경우 */
export type TradeEventName = 'ENTRY' | `EXIT_${ExitReason}` | `PARTIAL_${ExitReason}` | 'error';

export interface TradeEvent {
  readonly timestamp: number;
  readonly event: TradeEventName;
  readonly symbol: string;
  readonly side?: string | null;
  readonly quantity?: number | null;
  readonly price?: number | null;
  readonly stopLoss?: number | null;
  readonly takeProfit?: number | null;
  readonly orderId?: string | null;
  readonly pnl?: number | null;
  readonly reason?: string | null;
  readonly meta?: Record<string, unknown>;
}

export interface TradeSummary {
  readonly entryTs: number;
  readonly exitTs: number;
  readonly symbol: string;
  readonly side: string;
  readonly quantity: number;
  readonly executedQty: number;
  readonly residualQty: number;
  readonly entryPrice: number;
  readonly exitPrice: number;
  readonly pnlUsdt: number;
  readonly pnlPercent: number;
  readonly exitReason: ExitReason;
  readonly meta?: Record<string, unknown>;
}

/** 엔진이 의존하는 추가 전용(append-only) 거래 로그 */
export interface TradeSink {
  logEvent(event: TradeEvent): void;
  logSummary(summary: TradeSummary): void;
}

const eventRowSchema = z.object({
  id: z.number(),
  timestamp: z.number(),
  event: z.string(),
  symbol: z.string(),
  side: z.string().nullable(),
  quantity: z.number().nullable(),
  price: z.number().nullable(),
  stop_loss: z.number().nullable(),
  take_profit: z.number().nullable(),
  order_id: z.string().nullable(),
  pnl: z.number().nullable(),
  reason: z.string().nullable(),
  meta: z.string().nullable(),
});
export type TradeEventRow = z.infer<typeof eventRowSchema>;

const summaryRowSchema = z.object({
  id: z.number(),
  entry_ts: z.number(),
  exit_ts: z.number(),
  hold_sec: z.number(),
  symbol: z.string(),
  side: z.string(),
  quantity: z.number(),
  executed_qty: z.number(),
  residual_qty: z.number(),
  entry_price: z.number(),
  exit_price: z.number(),
  pnl_usdt: z.number(),
  pnl_percent: z.number(),
  exit_reason: z.string(),
  meta: z.string().nullable(),
});
export type TradeSummaryRow = z.infer<typeof summaryRowSchema>;

/**
 * SQLite 거래 로그: trade_events / trade_summaries
 * 기록 실패는 로그만 남기고 거래 흐름을 막지 않는다.
 */
export class SqliteTradeLog implements TradeSink {
  private readonly insertEvent: Database.Statement;
  private readonly insertSummary: Database.Statement;

  constructor(private readonly db: Database.Database) {
    this.insertEvent = db.prepare(`
      INSERT INTO trade_events
        (timestamp, event, symbol, side, quantity, price, stop_loss, take_profit, order_id, pnl, reason, meta)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.insertSummary = db.prepare(`
      INSERT INTO trade_summaries
        (entry_ts, exit_ts, hold_sec, symbol, side, quantity, executed_qty, residual_qty,
         entry_price, exit_price, pnl_usdt, pnl_percent, exit_reason, meta)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
  }

  logEvent(e: TradeEvent): void {
    try {
      this.insertEvent.run(
        e.timestamp,
        e.event,
        e.symbol,
        e.side ?? null,
        e.quantity ?? null,
        e.price ?? null,
        e.stopLoss ?? null,
        e.takeProfit ?? null,
        e.orderId ?? null,
        e.pnl ?? null,
        e.reason ?? null,
        e.meta ? JSON.stringify(e.meta) : null,
      );
    } catch (err) {
      log.error({ err, symbol: e.symbol, event: e.event }, 'Failed to write trade event');
    }
  }

  logSummary(s: TradeSummary): void {
    const holdSec = Math.max(0, (s.exitTs - s.entryTs) / 1000);
    try {
      this.insertSummary.run(
        s.entryTs,
        s.exitTs,
        holdSec,
        s.symbol,
        s.side,
        s.quantity,
        s.executedQty,
        s.residualQty,
        s.entryPrice,
        s.exitPrice,
        s.pnlUsdt,
        s.pnlPercent,
        s.exitReason,
        s.meta ? JSON.stringify(s.meta) : null,
      );
    } catch (err) {
      log.error({ err, symbol: s.symbol }, 'Failed to write trade summary');
    }
  }

  getRecentEvents(limit: number = 50): TradeEventRow[] {
    const rows: unknown = this.db.prepare('SELECT * FROM trade_events ORDER BY id DESC LIMIT ?').all(limit);
    return z.array(eventRowSchema).parse(rows);
  }

  getRecentSummaries(limit: number = 50): TradeSummaryRow[] {
    const rows: unknown = this.db.prepare('SELECT * FROM trade_summaries ORDER BY id DESC LIMIT ?').all(limit);
    return z.array(summaryRowSchema).parse(rows);
  }
}
