import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('db');

/**
 * SQLite 연결 + 스키마 초기화. ':memory:' 는 테스트용.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true });
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  initSchema(db);
  log.info({ path }, 'Database initialized');
  return db;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS trade_events (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp   INTEGER NOT NULL,
      event       TEXT NOT NULL,
      symbol      TEXT NOT NULL,
      side        TEXT,
      quantity    REAL,
      price       REAL,
      stop_loss   REAL,
      take_profit REAL,
      order_id    TEXT,
      pnl         REAL,
      reason      TEXT,
      meta        TEXT
    );

    CREATE TABLE IF NOT EXISTS trade_summaries (
      id            INTEGER PRIMARY KEY AUTOINCREMENT,
      entry_ts      INTEGER NOT NULL,
      exit_ts       INTEGER NOT NULL,
      hold_sec      REAL NOT NULL,
      symbol        TEXT NOT NULL,
      side          TEXT NOT NULL,
      quantity      REAL NOT NULL,
      executed_qty  REAL NOT NULL,
      residual_qty  REAL NOT NULL,
      entry_price   REAL NOT NULL,
      exit_price    REAL NOT NULL,
      pnl_usdt      REAL NOT NULL,
      pnl_percent   REAL NOT NULL,
      exit_reason   TEXT NOT NULL,
      meta          TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_trade_events_ts ON trade_events(timestamp);
    CREATE INDEX IF NOT EXISTS idx_trade_events_symbol ON trade_events(symbol);
    CREATE INDEX IF NOT EXISTS idx_trade_summaries_exit ON trade_summaries(exit_ts);
  `);
}
