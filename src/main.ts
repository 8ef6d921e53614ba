import { config } from './config.js';
import { createChildLogger } from './logger.js';
import { openDatabase } from './db/database.js';
import { RateLimiter } from './execution/rate-limiter.js';
import { PionexHttpClient } from './exchange/pionex/client.js';
import { PionexRest } from './exchange/pionex/rest.js';
import { PionexSpotApi } from './execution/spot-api.js';
import { DryRunSpotApi } from './execution/dry-run-api.js';
import { ExecutionLayer } from './execution/execution-layer.js';
import { PendingOrderRegistry } from './execution/pending-orders.js';
import { StateStore } from './state/state-store.js';
import { RiskGovernor } from './risk/risk-governor.js';
import { PositionScheduler } from './engine/scheduler.js';
import { SymbolWorker } from './engine/symbol-worker.js';
import { Supervisor } from './engine/supervisor.js';
import { SqliteTradeLog } from './report/trade-log.js';
import { startDailyReport } from './report/daily-report.js';
import type { SpotExchange } from './types/index.js';

const log = createChildLogger('main');

async function main(): Promise<void> {
  const { exchange: ex, trading } = config;
  log.info({ dryRun: ex.dryRun, symbols: trading.symbols, baseUrl: ex.baseUrl }, 'Starting spot engine');

  if (!ex.dryRun && (!ex.apiKey || !ex.apiSecret)) {
    log.fatal('API_KEY and API_SECRET are required when DRY_RUN=false');
    process.exit(1);
  }

  // ── 거래소 ──
  const limiter = new RateLimiter(ex.rateLimitPerSec);
  const client = new PionexHttpClient({
    baseUrl: ex.baseUrl,
    apiKey: ex.apiKey,
    apiSecret: ex.apiSecret,
    limiter,
    timeoutMs: ex.timeoutMs,
    retryBaseMs: ex.retryBaseMs,
    maxServerRetries: ex.maxServerRetries,
  });
  const live = new PionexSpotApi(new PionexRest(client));
  const exchange: SpotExchange = ex.dryRun ? new DryRunSpotApi(live) : live;

  // ── 상태 / 기록 ──
  const store = new StateStore(config.state.file);
  const db = openDatabase(config.db.path);
  const tradeLog = new SqliteTradeLog(db);

  // ── 공유 컴포넌트 ──
  const execution = new ExecutionLayer(exchange, config.execution, new PendingOrderRegistry(store));
  const governor = new RiskGovernor(config.risk);
  const scheduler = new PositionScheduler(trading.maxOpenTrades, trading.maxOpenTradesPerSymbol);

  const supervisor = new Supervisor({
    symbols: trading.symbols,
    store,
    scheduler,
    createWorker: (symbol) =>
      new SymbolWorker({ symbol, exchange, execution, scheduler, governor, store, tradeLog, config }),
  });

  const report = startDailyReport(governor, scheduler);
  supervisor.start();

  // ── Graceful shutdown ──
  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, 'Shutting down');
    report.stop();
    await supervisor.stop();
    db.close();
    log.info({ halted: Object.fromEntries(supervisor.haltedSymbols()) }, 'Shutdown complete');
    process.exit(0);
  };

  process.on('SIGINT', () => { shutdown('SIGINT').catch(() => process.exit(1)); });
  process.on('SIGTERM', () => { shutdown('SIGTERM').catch(() => process.exit(1)); });

  await supervisor.done();
  if (!stopping) {
    log.error({ halted: Object.fromEntries(supervisor.haltedSymbols()) }, 'All workers stopped');
    report.stop();
    db.close();
    process.exit(2);
  }
}

main().catch((err) => {
  log.fatal({ err }, 'Fatal error');
  process.exit(1);
});
