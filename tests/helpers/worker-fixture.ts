import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ExecutionLayer } from '../../src/execution/execution-layer.js';
import { RiskGovernor } from '../../src/risk/risk-governor.js';
import { PositionScheduler } from '../../src/engine/scheduler.js';
import { SymbolWorker, type WorkerConfig } from '../../src/engine/symbol-worker.js';
import { StateStore } from '../../src/state/state-store.js';
import type { TradeEvent, TradeSink, TradeSummary } from '../../src/report/trade-log.js';
import { FakeExchange } from './fake-exchange.js';

export const T0 = Date.UTC(2024, 0, 1, 12);

/** 변화율 1% 돌파, 2틱 확인, 고정 SL 2% / TP 3% */
export function workerConfig(): WorkerConfig {
  return {
    trading: {
      symbols: ['BTC_USDT'],
      positionUsdt: 25,
      maxOpenTrades: 3,
      maxOpenTradesPerSymbol: 1,
      checkIntervalSec: 0.005,
      cooldownSec: 60,
      verifyAfterTrade: false,
    },
    signal: {
      mode: 'contrarian',
      thresholdMode: 'percent',
      lookbackSec: 10,
      confirmTicks: 2,
      breakoutChangePercent: 1,
      ewmLambda: 0.94,
      zThreshold: 2.6,
      dynamicZEnabled: false,
      dynamicZPercentile: 0.7,
      zHistorySize: 100,
      volWindowSize: 100,
      spreadFilterEnabled: false,
      maxSpreadBps: 3,
    },
    exit: {
      stopMode: 'fixed',
      stopLossPercent: 2,
      takeProfitPercent: 3,
      atrWindowSec: 120,
      atrStopMultiplier: 1.5,
      atrTakeProfitMultiplier: 2.5,
      hysteresisPercent: 0,
      minHoldSec: 0,
      pullbackEnabled: false,
      pullbackPercent: 0.1,
      trailingEnabled: false,
      trailingActivationGainPercent: 2,
      trailingRetracePercent: 0.25,
      trailingAtrMultiplier: 0,
      makerForTakeProfit: false,
      makerForTrailing: false,
    },
    risk: {
      maxDailyLoss: 100,
      maxConsecutiveLosses: 5,
      coolOffSec: 60,
      fundsHaltSec: 30,
      pnlEpsilon: 1e-6,
    },
  };
}

/** 인메모리 거래 로그 */
export class MemoryTradeSink implements TradeSink {
  readonly events: TradeEvent[] = [];
  readonly summaries: TradeSummary[] = [];

  logEvent(event: TradeEvent): void {
    this.events.push(event);
  }

  logSummary(summary: TradeSummary): void {
    this.summaries.push(summary);
  }
}

export interface WorkerHarness {
  readonly exchange: FakeExchange;
  readonly execution: ExecutionLayer;
  readonly scheduler: PositionScheduler;
  readonly governor: RiskGovernor;
  readonly store: StateStore;
  readonly tradeLog: MemoryTradeSink;
  readonly config: WorkerConfig;
  readonly clock: { now: number };
  createWorker(symbol: string): SymbolWorker;
  cleanup(): void;
}

export function createHarness(options: { exchange?: FakeExchange; scheduler?: PositionScheduler; config?: WorkerConfig } = {}): WorkerHarness {
  const dir = mkdtempSync(join(tmpdir(), 'worker-'));
  const exchange = options.exchange ?? new FakeExchange();
  const config = options.config ?? workerConfig();
  const clock = { now: T0 };
  const now = (): number => clock.now;
  const execution = new ExecutionLayer(exchange, {
    preferMaker: false,
    makerOffsetBps: 10,
    entryLimitTimeoutMs: 30,
    exitLimitTimeoutMs: 30,
    pollIntervalMs: 5,
    cancelConfirmMs: 20,
  });
  const scheduler = options.scheduler ?? new PositionScheduler(config.trading.maxOpenTrades, config.trading.maxOpenTradesPerSymbol);
  const governor = new RiskGovernor(config.risk, now);
  const store = new StateStore(join(dir, 'runtime_state.json'));
  const tradeLog = new MemoryTradeSink();

  return {
    exchange,
    execution,
    scheduler,
    governor,
    store,
    tradeLog,
    config,
    clock,
    createWorker: (symbol) =>
      new SymbolWorker({ symbol, exchange, execution, scheduler, governor, store, tradeLog, config, now }),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
