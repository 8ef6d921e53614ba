import { createChildLogger, type Logger } from '../logger.js';
import type { EngineConfig } from '../config.js';
import {
  ConstraintViolationError,
  ExchangeRejectedError,
  PartialExitError,
  WorkerHaltedError,
  isEngineError,
} from '../errors.js';
import type { ExitDecision, PositionState, SpotExchange, SymbolState, TickStats } from '../types/index.js';
import { emptySymbolState } from '../types/index.js';
import type { ExecutionLayer, EntryResult, ExitResult } from '../execution/execution-layer.js';
import { baseAsset } from '../execution/symbols.js';
import { AvgAbsMove } from '../indicators/avg-abs-move.js';
import { ZScoreBreakout } from '../strategy/zscore-breakout.js';
import { PositionStateMachine } from '../risk/state-machine.js';
import { computeStops, evaluateExit, realizedPnl } from '../risk/exit-rules.js';
import type { RiskGovernor } from '../risk/risk-governor.js';
import type { PersistedPosition, StateStore } from '../state/state-store.js';
import type { TradeSink } from '../report/trade-log.js';
import type { PositionScheduler } from './scheduler.js';

export type WorkerConfig = Pick<EngineConfig, 'trading' | 'signal' | 'exit' | 'risk'>;

export interface SymbolWorkerDeps {
  readonly symbol: string;
  readonly exchange: SpotExchange;
  readonly execution: ExecutionLayer;
  readonly scheduler: PositionScheduler;
  readonly governor: RiskGovernor;
  readonly store: StateStore;
  readonly tradeLog: TradeSink;
  readonly config: WorkerConfig;
  readonly now?: () => number;
}

/** 잔고 변화 비교 허용 오차 */
const QTY_EPSILON = 1e-12;

/**
 * 심볼 워커: 한 심볼의 신호 → 진입 → 보유 → 청산 루프
 *
 * SymbolState 는 이 워커만 수정한다. 다른 워커와는 Scheduler / RateLimiter / StateStore 로만 만난다.
 * 한 워커 안의 상태 전이는 tick 단위로 순차 실행된다.
 */
export class SymbolWorker {
  readonly symbol: string;
  private readonly log: Logger;
  private readonly sm: PositionStateMachine;
  private readonly signal: ZScoreBreakout;
  private readonly moves: AvgAbsMove;
  private readonly now: () => number;
  private state: SymbolState = emptySymbolState();
  private entrySeq = 0;

  constructor(private readonly deps: SymbolWorkerDeps) {
    this.symbol = deps.symbol;
    this.log = createChildLogger('worker').child({ symbol: deps.symbol });
    this.now = deps.now ?? Date.now;
    this.sm = new PositionStateMachine(deps.symbol, this.now);
    this.signal = new ZScoreBreakout(deps.config.signal);
    this.moves = new AvgAbsMove(deps.config.exit.atrWindowSec * 1000);
  }

  get positionState(): PositionState {
    return this.sm.current;
  }

  snapshot(): Readonly<SymbolState> {
    return { ...this.state };
  }

  /** 영속 상태에서 복구: 보유 포지션이면 OPEN 으로 시작 */
  resume(persisted: PersistedPosition | undefined): void {
    if (!persisted) return;
    this.state.lastExitTime = persisted.last_exit_time;

    if (persisted.pending_order) {
      this.log.warn({ pendingOrder: persisted.pending_order }, 'Pending order from previous run requires reconciliation');
    }
    if (!persisted.in_position) return;

    this.state = {
      ...this.state,
      inPosition: true,
      side: 'BUY',
      quantity: persisted.quantity,
      entryPrice: persisted.entry_price,
      stopLoss: persisted.stop_loss,
      takeProfit: persisted.take_profit,
      maxPriceSinceEntry: Math.max(persisted.max_price_since_entry, persisted.entry_price),
      orderId: persisted.order_id,
      entryTime: persisted.entry_time,
      forceClosePending: persisted.force_close ?? false,
    };
    this.sm.transition('OPEN');
    this.log.info(
      {
        quantity: this.state.quantity,
        entryPrice: this.state.entryPrice,
        stopLoss: this.state.stopLoss,
        takeProfit: this.state.takeProfit,
      },
      'Resumed open position',
    );
  }

  /**
   * 한 틱: 가격 조회 → 변동성 갱신 → (보유 중) 청산 판정 / (무포지션) 진입 판정
   * 청산 불가(최소 수량 미달)면 WorkerHaltedError.
   */
  async tick(): Promise<void> {
    if (this.sm.isHalted()) return;

    let price: number;
    try {
      price = await this.deps.exchange.getPrice(this.symbol);
    } catch (err) {
      this.log.warn({ err }, 'Price unavailable, skipping tick');
      return;
    }

    const now = this.now();
    const stats = this.signal.observe(price, now);
    this.moves.update(now, price);
    this.state.lastPrice = price;

    if (this.sm.isOpen()) {
      await this.manageOpen(price, now);
    } else if (this.sm.isFlat()) {
      await this.maybeEnter(stats, price, now);
    }
  }

  /** 중단 신호까지 tick 반복. 현재 tick 은 끝까지 실행한다. */
  async run(abort: AbortSignal): Promise<void> {
    const intervalMs = this.deps.config.trading.checkIntervalSec * 1000;
    this.log.info({ intervalMs, state: this.sm.current }, 'Worker started');

    while (!abort.aborted && !this.sm.isHalted()) {
      try {
        await this.tick();
      } catch (err) {
        if (err instanceof WorkerHaltedError) throw err;
        this.log.error({ err }, 'Tick failed');
      }
      await sleep(intervalMs, abort);
    }
    this.log.info({ state: this.sm.current }, 'Worker stopped');
  }

  // ─── 진입 ───────────────────────────────────────────────────────────────

  private async maybeEnter(stats: TickStats, price: number, now: number): Promise<void> {
    const { trading, signal: signalCfg } = this.deps.config;
    const book = signalCfg.spreadFilterEnabled ? await this.deps.execution.getBookTicker(this.symbol) : null;
    const decision = this.signal.evaluate(stats, book);

    if (decision.signal.side === 'SELL') {
      this.log.debug({ z: stats.z, changePct: stats.changePct }, 'SELL signal (informational in spot mode)');
    }
    if (decision.filteredBySpread) {
      this.log.debug({ spreadBps: decision.spreadBps }, 'BUY filtered by spread');
    }
    if (!decision.actionable) return;

    if (now - this.state.lastExitTime < trading.cooldownSec * 1000) {
      this.log.debug({ lastExitTime: this.state.lastExitTime }, 'Signal ignored during cooldown');
      return;
    }
    const risk = this.deps.governor.checkEntry(now);
    if (!risk.allowed) {
      this.log.info({ reason: risk.reason }, 'Entry blocked by risk governor');
      return;
    }
    if (!this.deps.scheduler.tryReserve(this.symbol)) {
      this.log.info(this.deps.scheduler.snapshot(), 'Entry skipped: no free position slot');
      return;
    }

    this.sm.transition('PENDING_ENTRY');
    this.signal.resetConfirmation();

    const verify = trading.verifyAfterTrade && !this.deps.exchange.dryRun;
    const preBase = verify ? await this.freeBaseBalance() : null;
    const clientOrderId = `${this.symbol.replace('_', '')}-${now}-${++this.entrySeq}`;

    let result: EntryResult;
    try {
      result = await this.deps.execution.enter(this.symbol, trading.positionUsdt, clientOrderId);
    } catch (err) {
      this.failEntry(err, price, now);
      return;
    }
    if (!(result.quantity > 0)) {
      this.failEntry(new Error('entry returned no filled quantity'), price, now);
      return;
    }

    const entryPrice = result.avgPrice > 0 ? result.avgPrice : price;
    const stops = computeStops(entryPrice, this.deps.config.exit, this.moves.value);
    this.state = {
      ...this.state,
      inPosition: true,
      side: 'BUY',
      quantity: result.quantity,
      entryPrice,
      stopLoss: stops.stopLoss,
      takeProfit: stops.takeProfit,
      maxPriceSinceEntry: entryPrice,
      orderId: result.orderIds[result.orderIds.length - 1] ?? null,
      entryTime: now,
      forceClosePending: false,
    };
    this.sm.transition('OPEN');
    this.persistPosition();

    this.deps.tradeLog.logEvent({
      timestamp: now,
      event: 'ENTRY',
      symbol: this.symbol,
      side: 'BUY',
      quantity: this.state.quantity,
      price: entryPrice,
      stopLoss: stops.stopLoss,
      takeProfit: stops.takeProfit,
      orderId: this.state.orderId,
      meta: {
        orderIds: result.orderIds,
        usedMaker: result.usedMaker,
        notional: result.notional,
        z: stats.z,
        sigma: stats.sigma,
        threshold: decision.threshold,
      },
    });
    this.log.info(
      { quantity: this.state.quantity, entryPrice, stopLoss: stops.stopLoss, takeProfit: stops.takeProfit, usedMaker: result.usedMaker },
      'ENTRY',
    );

    if (verify) await this.verifyEntry(result.orderIds, preBase);
  }

  private failEntry(err: unknown, price: number, now: number): void {
    this.deps.scheduler.release(this.symbol);
    this.sm.transition('FLAT');

    const code = err instanceof ExchangeRejectedError ? err.code : undefined;
    this.log.error(
      { err, price, notional: this.deps.config.trading.positionUsdt, code },
      'Entry failed, slot released',
    );
    if (err instanceof ExchangeRejectedError && err.isInsufficientFunds) {
      this.deps.governor.haltEntries(`insufficient funds on ${this.symbol}`, this.deps.config.risk.fundsHaltSec, now);
    }
    this.deps.tradeLog.logEvent({
      timestamp: now,
      event: 'error',
      symbol: this.symbol,
      side: 'BUY',
      price,
      reason: `entry failed: ${errorMessage(err)}`,
      ...(code ? { meta: { code } } : {}),
    });
  }

  /** 체결 내역 / 잔고 변화로 수량·진입가 보정 */
  private async verifyEntry(orderIds: readonly string[], preBase: number | null): Promise<void> {
    try {
      let qty = 0;
      let notional = 0;
      for (const orderId of orderIds) {
        const fills = await this.deps.exchange.getFillsByOrderId(this.symbol, orderId);
        for (const f of fills) {
          qty += f.size;
          notional += f.size * f.price;
        }
      }
      if (qty > 0) {
        this.state.quantity = qty;
        if (notional > 0) this.applyEntryPrice(notional / qty);
      }

      if (preBase !== null) {
        const postBase = await this.freeBaseBalance();
        const delta = postBase !== null ? postBase - preBase : 0;
        if (delta > 0 && Math.abs(delta - this.state.quantity) > QTY_EPSILON) {
          this.log.info({ from: this.state.quantity, to: delta }, 'Entry quantity adjusted from balance delta');
          this.state.quantity = delta;
        }
      }
      this.persistPosition();
    } catch (err) {
      this.log.warn({ err }, 'Post-trade verification failed, keeping execution figures');
    }
  }

  private applyEntryPrice(entryPrice: number): void {
    const stops = computeStops(entryPrice, this.deps.config.exit, this.moves.value);
    this.state.entryPrice = entryPrice;
    this.state.stopLoss = stops.stopLoss;
    this.state.takeProfit = stops.takeProfit;
    this.state.maxPriceSinceEntry = Math.max(this.state.maxPriceSinceEntry, entryPrice);
  }

  // ─── 보유 / 청산 ─────────────────────────────────────────────────────────

  private async manageOpen(price: number, now: number): Promise<void> {
    this.observeForceClose();

    if (price > this.state.maxPriceSinceEntry) {
      this.state.maxPriceSinceEntry = price;
      this.persist({ max_price_since_entry: price });
    }

    const decision = evaluateExit(this.state, price, now, this.deps.config.exit, this.moves.value);
    if (!decision) return;
    await this.exit(decision, price, now);
  }

  /** 외부(모니터)에서 설정한 force_close 플래그: 관측 즉시 파일에서 지운다 */
  private observeForceClose(): void {
    if (this.state.forceClosePending) return;
    const entry = this.deps.store.load()[this.symbol];
    if (!entry?.force_close) return;
    this.state.forceClosePending = true;
    this.persist({ force_close: false });
    this.log.warn('Force close requested');
  }

  private async exit(decision: ExitDecision, price: number, now: number): Promise<void> {
    this.sm.transition('PENDING_EXIT');
    this.log.info(
      { reason: decision.reason, price, targetPrice: decision.targetPrice, quantity: this.state.quantity },
      'Exit triggered',
    );

    let result: ExitResult;
    try {
      result = await this.executeExit(decision, price, now);
    } catch (err) {
      if (err instanceof PartialExitError) {
        this.bookPartialExit(err.executedQty, err.avgPrice ?? price, err.orderIds, decision, now);
      }
      this.handleExitFailure(err, decision, price, this.state.quantity, now);
      return;
    }

    const quantity = this.state.quantity;
    const executedQty = result.executedQty > 0 ? result.executedQty : quantity;
    const residualQty = result.residualQty;
    const exitPrice = result.avgPrice ?? price;
    const orderIds = result.orderIds;
    const pnl = realizedPnl(this.state.entryPrice, exitPrice, executedQty, this.deps.config.risk.pnlEpsilon);
    const outcome = this.deps.governor.recordExit(pnl.pnl, now);

    this.deps.tradeLog.logEvent({
      timestamp: now,
      event: `EXIT_${decision.reason}`,
      symbol: this.symbol,
      side: 'SELL',
      quantity: executedQty,
      price: exitPrice,
      stopLoss: this.state.stopLoss,
      takeProfit: this.state.takeProfit,
      orderId: orderIds[orderIds.length - 1] ?? null,
      pnl: pnl.pnl,
      reason: decision.reason,
      meta: { orderIds, residualQty, outcome, entryPrice: this.state.entryPrice },
    });
    this.deps.tradeLog.logSummary({
      entryTs: this.state.entryTime,
      exitTs: now,
      symbol: this.symbol,
      side: 'BUY',
      quantity,
      executedQty,
      residualQty,
      entryPrice: this.state.entryPrice,
      exitPrice,
      pnlUsdt: pnl.pnl,
      pnlPercent: pnl.pnlPercent,
      exitReason: decision.reason,
    });
    this.log.info(
      { reason: decision.reason, executedQty, residualQty, exitPrice, pnl: pnl.pnl, pnlPercent: pnl.pnlPercent, outcome },
      'EXIT',
    );

    this.clearPersisted();
    this.deps.scheduler.release(this.symbol);
    this.state = { ...emptySymbolState(), lastPrice: price, lastExitTime: now };
    this.sm.transition('FLAT');
  }

  /**
   * 이전 청산의 미확정 주문부터 정리한 뒤 남은 수량을 청산.
   * 정리된 주문이 전량 체결이었으면 그 결과로 청산을 마친다.
   */
  private async executeExit(decision: ExitDecision, price: number, now: number): Promise<ExitResult> {
    const settled = await this.deps.execution.settlePendingExits(this.symbol);
    if (settled && settled.executedQty > 0) {
      if (settled.residualQty <= QTY_EPSILON || settled.executedQty + QTY_EPSILON >= this.state.quantity) {
        return { ...settled, residualQty: Math.max(0, this.state.quantity - settled.executedQty) };
      }
      this.bookPartialExit(settled.executedQty, settled.avgPrice ?? price, settled.orderIds, decision, now);
    }

    const quantity = this.state.quantity;
    return decision.useMaker
      ? this.deps.execution.exitMaker(this.symbol, quantity, decision.targetPrice)
      : this.deps.execution.exitMarket(this.symbol, quantity, price);
  }

  /** 일부만 팔린 청산: 보유 수량을 줄여 영속화하고 실현 손익을 당일 합계에 반영 */
  private bookPartialExit(
    executedQty: number,
    avgPrice: number,
    orderIds: readonly string[],
    decision: ExitDecision,
    now: number,
  ): void {
    const pnl = realizedPnl(this.state.entryPrice, avgPrice, executedQty, this.deps.config.risk.pnlEpsilon);
    this.deps.governor.recordPartialExit(pnl.pnl, now);
    this.state.quantity = Math.max(0, this.state.quantity - executedQty);
    this.persist({ quantity: this.state.quantity });

    this.deps.tradeLog.logEvent({
      timestamp: now,
      event: `PARTIAL_${decision.reason}`,
      symbol: this.symbol,
      side: 'SELL',
      quantity: executedQty,
      price: avgPrice,
      orderId: orderIds[orderIds.length - 1] ?? null,
      pnl: pnl.pnl,
      reason: decision.reason,
      meta: { orderIds: [...orderIds], remainingQty: this.state.quantity, entryPrice: this.state.entryPrice },
    });
    this.log.warn({ reason: decision.reason, executedQty, avgPrice, remainingQty: this.state.quantity }, 'Partial exit booked');
  }

  private handleExitFailure(err: unknown, decision: ExitDecision, price: number, quantity: number, now: number): void {
    const code = err instanceof ExchangeRejectedError ? err.code : undefined;
    this.deps.tradeLog.logEvent({
      timestamp: now,
      event: 'error',
      symbol: this.symbol,
      side: 'SELL',
      quantity,
      price,
      reason: `exit ${decision.reason} failed: ${errorMessage(err)}`,
      ...(code ? { meta: { code } } : {}),
    });

    if (err instanceof ConstraintViolationError && err.isTooSmallToExit) {
      this.sm.transition('HALTED');
      this.log.fatal(
        { err, quantity, price, targetPrice: decision.targetPrice, context: err.context },
        'Position cannot be closed within exchange limits, worker halted: operator action required',
      );
      throw new WorkerHaltedError(this.symbol, err.message, { cause: err });
    }

    this.sm.transition('OPEN');
    this.log.error(
      { err, reason: decision.reason, quantity, price, targetPrice: decision.targetPrice, code, kind: isEngineError(err) ? err.kind : 'unknown' },
      'Exit failed, retrying next tick',
    );
  }

  // ─── 영속화 ───────────────────────────────────────────────────────────────

  private persistPosition(): void {
    this.persist({
      in_position: true,
      side: 'BUY',
      quantity: this.state.quantity,
      entry_price: this.state.entryPrice,
      stop_loss: this.state.stopLoss,
      take_profit: this.state.takeProfit,
      order_id: this.state.orderId,
      entry_time: this.state.entryTime,
      last_exit_time: this.state.lastExitTime,
      max_price_since_entry: this.state.maxPriceSinceEntry,
    });
  }

  private persist(fields: Partial<PersistedPosition>): void {
    try {
      this.deps.store.updateSymbol(this.symbol, fields);
    } catch (err) {
      this.log.error({ err, fields }, 'Failed to persist state');
    }
  }

  /** 청산 확정 후 엔트리 삭제 */
  private clearPersisted(): void {
    try {
      this.deps.store.clearSymbol(this.symbol);
    } catch (err) {
      this.log.error({ err }, 'Failed to clear persisted position');
    }
  }

  private async freeBaseBalance(): Promise<number | null> {
    try {
      const coin = baseAsset(this.symbol);
      const balances = await this.deps.exchange.getBalances();
      return balances.find((b) => b.coin === coin)?.free ?? 0;
    } catch (err) {
      this.log.warn({ err }, 'Balance lookup failed');
      return null;
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** 중단 신호가 오면 즉시 깨어나는 sleep */
function sleep(ms: number, abort: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (abort.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      abort.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    abort.addEventListener('abort', onAbort, { once: true });
  });
}
