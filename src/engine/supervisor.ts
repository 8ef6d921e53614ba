import { createChildLogger } from '../logger.js';
import { WorkerHaltedError } from '../errors.js';
import { normalizeSymbol } from '../execution/symbols.js';
import type { StateStore } from '../state/state-store.js';
import type { PositionScheduler } from './scheduler.js';
import type { SymbolWorker } from './symbol-worker.js';

const log = createChildLogger('supervisor');

export type WorkerFactory = (symbol: string) => SymbolWorker;

export interface SupervisorOptions {
  readonly symbols: readonly string[];
  readonly store: StateStore;
  readonly scheduler: PositionScheduler;
  readonly createWorker: WorkerFactory;
}

/**
 * 심볼별 워커 기동/정지
 *
 * start: 영속 상태 로드 → 보유 포지션으로 스케줄러 시드 → 워커 복구 후 병렬 실행
 * 한 워커가 정지(HALTED)해도 나머지는 계속 돈다.
 */
export class Supervisor {
  private readonly workers = new Map<string, SymbolWorker>();
  private readonly halted = new Map<string, string>();
  private abort: AbortController | null = null;
  private running: Promise<void>[] = [];

  constructor(private readonly options: SupervisorOptions) {}

  start(): void {
    if (this.abort) throw new Error('Supervisor already started');

    const symbols = [...new Set(this.options.symbols.map(normalizeSymbol))];
    const persisted = this.options.store.load();

    const open = symbols.filter((s) => persisted[s]?.in_position === true);
    this.options.scheduler.seed(open);
    for (const [symbol, entry] of Object.entries(persisted)) {
      if (entry.in_position && !symbols.includes(symbol)) {
        log.warn({ symbol }, 'Persisted open position for unconfigured symbol is not managed');
      }
    }

    this.abort = new AbortController();
    const signal = this.abort.signal;
    for (const symbol of symbols) {
      const worker = this.options.createWorker(symbol);
      worker.resume(persisted[symbol]);
      this.workers.set(symbol, worker);
      this.running.push(this.runWorker(worker, signal));
    }
    log.info({ symbols, resumed: open }, 'Supervisor started');
  }

  /** 중단 신호 → 진행 중인 tick 이 끝날 때까지 대기 */
  async stop(): Promise<void> {
    if (!this.abort) return;
    this.abort.abort();
    await Promise.all(this.running);
    this.running = [];
    this.abort = null;
    log.info('Supervisor stopped');
  }

  /** 모든 워커 루프가 끝날 때 resolve */
  async done(): Promise<void> {
    await Promise.all(this.running);
  }

  haltedSymbols(): ReadonlyMap<string, string> {
    return new Map(this.halted);
  }

  getWorker(symbol: string): SymbolWorker | undefined {
    return this.workers.get(normalizeSymbol(symbol));
  }

  private async runWorker(worker: SymbolWorker, signal: AbortSignal): Promise<void> {
    try {
      await worker.run(signal);
    } catch (err) {
      if (err instanceof WorkerHaltedError) {
        this.halted.set(worker.symbol, err.message);
        log.error({ symbol: worker.symbol, halted: [...this.halted.keys()] }, 'Worker halted');
        return;
      }
      log.error({ err, symbol: worker.symbol }, 'Worker loop crashed');
      this.halted.set(worker.symbol, err instanceof Error ? err.message : String(err));
    }
  }
}
