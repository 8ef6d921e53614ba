import { createChildLogger } from '../logger.js';

const log = createChildLogger('scheduler');

export interface SchedulerSnapshot {
  readonly global: number;
  readonly maxOpenTrades: number;
  readonly perSymbol: Readonly<Record<string, number>>;
}

/**
 * 동시 보유 포지션 수 제한 (전역 + 심볼별)
 *
 * tryReserve 는 두 카운터를 한 번에 검사·증가하거나 아무것도 바꾸지 않는다.
 * 모든 메서드가 동기: await 지점이 없으므로 이벤트 루프 위에서 원자적이다.
 */
export class PositionScheduler {
  private global = 0;
  private readonly perSymbol = new Map<string, number>();

  constructor(
    private readonly maxOpenTrades: number,
    private readonly maxOpenTradesPerSymbol: number = 1,
  ) {
    if (maxOpenTrades < 1) throw new Error('maxOpenTrades must be >= 1');
    if (maxOpenTradesPerSymbol < 1) throw new Error('maxOpenTradesPerSymbol must be >= 1');
  }

  tryReserve(symbol: string): boolean {
    const own = this.perSymbol.get(symbol) ?? 0;
    if (this.global >= this.maxOpenTrades || own >= this.maxOpenTradesPerSymbol) {
      log.debug({ symbol, global: this.global, own }, 'Reservation refused');
      return false;
    }
    this.global++;
    this.perSymbol.set(symbol, own + 1);
    log.debug({ symbol, global: this.global }, 'Slot reserved');
    return true;
  }

  /** 0 에서 포화 */
  release(symbol: string): void {
    const own = this.perSymbol.get(symbol) ?? 0;
    if (own <= 0) {
      log.warn({ symbol }, 'Release without reservation ignored');
      return;
    }
    this.perSymbol.set(symbol, own - 1);
    this.global = Math.max(0, this.global - 1);
    log.debug({ symbol, global: this.global }, 'Slot released');
  }

  /**
   * 재시작 시 영속 상태의 보유 포지션으로 카운터 초기화.
   * 한도를 넘는 복구 포지션도 그대로 센다 (신규 진입만 막힌다).
   */
  seed(openSymbols: readonly string[]): void {
    this.global = 0;
    this.perSymbol.clear();
    for (const symbol of openSymbols) {
      this.global++;
      this.perSymbol.set(symbol, (this.perSymbol.get(symbol) ?? 0) + 1);
    }
    if (openSymbols.length > 0) {
      log.info({ open: this.global, symbols: openSymbols }, 'Scheduler seeded from persisted state');
    }
  }

  snapshot(): SchedulerSnapshot {
    return {
      global: this.global,
      maxOpenTrades: this.maxOpenTrades,
      perSymbol: Object.fromEntries(this.perSymbol),
    };
  }
}
