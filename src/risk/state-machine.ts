import { createChildLogger } from '../logger.js';
import type { PositionState } from '../types/index.js';

const log = createChildLogger('state-machine');

type StateTransition = [PositionState, PositionState];

/** 허용된 상태 전이 */
const VALID_TRANSITIONS: StateTransition[] = [
  ['FLAT', 'PENDING_ENTRY'],
  ['PENDING_ENTRY', 'OPEN'],
  ['PENDING_ENTRY', 'FLAT'],           // 진입 실패
  ['FLAT', 'OPEN'],                    // 재시작 후 영속 포지션 복구
  ['OPEN', 'PENDING_EXIT'],
  ['PENDING_EXIT', 'FLAT'],            // 청산 완료
  ['PENDING_EXIT', 'OPEN'],            // 청산 실패 → 다음 틱 재시도
  // 청산 불가 (최소 수량 미달) → 워커 정지
  ['OPEN', 'HALTED'],
  ['PENDING_EXIT', 'HALTED'],
];

/**
 * 심볼별 포지션 상태 머신
 * 잘못된 전이 시도 시 에러 (안전장치). HALTED 는 종료 상태.
 */
export class PositionStateMachine {
  private state: PositionState = 'FLAT';
  private stateEnteredAt: number;
  private history: Array<{ from: PositionState; to: PositionState; at: number }> = [];

  constructor(
    private readonly symbol: string,
    private readonly now: () => number = Date.now,
  ) {
    this.stateEnteredAt = this.now();
  }

  get current(): PositionState {
    return this.state;
  }

  get stateAge(): number {
    return this.now() - this.stateEnteredAt;
  }

  transition(to: PositionState): void {
    if (this.state === to) return; // noop

    if (!this.canTransition(to)) {
      const msg = `Invalid state transition for ${this.symbol}: ${this.state} → ${to}`;
      log.error({ symbol: this.symbol, from: this.state, to }, msg);
      throw new Error(msg);
    }

    log.debug({ symbol: this.symbol, from: this.state, to }, 'State transition');
    const at = this.now();
    this.history.push({ from: this.state, to, at });
    this.state = to;
    this.stateEnteredAt = at;

    // 히스토리 100개 제한
    if (this.history.length > 100) {
      this.history = this.history.slice(-50);
    }
  }

  canTransition(to: PositionState): boolean {
    return VALID_TRANSITIONS.some(([from, target]) => from === this.state && target === to);
  }

  isHalted(): boolean {
    return this.state === 'HALTED';
  }

  isFlat(): boolean {
    return this.state === 'FLAT';
  }

  isOpen(): boolean {
    return this.state === 'OPEN';
  }

  getHistory(): ReadonlyArray<{ from: PositionState; to: PositionState; at: number }> {
    return this.history;
  }
}
