import type { OrderSide } from './order.js';

export type SignalMode = 'contrarian' | 'momentum';

export interface Signal {
  readonly side: OrderSide | null;
  readonly score: number;
}

export interface TickStats {
  readonly price: number;
  readonly referencePrice: number;
  readonly changePct: number;
  readonly sigma: number;
  readonly z: number;
}

export interface SignalDecision {
  readonly signal: Signal;
  readonly stats: TickStats;
  readonly threshold: number;
  readonly confirmStreak: number;
  /** BUY가 confirmTicks 연속 확인됨 → 진입 가능 */
  readonly actionable: boolean;
  readonly spreadBps?: number;
  readonly filteredBySpread: boolean;
}
