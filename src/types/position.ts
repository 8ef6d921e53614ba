import type { OrderSide } from './order.js';

/** 심볼 워커가 단독 소유하는 실시간 상태 */
export interface SymbolState {
  lastPrice: number | null;
  inPosition: boolean;
  side: Extract<OrderSide, 'BUY'> | null;
  quantity: number;
  entryPrice: number;
  stopLoss: number;
  takeProfit: number;
  maxPriceSinceEntry: number;   // 진입 후 최고가 (트레일링)
  orderId: string | null;
  entryTime: number;            // Unix ms
  lastExitTime: number;         // Unix ms, 쿨다운 기준
  forceClosePending: boolean;
}

export type ExitReason = 'FORCE' | 'SL' | 'TP' | 'TRAIL';

export interface ExitDecision {
  readonly reason: ExitReason;
  /** 메이커 청산 시 최소 지정가 (TP/TRAIL) */
  readonly targetPrice: number;
  readonly useMaker: boolean;
}

export interface Stops {
  readonly stopLoss: number;
  readonly takeProfit: number;
}

export function emptySymbolState(): SymbolState {
  return {
    lastPrice: null,
    inPosition: false,
    side: null,
    quantity: 0,
    entryPrice: 0,
    stopLoss: 0,
    takeProfit: 0,
    maxPriceSinceEntry: 0,
    orderId: null,
    entryTime: 0,
    lastExitTime: 0,
    forceClosePending: false,
  };
}
