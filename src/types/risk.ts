export interface RiskCheck {
  readonly allowed: boolean;
  readonly reason?: string;
}

export type PositionState =
  | 'FLAT'            // 포지션 없음
  | 'PENDING_ENTRY'   // 진입 주문 진행 중
  | 'OPEN'            // 포지션 보유
  | 'PENDING_EXIT'    // 청산 주문 진행 중
  | 'HALTED';         // 청산 불가: 운영자 개입 필요

export type TradeOutcome = 'win' | 'loss' | 'flat';

export interface DailyStats {
  readonly date: string;        // YYYY-MM-DD (UTC)
  tradeCount: number;
  wins: number;
  losses: number;
  flats: number;
  totalPnl: number;
  consecutiveLosses: number;
}
