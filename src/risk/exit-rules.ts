import type { ExitConfig } from '../config.js';
import type { ExitDecision, Stops, TradeOutcome } from '../types/index.js';

/** 청산 판정에 필요한 포지션 필드 */
export interface OpenPositionView {
  readonly entryPrice: number;
  readonly stopLoss: number;
  readonly takeProfit: number;
  readonly maxPriceSinceEntry: number;
  readonly entryTime: number;
  readonly forceClosePending: boolean;
}

export interface RealizedPnl {
  readonly pnl: number;
  readonly pnlPercent: number;
  readonly outcome: TradeOutcome;
}

/**
 * 진입 직후 SL/TP 계산
 * fixed: entry × (1 ∓ %) / atr: entry ∓ 배수 × 평균 절대 변동 (표본 부족이면 fixed)
 */
export function computeStops(entryPrice: number, cfg: ExitConfig, avgAbsMove: number = 0): Stops {
  if (cfg.stopMode === 'atr' && avgAbsMove > 0) {
    const stopLoss = entryPrice - cfg.atrStopMultiplier * avgAbsMove;
    const takeProfit = entryPrice + cfg.atrTakeProfitMultiplier * avgAbsMove;
    if (stopLoss > 0) return { stopLoss, takeProfit };
  }
  return {
    stopLoss: entryPrice * (1 - cfg.stopLossPercent / 100),
    takeProfit: entryPrice * (1 + cfg.takeProfitPercent / 100),
  };
}

/**
 * 트레일링 스톱 = max(peak × (1 − retrace%), peak − m × avgAbsMove)
 * m <= 0 또는 avgAbsMove <= 0 이면 ATR 구간 없음. 활성화 전이면 null.
 */
export function trailingStopLevel(
  entryPrice: number,
  peak: number,
  cfg: ExitConfig,
  avgAbsMove: number,
): number | null {
  if (!cfg.trailingEnabled || !(entryPrice > 0)) return null;
  const gainPct = ((peak - entryPrice) / entryPrice) * 100;
  if (gainPct < cfg.trailingActivationGainPercent) return null;
  const pctLeg = peak * (1 - cfg.trailingRetracePercent / 100);
  if (cfg.trailingAtrMultiplier > 0 && avgAbsMove > 0) {
    return Math.max(pctLeg, peak - cfg.trailingAtrMultiplier * avgAbsMove);
  }
  return pctLeg;
}

/**
 * 청산 판정: FORCE → SL → TRAIL → TP 순서
 * 최소 보유 시간 전에는 SL/TP/TRAIL 모두 비활성 (FORCE 만 허용).
 * peak 는 호출 전에 현재 가격까지 반영되어 있어야 한다.
 */
export function evaluateExit(
  position: OpenPositionView,
  price: number,
  now: number,
  cfg: ExitConfig,
  avgAbsMove: number = 0,
): ExitDecision | null {
  if (position.forceClosePending) {
    return { reason: 'FORCE', targetPrice: price, useMaker: false };
  }

  const elapsedSec = (now - position.entryTime) / 1000;
  if (elapsedSec < cfg.minHoldSec) return null;

  const h = cfg.hysteresisPercent / 100;
  if (price <= position.stopLoss * (1 - h)) {
    return { reason: 'SL', targetPrice: position.stopLoss, useMaker: false };
  }

  const peak = Math.max(position.maxPriceSinceEntry, price);
  const trailingStop = trailingStopLevel(position.entryPrice, peak, cfg, avgAbsMove);
  if (trailingStop !== null && price <= trailingStop) {
    return { reason: 'TRAIL', targetPrice: trailingStop, useMaker: cfg.makerForTrailing };
  }

  const tpTrigger = position.takeProfit * (1 + h);
  if (cfg.pullbackEnabled) {
    // peak 가 TP 트리거를 넘은 뒤 pullback% 되돌림에서 실행
    if (peak >= tpTrigger && price <= peak * (1 - cfg.pullbackPercent / 100)) {
      return { reason: 'TP', targetPrice: position.takeProfit, useMaker: cfg.makerForTakeProfit };
    }
  } else if (price >= tpTrigger) {
    return { reason: 'TP', targetPrice: position.takeProfit, useMaker: cfg.makerForTakeProfit };
  }

  return null;
}

/** 실현 손익. |pnl| <= epsilon 이면 0 (flat) */
export function realizedPnl(
  entryPrice: number,
  exitPrice: number,
  quantity: number,
  epsilon: number,
): RealizedPnl {
  const raw = (exitPrice - entryPrice) * quantity;
  if (Math.abs(raw) <= epsilon || !(entryPrice > 0)) {
    return { pnl: 0, pnlPercent: 0, outcome: 'flat' };
  }
  return {
    pnl: raw,
    pnlPercent: ((exitPrice - entryPrice) / entryPrice) * 100,
    outcome: raw > 0 ? 'win' : 'loss',
  };
}
