import { createChildLogger } from '../logger.js';
import type { OrderInfo, SpotExchange } from '../types/index.js';

const log = createChildLogger('order-poller');

export interface FillResult {
  filled: boolean;
  filledSize: number;
  /** 체결 금액 (quote) */
  filledAmount: number;
  /** CLOSED: 체결완료 또는 취소 / OPEN: 타임아웃 시점 미체결 / unknown: 조회 실패 */
  status: 'CLOSED' | 'OPEN' | 'unknown';
  order: OrderInfo | null;
}

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
}

/** 수량 비교 허용 오차 */
const SIZE_EPSILON = 1e-12;

/** 지정가 주문이 전량 체결되었는지 */
export function isFullyFilled(order: OrderInfo): boolean {
  if (order.size > 0) return order.filledSize + SIZE_EPSILON >= order.size;
  // 시장가 매수(금액 지정): CLOSED + 체결 수량 > 0
  return order.status === 'CLOSED' && order.filledSize > 0;
}

/**
 * 주문 체결 확인 폴링
 * - exchange.getOrder 를 고정 간격으로 반복 호출, timeoutMs 에서 중단
 * - CLOSED(체결완료/취소) 이면 즉시 반환
 * - 조회 실패는 로그 후 다음 폴링에서 재시도
 */
export async function waitForFill(
  exchange: SpotExchange,
  symbol: string,
  orderId: string,
  options: PollOptions,
): Promise<FillResult> {
  const deadline = Date.now() + options.timeoutMs;
  let attempt = 0;
  let last: OrderInfo | null = null;

  while (Date.now() < deadline) {
    await sleep(Math.min(options.intervalMs, Math.max(0, deadline - Date.now())));
    attempt++;

    try {
      last = await exchange.getOrder(symbol, orderId);
    } catch (err) {
      log.warn({ err, symbol, orderId, attempt }, 'Poll getOrder failed');
      continue;
    }

    log.debug({ symbol, orderId, status: last.status, filledSize: last.filledSize, attempt }, 'Poll result');

    if (isFullyFilled(last) || last.status === 'CLOSED') {
      return toResult(last);
    }
  }

  log.info({ symbol, orderId, timeoutMs: options.timeoutMs }, 'Order fill polling timed out');
  return last ? toResult(last) : emptyResult();
}

/**
 * 취소 후 확정 확인: 취소 직전 체결 경합을 잡기 위해 windowMs 동안 CLOSED 를 기다린다.
 * 마지막으로 관측한 주문 상태를 반환 (한 번도 조회 못하면 unknown).
 */
export async function confirmCancel(
  exchange: SpotExchange,
  symbol: string,
  orderId: string,
  options: PollOptions,
): Promise<FillResult> {
  const deadline = Date.now() + options.timeoutMs;
  let last: OrderInfo | null = null;

  do {
    try {
      last = await exchange.getOrder(symbol, orderId);
      if (last.status === 'CLOSED') return toResult(last);
    } catch (err) {
      log.warn({ err, symbol, orderId }, 'Cancel confirmation getOrder failed');
    }
    if (Date.now() >= deadline) break;
    await sleep(Math.min(options.intervalMs, Math.max(0, deadline - Date.now())));
  } while (Date.now() <= deadline);

  log.warn({ symbol, orderId, status: last?.status ?? 'unknown' }, 'Cancel not confirmed within window');
  return last ? toResult(last) : emptyResult();
}

function toResult(order: OrderInfo): FillResult {
  return {
    filled: isFullyFilled(order),
    filledSize: order.filledSize,
    filledAmount: order.filledAmount,
    status: order.status,
    order,
  };
}

function emptyResult(): FillResult {
  return { filled: false, filledSize: 0, filledAmount: 0, status: 'unknown', order: null };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
