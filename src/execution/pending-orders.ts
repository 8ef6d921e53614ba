import { createChildLogger } from '../logger.js';
import type { PendingOrder } from '../types/index.js';
import type { PersistedPendingOrder } from '../state/state-store.js';

const log = createChildLogger('pending-orders');

/** 미체결 주문을 영속 상태에 비추는 대상 (StateStore) */
export interface PendingOrderMirror {
  setPendingOrder(symbol: string, pending: PersistedPendingOrder | null): void;
}

/**
 * 미체결 지정가 주문 레지스트리 (orderId 키)
 * 외부 가시성 전용: 상태 머신은 이 목록으로 판단하지 않는다.
 */
export class PendingOrderRegistry {
  private readonly orders = new Map<string, PendingOrder>();

  constructor(private readonly mirror?: PendingOrderMirror) {}

  add(order: PendingOrder): void {
    this.orders.set(order.orderId, order);
    this.reflect(order.symbol, {
      order_id: order.orderId,
      side: order.side,
      kind: order.kind,
      price: order.price,
      size: order.size,
      placed_at: order.placedAt,
      timeout_ms: order.timeoutMs,
    });
  }

  /** 체결/취소/대체 시 제거. 모르는 orderId 는 무시 */
  remove(orderId: string): PendingOrder | undefined {
    const order = this.orders.get(orderId);
    if (!order) return undefined;
    this.orders.delete(orderId);
    this.reflect(order.symbol, null);
    return order;
  }

  list(symbol?: string): PendingOrder[] {
    const all = [...this.orders.values()];
    return symbol ? all.filter((o) => o.symbol === symbol) : all;
  }

  private reflect(symbol: string, pending: PersistedPendingOrder | null): void {
    if (!this.mirror) return;
    try {
      this.mirror.setPendingOrder(symbol, pending);
    } catch (err) {
      log.error({ err, symbol }, 'Failed to mirror pending order into state file');
    }
  }
}
