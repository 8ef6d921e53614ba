export type OrderSide = 'BUY' | 'SELL';
export type OrderType = 'MARKET' | 'LIMIT';
/** 거래소 원본 상태: OPEN(미체결/부분체결) / CLOSED(체결완료 또는 취소) */
export type OrderStatus = 'OPEN' | 'CLOSED';
export type OrderKind = 'entry' | 'exit';

export interface PlacedOrder {
  readonly orderId: string;
  readonly clientOrderId?: string;
}

export interface OrderInfo {
  readonly orderId: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly type: OrderType;
  readonly price: number;        // 지정가 (시장가면 0)
  readonly size: number;         // base 수량 (시장가 매수면 0)
  readonly amount: number;       // 시장가 매수 금액 (quote)
  readonly filledSize: number;
  readonly filledAmount: number; // 체결 금액 (quote)
  readonly status: OrderStatus;
}

export interface Fill {
  readonly orderId: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly price: number;
  readonly size: number;
  readonly fee: number;
  readonly timestamp: number;    // Unix ms
}

export interface MarketOrderRequest {
  readonly symbol: string;
  readonly side: OrderSide;
  /** 시장가 매수: quote 금액 */
  readonly amount?: number;
  /** 시장가 매도: base 수량 */
  readonly size?: number;
  readonly clientOrderId?: string;
}

export interface LimitOrderRequest {
  readonly symbol: string;
  readonly side: OrderSide;
  readonly price: number;
  readonly size: number;
  readonly clientOrderId?: string;
}

/** 대시보드 등 외부 가시성용 미체결 지정가 주문 (의사결정에는 쓰지 않음) */
export interface PendingOrder {
  readonly orderId: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly kind: OrderKind;
  readonly price: number;
  readonly size: number;
  readonly placedAt: number;
  readonly timeoutMs: number;
}
