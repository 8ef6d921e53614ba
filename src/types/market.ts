export interface BookTicker {
  readonly bid: number;
  readonly ask: number;
}

export interface Balance {
  readonly coin: string;
  readonly free: number;
  readonly frozen: number;
}

/** 심볼별 거래 규칙 (최초 1회 조회 후 캐시) */
export interface ExchangeRules {
  readonly symbol: string;
  readonly basePrecision: number;   // 수량 소수 자릿수
  readonly quotePrecision: number;  // 가격 소수 자릿수
  readonly minTradeSize: number;
  readonly maxTradeSize: number;
  /** 최소 주문 금액 (quote) */
  readonly minAmount: number;
}

/** 가격 한 틱 (Unix ms) */
export interface PricePoint {
  readonly ts: number;
  readonly price: number;
}
