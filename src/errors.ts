/**
 * 엔진 에러 분류
 *
 * - transport: 네트워크/HTTP 실패 (5xx 재시도 소진 포함)
 * - exchange_rejected: HTTP 200 + result=false (거래소 업무 거절)
 * - parse: 응답 스키마 불일치 / 필수 필드 누락
 * - constraint: 거래 규칙 위반: 거래소로 보내지 않음
 * - partial_exit: 청산 일부 체결 후 나머지 주문 실패
 * - state_corruption: 영속 상태 파일 손상
 * - worker_halted: 심볼 워커가 스스로 정지
 */
export type EngineErrorKind =
  | 'transport'
  | 'exchange_rejected'
  | 'parse'
  | 'constraint'
  | 'partial_exit'
  | 'state_corruption'
  | 'worker_halted';

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransportError extends EngineError {
  readonly kind = 'transport' as const;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** 잔고 부족으로 분류되는 거래소 코드/메시지 */
const INSUFFICIENT_FUNDS_PATTERNS = [/insufficient/i, /not[_ ]enough/i, /balance_not_enough/i];

export class ExchangeRejectedError extends EngineError {
  readonly kind = 'exchange_rejected' as const;

  constructor(
    readonly code: string,
    readonly exchangeMessage: string,
    readonly path?: string,
  ) {
    super(`Exchange rejected${path ? ` ${path}` : ''}: ${code} ${exchangeMessage}`.trim());
  }

  get isInsufficientFunds(): boolean {
    return INSUFFICIENT_FUNDS_PATTERNS.some(
      (re) => re.test(this.code) || re.test(this.exchangeMessage),
    );
  }
}

export class ResponseParseError extends EngineError {
  readonly kind = 'parse' as const;

  constructor(readonly path: string, detail: string) {
    super(`Unexpected response from ${path}: ${detail}`);
  }
}

export type ConstraintSide = 'entry' | 'exit';

export class ConstraintViolationError extends EngineError {
  readonly kind = 'constraint' as const;

  constructor(
    readonly symbol: string,
    readonly side: ConstraintSide,
    readonly detail: string,
    readonly context: Readonly<Record<string, number>> = {},
  ) {
    super(
      side === 'exit'
        ? `Too small to exit ${symbol}: ${detail}`
        : `Order constraint violated for ${symbol}: ${detail}`,
    );
  }

  get isTooSmallToExit(): boolean {
    return this.side === 'exit';
  }
}

/** 메이커 청산이 일부 체결된 뒤 잔량 주문이 실패: 체결분은 이미 팔렸다 */
export class PartialExitError extends EngineError {
  readonly kind = 'partial_exit' as const;

  constructor(
    readonly symbol: string,
    readonly executedQty: number,
    /** 체결분 가중 평균가: 모르면 null */
    readonly avgPrice: number | null,
    readonly orderIds: readonly string[],
    options?: { cause?: unknown },
  ) {
    super(`Exit of ${symbol} stopped after selling ${executedQty}`, options);
  }
}

export class StateCorruptionError extends EngineError {
  readonly kind = 'state_corruption' as const;

  constructor(readonly file: string, detail: string, options?: { cause?: unknown }) {
    super(`State file ${file} is invalid: ${detail}`, options);
  }
}

export class WorkerHaltedError extends EngineError {
  readonly kind = 'worker_halted' as const;

  constructor(readonly symbol: string, reason: string, options?: { cause?: unknown }) {
    super(`Worker ${symbol} halted: ${reason}`, options);
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
