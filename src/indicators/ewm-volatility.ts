/** 변동성 상태: EWM 분산 + 최근 수익률(%) 창 */
export interface VolatilityState {
  readonly ewmVariance: number;
  readonly returns: readonly number[];
}

export function initialVolatilityState(): VolatilityState {
  return { ewmVariance: 0, returns: [] };
}

/**
 * EWM 분산 갱신: var' = λ·var + (1-λ)·r²
 * r: 직전 틱 대비 수익률(%). returns 창은 windowSize 개까지 유지.
 */
export function updateVolatility(
  state: VolatilityState,
  ret: number,
  lambda: number,
  windowSize: number = 300,
): VolatilityState {
  const r = Number.isFinite(ret) ? ret : 0;
  const ewmVariance = Math.max(0, lambda * state.ewmVariance + (1 - lambda) * r * r);
  const returns = [...state.returns, r];
  if (returns.length > windowSize) returns.splice(0, returns.length - windowSize);
  return { ewmVariance, returns };
}

/**
 * 심볼별 EWM 변동성 추적기
 */
export class EwmVolatility {
  private state: VolatilityState = initialVolatilityState();
  private prevPrice: number | null = null;

  constructor(
    private readonly lambda: number,
    private readonly windowSize: number = 300,
  ) {
    if (!(lambda > 0 && lambda < 1)) throw new Error('EWM lambda must be in (0, 1)');
  }

  /** 가격 틱 → 수익률 계산 후 분산 갱신. 첫 틱은 수익률 0 */
  update(price: number): number {
    const prev = this.prevPrice ?? price;
    const ret = prev > 0 ? ((price - prev) / prev) * 100 : 0;
    this.prevPrice = price;
    this.state = updateVolatility(this.state, ret, this.lambda, this.windowSize);
    return this.sigma;
  }

  get variance(): number {
    return this.state.ewmVariance;
  }

  get sigma(): number {
    return this.state.ewmVariance > 0 ? Math.sqrt(this.state.ewmVariance) : 0;
  }

  get returns(): readonly number[] {
    return this.state.returns;
  }
}
