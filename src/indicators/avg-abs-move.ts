import type { PricePoint } from '../types/index.js';

/**
 * ATR 유사 지표: 최근 windowMs 동안 틱 간 절대 가격 변화의 평균
 * 캔들이 없는 틱 스트림용.
 */
export class AvgAbsMove {
  private readonly points: PricePoint[] = [];

  constructor(private readonly windowMs: number) {
    if (!(windowMs > 0)) throw new Error('AvgAbsMove window must be > 0');
  }

  update(ts: number, price: number): void {
    this.points.push({ ts, price });
    const cutoff = ts - this.windowMs;
    while (this.points.length > 2 && (this.points[0]?.ts ?? ts) < cutoff) this.points.shift();
  }

  /** 표본 2개 미만이면 0 */
  get value(): number {
    if (this.points.length < 2) return 0;
    let sum = 0;
    for (let i = 1; i < this.points.length; i++) {
      const cur = this.points[i];
      const prev = this.points[i - 1];
      if (cur && prev) sum += Math.abs(cur.price - prev.price);
    }
    return sum / (this.points.length - 1);
  }
}
