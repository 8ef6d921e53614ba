/**
 * 최근 |z| 링 버퍼: 동적 임계값(백분위) 계산 전용
 */
export class ZScoreHistory {
  private readonly values: number[] = [];

  constructor(private readonly maxLength: number = 600) {
    if (maxLength < 1) throw new Error('ZScoreHistory maxLength must be >= 1');
  }

  push(zAbs: number): void {
    this.values.push(Number.isFinite(zAbs) ? Math.max(0, Math.abs(zAbs)) : 0);
    if (this.values.length > this.maxLength) this.values.shift();
  }

  /** p ∈ [0, 0.999] 로 클램프, 정렬 후 floor(p·(n-1)) 번째. 비어 있으면 0 */
  percentile(p: number): number {
    if (this.values.length === 0) return 0;
    const sorted = [...this.values].sort((a, b) => a - b);
    const clamped = Math.min(0.999, Math.max(0, p));
    const idx = Math.floor(clamped * (sorted.length - 1));
    return sorted[idx] ?? 0;
  }

  get size(): number {
    return this.values.length;
  }
}
