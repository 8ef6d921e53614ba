import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createChildLogger } from '../logger.js';
import { StateCorruptionError } from '../errors.js';

const log = createChildLogger('state-store');

const pendingOrderSchema = z.object({
  order_id: z.string(),
  side: z.enum(['BUY', 'SELL']),
  kind: z.enum(['entry', 'exit']),
  price: z.number(),
  size: z.number(),
  placed_at: z.number(),
  timeout_ms: z.number(),
});
export type PersistedPendingOrder = z.infer<typeof pendingOrderSchema>;

/**
 * 심볼별 영속 포지션 스냅샷 (snake_case: 모니터 등 외부 도구와 공유하는 파일 포맷)
 * 알 수 없는 필드는 보존한다.
 */
export const persistedPositionSchema = z
  .object({
    in_position: z.boolean(),
    side: z.enum(['BUY']).nullable(),
    quantity: z.number().nonnegative(),
    entry_price: z.number().nonnegative(),
    stop_loss: z.number().nonnegative(),
    take_profit: z.number().nonnegative(),
    order_id: z.string().nullable(),
    entry_time: z.number(),
    last_exit_time: z.number(),
    max_price_since_entry: z.number().nonnegative(),
    force_close: z.boolean().optional(),
    pending_order: pendingOrderSchema.nullable().optional(),
  })
  .passthrough()
  .refine((p) => !p.in_position || (p.quantity > 0 && p.entry_price > 0), {
    message: 'open position requires quantity > 0 and entry_price > 0',
  });

export type PersistedPosition = z.infer<typeof persistedPositionSchema>;
export type PersistedState = Record<string, PersistedPosition>;

/** updateSymbol 로 처음 만들어지는 엔트리의 기본값 */
export function blankPosition(): PersistedPosition {
  return {
    in_position: false,
    side: null,
    quantity: 0,
    entry_price: 0,
    stop_loss: 0,
    take_profit: 0,
    order_id: null,
    entry_time: 0,
    last_exit_time: 0,
    max_price_since_entry: 0,
  };
}

/**
 * JSON 파일 기반 상태 저장소
 * - save: 임시 파일 기록 후 rename (원자적 교체, 반쯤 쓰인 파일 노출 없음)
 * - 동기 I/O: 한 번의 read-modify-write 사이에 다른 워커가 끼어들 수 없다
 * - 손상된 파일은 빈 상태로 간주하고 로그만 남긴다
 */
export class StateStore {
  constructor(readonly file: string) {}

  load(): PersistedState {
    if (!existsSync(this.file)) return {};

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.file, 'utf8'));
    } catch (err) {
      this.reportCorruption(new StateCorruptionError(this.file, 'unreadable JSON', { cause: err }));
      return {};
    }

    const top = z.record(z.unknown()).safeParse(raw);
    if (!top.success) {
      this.reportCorruption(new StateCorruptionError(this.file, 'top level is not an object'));
      return {};
    }

    const state: PersistedState = {};
    for (const [symbol, value] of Object.entries(top.data)) {
      const parsed = persistedPositionSchema.safeParse(value);
      if (parsed.success) {
        state[symbol] = parsed.data;
      } else {
        log.warn({ file: this.file, symbol, issues: parsed.error.issues.length }, 'Dropping invalid state entry');
      }
    }
    return state;
  }

  save(state: PersistedState): void {
    mkdirSync(dirname(this.file), { recursive: true });
    const tmp = `${this.file}.tmp`;
    writeFileSync(tmp, JSON.stringify(state, null, 2), 'utf8');
    renameSync(tmp, this.file);
  }

  /** 기존 엔트리에 필드 병합 (없으면 기본값에서 시작) */
  updateSymbol(symbol: string, fields: Partial<PersistedPosition>): PersistedPosition {
    const state = this.load();
    const merged: PersistedPosition = { ...(state[symbol] ?? blankPosition()), ...fields };
    state[symbol] = merged;
    this.save(state);
    return merged;
  }

  /** 엔트리 삭제. 없으면 아무것도 쓰지 않는다. */
  clearSymbol(symbol: string): void {
    const state = this.load();
    if (!(symbol in state)) return;
    delete state[symbol];
    this.save(state);
  }

  /**
   * 미체결 지정가 주문 미러링. null 이면 제거하고,
   * 포지션도 없고 주문도 없는 엔트리는 지운다.
   */
  setPendingOrder(symbol: string, pending: PersistedPendingOrder | null): void {
    const state = this.load();
    const current = state[symbol];
    if (pending) {
      state[symbol] = { ...(current ?? blankPosition()), pending_order: pending };
      this.save(state);
      return;
    }
    if (!current || current.pending_order == null) return;
    if (!current.in_position && !current.force_close) {
      delete state[symbol];
    } else {
      const { pending_order: _removed, ...rest } = current;
      state[symbol] = rest;
    }
    this.save(state);
  }

  private reportCorruption(err: StateCorruptionError): void {
    log.error({ err, file: this.file }, 'State file corrupted, starting from empty state');
  }
}
