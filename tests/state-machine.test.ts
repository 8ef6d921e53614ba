import { describe, it, expect } from 'vitest';
import { PositionStateMachine } from '../src/risk/state-machine.js';

describe('PositionStateMachine', () => {
  it('should start in FLAT', () => {
    const sm = new PositionStateMachine('BTC_USDT');
    expect(sm.current).toBe('FLAT');
    expect(sm.isFlat()).toBe(true);
    expect(sm.isHalted()).toBe(false);
  });

  it('should walk the full entry/exit cycle back to FLAT', () => {
    const sm = new PositionStateMachine('BTC_USDT');
    sm.transition('PENDING_ENTRY');
    sm.transition('OPEN');
    expect(sm.isOpen()).toBe(true);
    sm.transition('PENDING_EXIT');
    sm.transition('FLAT');
    expect(sm.isFlat()).toBe(true);
    // FLAT 은 재사용된다
    sm.transition('PENDING_ENTRY');
    expect(sm.current).toBe('PENDING_ENTRY');
  });

  it('should return to FLAT when entry fails', () => {
    const sm = new PositionStateMachine('BTC_USDT');
    sm.transition('PENDING_ENTRY');
    sm.transition('FLAT');
    expect(sm.current).toBe('FLAT');
  });

  it('should return to OPEN when exit fails', () => {
    const sm = new PositionStateMachine('BTC_USDT');
    sm.transition('PENDING_ENTRY');
    sm.transition('OPEN');
    sm.transition('PENDING_EXIT');
    sm.transition('OPEN');
    expect(sm.isOpen()).toBe(true);
  });

  it('should allow FLAT → OPEN for resumed positions', () => {
    const sm = new PositionStateMachine('BTC_USDT');
    sm.transition('OPEN');
    expect(sm.isOpen()).toBe(true);
  });

  it('should throw on invalid transitions', () => {
    const sm = new PositionStateMachine('BTC_USDT');
    expect(() => sm.transition('PENDING_EXIT')).toThrow('Invalid state transition for BTC_USDT: FLAT → PENDING_EXIT');
    expect(() => sm.transition('HALTED')).toThrow('Invalid state transition');
  });

  it('should treat HALTED as terminal', () => {
    const sm = new PositionStateMachine('BTC_USDT');
    sm.transition('OPEN');
    sm.transition('PENDING_EXIT');
    sm.transition('HALTED');
    expect(sm.isHalted()).toBe(true);
    expect(sm.canTransition('FLAT')).toBe(false);
    expect(sm.canTransition('OPEN')).toBe(false);
  });

  it('should record history with injected clock', () => {
    let t = 1_000;
    const sm = new PositionStateMachine('ETH_USDT', () => t);
    sm.transition('PENDING_ENTRY');
    t = 2_500;
    sm.transition('OPEN');

    const h = sm.getHistory();
    expect(h).toHaveLength(2);
    expect(h[0]).toEqual({ from: 'FLAT', to: 'PENDING_ENTRY', at: 1_000 });
    expect(h[1]).toEqual({ from: 'PENDING_ENTRY', to: 'OPEN', at: 2_500 });
    t = 4_000;
    expect(sm.stateAge).toBe(1_500);
  });

  it('should noop on same-state transition', () => {
    const sm = new PositionStateMachine('BTC_USDT');
    sm.transition('FLAT');
    expect(sm.getHistory()).toHaveLength(0);
  });
});
