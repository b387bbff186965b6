import { describe, it, expect } from 'vitest';
import { LossStreakGuard } from './loss-guard';
import type { OutcomeResult, TradeSignal } from '../types';

const T = 1_700_000_000_000;
const SECOND = 1000;

function riseAt(timestamp: number): TradeSignal {
  return {
    side: 'RISE',
    confidence: 75,
    riseConfidence: 75,
    fallConfidence: 0,
    agreement: 2,
    factors: ['RISE m15-bias: bias UP (+15)'],
    confirmations: { M1: true, M5: true, M15: false },
    mode: 'TRENDING_UP',
    price: 100,
    timestamp,
  };
}

/** Open a decision and settle it at the same instant */
function trade(guard: LossStreakGuard, at: number, result: OutcomeResult): TradeSignal {
  const signal = guard.gate(riseAt(at), at);
  if (signal.side !== 'NONE') {
    guard.recordOutcome({ result, pnl: result === 'win' ? 9.5 : result === 'loss' ? -10 : 0, timestamp: at });
  }
  return signal;
}

describe('LossStreakGuard', () => {
  it('passes decisions through while ACTIVE', () => {
    const guard = new LossStreakGuard();
    const signal = riseAt(T);
    expect(guard.gate(signal, T)).toBe(signal);
    expect(guard.state.outstanding).toBe(1);
  });

  it('counts losses and resets on a win; ties leave the count', () => {
    const guard = new LossStreakGuard();
    trade(guard, T, 'loss');
    trade(guard, T + SECOND, 'loss');
    expect(guard.state.consecutiveLosses).toBe(2);
    trade(guard, T + 2 * SECOND, 'tie');
    expect(guard.state.consecutiveLosses).toBe(2);
    trade(guard, T + 3 * SECOND, 'win');
    expect(guard.state.consecutiveLosses).toBe(0);
    expect(guard.state.status).toBe('ACTIVE');
  });

  it('cools down on the third loss and resumes after the cooldown', () => {
    const guard = new LossStreakGuard({ maxConsecutiveLosses: 3, cooldownMs: 600 * SECOND });
    trade(guard, T - 2 * SECOND, 'loss');
    trade(guard, T - SECOND, 'loss');
    trade(guard, T, 'loss');

    expect(guard.state).toEqual({
      consecutiveLosses: 3,
      status: 'COOLDOWN',
      cooldownUntil: T + 600 * SECOND,
      outstanding: 0,
    });

    for (const offset of [1, 300, 599]) {
      const blocked = guard.gate(riseAt(T + offset * SECOND), T + offset * SECOND);
      expect(blocked.side).toBe('NONE');
      expect(blocked.blockedBy).toBe('cooldown');
    }

    const resumed = guard.gate(riseAt(T + 600 * SECOND), T + 600 * SECOND);
    expect(resumed.side).toBe('RISE');
    expect(guard.state.consecutiveLosses).toBe(0);
    expect(guard.state.status).toBe('ACTIVE');
  });

  it.each([
    ['cooldown', 60 * SECOND, 2],
    ['hard-stop', 0, 4],
  ])('forces NONE (%s) only with the counter at the maximum', (reason, cooldownMs, expectedBlocks) => {
    const guard = new LossStreakGuard({ maxConsecutiveLosses: 3, cooldownMs });
    const results: OutcomeResult[] = ['loss', 'win', 'loss', 'loss', 'loss', 'loss', 'loss', 'tie', 'loss'];
    let now = T;
    let blocks = 0;
    for (const result of results) {
      const before = guard.state.consecutiveLosses;
      const signal = trade(guard, now, result);
      if (signal.side === 'NONE') {
        blocks++;
        expect(signal.blockedBy).toBe(reason);
        expect(before).toBe(3);
      }
      expect(guard.state.consecutiveLosses).toBeLessThanOrEqual(3);
      now += 20 * SECOND;
    }
    expect(blocks).toBe(expectedBlocks);
  });

  it('ignores outcomes that arrive during COOLDOWN except to clear the slot', () => {
    const guard = new LossStreakGuard({ maxConsecutiveLosses: 1 });
    guard.gate(riseAt(T), T);
    guard.gate(riseAt(T), T);
    guard.recordOutcome({ result: 'loss', pnl: -10, timestamp: T });
    expect(guard.state.status).toBe('COOLDOWN');

    expect(guard.recordOutcome({ result: 'loss', pnl: -10, timestamp: T })).toBe(true);
    expect(guard.state.consecutiveLosses).toBe(1);
    expect(guard.state.outstanding).toBe(0);
  });

  it('treats a zero cooldown as a hard stop until reset', () => {
    const guard = new LossStreakGuard({ maxConsecutiveLosses: 2, cooldownMs: 0 });
    trade(guard, T, 'loss');
    trade(guard, T, 'loss');
    expect(guard.isHardStopped()).toBe(true);

    const blocked = guard.gate(riseAt(T + 86_400_000), T + 86_400_000);
    expect(blocked.blockedBy).toBe('hard-stop');
    expect(blocked.factors.at(-1)).toBe('guard: hard-stop');

    guard.reset();
    expect(guard.isHardStopped()).toBe(false);
    expect(guard.gate(riseAt(T + 86_400_000), T + 86_400_000).side).toBe('RISE');
  });

  it('passes a new decision unchanged while another awaits its outcome', () => {
    const guard = new LossStreakGuard();
    guard.gate(riseAt(T), T);
    const second = riseAt(T + SECOND);
    expect(guard.gate(second, T + SECOND)).toBe(second);
    expect(guard.state.outstanding).toBe(2);
  });

  it('freezes the signal it forces to NONE', () => {
    const guard = new LossStreakGuard({ maxConsecutiveLosses: 1 });
    trade(guard, T, 'loss');
    const blocked = guard.gate(riseAt(T + SECOND), T + SECOND);
    expect(blocked.side).toBe('NONE');
    expect(blocked.blockedBy).toBe('cooldown');
    expect(blocked.riseConfidence).toBe(75);
    expect(Object.isFrozen(blocked)).toBe(true);
  });

  it('releases the slot of a decision that was never placed', () => {
    const guard = new LossStreakGuard();
    guard.gate(riseAt(T), T);
    expect(guard.release()).toBe(true);
    expect(guard.state.outstanding).toBe(0);
    expect(guard.release()).toBe(false);
    expect(guard.recordOutcome({ result: 'loss', pnl: -10, timestamp: T })).toBe(false);
    expect(guard.state.consecutiveLosses).toBe(0);
  });

  it('clears outstanding decisions on reset', () => {
    const guard = new LossStreakGuard({ maxConsecutiveLosses: 1, cooldownMs: 0 });
    guard.gate(riseAt(T), T);
    guard.gate(riseAt(T), T);
    guard.recordOutcome({ result: 'loss', pnl: -10, timestamp: T });
    expect(guard.state.outstanding).toBe(1);

    guard.reset();
    expect(guard.state).toEqual({ consecutiveLosses: 0, status: 'ACTIVE', cooldownUntil: null, outstanding: 0 });
    expect(guard.gate(riseAt(T + SECOND), T + SECOND).side).toBe('RISE');
    expect(guard.state.outstanding).toBe(1);
  });

  it('logs and ignores an outcome with nothing outstanding', () => {
    const guard = new LossStreakGuard();
    expect(guard.recordOutcome({ result: 'loss', pnl: -10, timestamp: T })).toBe(false);
    expect(guard.state.consecutiveLosses).toBe(0);
  });

  it('lets NONE signals through untouched in any state', () => {
    const guard = new LossStreakGuard({ maxConsecutiveLosses: 1, cooldownMs: 0 });
    trade(guard, T, 'loss');
    const none: TradeSignal = { ...riseAt(T), side: 'NONE', confidence: 0, blockedBy: 'tie' };
    expect(guard.gate(none, T)).toBe(none);
  });
});
