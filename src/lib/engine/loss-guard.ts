// ============================================================
// Loss-Streak Guard
// ============================================================
// ACTIVE    decisions pass unchanged; outcomes move the loss counter
// COOLDOWN  decisions are forced to NONE until cooldownUntil;
//           cooldownUntil === null is a hard stop that only
//           reset() clears
// The guard is consulted last, after selection. It counts passed
// decisions awaiting an outcome only to recognise a stray outcome;
// the count never blocks a decision.
// ============================================================

import { loggers } from '../logger';
import type { NoTradeReason, TradeOutcome, TradeSignal } from '../types';

export type GuardStatus = 'ACTIVE' | 'COOLDOWN';

export interface LossGuardConfig {
  maxConsecutiveLosses: number;
  /** 0 turns the cooldown into a hard stop */
  cooldownMs: number;
}

export const DEFAULT_LOSS_GUARD_CONFIG: LossGuardConfig = {
  maxConsecutiveLosses: 3,
  cooldownMs: 600_000,
};

export interface LossStreakState {
  readonly consecutiveLosses: number;
  readonly status: GuardStatus;
  readonly cooldownUntil: number | null;
  /** Passed decisions still awaiting an outcome */
  readonly outstanding: number;
}

export const INITIAL_GUARD_STATE: LossStreakState = Object.freeze({
  consecutiveLosses: 0,
  status: 'ACTIVE',
  cooldownUntil: null,
  outstanding: 0,
});

function forceNone(signal: TradeSignal, reason: NoTradeReason): TradeSignal {
  const blocked: TradeSignal = {
    ...signal,
    side: 'NONE',
    confidence: 0,
    factors: Object.freeze([...signal.factors, `guard: ${reason}`]),
    blockedBy: reason,
  };
  return Object.freeze(blocked);
}

export class LossStreakGuard {
  private readonly config: LossGuardConfig;
  private current: LossStreakState;

  constructor(config: Partial<LossGuardConfig> = {}, initial: LossStreakState = INITIAL_GUARD_STATE) {
    this.config = { ...DEFAULT_LOSS_GUARD_CONFIG, ...config };
    this.current = Object.freeze({ ...initial });
  }

  get state(): LossStreakState {
    return this.current;
  }

  isHardStopped(): boolean {
    return this.current.status === 'COOLDOWN' && this.current.cooldownUntil === null;
  }

  private update(patch: Partial<LossStreakState>): void {
    this.current = Object.freeze({ ...this.current, ...patch });
  }

  /** Expire a due cooldown. The counter resets with the transition. */
  refresh(now: number): GuardStatus {
    const { status, cooldownUntil } = this.current;
    if (status === 'COOLDOWN' && cooldownUntil !== null && now >= cooldownUntil) {
      this.update({ status: 'ACTIVE', consecutiveLosses: 0, cooldownUntil: null });
      loggers.guard.info(`Cooldown over at ${new Date(now).toISOString()}, trading resumed`);
    }
    return this.current.status;
  }

  /**
   * Final say on a selected signal. A signal that passes counts as
   * outstanding until its outcome is recorded or the slot is released.
   */
  gate(signal: TradeSignal, now: number): TradeSignal {
    const status = this.refresh(now);
    if (signal.side === 'NONE') return signal;

    if (status === 'COOLDOWN') {
      return forceNone(signal, this.current.cooldownUntil === null ? 'hard-stop' : 'cooldown');
    }

    this.update({ outstanding: this.current.outstanding + 1 });
    return signal;
  }

  /**
   * Free the slot of a passed decision whose outcome will never arrive,
   * e.g. an order that was not placed or was rejected. The loss counter
   * is untouched. Returns false when nothing was outstanding.
   */
  release(): boolean {
    if (this.current.outstanding === 0) {
      loggers.guard.warn('Nothing outstanding to release');
      return false;
    }
    this.update({ outstanding: this.current.outstanding - 1 });
    return true;
  }

  /**
   * Apply a settled trade. Returns false when no decision was outstanding;
   * the outcome is then logged and ignored.
   */
  recordOutcome(outcome: TradeOutcome): boolean {
    if (this.current.outstanding === 0) {
      loggers.guard.warn(`Ignoring ${outcome.result} outcome: no decision outstanding`);
      return false;
    }

    const outstanding = this.current.outstanding - 1;
    if (this.current.status === 'COOLDOWN') {
      this.update({ outstanding });
      return true;
    }

    if (outcome.result === 'win') {
      this.update({ outstanding, consecutiveLosses: 0 });
      return true;
    }
    if (outcome.result === 'tie') {
      this.update({ outstanding });
      return true;
    }

    const consecutiveLosses = this.current.consecutiveLosses + 1;
    if (consecutiveLosses < this.config.maxConsecutiveLosses) {
      this.update({ outstanding, consecutiveLosses });
      return true;
    }

    if (this.config.cooldownMs > 0) {
      const cooldownUntil = outcome.timestamp + this.config.cooldownMs;
      this.update({ outstanding, consecutiveLosses, status: 'COOLDOWN', cooldownUntil });
      loggers.guard.warn(
        `${consecutiveLosses} consecutive losses, cooling down until ${new Date(cooldownUntil).toISOString()}`,
      );
    } else {
      this.update({ outstanding, consecutiveLosses, status: 'COOLDOWN', cooldownUntil: null });
      loggers.guard.warn(`${consecutiveLosses} consecutive losses, hard stop until reset`);
    }
    return true;
  }

  /** Manual intervention: back to ACTIVE with a clean counter and no outstanding decisions */
  reset(): void {
    this.update({ status: 'ACTIVE', consecutiveLosses: 0, cooldownUntil: null, outstanding: 0 });
    loggers.guard.info('Guard reset');
  }
}
