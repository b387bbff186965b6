import { describe, it, expect } from 'vitest';
import { TradeLimits } from './trade-limits';
import { DEFAULT_RISK_LIMITS, type RiskLimitsConfig } from '../config';
import type { OpenContract, SettledTrade } from './executor';

const DAY = 86_400_000;
const MINUTE = 60_000;
/** 2024-01-02 00:00 UTC */
const MIDNIGHT = Date.UTC(2024, 0, 2);

function limitsWith(limits: Partial<RiskLimitsConfig> = {}, minTradeIntervalMs = 0): TradeLimits {
  return new TradeLimits({
    limits: { ...DEFAULT_RISK_LIMITS, ...limits },
    pacing: { maxOpenContracts: 1, minTradeIntervalMs },
    initialBalance: 1000,
  });
}

function contractAt(entryTime: number): OpenContract {
  return {
    id: 1,
    side: 'RISE',
    stake: 10,
    entryPrice: 100,
    entryTime,
    expiryTime: entryTime + 3 * MINUTE,
    confidence: 60,
    mode: 'TRENDING_UP',
    maxAdverse: 0,
    maxFavourable: 0,
  };
}

function settled(pnl: number, exitTime: number): SettledTrade {
  return {
    id: 1,
    side: 'RISE',
    stake: 10,
    entryPrice: 100,
    entryTime: exitTime - 3 * MINUTE,
    exitPrice: pnl > 0 ? 101 : pnl < 0 ? 99 : 100,
    exitTime,
    result: pnl > 0 ? 'win' : pnl < 0 ? 'loss' : 'tie',
    pnl,
    confidence: 60,
    mode: 'TRENDING_UP',
    mae: 0,
    mfe: 0,
  };
}

describe('TradeLimits', () => {
  it('allows everything with the limits off', () => {
    const limits = limitsWith();
    limits.startCycle(MIDNIGHT);
    for (let i = 0; i < 50; i++) {
      limits.onOpened(contractAt(MIDNIGHT));
      limits.onSettled(settled(-10, MIDNIGHT));
    }
    expect(limits.skipReason(MIDNIGHT, 0)).toBeNull();
    expect(limits.sessionLossReached()).toBe(false);
  });

  it('counts trades per UTC day', () => {
    const limits = limitsWith({ maxDailyTrades: 2 });
    limits.startCycle(MIDNIGHT + 23 * 60 * MINUTE);
    limits.onOpened(contractAt(MIDNIGHT + 23 * 60 * MINUTE));
    limits.onOpened(contractAt(MIDNIGHT + 23 * 60 * MINUTE + MINUTE));
    expect(limits.skipReason(MIDNIGHT + 23 * 60 * MINUTE + 2 * MINUTE, 0)).toBe('daily-trades');

    limits.startCycle(MIDNIGHT + DAY);
    expect(limits.day).toEqual({ day: Math.floor((MIDNIGHT + DAY) / DAY), trades: 0, pnl: 0 });
    expect(limits.skipReason(MIDNIGHT + DAY, 0)).toBeNull();
  });

  it('stops for the day at the loss percentage of the starting balance', () => {
    const limits = limitsWith({ maxDailyLossPercent: 2 });
    limits.startCycle(MIDNIGHT);
    limits.onSettled(settled(-10, MIDNIGHT));
    expect(limits.skipReason(MIDNIGHT, 0)).toBeNull();
    limits.onSettled(settled(-10, MIDNIGHT));
    expect(limits.skipReason(MIDNIGHT, 0)).toBe('daily-loss');
  });

  it('stops for the day at the profit target', () => {
    const limits = limitsWith({ dailyProfitTarget: 19 });
    limits.startCycle(MIDNIGHT);
    limits.onSettled(settled(9.5, MIDNIGHT));
    expect(limits.skipReason(MIDNIGHT, 0)).toBeNull();
    limits.onSettled(settled(9.5, MIDNIGHT));
    expect(limits.skipReason(MIDNIGHT, 0)).toBe('profit-target');
  });

  it('checks the daily limits before pacing', () => {
    const limits = limitsWith({ maxDailyTrades: 1 }, 5 * MINUTE);
    limits.startCycle(MIDNIGHT);
    limits.onOpened(contractAt(MIDNIGHT));
    expect(limits.skipReason(MIDNIGHT + MINUTE, 1)).toBe('daily-trades');
  });

  it('paces entries by open contracts and the minimum interval', () => {
    const limits = limitsWith({}, 5 * MINUTE);
    limits.startCycle(MIDNIGHT);
    expect(limits.skipReason(MIDNIGHT, 0)).toBeNull();
    limits.onOpened(contractAt(MIDNIGHT));

    expect(limits.skipReason(MIDNIGHT + MINUTE, 1)).toBe('open-contract');
    expect(limits.skipReason(MIDNIGHT + 4 * MINUTE, 0)).toBe('min-interval');
    expect(limits.skipReason(MIDNIGHT + 5 * MINUTE, 0)).toBeNull();
  });

  it('keeps the session loss across days', () => {
    const limits = limitsWith({ maxSessionLoss: 25 });
    limits.startCycle(MIDNIGHT);
    limits.onSettled(settled(-10, MIDNIGHT));
    limits.onSettled(settled(-10, MIDNIGHT));
    limits.startCycle(MIDNIGHT + DAY);
    expect(limits.sessionLossReached()).toBe(false);
    limits.onSettled(settled(9.5, MIDNIGHT + DAY));
    limits.onSettled(settled(-10, MIDNIGHT + DAY));
    expect(limits.sessionLossReached()).toBe(false);
    limits.onSettled(settled(-10, MIDNIGHT + DAY));
    expect(limits.sessionLossReached()).toBe(true);
  });
});
