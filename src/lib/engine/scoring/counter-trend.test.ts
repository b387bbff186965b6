import { describe, it, expect } from 'vitest';
import { DEFAULT_COUNTER_TREND_TIERS, findPassingTier, passesTier } from './counter-trend';
import { makeSnapshot } from '../__tests__/fixtures';

const [tier1, tier2] = DEFAULT_COUNTER_TREND_TIERS;

describe('counter-trend tiers', () => {
  it('tier 1 takes a divergence on M5 as its reversal hint', () => {
    const m1 = makeSnapshot('M1');
    const m5 = makeSnapshot('M5', { rsi: 25, bbPercentB: 0.1, bullishDivergence: true });
    expect(passesTier(tier1, 'RISE', m1, m5)).toBe(true);
  });

  it('tier 1 needs RSI strictly below its limit', () => {
    const m1 = makeSnapshot('M1', { patterns: { hammer: true } });
    const m5 = makeSnapshot('M5', { rsi: 30, bbPercentB: 0.1 });
    expect(passesTier(tier1, 'RISE', m1, m5)).toBe(false);
  });

  it('tier 2 accepts a breakout close but not a hammer', () => {
    const m5 = makeSnapshot('M5', { rsi: 35, bbPercentB: 0.3 });
    expect(passesTier(tier2, 'RISE', makeSnapshot('M1', { patterns: { bullishBreakout: true } }), m5)).toBe(true);
    expect(passesTier(tier2, 'RISE', makeSnapshot('M1', { patterns: { hammer: true } }), m5)).toBe(false);
  });

  it('mirrors the limits for FALL', () => {
    const m1 = makeSnapshot('M1', { patterns: { bearishEngulfing: true } });
    expect(passesTier(tier2, 'FALL', m1, makeSnapshot('M5', { rsi: 65, bbPercentB: 0.7 }))).toBe(true);
    expect(passesTier(tier2, 'FALL', m1, makeSnapshot('M5', { rsi: 60, bbPercentB: 0.7 }))).toBe(false);
  });

  it('returns the first tier that passes, in table order', () => {
    const m1 = makeSnapshot('M1', { patterns: { bullishEngulfing: true } });
    const deep = makeSnapshot('M5', { rsi: 20, bbPercentB: 0.1 });
    const shallow = makeSnapshot('M5', { rsi: 38, bbPercentB: 0.3 });
    expect(findPassingTier(DEFAULT_COUNTER_TREND_TIERS, 'RISE', m1, deep)?.name).toBe('tier-1');
    expect(findPassingTier(DEFAULT_COUNTER_TREND_TIERS, 'RISE', m1, shallow)?.name).toBe('tier-2');
    expect(findPassingTier(DEFAULT_COUNTER_TREND_TIERS, 'RISE', makeSnapshot('M1'), shallow)).toBeNull();
  });
});
