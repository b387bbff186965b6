// ============================================================
// Counter-trend tiers
// ============================================================
// An entry against the M15 bias in a ranging or uncertain market
// must clear one tier: stricter oscillator extremes with a weaker
// confirmation, or softer extremes with price action behind them.
// ============================================================

import type { IndicatorSnapshot, TradeSide } from '../../types';
import type { CounterTrendTier, TierConfirmation } from './types';

export const DEFAULT_COUNTER_TREND_TIERS: CounterTrendTier[] = [
  { name: 'tier-1', maxRsi: 30, maxPercentB: 0.2, confirmation: 'reversal-hint' },
  { name: 'tier-2', maxRsi: 40, maxPercentB: 0.35, confirmation: 'price-action' },
];

function hasConfirmation(
  side: TradeSide,
  kind: TierConfirmation,
  m1: IndicatorSnapshot,
  m5: IndicatorSnapshot,
): boolean {
  const p = m1.patterns;
  if (kind === 'reversal-hint') {
    return side === 'RISE'
      ? p.hammer || p.bullishEngulfing || m5.bullishDivergence
      : p.shootingStar || p.bearishEngulfing || m5.bearishDivergence;
  }
  return side === 'RISE'
    ? p.bullishEngulfing || p.bullishBreakout
    : p.bearishEngulfing || p.bearishBreakout;
}

export function passesTier(
  tier: CounterTrendTier,
  side: TradeSide,
  m1: IndicatorSnapshot,
  m5: IndicatorSnapshot,
): boolean {
  const extreme =
    side === 'RISE'
      ? m5.rsi < tier.maxRsi && m5.bbPercentB <= tier.maxPercentB
      : m5.rsi > 100 - tier.maxRsi && m5.bbPercentB >= 1 - tier.maxPercentB;

  return extreme && hasConfirmation(side, tier.confirmation, m1, m5);
}

/** First tier the entry clears, in table order */
export function findPassingTier(
  tiers: readonly CounterTrendTier[],
  side: TradeSide,
  m1: IndicatorSnapshot,
  m5: IndicatorSnapshot,
): CounterTrendTier | null {
  return tiers.find((tier) => passesTier(tier, side, m1, m5)) ?? null;
}
