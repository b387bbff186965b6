// ============================================================
// Scoring rules
// ============================================================
// Evaluated in order for each side. Gates come first: a veto zeroes
// the side and stops evaluation. Point rules then add or remove
// points and may confirm a timeframe.
// ============================================================

import type { IndicatorSnapshot, TradeSide } from '../../types';
import { isTrending, trendSide } from '../../types';
import { findPassingTier } from './counter-trend';
import { sessionAdjustment } from './session';
import type { Bias, RuleContext, ScoringRule } from './types';

/** M15 bias: close vs fast EMA, confirmed by DI dominance */
export function m15Bias(m15: IndicatorSnapshot): Bias {
  if (m15.close > m15.emaFast && m15.plusDI > m15.minusDI) return 'UP';
  if (m15.close < m15.emaFast && m15.minusDI > m15.plusDI) return 'DOWN';
  return 'NEUTRAL';
}

function biasSide(bias: Bias): TradeSide | null {
  if (bias === 'UP') return 'RISE';
  if (bias === 'DOWN') return 'FALL';
  return null;
}

function fmt(value: number, digits = 1): string {
  return value.toFixed(digits);
}

// ============================================================
// Gates
// ============================================================

/** In a trend, do not chase an entry the oscillator already calls stretched */
export const extensionGate: ScoringRule = {
  name: 'extension',
  evaluate(ctx) {
    if (!isTrending(ctx.mode)) return null;
    const { rsiExtended } = ctx.config.scoring.trend;
    const rsi = ctx.m5.rsi;

    if (ctx.side === 'RISE' && rsi > rsiExtended) {
      return { kind: 'veto', reason: `M5 RSI ${fmt(rsi)} above ${rsiExtended}` };
    }
    if (ctx.side === 'FALL' && rsi < 100 - rsiExtended) {
      return { kind: 'veto', reason: `M5 RSI ${fmt(rsi)} below ${100 - rsiExtended}` };
    }
    return null;
  },
};

export const counterTrendGate: ScoringRule = {
  name: 'counter-trend',
  evaluate(ctx) {
    if (isTrending(ctx.mode)) return null;
    const favoured = biasSide(ctx.bias);
    if (favoured === null || favoured === ctx.side) return null;

    const tier = findPassingTier(ctx.config.scoring.counterTrendTiers, ctx.side, ctx.m1, ctx.m5);
    if (tier === null) {
      return { kind: 'veto', reason: `no tier passed against M15 bias ${ctx.bias}` };
    }
    return { kind: 'points', delta: 0, factor: `${tier.name} passed against M15 bias ${ctx.bias}` };
  },
};

// ============================================================
// Point rules
// ============================================================

export const m15BiasRule: ScoringRule = {
  name: 'm15-bias',
  evaluate(ctx) {
    if (biasSide(ctx.bias) !== ctx.side) return null;
    return {
      kind: 'points',
      delta: ctx.config.scoring.points.m15Bias,
      factor: `bias ${ctx.bias}`,
      confirms: 'M15',
    };
  },
};

function trendSetup(ctx: RuleContext): boolean {
  const { pullbackPercentB, rsiFloor, rsiExtended } = ctx.config.scoring.trend;
  const { rsi, bbPercentB } = ctx.m5;
  if (ctx.side === 'RISE') {
    return bbPercentB <= pullbackPercentB && rsi >= rsiFloor && rsi <= rsiExtended;
  }
  return bbPercentB >= 1 - pullbackPercentB && rsi >= 100 - rsiExtended && rsi <= 100 - rsiFloor;
}

function rangeSetup(ctx: RuleContext): boolean {
  const { extremePercentB, rsiOversold, rsiOverbought } = ctx.config.scoring.range;
  const m5 = ctx.m5;
  if (ctx.side === 'RISE') {
    return m5.bbPercentB <= extremePercentB && m5.rsi <= rsiOversold && m5.bullishDivergence;
  }
  return m5.bbPercentB >= 1 - extremePercentB && m5.rsi >= rsiOverbought && m5.bearishDivergence;
}

export const m5SetupRule: ScoringRule = {
  name: 'm5-setup',
  evaluate(ctx) {
    const points = ctx.config.scoring.points;
    const detail = `%B ${fmt(ctx.m5.bbPercentB, 2)}, RSI ${fmt(ctx.m5.rsi)}`;

    if (isTrending(ctx.mode)) {
      if (!trendSetup(ctx)) return null;
      const setup = trendSide(ctx.mode) === ctx.side ? 'pullback' : 'rally';
      return { kind: 'points', delta: points.trendSetup, factor: `${setup} ${detail}`, confirms: 'M5' };
    }

    if (!rangeSetup(ctx)) return null;
    return {
      kind: 'points',
      delta: points.rangeSetup,
      factor: `band extreme with divergence ${detail}`,
      confirms: 'M5',
    };
  },
};

export const m5MacdRule: ScoringRule = {
  name: 'm5-macd',
  evaluate(ctx) {
    const { macd, macdSignal, macdHistogram } = ctx.m5;
    const agrees =
      ctx.side === 'RISE'
        ? macdHistogram > 0 && macd > macdSignal
        : macdHistogram < 0 && macd < macdSignal;
    if (!agrees) return null;
    return { kind: 'points', delta: ctx.config.scoring.points.macd, factor: `histogram ${fmt(macdHistogram, 4)}` };
  },
};

export const m1StochCrossRule: ScoringRule = {
  name: 'm1-stoch-cross',
  evaluate(ctx) {
    const { stochK, stochBullishCross, stochBearishCross } = ctx.m1;
    const midline = ctx.config.scoring.stochMidline;
    const crossed =
      ctx.side === 'RISE'
        ? stochBullishCross && stochK < midline
        : stochBearishCross && stochK > midline;
    if (!crossed) return null;
    return {
      kind: 'points',
      delta: ctx.config.scoring.points.stochCross,
      factor: `%K ${fmt(stochK)} crossed %D`,
      confirms: 'M1',
    };
  },
};

export const m1ReversalPatternRule: ScoringRule = {
  name: 'm1-pattern',
  evaluate(ctx) {
    const p = ctx.m1.patterns;
    let pattern: string | null = null;
    if (ctx.side === 'RISE') {
      if (p.hammer) pattern = 'hammer';
      else if (p.bullishEngulfing) pattern = 'bullish engulfing';
    } else if (p.shootingStar) {
      pattern = 'shooting star';
    } else if (p.bearishEngulfing) {
      pattern = 'bearish engulfing';
    }
    if (pattern === null) return null;
    return {
      kind: 'points',
      delta: ctx.config.scoring.points.reversalPattern,
      factor: pattern,
      confirms: 'M1',
    };
  },
};

export const confluenceRule: ScoringRule = {
  name: 'confluence',
  evaluate(ctx, state) {
    const { M1, M5, M15 } = state.confirmations;
    if (!(M1 && M5 && M15)) return null;
    return { kind: 'points', delta: ctx.config.scoring.points.confluence, factor: 'M1, M5 and M15 agree' };
  },
};

/** Trend strength only speaks for the side that follows the trend */
export const adxMomentumRule: ScoringRule = {
  name: 'adx-momentum',
  evaluate(ctx) {
    if (trendSide(ctx.mode) !== ctx.side) return null;
    const slope = ctx.m5.adxSlope;
    const { adxSlopeThreshold, points } = ctx.config.scoring;
    if (slope > adxSlopeThreshold) {
      return { kind: 'points', delta: points.adxRising, factor: `ADX rising ${fmt(slope, 2)}` };
    }
    if (slope < -adxSlopeThreshold) {
      return { kind: 'points', delta: -points.adxFalling, factor: `ADX falling ${fmt(slope, 2)}` };
    }
    return null;
  },
};

export const sessionRule: ScoringRule = {
  name: 'session',
  evaluate(ctx) {
    const adjustment = sessionAdjustment(ctx.now, ctx.config.session);
    if (adjustment === null || adjustment.delta === 0) return null;
    return { kind: 'points', delta: adjustment.delta, factor: adjustment.label };
  },
};

/** Evaluation order: gates, then point rules */
export const SCORING_RULES: readonly ScoringRule[] = [
  extensionGate,
  counterTrendGate,
  m15BiasRule,
  m5SetupRule,
  m5MacdRule,
  m1StochCrossRule,
  m1ReversalPatternRule,
  confluenceRule,
  adxMomentumRule,
  sessionRule,
];
