import { DEFAULT_COUNTER_TREND_TIERS } from './counter-trend';
import type { ScorerConfig, ScoringConfig, SessionConfig } from './types';

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  minConfidence: 60,
  minAgreement: 2,
  points: {
    m15Bias: 15,
    trendSetup: 25,
    rangeSetup: 30,
    macd: 10,
    stochCross: 15,
    reversalPattern: 15,
    confluence: 10,
    adxRising: 5,
    adxFalling: 5,
  },
  trend: { pullbackPercentB: 0.35, rsiFloor: 35, rsiExtended: 65 },
  range: { extremePercentB: 0.05, rsiOversold: 30, rsiOverbought: 70 },
  stochMidline: 50,
  adxSlopeThreshold: 1.0,
  counterTrendTiers: DEFAULT_COUNTER_TREND_TIERS,
};

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  utcOffsetMinutes: 0,
  highLiquidity: [
    { start: '07:00', end: '11:00' },
    { start: '12:00', end: '16:00' },
  ],
  highLiquidityBonus: 5,
  offPeak: [
    { start: '21:00', end: '23:55' },
    { start: '00:05', end: '07:00' },
  ],
  offPeakPenalty: 5,
  avoid: [{ start: '23:55', end: '00:05' }],
  avoidPenalty: 1000,
};

export const DEFAULT_SCORER_CONFIG: ScorerConfig = {
  scoring: DEFAULT_SCORING_CONFIG,
  session: DEFAULT_SESSION_CONFIG,
};
