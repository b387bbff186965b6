// ============================================================
// Scoring Types
// ============================================================

import type {
  Confirmations,
  IndicatorSnapshot,
  MarketMode,
  Timeframe,
  TradeSide,
} from '../../types';

export type Bias = 'UP' | 'DOWN' | 'NEUTRAL';

export interface ScoringPoints {
  m15Bias: number;
  trendSetup: number;
  rangeSetup: number;
  macd: number;
  stochCross: number;
  reversalPattern: number;
  confluence: number;
  adxRising: number;
  /** Subtracted when ADX is falling */
  adxFalling: number;
}

/** Pullback entry in the direction of an established trend */
export interface TrendSetupThresholds {
  /** RISE needs %B at or below this; FALL at or above 1 - this */
  pullbackPercentB: number;
  /** Lower edge of the RSI band for RISE (mirrored for FALL) */
  rsiFloor: number;
  /** Upper edge of the RSI band for RISE; beyond it the entry is extended */
  rsiExtended: number;
}

/** Mean-reversion entry at a band extreme */
export interface RangeSetupThresholds {
  extremePercentB: number;
  rsiOversold: number;
  rsiOverbought: number;
}

export type TierConfirmation = 'reversal-hint' | 'price-action';

/**
 * One counter-trend tier. RISE passes with RSI below maxRsi, %B at or
 * below maxPercentB and the confirmation present; FALL is mirrored.
 */
export interface CounterTrendTier {
  name: string;
  maxRsi: number;
  maxPercentB: number;
  confirmation: TierConfirmation;
}

export interface ScoringConfig {
  minConfidence: number;
  minAgreement: number;
  points: ScoringPoints;
  trend: TrendSetupThresholds;
  range: RangeSetupThresholds;
  /** Stochastic cross only counts below (RISE) / above (FALL) this */
  stochMidline: number;
  /** |M5 ADX slope| beyond this adds or removes momentum points */
  adxSlopeThreshold: number;
  counterTrendTiers: CounterTrendTier[];
}

export interface ClockWindow {
  /** "HH:MM" */
  start: string;
  end: string;
}

export interface SessionConfig {
  /** Shift applied to UTC before matching windows */
  utcOffsetMinutes: number;
  highLiquidity: ClockWindow[];
  highLiquidityBonus: number;
  offPeak: ClockWindow[];
  offPeakPenalty: number;
  avoid: ClockWindow[];
  avoidPenalty: number;
}

export interface ScorerConfig {
  scoring: ScoringConfig;
  session: SessionConfig;
}

export interface RuleContext {
  readonly side: TradeSide;
  readonly mode: MarketMode;
  readonly m1: IndicatorSnapshot;
  readonly m5: IndicatorSnapshot;
  readonly m15: IndicatorSnapshot;
  /** M15 bias, computed once per cycle */
  readonly bias: Bias;
  /** Decision time (M1 close) */
  readonly now: number;
  readonly config: ScorerConfig;
}

/** Running totals a rule may read */
export interface RuleState {
  readonly points: number;
  readonly confirmations: Readonly<Confirmations>;
}

export type RuleOutcome =
  | { kind: 'points'; delta: number; factor: string; confirms?: Timeframe }
  | { kind: 'veto'; reason: string };

export interface ScoringRule {
  name: string;
  /** null when the rule does not apply */
  evaluate(ctx: RuleContext, state: RuleState): RuleOutcome | null;
}

export interface SideScore {
  side: TradeSide;
  confidence: number;
  agreement: number;
  confirmations: Confirmations;
  factors: string[];
  /** Name of the gate that zeroed the side */
  vetoedBy?: string;
}

export interface ScoreResult {
  mode: MarketMode;
  bias: Bias;
  rise: SideScore;
  fall: SideScore;
}
