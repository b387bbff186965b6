// ============================================================
// Core Types for the decision engine
// ============================================================

/** Bar sizes the engine works with */
export type Timeframe = 'M1' | 'M5' | 'M15';

export const TIMEFRAMES: readonly Timeframe[] = ['M1', 'M5', 'M15'];

export const TIMEFRAME_MS: Record<Timeframe, number> = {
  M1: 60_000,
  M5: 5 * 60_000,
  M15: 15 * 60_000,
};

/** OHLCV bar; `timestamp` is the open time in epoch ms */
export interface Candle {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume?: number;
}

export type MarketMode = 'TRENDING_UP' | 'TRENDING_DOWN' | 'RANGING' | 'UNCERTAIN';

export const MARKET_MODES: readonly MarketMode[] = [
  'TRENDING_UP',
  'TRENDING_DOWN',
  'RANGING',
  'UNCERTAIN',
];

/** Direction of a binary-option bet */
export type Side = 'RISE' | 'FALL' | 'NONE';
export type TradeSide = Exclude<Side, 'NONE'>;

export function isTrending(mode: MarketMode): boolean {
  return mode === 'TRENDING_UP' || mode === 'TRENDING_DOWN';
}

export function oppositeSide(side: TradeSide): TradeSide {
  return side === 'RISE' ? 'FALL' : 'RISE';
}

/** Trend direction a mode implies, if any */
export function trendSide(mode: MarketMode): TradeSide | null {
  if (mode === 'TRENDING_UP') return 'RISE';
  if (mode === 'TRENDING_DOWN') return 'FALL';
  return null;
}

export interface CandlePatterns {
  hammer: boolean;
  shootingStar: boolean;
  bullishEngulfing: boolean;
  bearishEngulfing: boolean;
  /** Bullish body closing above the previous candle's high */
  bullishBreakout: boolean;
  /** Bearish body closing below the previous candle's low */
  bearishBreakout: boolean;
}

/**
 * Indicator values for one timeframe at one candle close.
 * Built fresh on every close and frozen; the next close supersedes it.
 */
export interface IndicatorSnapshot {
  readonly timeframe: Timeframe;
  /** Open time of the candle the snapshot was computed at */
  readonly timestamp: number;
  readonly closeTime: number;

  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;

  readonly bbUpper: number;
  readonly bbMiddle: number;
  readonly bbLower: number;
  readonly bbPercentB: number;
  readonly bbWidth: number;

  readonly rsi: number;
  readonly stochK: number;
  readonly stochD: number;
  readonly prevStochK: number;
  readonly prevStochD: number;

  readonly adx: number;
  readonly plusDI: number;
  readonly minusDI: number;
  /** ADX change over the configured lookback */
  readonly adxSlope: number;

  /** Fast trend EMA (50 by default) */
  readonly emaFast: number;
  /** Slow trend EMA (200 by default) */
  readonly emaSlow: number;

  readonly macd: number;
  readonly macdSignal: number;
  readonly macdHistogram: number;

  readonly rsiOversold: boolean;
  readonly rsiOverbought: boolean;
  readonly stochOversold: boolean;
  readonly stochOverbought: boolean;
  readonly priceAtLowerBand: boolean;
  readonly priceAtUpperBand: boolean;
  readonly stochBullishCross: boolean;
  readonly stochBearishCross: boolean;
  readonly bullishDivergence: boolean;
  readonly bearishDivergence: boolean;
  readonly patterns: Readonly<CandlePatterns>;
}

export interface SnapshotTriple {
  m1: IndicatorSnapshot;
  m5: IndicatorSnapshot;
  m15: IndicatorSnapshot;
}

export type Confirmations = Record<Timeframe, boolean>;

/** Why a cycle produced no trade */
export type NoTradeReason =
  | 'insufficient-data'
  | 'below-confidence'
  | 'below-agreement'
  | 'tie'
  | 'cooldown'
  | 'hard-stop';

/** One decision per evaluation cycle. Never mutated after creation. */
export interface TradeSignal {
  readonly side: Side;
  /** Confidence of the chosen side, 0 for NONE */
  readonly confidence: number;
  readonly riseConfidence: number;
  readonly fallConfidence: number;
  readonly agreement: number;
  readonly factors: readonly string[];
  readonly confirmations: Readonly<Confirmations>;
  readonly mode: MarketMode;
  readonly price: number;
  /** Decision time: close time of the M1 candle that triggered the cycle */
  readonly timestamp: number;
  readonly blockedBy?: NoTradeReason;
}

export type OutcomeResult = 'win' | 'loss' | 'tie';

/** Settlement notice from the execution layer */
export interface TradeOutcome {
  result: OutcomeResult;
  pnl: number;
  /** Settlement time */
  timestamp: number;
}
