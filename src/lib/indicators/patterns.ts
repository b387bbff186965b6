// ============================================================
// Candle patterns and RSI divergence
// ============================================================

import type { Candle, CandlePatterns } from '../types';

export const NO_PATTERNS: Readonly<CandlePatterns> = Object.freeze({
  hammer: false,
  shootingStar: false,
  bullishEngulfing: false,
  bearishEngulfing: false,
  bullishBreakout: false,
  bearishBreakout: false,
});

/**
 * Reversal patterns on the last candle (with the one before it).
 *
 * - hammer: bullish close, lower wick > 2x body, upper wick < 0.5x body
 * - shooting star: mirrored
 * - engulfing: opposite-colour body that opens beyond the previous close
 *   and closes beyond the previous open
 * - breakout: body direction matches and the close clears the previous
 *   candle's high (bullish) or low (bearish)
 */
export function detectCandlePatterns(candles: readonly Candle[]): CandlePatterns {
  if (candles.length < 2) return { ...NO_PATTERNS };

  const current = candles[candles.length - 1];
  const prev = candles[candles.length - 2];

  const { open: o, high: h, low: l, close: c } = current;
  const body = Math.abs(c - o);
  const upperWick = h - Math.max(o, c);
  const lowerWick = Math.min(o, c) - l;

  const bullishBody = c > o;
  const bearishBody = c < o;

  return {
    hammer: bullishBody && lowerWick > body * 2 && upperWick < body * 0.5,
    shootingStar: bearishBody && upperWick > body * 2 && lowerWick < body * 0.5,
    bullishEngulfing:
      prev.close < prev.open && bullishBody && o < prev.close && c > prev.open,
    bearishEngulfing:
      prev.close > prev.open && bearishBody && o > prev.close && c < prev.open,
    bullishBreakout: bullishBody && c > prev.high,
    bearishBreakout: bearishBody && c < prev.low,
  };
}

export interface DivergenceThresholds {
  /** Bullish divergence only counts while RSI is below this */
  bullishMaxRsi: number;
  /** Bearish divergence only counts while RSI is above this */
  bearishMinRsi: number;
}

export const DEFAULT_DIVERGENCE_THRESHOLDS: DivergenceThresholds = {
  bullishMaxRsi: 40,
  bearishMinRsi: 60,
};

/**
 * RSI divergence at the latest point.
 *
 * `closes` and `rsi` must end at the same candle. Bullish: the last close
 * is below every one of the previous `lookback` closes while the last RSI
 * sits above the lowest of the previous `lookback` RSI values.
 */
export function detectDivergence(
  closes: readonly number[],
  rsi: readonly number[],
  lookback: number,
  thresholds: DivergenceThresholds = DEFAULT_DIVERGENCE_THRESHOLDS,
): { bullish: boolean; bearish: boolean } {
  if (lookback <= 0 || closes.length < lookback + 1 || rsi.length < lookback + 1) {
    return { bullish: false, bearish: false };
  }

  const lastClose = closes[closes.length - 1];
  const lastRsi = rsi[rsi.length - 1];
  const prevCloses = closes.slice(-(lookback + 1), -1);
  const prevRsi = rsi.slice(-(lookback + 1), -1);

  const lowerLow = lastClose < Math.min(...prevCloses);
  const higherRsiLow = lastRsi > Math.min(...prevRsi);
  const higherHigh = lastClose > Math.max(...prevCloses);
  const lowerRsiHigh = lastRsi < Math.max(...prevRsi);

  return {
    bullish: lowerLow && higherRsiLow && lastRsi < thresholds.bullishMaxRsi,
    bearish: higherHigh && lowerRsiHigh && lastRsi > thresholds.bearishMinRsi,
  };
}
