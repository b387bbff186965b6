// ============================================================
// Indicator Snapshot builder
// ============================================================
// Turns a candle window for one timeframe into a frozen
// IndicatorSnapshot, or null while history is too short.
// ============================================================

import type { Candle, IndicatorSnapshot, Timeframe } from '../types';
import { TIMEFRAME_MS } from '../types';
import {
  ADX,
  RSI,
  Stochastic,
  calculateBollingerBands,
  calculateEMA,
  calculateMACD,
  percentB,
} from './index';
import { detectCandlePatterns, detectDivergence } from './patterns';

export interface SnapshotConfig {
  bbPeriod: number;
  bbStdDev: number;
  rsiPeriod: number;
  stochKPeriod: number;
  stochDPeriod: number;
  adxPeriod: number;
  /** Candles back the ADX slope is measured over */
  adxSlopeLookback: number;
  emaFastPeriod: number;
  emaSlowPeriod: number;
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
  divergenceLookback: number;
  divergenceBullishMaxRsi: number;
  divergenceBearishMinRsi: number;
  rsiOversold: number;
  rsiOverbought: number;
  stochOversold: number;
  stochOverbought: number;
  /** Candles kept per timeframe; snapshots only ever see this many */
  historyWindow: number;
}

/**
 * Shortest candle window every indicator in a snapshot can be computed from
 */
export function minimumCandles(config: SnapshotConfig): number {
  return Math.max(
    2,
    config.bbPeriod,
    config.emaFastPeriod,
    config.emaSlowPeriod,
    config.rsiPeriod + config.divergenceLookback + 1,
    config.stochKPeriod + config.stochDPeriod,
    config.adxPeriod * 2 + config.adxSlopeLookback,
    config.macdSlow + config.macdSignal,
  );
}

function allFinite(values: readonly number[]): boolean {
  return values.every((v) => Number.isFinite(v));
}

/**
 * Build a snapshot at the last candle of `candles`.
 * Returns null when the window is shorter than minimumCandles() or any
 * value comes out non-finite; callers treat that as "skip this cycle".
 */
export function buildSnapshot(
  timeframe: Timeframe,
  candles: readonly Candle[],
  config: SnapshotConfig,
): IndicatorSnapshot | null {
  const window = candles.slice(-config.historyWindow);
  if (window.length < minimumCandles(config)) return null;

  const closes = window.map((c) => c.close);
  const highs = window.map((c) => c.high);
  const lows = window.map((c) => c.low);
  const last = window[window.length - 1];

  const bands = calculateBollingerBands(closes, config.bbPeriod, config.bbStdDev);
  const rsiSeries = RSI.calculate(closes, config.rsiPeriod);
  const stochSeries = Stochastic.calculate(
    highs,
    lows,
    closes,
    config.stochKPeriod,
    config.stochDPeriod,
  );
  const adxSeries = ADX.calculate(highs, lows, closes, config.adxPeriod);
  const emaFast = calculateEMA(closes, config.emaFastPeriod);
  const emaSlow = calculateEMA(closes, config.emaSlowPeriod);
  const macd = calculateMACD(closes, config.macdFast, config.macdSlow, config.macdSignal);

  if (
    !bands ||
    emaFast === null ||
    emaSlow === null ||
    !macd ||
    rsiSeries.length === 0 ||
    stochSeries.length < 2 ||
    adxSeries.length <= config.adxSlopeLookback
  ) {
    return null;
  }

  const rsi = rsiSeries[rsiSeries.length - 1];
  const stoch = stochSeries[stochSeries.length - 1];
  const prevStoch = stochSeries[stochSeries.length - 2];
  const adx = adxSeries[adxSeries.length - 1];
  const adxBefore = adxSeries[adxSeries.length - 1 - config.adxSlopeLookback];
  const pctB = percentB(last.close, bands);
  const bbWidth = bands.middle === 0 ? 0 : (bands.upper - bands.lower) / bands.middle;

  const numbers = [
    last.open, last.high, last.low, last.close,
    bands.upper, bands.middle, bands.lower, pctB, bbWidth,
    rsi, stoch.k, stoch.d, prevStoch.k, prevStoch.d,
    adx.adx, adx.plusDI, adx.minusDI, adxBefore.adx,
    emaFast, emaSlow, macd.macd, macd.signal, macd.histogram,
  ];
  if (!allFinite(numbers)) return null;

  const divergence = detectDivergence(closes, rsiSeries, config.divergenceLookback, {
    bullishMaxRsi: config.divergenceBullishMaxRsi,
    bearishMinRsi: config.divergenceBearishMinRsi,
  });

  const snapshot: IndicatorSnapshot = {
    timeframe,
    timestamp: last.timestamp,
    closeTime: last.timestamp + TIMEFRAME_MS[timeframe],
    open: last.open,
    high: last.high,
    low: last.low,
    close: last.close,
    bbUpper: bands.upper,
    bbMiddle: bands.middle,
    bbLower: bands.lower,
    bbPercentB: pctB,
    bbWidth,
    rsi,
    stochK: stoch.k,
    stochD: stoch.d,
    prevStochK: prevStoch.k,
    prevStochD: prevStoch.d,
    adx: adx.adx,
    plusDI: adx.plusDI,
    minusDI: adx.minusDI,
    adxSlope: adx.adx - adxBefore.adx,
    emaFast,
    emaSlow,
    macd: macd.macd,
    macdSignal: macd.signal,
    macdHistogram: macd.histogram,
    rsiOversold: rsi <= config.rsiOversold,
    rsiOverbought: rsi >= config.rsiOverbought,
    stochOversold: stoch.k <= config.stochOversold,
    stochOverbought: stoch.k >= config.stochOverbought,
    priceAtLowerBand: last.close <= bands.lower,
    priceAtUpperBand: last.close >= bands.upper,
    stochBullishCross: prevStoch.k <= prevStoch.d && stoch.k > stoch.d,
    stochBearishCross: prevStoch.k >= prevStoch.d && stoch.k < stoch.d,
    bullishDivergence: divergence.bullish,
    bearishDivergence: divergence.bearish,
    patterns: Object.freeze(detectCandlePatterns(window)),
  };

  return Object.freeze(snapshot);
}
