// ============================================================
// Technical Indicators
// ============================================================
// Latest-value functions (calculate*) plus O(n) series wrappers
// for the readings the snapshot builder needs a history of.
// All inputs are oldest-first.
// ============================================================

import type {
  ADXResult,
  BollingerBandsResult,
  MACDResult,
  StochasticResult,
} from './types';

/**
 * Exponential Moving Average (EMA), seeded with the SMA of the first period
 */
export function calculateEMA(data: number[], period: number): number | null {
  const series = _computeEMASeries(data, period);
  return series.length > 0 ? series[series.length - 1] : null;
}

/**
 * Bollinger Bands over the last `period` values (population std dev)
 */
export function calculateBollingerBands(
  data: number[],
  period: number = 20,
  stdDev: number = 2,
): BollingerBandsResult | null {
  if (data.length < period || period <= 0) return null;

  const slice = data.slice(-period);
  const middle = slice.reduce((acc, val) => acc + val, 0) / period;

  const variance = slice.reduce((acc, val) => acc + (val - middle) ** 2, 0) / period;
  const sd = Math.sqrt(variance);

  return {
    upper: middle + stdDev * sd,
    middle,
    lower: middle - stdDev * sd,
  };
}

/**
 * Position of `price` inside the band: 0 = lower, 1 = upper.
 * A zero-width band reports the midpoint.
 */
export function percentB(price: number, bands: BollingerBandsResult): number {
  const width = bands.upper - bands.lower;
  if (width === 0) return 0.5;
  return (price - bands.lower) / width;
}

export function calculateMACD(
  data: number[],
  fastPeriod: number = 12,
  slowPeriod: number = 26,
  signalPeriod: number = 9,
): MACDResult | null {
  const series = _computeMACDSeries(data, fastPeriod, slowPeriod, signalPeriod);
  return series.length > 0 ? series[series.length - 1] : null;
}

/**
 * True Range
 * TR = max(high - low, |high - prevClose|, |low - prevClose|)
 */
function trueRange(high: number, low: number, prevClose: number): number {
  return Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose));
}

// ============================================================
// O(n) Series Computation
// ============================================================

/** RSI series, length data.length - period */
function _computeRSISeries(data: number[], period: number): number[] {
  if (data.length < period + 1 || period <= 0) return [];

  const results: number[] = [];
  let avgGain = 0;
  let avgLoss = 0;

  for (let i = 1; i <= period; i++) {
    const change = data[i] - data[i - 1];
    if (change > 0) avgGain += change;
    else avgLoss += Math.abs(change);
  }
  avgGain /= period;
  avgLoss /= period;

  results.push(avgLoss === 0 ? 100 : 100 - 100 / (1 + avgGain / avgLoss));

  for (let i = period + 1; i < data.length; i++) {
    const change = data[i] - data[i - 1];
    if (change > 0) {
      avgGain = (avgGain * (period - 1) + change) / period;
      avgLoss = (avgLoss * (period - 1)) / period;
    } else {
      avgGain = (avgGain * (period - 1)) / period;
      avgLoss = (avgLoss * (period - 1) + Math.abs(change)) / period;
    }

    results.push(avgLoss === 0 ? 100 : 100 - 100 / (1 + avgGain / avgLoss));
  }

  return results;
}

/** EMA series, length data.length - period + 1 */
function _computeEMASeries(data: number[], period: number): number[] {
  if (data.length < period || period <= 0) return [];

  const results: number[] = [];
  const multiplier = 2 / (period + 1);

  let sum = 0;
  for (let i = 0; i < period; i++) sum += data[i];
  let ema = sum / period;
  results.push(ema);

  for (let i = period; i < data.length; i++) {
    ema = (data[i] - ema) * multiplier + ema;
    results.push(ema);
  }

  return results;
}

/** MACD series, length data.length - slowPeriod - signalPeriod + 1 */
function _computeMACDSeries(
  data: number[],
  fastPeriod: number,
  slowPeriod: number,
  signalPeriod: number,
): MACDResult[] {
  if (
    data.length < slowPeriod + signalPeriod ||
    fastPeriod <= 0 ||
    slowPeriod <= fastPeriod ||
    signalPeriod <= 0
  ) {
    return [];
  }

  const fastEMAs = _computeEMASeries(data, fastPeriod);
  const slowEMAs = _computeEMASeries(data, slowPeriod);

  // align fast EMA to the slow EMA's first index
  const offset = slowPeriod - fastPeriod;
  const macdLine: number[] = [];
  for (let i = 0; i < slowEMAs.length; i++) {
    macdLine.push(fastEMAs[i + offset] - slowEMAs[i]);
  }

  const signalEMAs = _computeEMASeries(macdLine, signalPeriod);

  // signalEMAs[0] is the SMA seed; the first emitted point is the one after it
  const results: MACDResult[] = [];
  for (let i = 1; i < signalEMAs.length; i++) {
    const macdVal = macdLine[i + signalPeriod - 1];
    const signalVal = signalEMAs[i];
    results.push({
      macd: macdVal,
      signal: signalVal,
      histogram: macdVal - signalVal,
    });
  }

  return results;
}

/** Stochastic series, length minLen - kPeriod - dPeriod + 2 */
function _computeStochasticSeries(
  highs: number[],
  lows: number[],
  closes: number[],
  kPeriod: number,
  dPeriod: number,
): StochasticResult[] {
  const minLen = Math.min(highs.length, lows.length, closes.length);
  if (minLen < kPeriod + dPeriod - 1 || kPeriod <= 0 || dPeriod <= 0) return [];

  const kValues: number[] = [];
  for (let i = kPeriod - 1; i < minLen; i++) {
    let hh = -Infinity;
    let ll = Infinity;
    for (let j = i - kPeriod + 1; j <= i; j++) {
      if (highs[j] > hh) hh = highs[j];
      if (lows[j] < ll) ll = lows[j];
    }
    const range = hh - ll;
    kValues.push(range === 0 ? 50 : ((closes[i] - ll) / range) * 100);
  }

  const results: StochasticResult[] = [];
  for (let i = dPeriod - 1; i < kValues.length; i++) {
    let dSum = 0;
    for (let j = i - dPeriod + 1; j <= i; j++) dSum += kValues[j];
    results.push({ k: kValues[i], d: dSum / dPeriod });
  }

  return results;
}

/**
 * ADX series, length minLen - 2 * period + 1.
 * DI uses Wilder running sums of +DM, -DM and TR; ADX seeds with the
 * mean of the first `period` DX values and then smooths.
 */
function _computeADXSeries(
  highs: number[],
  lows: number[],
  closes: number[],
  period: number,
): ADXResult[] {
  const minLen = Math.min(highs.length, lows.length, closes.length);
  if (minLen < period * 2 || period <= 0) return [];

  const plusDMs: number[] = [];
  const minusDMs: number[] = [];
  const trueRanges: number[] = [];

  for (let i = 1; i < minLen; i++) {
    const upMove = highs[i] - highs[i - 1];
    const downMove = lows[i - 1] - lows[i];

    plusDMs.push(upMove > downMove && upMove > 0 ? upMove : 0);
    minusDMs.push(downMove > upMove && downMove > 0 ? downMove : 0);
    trueRanges.push(trueRange(highs[i], lows[i], closes[i - 1]));
  }

  let smoothedPlusDM = 0;
  let smoothedMinusDM = 0;
  let smoothedTR = 0;
  for (let i = 0; i < period; i++) {
    smoothedPlusDM += plusDMs[i];
    smoothedMinusDM += minusDMs[i];
    smoothedTR += trueRanges[i];
  }

  const toDI = () => ({
    plusDI: smoothedTR === 0 ? 0 : (smoothedPlusDM / smoothedTR) * 100,
    minusDI: smoothedTR === 0 ? 0 : (smoothedMinusDM / smoothedTR) * 100,
  });

  const dis = [toDI()];
  for (let i = period; i < plusDMs.length; i++) {
    smoothedPlusDM = smoothedPlusDM - smoothedPlusDM / period + plusDMs[i];
    smoothedMinusDM = smoothedMinusDM - smoothedMinusDM / period + minusDMs[i];
    smoothedTR = smoothedTR - smoothedTR / period + trueRanges[i];
    dis.push(toDI());
  }

  const dxValues = dis.map(({ plusDI, minusDI }) => {
    const diSum = plusDI + minusDI;
    return diSum === 0 ? 0 : (Math.abs(plusDI - minusDI) / diSum) * 100;
  });

  if (dxValues.length < period) return [];

  let adx = 0;
  for (let i = 0; i < period; i++) adx += dxValues[i];
  adx /= period;

  const results: ADXResult[] = [{ adx, ...dis[period - 1] }];
  for (let i = period; i < dxValues.length; i++) {
    adx = (adx * (period - 1) + dxValues[i]) / period;
    results.push({ adx, ...dis[i] });
  }

  return results;
}

// ============================================================
// Series Wrappers
// ============================================================

export const RSI = {
  calculate(data: number[], period: number = 14): number[] {
    return _computeRSISeries(data, period);
  },
};

export const Stochastic = {
  calculate(
    highs: number[],
    lows: number[],
    closes: number[],
    kPeriod: number = 14,
    dPeriod: number = 3,
  ): StochasticResult[] {
    return _computeStochasticSeries(highs, lows, closes, kPeriod, dPeriod);
  },
};

export const ADX = {
  calculate(highs: number[], lows: number[], closes: number[], period: number = 14): ADXResult[] {
    return _computeADXSeries(highs, lows, closes, period);
  },
};

export * from './types';
