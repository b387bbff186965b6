// ============================================================
// Snapshot fixtures for engine tests
// ============================================================

import { NO_PATTERNS } from '../../indicators/patterns';
import type {
  CandlePatterns,
  IndicatorSnapshot,
  SnapshotTriple,
  Timeframe,
} from '../../types';
import { TIMEFRAME_MS } from '../../types';

export type SnapshotOverrides = Omit<Partial<IndicatorSnapshot>, 'patterns'> & {
  patterns?: Partial<CandlePatterns>;
};

/** 2024-01-01 16:30 UTC, outside every session window */
export const NEUTRAL_NOW = Date.UTC(2024, 0, 1, 16, 30);

/**
 * Snapshot on which no scoring rule fires: mid-band price, RSI 50,
 * flat MACD, no crosses, no patterns, ADX between the mode thresholds.
 */
export function makeSnapshot(
  timeframe: Timeframe = 'M1',
  overrides: SnapshotOverrides = {},
): IndicatorSnapshot {
  const { patterns, ...rest } = overrides;
  const timestamp = rest.timestamp ?? NEUTRAL_NOW - TIMEFRAME_MS[timeframe];

  return {
    timeframe,
    timestamp,
    closeTime: timestamp + TIMEFRAME_MS[timeframe],
    open: 100,
    high: 100.5,
    low: 99.5,
    close: 100,
    bbUpper: 102,
    bbMiddle: 100,
    bbLower: 98,
    bbPercentB: 0.5,
    bbWidth: 0.04,
    rsi: 50,
    stochK: 50,
    stochD: 50,
    prevStochK: 50,
    prevStochD: 50,
    adx: 22,
    plusDI: 20,
    minusDI: 20,
    adxSlope: 0,
    emaFast: 100,
    emaSlow: 100,
    macd: 0,
    macdSignal: 0,
    macdHistogram: 0,
    rsiOversold: false,
    rsiOverbought: false,
    stochOversold: false,
    stochOverbought: false,
    priceAtLowerBand: false,
    priceAtUpperBand: false,
    stochBullishCross: false,
    stochBearishCross: false,
    bullishDivergence: false,
    bearishDivergence: false,
    ...rest,
    patterns: { ...NO_PATTERNS, ...patterns },
  };
}

export function makeTriple(
  overrides: { m1?: SnapshotOverrides; m5?: SnapshotOverrides; m15?: SnapshotOverrides } = {},
): SnapshotTriple {
  return {
    m1: makeSnapshot('M1', overrides.m1),
    m5: makeSnapshot('M5', overrides.m5),
    m15: makeSnapshot('M15', overrides.m15),
  };
}
