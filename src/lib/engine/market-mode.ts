// ============================================================
// Market Mode Classifier
// ============================================================
// Classifies the market from M5 ADX / DI with hysteresis:
// a trending or ranging mode is only left once ADX crosses the
// opposite threshold, so ADX chatter between the two thresholds
// does not flip the mode.
// ============================================================

import { loggers } from '../logger';
import type { IndicatorSnapshot, MarketMode } from '../types';
import { isTrending } from '../types';

export interface ModeThresholds {
  /** ADX must exceed this to enter a trending mode */
  trendEntryAdx: number;
  /** ADX must fall below this to enter RANGING */
  rangeEntryAdx: number;
}

export const DEFAULT_MODE_THRESHOLDS: ModeThresholds = {
  trendEntryAdx: 27,
  rangeEntryAdx: 18,
};

/**
 * Next market mode given the previous one and the latest M5 ADX / DI.
 *
 * - ADX above trend entry: direction from DI dominance. Equal DIs keep a
 *   previous trend, otherwise UNCERTAIN.
 * - ADX below range entry: RANGING.
 * - In between: trending and ranging modes persist, UNCERTAIN stays.
 * - Non-finite input: the previous mode.
 */
export function classify(
  previous: MarketMode,
  adx: number,
  plusDI: number,
  minusDI: number,
  thresholds: ModeThresholds = DEFAULT_MODE_THRESHOLDS,
): MarketMode {
  if (!Number.isFinite(adx) || !Number.isFinite(plusDI) || !Number.isFinite(minusDI)) {
    return previous;
  }

  if (adx > thresholds.trendEntryAdx) {
    if (plusDI > minusDI) return 'TRENDING_UP';
    if (minusDI > plusDI) return 'TRENDING_DOWN';
    return isTrending(previous) ? previous : 'UNCERTAIN';
  }

  if (adx < thresholds.rangeEntryAdx) {
    return 'RANGING';
  }

  return previous;
}

export interface ModeState {
  readonly mode: MarketMode;
  /** Close time of the M5 snapshot the mode was last classified on */
  readonly lastM5Close: number | null;
}

export const INITIAL_MODE_STATE: ModeState = Object.freeze({
  mode: 'UNCERTAIN',
  lastM5Close: null,
});

/**
 * Fold an M5 snapshot into the mode state. A snapshot that is not newer
 * than the last one classified leaves the state untouched, so the mode
 * only moves on M5 closes.
 */
export function advanceMode(
  state: ModeState,
  m5: IndicatorSnapshot,
  thresholds: ModeThresholds = DEFAULT_MODE_THRESHOLDS,
): ModeState {
  if (state.lastM5Close !== null && m5.closeTime <= state.lastM5Close) {
    return state;
  }

  const mode = classify(state.mode, m5.adx, m5.plusDI, m5.minusDI, thresholds);
  if (mode !== state.mode) {
    loggers.mode.info(
      `${state.mode} -> ${mode} (ADX ${m5.adx.toFixed(1)}, +DI ${m5.plusDI.toFixed(1)}, -DI ${m5.minusDI.toFixed(1)})`,
    );
  }

  return Object.freeze({ mode, lastM5Close: m5.closeTime });
}
