// ============================================================
// Candle Data Utilities
// ============================================================
// Validation, deduplication and gap detection for M1 candle
// sequences. A replay refuses any sequence that is not strictly
// ordered minute bars.
// ============================================================

import { ErrorCode, Errors } from '../errors';
import type { Candle } from '../types';
import { TIMEFRAME_MS } from '../types';

/** Gap information between consecutive candles */
export interface CandleGap {
  /** Index of the candle BEFORE the gap */
  beforeIndex: number;
  beforeTimestamp: number;
  afterTimestamp: number;
  /** Number of expected candles missing */
  missingCount: number;
}

/**
 * Validate a single candle's OHLC data integrity.
 * Returns true if the candle has valid OHLC relationships.
 */
export function isValidCandle(candle: Candle): boolean {
  const { open, high, low, close, timestamp } = candle;

  // Check for NaN/Infinity
  if (!isFinite(open) || !isFinite(high) || !isFinite(low) || !isFinite(close)) {
    return false;
  }

  // Check positive prices
  if (open <= 0 || high <= 0 || low <= 0 || close <= 0) {
    return false;
  }

  // low <= min(open,close) and high >= max(open,close)
  if (low > Math.min(open, close) || high < Math.max(open, close)) {
    return false;
  }

  if (!Number.isInteger(timestamp) || timestamp <= 0) {
    return false;
  }

  return true;
}

/**
 * Throw on the first candle that breaks the replay contract:
 * valid OHLC, open time on a minute boundary, strictly increasing.
 */
export function validateCandleSequence(candles: readonly Candle[]): void {
  const interval = TIMEFRAME_MS.M1;

  for (let i = 0; i < candles.length; i++) {
    const candle = candles[i];

    if (!isValidCandle(candle)) {
      throw Errors.replay(ErrorCode.REPLAY_INVALID_CANDLE, `Invalid candle at index ${i}`, {
        index: i,
        candle,
      });
    }
    if (candle.timestamp % interval !== 0) {
      throw Errors.replay(
        ErrorCode.REPLAY_MISALIGNED,
        `Candle at index ${i} opens at ${candle.timestamp}, not on a minute boundary`,
        { index: i, timestamp: candle.timestamp },
      );
    }
    if (i === 0) continue;

    const previous = candles[i - 1].timestamp;
    if (candle.timestamp === previous) {
      throw Errors.replay(
        ErrorCode.REPLAY_DUPLICATE_TIMESTAMP,
        `Duplicate timestamp ${candle.timestamp} at index ${i}`,
        { index: i, timestamp: candle.timestamp },
      );
    }
    if (candle.timestamp < previous) {
      throw Errors.replay(
        ErrorCode.REPLAY_NON_MONOTONIC,
        `Timestamp ${candle.timestamp} at index ${i} is before ${previous}`,
        { index: i, timestamp: candle.timestamp, previous },
      );
    }
  }
}

/**
 * Sort by timestamp and drop duplicates, keeping the last occurrence.
 * For cleaning imported files before they are stored.
 */
export function sortAndDeduplicate(candles: readonly Candle[]): Candle[] {
  const sorted = [...candles].sort((a, b) => a.timestamp - b.timestamp);
  if (sorted.length <= 1) return sorted;

  const result: Candle[] = [sorted[0]];
  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].timestamp !== sorted[i - 1].timestamp) {
      result.push(sorted[i]);
    } else {
      // Keep the later occurrence (overwrite)
      result[result.length - 1] = sorted[i];
    }
  }

  return result;
}

/**
 * Missing-minute gaps in a sorted sequence. Gaps are legal in a replay
 * (the aggregator closes buckets late) but worth reporting.
 */
export function detectGaps(sortedCandles: readonly Candle[], intervalMs = TIMEFRAME_MS.M1): CandleGap[] {
  const gaps: CandleGap[] = [];
  for (let i = 1; i < sortedCandles.length; i++) {
    const diff = sortedCandles[i].timestamp - sortedCandles[i - 1].timestamp;
    if (diff > intervalMs) {
      gaps.push({
        beforeIndex: i - 1,
        beforeTimestamp: sortedCandles[i - 1].timestamp,
        afterTimestamp: sortedCandles[i].timestamp,
        missingCount: Math.round(diff / intervalMs) - 1,
      });
    }
  }
  return gaps;
}
