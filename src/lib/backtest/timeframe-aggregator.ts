// ============================================================
// Timeframe Aggregator
// ============================================================
// Folds M1 candles into M5 / M15 buckets, the same way in live
// and in replay:
// - bucket = floor(ts / interval) * interval
// - open = first, close = last, high/low = extremes, volume summed
// - a bucket closes when the M1 candle ending at the bucket end
//   arrives, or late when a candle from a later bucket shows up
// ============================================================

import { ErrorCode, Errors } from '../errors';
import type { Candle, Timeframe } from '../types';
import { TIMEFRAME_MS } from '../types';
import { floorToInterval } from '../utils/time';

export type HigherTimeframe = Exclude<Timeframe, 'M1'>;

export class TimeframeAggregator {
  readonly timeframe: HigherTimeframe;
  private readonly intervalMs: number;
  private open: Candle | null = null;

  constructor(timeframe: HigherTimeframe) {
    this.timeframe = timeframe;
    this.intervalMs = TIMEFRAME_MS[timeframe];
  }

  /** Bucket still being filled, if any */
  get pending(): Readonly<Candle> | null {
    return this.open;
  }

  /**
   * Add one M1 candle. Returns the buckets it closed, oldest first:
   * none, the previous bucket closed late, this bucket, or both.
   */
  push(m1: Candle): Candle[] {
    const start = floorToInterval(m1.timestamp, this.intervalMs);
    const closed: Candle[] = [];

    if (this.open !== null) {
      if (start < this.open.timestamp) {
        throw Errors.replay(
          ErrorCode.REPLAY_NON_MONOTONIC,
          `${this.timeframe} bucket ${this.open.timestamp} received an older candle ${m1.timestamp}`,
          { timestamp: m1.timestamp, bucket: this.open.timestamp },
          'TimeframeAggregator.push',
        );
      }
      if (start > this.open.timestamp) {
        closed.push(this.open);
        this.open = null;
      }
    }

    if (this.open === null) {
      this.open = {
        timestamp: start,
        open: m1.open,
        high: m1.high,
        low: m1.low,
        close: m1.close,
        volume: m1.volume ?? 0,
      };
    } else {
      this.open = {
        ...this.open,
        high: Math.max(this.open.high, m1.high),
        low: Math.min(this.open.low, m1.low),
        close: m1.close,
        volume: (this.open.volume ?? 0) + (m1.volume ?? 0),
      };
    }

    if (m1.timestamp + TIMEFRAME_MS.M1 >= start + this.intervalMs) {
      closed.push(this.open);
      this.open = null;
    }

    return closed;
  }

  reset(): void {
    this.open = null;
  }
}

/** Aggregate a whole M1 sequence; the trailing partial bucket is dropped */
export function aggregateCandles(m1: readonly Candle[], timeframe: HigherTimeframe): Candle[] {
  const aggregator = new TimeframeAggregator(timeframe);
  return m1.flatMap((candle) => aggregator.push(candle));
}
