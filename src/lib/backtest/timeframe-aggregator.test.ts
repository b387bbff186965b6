import { describe, it, expect } from 'vitest';
import { TimeframeAggregator, aggregateCandles } from './timeframe-aggregator';
import { EngineError } from '../errors';
import type { Candle } from '../types';

const T0 = Date.UTC(2024, 0, 2);
const MIN = 60_000;

function m1(minute: number, close: number, volume = 1): Candle {
  return {
    timestamp: T0 + minute * MIN,
    open: close - 0.5,
    high: close + 1,
    low: close - 1,
    close,
    volume,
  };
}

describe('TimeframeAggregator', () => {
  it('closes an M5 bucket on its fifth minute', () => {
    const agg = new TimeframeAggregator('M5');
    const closes = [10, 12, 9, 11, 13];
    const results = closes.map((c, i) => agg.push(m1(i, c, 2)));

    expect(results.slice(0, 4).every((r) => r.length === 0)).toBe(true);
    expect(results[4]).toEqual([
      { timestamp: T0, open: 9.5, high: 14, low: 8, close: 13, volume: 10 },
    ]);
    expect(agg.pending).toBeNull();
  });

  it('closes a bucket late when its last minute is missing', () => {
    const agg = new TimeframeAggregator('M5');
    agg.push(m1(0, 10));
    agg.push(m1(1, 11));
    const closed = agg.push(m1(6, 12));
    expect(closed).toEqual([{ timestamp: T0, open: 9.5, high: 12, low: 9, close: 11, volume: 2 }]);
    expect(agg.pending?.timestamp).toBe(T0 + 5 * MIN);
  });

  it('can close two buckets with one candle', () => {
    const agg = new TimeframeAggregator('M5');
    agg.push(m1(0, 10));
    const closed = agg.push(m1(9, 20));
    expect(closed.map((c) => c.timestamp)).toEqual([T0, T0 + 5 * MIN]);
    expect(closed[1].open).toBe(19.5);
  });

  it('rejects a candle older than the open bucket', () => {
    const agg = new TimeframeAggregator('M15');
    agg.push(m1(16, 10));
    expect(() => agg.push(m1(3, 10))).toThrow(EngineError);
  });
});

describe('aggregateCandles', () => {
  it('builds M15 bars and drops the trailing partial bucket', () => {
    const candles = Array.from({ length: 40 }, (_, i) => m1(i, 100 + i));
    const m15 = aggregateCandles(candles, 'M15');
    expect(m15.map((c) => [c.timestamp, c.open, c.close])).toEqual([
      [T0, 99.5, 114],
      [T0 + 15 * MIN, 114.5, 129],
    ]);
  });
});
