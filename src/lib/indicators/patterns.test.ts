import { describe, it, expect } from 'vitest';
import { detectCandlePatterns, detectDivergence, NO_PATTERNS } from './patterns';
import type { Candle } from '../types';

const bar = (open: number, high: number, low: number, close: number, i = 0): Candle => ({
  timestamp: i * 60_000,
  open,
  high,
  low,
  close,
});

describe('detectCandlePatterns', () => {
  it('returns no patterns for a single candle', () => {
    expect(detectCandlePatterns([bar(1, 2, 0, 1.5)])).toEqual(NO_PATTERNS);
  });

  it('detects a hammer', () => {
    // body 0.2, lower wick 1.0, upper wick 0.05
    const patterns = detectCandlePatterns([bar(10, 10.5, 9.5, 10.1), bar(10, 10.25, 9, 10.2, 1)]);
    expect(patterns.hammer).toBe(true);
    expect(patterns.shootingStar).toBe(false);
  });

  it('detects a shooting star', () => {
    const patterns = detectCandlePatterns([bar(10, 10.5, 9.5, 10.1), bar(10.2, 11.2, 9.95, 10, 1)]);
    expect(patterns.shootingStar).toBe(true);
    expect(patterns.hammer).toBe(false);
  });

  it('detects bullish engulfing and breakout', () => {
    // prev bearish 10.5 -> 10.0, current opens 9.9 below prev close, closes 10.8 above prev open
    const patterns = detectCandlePatterns([bar(10.5, 10.6, 9.95, 10), bar(9.9, 10.9, 9.85, 10.8, 1)]);
    expect(patterns.bullishEngulfing).toBe(true);
    expect(patterns.bullishBreakout).toBe(true);
    expect(patterns.bearishEngulfing).toBe(false);
  });

  it('detects bearish engulfing', () => {
    const patterns = detectCandlePatterns([bar(10, 10.55, 9.95, 10.5), bar(10.6, 10.65, 9.7, 9.8, 1)]);
    expect(patterns.bearishEngulfing).toBe(true);
    expect(patterns.bearishBreakout).toBe(true);
  });

  it('does not call a bullish candle inside the previous range a breakout', () => {
    const patterns = detectCandlePatterns([bar(10, 11, 9, 10.5), bar(10.2, 10.9, 10.1, 10.8, 1)]);
    expect(patterns.bullishBreakout).toBe(false);
    expect(patterns.bullishEngulfing).toBe(false);
  });
});

describe('detectDivergence', () => {
  it('flags bullish divergence on a lower low with a higher RSI low', () => {
    const closes = [10, 9.8, 9.6, 9.5];
    const rsi = [30, 25, 28, 35];
    expect(detectDivergence(closes, rsi, 3)).toEqual({ bullish: true, bearish: false });
  });

  it('requires RSI under the bullish ceiling', () => {
    const closes = [10, 9.8, 9.6, 9.5];
    const rsi = [30, 25, 28, 45];
    expect(detectDivergence(closes, rsi, 3).bullish).toBe(false);
  });

  it('flags bearish divergence on a higher high with a lower RSI high', () => {
    const closes = [10, 10.2, 10.4, 10.5];
    const rsi = [70, 75, 72, 65];
    expect(detectDivergence(closes, rsi, 3)).toEqual({ bullish: false, bearish: true });
  });

  it('returns false without enough history', () => {
    expect(detectDivergence([1, 2], [50, 50], 3)).toEqual({ bullish: false, bearish: false });
  });
});
