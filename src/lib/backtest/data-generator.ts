// ============================================================
// Synthetic Candle Generator
// ============================================================
// Seeded random walk that switches between up, down and flat
// regimes, for tests and demos. Same options, same candles.
// ============================================================

import type { Candle } from '../types';
import { TIMEFRAME_MS } from '../types';

export type Regime = 'up' | 'down' | 'flat';

export interface GeneratorOptions {
  seed: number;
  count: number;
  /** Open time of the first candle; floored to the minute */
  start: number;
  startPrice: number;
  /** Maximum per-minute noise as a fraction of price */
  volatility: number;
  /** Per-minute drift as a fraction of price while trending */
  drift: number;
  /** Regime length bounds in minutes */
  minRegimeLength: number;
  maxRegimeLength: number;
  /** Decimal places prices are rounded to */
  precision: number;
}

export const DEFAULT_GENERATOR_OPTIONS: GeneratorOptions = {
  seed: 42,
  count: 1000,
  start: Date.UTC(2024, 0, 1),
  startPrice: 1.1,
  volatility: 0.0004,
  drift: 0.00015,
  minRegimeLength: 60,
  maxRegimeLength: 240,
  precision: 5,
};

const REGIMES: readonly Regime[] = ['up', 'down', 'flat'];

/** mulberry32: small, fast 32-bit PRNG returning floats in [0, 1) */
export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function generateCandles(options: Partial<GeneratorOptions> = {}): Candle[] {
  const cfg = { ...DEFAULT_GENERATOR_OPTIONS, ...options };
  const random = mulberry32(cfg.seed);
  const scale = 10 ** cfg.precision;
  const round = (value: number) => Math.round(value * scale) / scale;
  const interval = TIMEFRAME_MS.M1;
  const start = Math.floor(cfg.start / interval) * interval;

  const nextRegimeLength = () =>
    cfg.minRegimeLength + Math.floor(random() * (cfg.maxRegimeLength - cfg.minRegimeLength + 1));

  const candles: Candle[] = [];
  let price = round(cfg.startPrice);
  let regime: Regime = REGIMES[Math.floor(random() * REGIMES.length)];
  let remaining = nextRegimeLength();

  for (let i = 0; i < cfg.count; i++) {
    if (remaining === 0) {
      regime = REGIMES[Math.floor(random() * REGIMES.length)];
      remaining = nextRegimeLength();
    }
    remaining--;

    const drift = regime === 'up' ? cfg.drift : regime === 'down' ? -cfg.drift : 0;
    const noise = (random() - 0.5) * 2 * cfg.volatility;

    const open = price;
    const close = round(open * (1 + drift + noise));
    const top = Math.max(open, close);
    const bottom = Math.min(open, close);
    const high = round(top * (1 + random() * cfg.volatility * 0.5));
    const low = round(bottom * (1 - random() * cfg.volatility * 0.5));

    candles.push({
      timestamp: start + i * interval,
      open,
      high,
      low,
      close,
      volume: Math.round(100 + random() * 900),
    });

    price = close;
  }

  return candles;
}
