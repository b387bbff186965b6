// ============================================================
// Technical Indicator Types
// ============================================================

export interface StochasticResult {
  k: number;
  d: number;
}

export interface MACDResult {
  macd: number;
  signal: number;
  histogram: number;
}

export interface BollingerBandsResult {
  upper: number;
  middle: number;
  lower: number;
}

export interface ADXResult {
  adx: number;
  plusDI: number;
  minusDI: number;
}

