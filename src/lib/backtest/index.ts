// ============================================================
// Backtest Module - Main Entry Point
// ============================================================

export * from './types'
export * from './candle-utils'
export * from './timeframe-aggregator'
export * from './executor'
export * from './statistics'
export * from './report'
export * from './data-generator'
export { ReplayHarness, runReplay } from './replay'
export type { ReplayConfig as ReplayHarnessConfig } from './replay'
export { TradeLimits } from './trade-limits'
export type { TradeLimitsOptions, DayStats } from './trade-limits'
