// ============================================================
// Replay Statistics
// ============================================================
// Summary of one replay run: decision counts over every evaluated
// cycle, trade performance over settled contracts only.
// ============================================================

import type { MarketMode, NoTradeReason, Side } from '../types'
import type { DecisionRecord, HaltReason, ReplaySummary, SettledTrade, SkipReason } from './types'

const GUARD_REASONS: ReadonlySet<NoTradeReason> = new Set(['cooldown', 'hard-stop'])

export interface SummaryInput {
  records: readonly DecisionRecord[]
  trades: readonly SettledTrade[]
  initialBalance: number
  unsettled: number
  haltReason: HaltReason
}

export function summarizeReplay(input: SummaryInput): ReplaySummary {
  const { records, trades, initialBalance } = input

  const signals: Record<Side, number> = { RISE: 0, FALL: 0, NONE: 0 }
  const blockedBy: Record<NoTradeReason, number> = {
    'insufficient-data': 0,
    'below-confidence': 0,
    'below-agreement': 0,
    tie: 0,
    cooldown: 0,
    'hard-stop': 0,
  }
  const skipped: Record<SkipReason, number> = {
    'daily-trades': 0,
    'daily-loss': 0,
    'profit-target': 0,
    'open-contract': 0,
    'min-interval': 0,
  }
  const modeDistribution: Record<MarketMode, number> = {
    TRENDING_UP: 0,
    TRENDING_DOWN: 0,
    RANGING: 0,
    UNCERTAIN: 0,
  }
  let guardBlocks = 0

  for (const { signal, skipped: skip } of records) {
    signals[signal.side]++
    if (skip !== null) skipped[skip]++
    modeDistribution[signal.mode]++
    if (signal.blockedBy !== undefined) {
      blockedBy[signal.blockedBy]++
      if (GUARD_REASONS.has(signal.blockedBy)) guardBlocks++
    }
  }

  const wins = trades.filter(t => t.result === 'win')
  const losses = trades.filter(t => t.result === 'loss')
  const ties = trades.length - wins.length - losses.length

  const grossProfit = wins.reduce((sum, t) => sum + t.pnl, 0)
  const grossLoss = Math.abs(losses.reduce((sum, t) => sum + t.pnl, 0))
  const netProfit = grossProfit - grossLoss
  const profitFactor = grossLoss > 0 ? grossProfit / grossLoss : grossProfit > 0 ? Infinity : 0

  const { maxDrawdown, maxDrawdownPercent } = calculateDrawdown(trades, initialBalance)

  return {
    cycles: records.length,
    signals,
    guardBlocks,
    blockedBy,
    skipped,
    trades: trades.length,
    wins: wins.length,
    losses: losses.length,
    ties,
    winRate: trades.length > 0 ? (wins.length / trades.length) * 100 : 0,
    maxConsecutiveLosses: maxConsecutiveLosses(trades),
    grossProfit,
    grossLoss,
    profitFactor,
    netProfit,
    initialBalance,
    finalBalance: initialBalance + netProfit,
    maxDrawdown,
    maxDrawdownPercent,
    expectancy: trades.length > 0 ? netProfit / trades.length : 0,
    averageMae: average(trades.map(t => t.mae)),
    averageMfe: average(trades.map(t => t.mfe)),
    modeDistribution,
    unsettled: input.unsettled,
    haltReason: input.haltReason,
  }
}

/** Longest run of losses in settlement order; ties neither extend nor break a run */
export function maxConsecutiveLosses(trades: readonly SettledTrade[]): number {
  let max = 0
  let run = 0

  for (const trade of trades) {
    if (trade.result === 'loss') {
      run++
      max = Math.max(max, run)
    } else if (trade.result === 'win') {
      run = 0
    }
  }

  return max
}

export function calculateDrawdown(
  trades: readonly SettledTrade[],
  initialBalance: number
): { maxDrawdown: number; maxDrawdownPercent: number } {
  let balance = initialBalance
  let peak = initialBalance
  let maxDrawdown = 0
  let maxDrawdownPercent = 0

  for (const trade of trades) {
    balance += trade.pnl
    if (balance > peak) {
      peak = balance
    }
    const drawdown = peak - balance
    if (drawdown > maxDrawdown) {
      maxDrawdown = drawdown
      maxDrawdownPercent = peak > 0 ? (drawdown / peak) * 100 : 0
    }
  }

  return { maxDrawdown, maxDrawdownPercent }
}

function average(values: readonly number[]): number {
  if (values.length === 0) return 0
  return values.reduce((a, b) => a + b, 0) / values.length
}
