// ============================================================
// Replay Types
// ============================================================

import type { MarketMode, NoTradeReason, Side, TradeSignal } from '../types';
import type { OpenContract, SettledTrade } from './executor';
import type { SkipReason } from './trade-limits';

export type { OpenContract, SettledTrade } from './executor';
export type { SkipReason } from './trade-limits';

/** One evaluated cycle */
export interface DecisionRecord {
  readonly signal: TradeSignal;
  /** Why a RISE/FALL signal opened no contract; null when it did or for NONE */
  readonly skipped: SkipReason | null;
  /** Settlement of the contract this signal opened; null for NONE, skipped or unsettled */
  outcome: SettledTrade | null;
  /** Running balance after the settlements that preceded this decision */
  readonly balance: number;
}

export type HaltReason = 'end-of-data' | 'max-trades' | 'insufficient-balance' | 'session-loss';

export interface ReplaySummary {
  cycles: number;
  signals: Record<Side, number>;
  /** Signals the loss-streak guard forced to NONE */
  guardBlocks: number;
  blockedBy: Record<NoTradeReason, number>;
  /** RISE/FALL signals that opened no contract */
  skipped: Record<SkipReason, number>;

  trades: number;
  wins: number;
  losses: number;
  ties: number;
  /** Percentage of settled trades that won */
  winRate: number;
  maxConsecutiveLosses: number;

  grossProfit: number;
  grossLoss: number;
  /** Infinity when there is profit and no loss */
  profitFactor: number;
  netProfit: number;
  initialBalance: number;
  finalBalance: number;
  maxDrawdown: number;
  maxDrawdownPercent: number;
  /** Average pnl per settled trade */
  expectancy: number;
  averageMae: number;
  averageMfe: number;

  modeDistribution: Record<MarketMode, number>;
  unsettled: number;
  haltReason: HaltReason;
}

export interface ReplayResult {
  records: readonly DecisionRecord[];
  trades: readonly SettledTrade[];
  /** Contracts still open when the data ran out; not counted in the summary */
  unsettled: readonly OpenContract[];
  haltReason: HaltReason;
  summary: ReplaySummary;
}
