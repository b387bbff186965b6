// ============================================================
// Trade Limits
// ============================================================
// Execution-side checks made before a contract is opened. They
// never change a signal: a RISE/FALL that cannot be placed is
// recorded as skipped and its guard slot released.
//   skip  daily-trades | daily-loss | profit-target
//         | open-contract | min-interval
//   halt  session-loss (with insufficient-balance in the harness)
// Days are UTC calendar days of the decision time.
// ============================================================

import type { ReplayConfig, RiskLimitsConfig } from '../config';
import type { OpenContract, SettledTrade } from './executor';

export type SkipReason = 'daily-trades' | 'daily-loss' | 'profit-target' | 'open-contract' | 'min-interval';

const DAY_MS = 86_400_000;

export interface TradeLimitsOptions {
  limits: RiskLimitsConfig;
  pacing: Pick<ReplayConfig, 'maxOpenContracts' | 'minTradeIntervalMs'>;
  initialBalance: number;
}

export interface DayStats {
  /** UTC day number, days since the epoch */
  day: number;
  trades: number;
  pnl: number;
}

export class TradeLimits {
  private readonly options: TradeLimitsOptions;
  private today: DayStats = { day: Number.NaN, trades: 0, pnl: 0 };
  private sessionPnl = 0;
  private lastEntry: number | null = null;

  constructor(options: TradeLimitsOptions) {
    this.options = options;
  }

  get day(): Readonly<DayStats> {
    return this.today;
  }

  /** Roll the daily counters when `now` falls on a new UTC day */
  startCycle(now: number): void {
    const day = Math.floor(now / DAY_MS);
    if (day !== this.today.day) {
      this.today = { day, trades: 0, pnl: 0 };
    }
  }

  onOpened(contract: OpenContract): void {
    this.today.trades++;
    this.lastEntry = contract.entryTime;
  }

  onSettled(trade: SettledTrade): void {
    this.today.pnl += trade.pnl;
    this.sessionPnl += trade.pnl;
  }

  /** Why a contract cannot be opened at `now`, or null when it can */
  skipReason(now: number, openContracts: number): SkipReason | null {
    const { limits, pacing, initialBalance } = this.options;
    const { trades, pnl } = this.today;

    if (limits.maxDailyTrades > 0 && trades >= limits.maxDailyTrades) {
      return 'daily-trades';
    }
    if (limits.maxDailyLossPercent > 0 && pnl < 0 && (-pnl / initialBalance) * 100 >= limits.maxDailyLossPercent) {
      return 'daily-loss';
    }
    if (limits.dailyProfitTarget > 0 && pnl >= limits.dailyProfitTarget) {
      return 'profit-target';
    }
    if (openContracts >= pacing.maxOpenContracts) {
      return 'open-contract';
    }
    if (this.lastEntry !== null && now - this.lastEntry < pacing.minTradeIntervalMs) {
      return 'min-interval';
    }
    return null;
  }

  /** The run's realised loss has reached maxSessionLoss */
  sessionLossReached(): boolean {
    const { maxSessionLoss } = this.options.limits;
    return maxSessionLoss > 0 && -this.sessionPnl >= maxSessionLoss;
  }
}
