// ============================================================
// Replay Reports
// ============================================================
// Text summary for the console, a JSON-lines decision log and a
// CSV trade log. The decision log is built with a fixed key order
// so two runs over the same input compare byte for byte.
// ============================================================

import type { DecisionRecord, ReplaySummary, SettledTrade } from './types';

const RULE = '═'.repeat(56);

function money(value: number): string {
  return value < 0 ? `-$${Math.abs(value).toFixed(2)}` : `$${value.toFixed(2)}`;
}

function ratio(value: number): string {
  return Number.isFinite(value) ? value.toFixed(2) : '∞';
}

/** Win rate needed to break even at the given payout */
export function breakEvenWinRate(payoutRate: number): number {
  return (1 / (1 + payoutRate)) * 100;
}

export function formatSummary(summary: ReplaySummary, payoutRate: number): string {
  const modes = Object.entries(summary.modeDistribution)
    .map(([mode, count]) => `${mode} ${count}`)
    .join(', ');
  const blocked = Object.entries(summary.blockedBy)
    .filter(([, count]) => count > 0)
    .map(([reason, count]) => `${reason} ${count}`)
    .join(', ');
  const skips = Object.entries(summary.skipped).filter(([, count]) => count > 0);
  const notOpened = skips.reduce((sum, [, count]) => sum + count, 0);
  const skipped = skips.map(([reason, count]) => `${reason} ${count}`).join(', ');

  const lines = [
    RULE,
    '                    REPLAY SUMMARY',
    RULE,
    '',
    'DECISIONS',
    `   Cycles:           ${summary.cycles}`,
    `   RISE / FALL:      ${summary.signals.RISE} / ${summary.signals.FALL}`,
    `   Not opened:       ${notOpened}${skipped ? ` (${skipped})` : ''}`,
    `   NONE:             ${summary.signals.NONE}${blocked ? ` (${blocked})` : ''}`,
    `   Guard blocks:     ${summary.guardBlocks}`,
    `   Modes:            ${modes}`,
    '',
    'TRADES',
    `   Settled:          ${summary.trades} (unsettled ${summary.unsettled})`,
    `   Wins / Losses:    ${summary.wins} / ${summary.losses} (ties ${summary.ties})`,
    `   Win Rate:         ${summary.winRate.toFixed(2)}%`,
    `   Max Loss Streak:  ${summary.maxConsecutiveLosses}`,
    '',
    'PROFIT/LOSS',
    `   Gross Profit:     ${money(summary.grossProfit)}`,
    `   Gross Loss:       ${money(summary.grossLoss)}`,
    `   Net Profit:       ${money(summary.netProfit)}`,
    `   Profit Factor:    ${ratio(summary.profitFactor)}`,
    `   Expectancy:       ${money(summary.expectancy)}/trade`,
    `   Balance:          ${money(summary.initialBalance)} -> ${money(summary.finalBalance)}`,
    `   Max Drawdown:     ${money(summary.maxDrawdown)} (${summary.maxDrawdownPercent.toFixed(2)}%)`,
    `   Avg MAE / MFE:    ${summary.averageMae.toFixed(5)} / ${summary.averageMfe.toFixed(5)}`,
    '',
    `Halted: ${summary.haltReason}`,
    RULE,
  ];

  const breakEven = breakEvenWinRate(payoutRate);
  if (summary.trades === 0) {
    lines.push('NO SETTLED TRADES');
  } else if (summary.winRate >= breakEven) {
    lines.push(`WIN RATE >= ${breakEven.toFixed(2)}% BREAK-EVEN`);
  } else {
    lines.push(`WIN RATE ${summary.winRate.toFixed(2)}% < ${breakEven.toFixed(2)}% BREAK-EVEN`);
  }
  lines.push(RULE);

  return lines.join('\n');
}

export function decisionLine(record: DecisionRecord): string {
  const { signal, skipped, outcome, balance } = record;
  return JSON.stringify({
    time: signal.timestamp,
    side: signal.side,
    confidence: signal.confidence,
    rise: signal.riseConfidence,
    fall: signal.fallConfidence,
    agreement: signal.agreement,
    confirmations: {
      M1: signal.confirmations.M1,
      M5: signal.confirmations.M5,
      M15: signal.confirmations.M15,
    },
    mode: signal.mode,
    price: signal.price,
    blockedBy: signal.blockedBy ?? null,
    skipped,
    factors: signal.factors,
    outcome: outcome
      ? { id: outcome.id, result: outcome.result, pnl: outcome.pnl, exitPrice: outcome.exitPrice, exitTime: outcome.exitTime }
      : null,
    balance,
  });
}

/** One JSON object per evaluated cycle, newline terminated */
export function toDecisionLog(records: readonly DecisionRecord[]): string {
  return records.map((record) => `${decisionLine(record)}\n`).join('');
}

export const TRADE_CSV_HEADER =
  'id,side,entry_time,entry_price,exit_time,exit_price,result,pnl,confidence,mode,mae,mfe';

export function toTradeCsv(trades: readonly SettledTrade[]): string {
  const rows = trades.map((t) =>
    [
      t.id,
      t.side,
      new Date(t.entryTime).toISOString(),
      t.entryPrice,
      new Date(t.exitTime).toISOString(),
      t.exitPrice,
      t.result,
      t.pnl,
      t.confidence,
      t.mode,
      t.mae,
      t.mfe,
    ].join(','),
  );
  return [TRADE_CSV_HEADER, ...rows].join('\n') + '\n';
}
