import { describe, it, expect } from 'vitest';
import { calculateDrawdown, maxConsecutiveLosses, summarizeReplay } from './statistics';
import type { DecisionRecord, SettledTrade, SkipReason } from './types';
import type { MarketMode, NoTradeReason, OutcomeResult, Side, TradeSignal } from '../types';

const T0 = Date.UTC(2024, 0, 2, 16, 0);

function trade(id: number, result: OutcomeResult, pnl: number, mae = 0, mfe = 0): SettledTrade {
  return {
    id,
    side: 'RISE',
    stake: 10,
    entryPrice: 100,
    entryTime: T0 + id * 180_000,
    exitPrice: 100,
    exitTime: T0 + (id + 1) * 180_000,
    result,
    pnl,
    confidence: 60,
    mode: 'TRENDING_UP',
    mae,
    mfe,
  };
}

function record(
  side: Side,
  mode: MarketMode,
  blockedBy?: NoTradeReason,
  skipped: SkipReason | null = null,
): DecisionRecord {
  const signal: TradeSignal = {
    side,
    confidence: 0,
    riseConfidence: 0,
    fallConfidence: 0,
    agreement: 0,
    factors: [],
    confirmations: { M1: false, M5: false, M15: false },
    mode,
    price: 100,
    timestamp: T0,
    ...(blockedBy ? { blockedBy } : {}),
  };
  return { signal, skipped, outcome: null, balance: 100 };
}

const TRADES = [
  trade(1, 'win', 9, 1, 2),
  trade(2, 'loss', -10, 2, 0),
  trade(3, 'loss', -10, 3, 0),
  trade(4, 'tie', 0),
  trade(5, 'loss', -10),
  trade(6, 'win', 9, 0, 4),
];

describe('maxConsecutiveLosses', () => {
  it('lets a tie sit inside a losing run', () => {
    expect(maxConsecutiveLosses(TRADES)).toBe(3);
  });

  it('is 0 without losses', () => {
    expect(maxConsecutiveLosses([trade(1, 'win', 9)])).toBe(0);
  });
});

describe('calculateDrawdown', () => {
  it('measures the deepest fall from a running peak', () => {
    const { maxDrawdown, maxDrawdownPercent } = calculateDrawdown(TRADES, 100);
    expect(maxDrawdown).toBe(30);
    expect(maxDrawdownPercent).toBeCloseTo((30 / 109) * 100, 6);
  });
});

describe('summarizeReplay', () => {
  it('combines decision counts and trade performance', () => {
    const records = [
      record('RISE', 'TRENDING_UP'),
      record('NONE', 'RANGING', 'cooldown'),
      record('NONE', 'RANGING', 'tie'),
      record('FALL', 'UNCERTAIN', undefined, 'open-contract'),
    ];
    const summary = summarizeReplay({
      records,
      trades: TRADES,
      initialBalance: 100,
      unsettled: 1,
      haltReason: 'max-trades',
    });

    expect(summary).toMatchObject({
      cycles: 4,
      signals: { RISE: 1, FALL: 1, NONE: 2 },
      guardBlocks: 1,
      trades: 6,
      wins: 2,
      losses: 3,
      ties: 1,
      maxConsecutiveLosses: 3,
      grossProfit: 18,
      grossLoss: 30,
      netProfit: -12,
      initialBalance: 100,
      finalBalance: 88,
      maxDrawdown: 30,
      expectancy: -2,
      averageMae: 1,
      averageMfe: 1,
      modeDistribution: { TRENDING_UP: 1, TRENDING_DOWN: 0, RANGING: 2, UNCERTAIN: 1 },
      unsettled: 1,
      haltReason: 'max-trades',
    });
    expect(summary.blockedBy.cooldown).toBe(1);
    expect(summary.blockedBy.tie).toBe(1);
    expect(summary.skipped).toEqual({
      'daily-trades': 0,
      'daily-loss': 0,
      'profit-target': 0,
      'open-contract': 1,
      'min-interval': 0,
    });
    expect(summary.winRate).toBeCloseTo(33.333, 3);
    expect(summary.profitFactor).toBeCloseTo(0.6, 10);
  });

  it('reports an infinite profit factor when nothing lost', () => {
    const summary = summarizeReplay({
      records: [],
      trades: [trade(1, 'win', 9)],
      initialBalance: 100,
      unsettled: 0,
      haltReason: 'end-of-data',
    });
    expect(summary.profitFactor).toBe(Infinity);
    expect(summary.winRate).toBe(100);
  });

  it('is all zeros without trades', () => {
    const summary = summarizeReplay({
      records: [],
      trades: [],
      initialBalance: 100,
      unsettled: 0,
      haltReason: 'end-of-data',
    });
    expect(summary).toMatchObject({
      cycles: 0,
      trades: 0,
      winRate: 0,
      profitFactor: 0,
      expectancy: 0,
      averageMae: 0,
      finalBalance: 100,
      maxDrawdown: 0,
    });
  });
});
