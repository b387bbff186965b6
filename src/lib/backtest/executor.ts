// ============================================================
// Simulated Executor
// ============================================================
// Stands in for the broker during replay. A contract opens at the
// decision candle's close and settles at the close of the first
// M1 candle whose close time reaches entry + duration.
// ============================================================

import type { ExecutionConfig } from '../config';
import type { Candle, MarketMode, OutcomeResult, TradeOutcome, TradeSide, TradeSignal } from '../types';
import { TIMEFRAME_MS } from '../types';

export interface OpenContract {
  readonly id: number;
  readonly side: TradeSide;
  readonly stake: number;
  readonly entryPrice: number;
  readonly entryTime: number;
  readonly expiryTime: number;
  readonly confidence: number;
  readonly mode: MarketMode;
  /** Worst move against the position so far, in price units */
  maxAdverse: number;
  /** Best move in favour of the position so far, in price units */
  maxFavourable: number;
}

export interface SettledTrade {
  readonly id: number;
  readonly side: TradeSide;
  readonly stake: number;
  readonly entryPrice: number;
  readonly entryTime: number;
  readonly exitPrice: number;
  readonly exitTime: number;
  readonly result: OutcomeResult;
  readonly pnl: number;
  readonly confidence: number;
  readonly mode: MarketMode;
  readonly mae: number;
  readonly mfe: number;
}

export function resolveResult(side: TradeSide, entryPrice: number, exitPrice: number): OutcomeResult {
  if (exitPrice === entryPrice) return 'tie';
  const rose = exitPrice > entryPrice;
  return (side === 'RISE') === rose ? 'win' : 'loss';
}

export function toOutcome(trade: SettledTrade): TradeOutcome {
  return { result: trade.result, pnl: trade.pnl, timestamp: trade.exitTime };
}

export class SimulatedExecutor {
  private readonly config: ExecutionConfig;
  private readonly contracts: OpenContract[] = [];
  private nextId = 1;

  constructor(config: ExecutionConfig) {
    this.config = config;
  }

  get openContracts(): readonly OpenContract[] {
    return this.contracts;
  }

  /** Number of contracts opened so far */
  get opened(): number {
    return this.nextId - 1;
  }

  /**
   * Open a contract for a RISE or FALL signal. The signal's price and
   * timestamp are the decision candle's close and close time.
   */
  open(signal: TradeSignal): OpenContract | null {
    if (signal.side === 'NONE') return null;

    const contract: OpenContract = {
      id: this.nextId++,
      side: signal.side,
      stake: this.config.stake,
      entryPrice: signal.price,
      entryTime: signal.timestamp,
      expiryTime: signal.timestamp + this.config.contractDurationMs,
      confidence: signal.confidence,
      mode: signal.mode,
      maxAdverse: 0,
      maxFavourable: 0,
    };
    this.contracts.push(contract);
    return contract;
  }

  /**
   * Feed the next M1 candle: update excursions of every open contract,
   * then settle the ones that expire within it, oldest first.
   */
  observe(candle: Candle): SettledTrade[] {
    const closeTime = candle.timestamp + TIMEFRAME_MS.M1;
    const settled: SettledTrade[] = [];

    for (const contract of this.contracts) {
      const up = candle.high - contract.entryPrice;
      const down = contract.entryPrice - candle.low;
      const favourable = contract.side === 'RISE' ? up : down;
      const adverse = contract.side === 'RISE' ? down : up;
      contract.maxFavourable = Math.max(contract.maxFavourable, favourable);
      contract.maxAdverse = Math.max(contract.maxAdverse, adverse);
    }

    while (this.contracts.length > 0 && this.contracts[0].expiryTime <= closeTime) {
      const contract = this.contracts[0];
      this.contracts.shift();
      settled.push(this.settle(contract, candle.close, closeTime));
    }
    return settled;
  }

  private settle(contract: OpenContract, exitPrice: number, exitTime: number): SettledTrade {
    const result = resolveResult(contract.side, contract.entryPrice, exitPrice);
    const pnl =
      result === 'win' ? contract.stake * this.config.payoutRate : result === 'loss' ? -contract.stake : 0;

    return Object.freeze({
      id: contract.id,
      side: contract.side,
      stake: contract.stake,
      entryPrice: contract.entryPrice,
      entryTime: contract.entryTime,
      exitPrice,
      exitTime,
      result,
      pnl,
      confidence: contract.confidence,
      mode: contract.mode,
      mae: contract.maxAdverse,
      mfe: contract.maxFavourable,
    });
  }
}
