// ============================================================
// Replay Harness
// ============================================================
// Drives the live decision pipeline over recorded M1 candles,
// strictly in timestamp order. Each cycle:
//   1. settle contracts that expire in this candle
//      (outcomes reach the guard before the decision)
//   2. run the pipeline on the candle
//   3. open a contract for a RISE/FALL signal unless a trade
//      limit skips it; a skipped signal releases its guard slot
// Same candles + same config = same decision log.
// ============================================================

import type { EngineConfig } from '../config';
import { LossStreakGuard } from '../engine/loss-guard';
import { DecisionPipeline } from '../engine/pipeline';
import { ErrorCode, Errors } from '../errors';
import { loggers } from '../logger';
import type { Candle } from '../types';
import { TIMEFRAME_MS } from '../types';
import { validateCandleSequence } from './candle-utils';
import { SimulatedExecutor, toOutcome } from './executor';
import { summarizeReplay } from './statistics';
import { TradeLimits } from './trade-limits';
import type { DecisionRecord, HaltReason, ReplayResult, SettledTrade, SkipReason } from './types';

export type ReplayConfig = Pick<
  EngineConfig,
  'indicators' | 'mode' | 'scoring' | 'session' | 'guard' | 'execution' | 'replay' | 'limits'
>;

export class ReplayHarness {
  private readonly config: ReplayConfig;

  constructor(config: ReplayConfig) {
    this.config = config;
  }

  /**
   * Replay a full candle sequence with fresh mode and guard state.
   * Throws a REPLAY_* EngineError when the sequence is empty, unordered,
   * duplicated, misaligned or holds an invalid candle.
   */
  run(candles: readonly Candle[]): ReplayResult {
    if (candles.length === 0) {
      throw Errors.replay(ErrorCode.REPLAY_NO_DATA, 'No candles to replay', undefined, 'ReplayHarness.run');
    }
    validateCandleSequence(candles);

    const { execution, replay, limits } = this.config;
    const pipeline = new DecisionPipeline(this.config, { guard: new LossStreakGuard(this.config.guard) });
    const executor = new SimulatedExecutor(execution);
    const tradeLimits = new TradeLimits({ limits, pacing: replay, initialBalance: execution.initialBalance });
    const records: DecisionRecord[] = [];
    const trades: SettledTrade[] = [];
    const openedBy = new Map<number, DecisionRecord>();

    let balance = execution.initialBalance;
    let stopReason: HaltReason | null = null;
    let haltReason: HaltReason = 'end-of-data';

    loggers.replay.start(
      `Replaying ${candles.length} candles from ${new Date(candles[0].timestamp).toISOString()}`,
    );

    for (const candle of candles) {
      const now = candle.timestamp + TIMEFRAME_MS.M1;
      tradeLimits.startCycle(now);

      for (const trade of executor.observe(candle)) {
        balance += trade.pnl;
        trades.push(trade);
        tradeLimits.onSettled(trade);
        pipeline.recordOutcome(toOutcome(trade));

        const record = openedBy.get(trade.id);
        if (record) {
          record.outcome = trade;
          openedBy.delete(trade.id);
        }
        loggers.replay.trade(`#${trade.id} ${trade.side} ${trade.result} ${trade.pnl} -> ${balance}`);
      }

      if (stopReason === null && balance < execution.stake) {
        stopReason = 'insufficient-balance';
        loggers.replay.info(`Balance ${balance} below stake ${execution.stake}, no new trades`);
      }
      if (stopReason === null && tradeLimits.sessionLossReached()) {
        stopReason = 'session-loss';
        loggers.replay.info(`Session loss reached ${limits.maxSessionLoss}, no new trades`);
      }

      if (stopReason !== null) {
        if (executor.openContracts.length === 0) {
          haltReason = stopReason;
          break;
        }
        continue;
      }

      const signal = pipeline.onM1Close(candle);
      let skipped: SkipReason | null = null;
      if (signal.side !== 'NONE') {
        skipped = tradeLimits.skipReason(now, executor.openContracts.length);
        if (skipped !== null) {
          pipeline.release();
          loggers.replay.debug(`${signal.side} at ${new Date(now).toISOString()} not opened: ${skipped}`);
        }
      }
      const record: DecisionRecord = { signal, skipped, outcome: null, balance };
      records.push(record);
      if (skipped !== null) continue;

      const contract = executor.open(signal);
      if (contract) {
        tradeLimits.onOpened(contract);
        openedBy.set(contract.id, record);
        if (replay.maxTrades > 0 && executor.opened >= replay.maxTrades) {
          stopReason = 'max-trades';
          loggers.replay.info(`Reached ${replay.maxTrades} trades, settling open contracts`);
        }
      }
    }

    const unsettled = [...executor.openContracts];
    if (unsettled.length > 0) {
      loggers.replay.warn(`${unsettled.length} contract(s) unsettled at end of data`);
    }

    const summary = summarizeReplay({
      records,
      trades,
      initialBalance: execution.initialBalance,
      unsettled: unsettled.length,
      haltReason,
    });
    loggers.replay.stop(
      `Halted (${haltReason}) after ${records.length} cycles: ${summary.trades} trades, ` +
        `win rate ${summary.winRate.toFixed(1)}%, balance ${summary.finalBalance}`,
    );

    return { records, trades, unsettled, haltReason, summary };
  }
}

export function runReplay(config: ReplayConfig, candles: readonly Candle[]): ReplayResult {
  return new ReplayHarness(config).run(candles);
}
