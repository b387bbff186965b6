// ============================================================
// Decision Pipeline
// ============================================================
// One evaluation cycle per closed M1 candle:
//   aggregate -> refresh M5/M15 snapshots on their closes
//   (classify mode on each new M5) -> M1 snapshot -> score
//   -> select -> guard -> frozen TradeSignal
// Mode and guard state are owned here and passed explicitly;
// live and replay drive the same class.
// ============================================================

import { isValidCandle } from '../backtest/candle-utils';
import { TimeframeAggregator, type HigherTimeframe } from '../backtest/timeframe-aggregator';
import { ErrorCode, Errors } from '../errors';
import { buildSnapshot, type SnapshotConfig } from '../indicators/snapshot';
import { loggers } from '../logger';
import type {
  Candle,
  IndicatorSnapshot,
  MarketMode,
  Timeframe,
  TradeOutcome,
  TradeSignal,
} from '../types';
import { TIMEFRAME_MS } from '../types';
import { LossStreakGuard, type LossGuardConfig } from './loss-guard';
import { advanceMode, INITIAL_MODE_STATE, type ModeState, type ModeThresholds } from './market-mode';
import { score, type ScoringConfig, type SessionConfig } from './scoring';
import { noTradeSignal, select } from './selector';

export interface PipelineConfig {
  indicators: SnapshotConfig;
  mode: ModeThresholds;
  scoring: ScoringConfig;
  session: SessionConfig;
  guard: LossGuardConfig;
}

export interface PipelineOptions {
  guard?: LossStreakGuard;
  modeState?: ModeState;
}

const HIGHER_TIMEFRAMES: readonly HigherTimeframe[] = ['M5', 'M15'];

export class DecisionPipeline {
  readonly guard: LossStreakGuard;
  private readonly config: PipelineConfig;
  private readonly histories: Record<Timeframe, Candle[]> = { M1: [], M5: [], M15: [] };
  private readonly snapshots: Record<Timeframe, IndicatorSnapshot | null> = {
    M1: null,
    M5: null,
    M15: null,
  };
  private readonly aggregators: Record<HigherTimeframe, TimeframeAggregator> = {
    M5: new TimeframeAggregator('M5'),
    M15: new TimeframeAggregator('M15'),
  };
  private modeState: ModeState;
  private lastTimestamp: number | null = null;
  private m1Stale = true;

  constructor(config: PipelineConfig, options: PipelineOptions = {}) {
    this.config = config;
    this.guard = options.guard ?? new LossStreakGuard(config.guard);
    this.modeState = options.modeState ?? INITIAL_MODE_STATE;
  }

  get mode(): MarketMode {
    return this.modeState.mode;
  }

  get currentModeState(): ModeState {
    return this.modeState;
  }

  /** Most recent snapshot for a timeframe, null while history is short */
  latestSnapshot(timeframe: Timeframe): IndicatorSnapshot | null {
    if (timeframe === 'M1' && this.m1Stale) {
      this.snapshots.M1 = buildSnapshot('M1', this.histories.M1, this.config.indicators);
      this.m1Stale = false;
    }
    return this.snapshots[timeframe];
  }

  /** Ingest history without evaluating */
  warmup(candles: readonly Candle[]): void {
    for (const candle of candles) {
      this.ingest(candle);
    }
    loggers.engine.debug(`Warmed up with ${candles.length} candles, mode ${this.mode}`);
  }

  /** Run one decision cycle for a closed M1 candle */
  onM1Close(candle: Candle): TradeSignal {
    this.ingest(candle);

    const now = candle.timestamp + TIMEFRAME_MS.M1;
    const context = { mode: this.mode, price: candle.close, timestamp: now };
    const m1 = this.latestSnapshot('M1');
    const m5 = this.snapshots.M5;
    const m15 = this.snapshots.M15;

    let signal: TradeSignal;
    if (m1 === null || m5 === null || m15 === null) {
      loggers.engine.debug(`Skipping cycle at ${new Date(now).toISOString()}: insufficient history`);
      signal = noTradeSignal('insufficient-data', context);
    } else {
      const { scoring, session } = this.config;
      signal = select(score(this.mode, { m1, m5, m15 }, now, { scoring, session }), scoring, context);
    }

    const gated = this.guard.gate(signal, now);
    if (gated.side !== 'NONE') {
      loggers.engine.signal(
        `${gated.side} ${gated.confidence} (${gated.agreement}/3) in ${gated.mode} @ ${gated.price}`,
      );
    }
    return gated;
  }

  recordOutcome(outcome: TradeOutcome): boolean {
    return this.guard.recordOutcome(outcome);
  }

  /** A passed decision was not placed; its outcome will never arrive */
  release(): boolean {
    return this.guard.release();
  }

  private ingest(candle: Candle): void {
    if (!isValidCandle(candle)) {
      throw Errors.replay(
        ErrorCode.REPLAY_INVALID_CANDLE,
        `Invalid candle at ${candle.timestamp}`,
        { candle },
        'DecisionPipeline.ingest',
      );
    }
    if (this.lastTimestamp !== null && candle.timestamp <= this.lastTimestamp) {
      const code =
        candle.timestamp === this.lastTimestamp
          ? ErrorCode.REPLAY_DUPLICATE_TIMESTAMP
          : ErrorCode.REPLAY_NON_MONOTONIC;
      throw Errors.replay(
        code,
        `Candle ${candle.timestamp} is not after ${this.lastTimestamp}`,
        { timestamp: candle.timestamp, previous: this.lastTimestamp },
        'DecisionPipeline.ingest',
      );
    }
    this.lastTimestamp = candle.timestamp;

    this.append('M1', candle);
    this.m1Stale = true;

    for (const timeframe of HIGHER_TIMEFRAMES) {
      for (const closed of this.aggregators[timeframe].push(candle)) {
        this.append(timeframe, closed);
        const snapshot = buildSnapshot(timeframe, this.histories[timeframe], this.config.indicators);
        this.snapshots[timeframe] = snapshot;
        if (timeframe === 'M5' && snapshot !== null) {
          this.modeState = advanceMode(this.modeState, snapshot, this.config.mode);
        }
      }
    }
  }

  private append(timeframe: Timeframe, candle: Candle): void {
    const history = this.histories[timeframe];
    history.push(candle);
    if (history.length > this.config.indicators.historyWindow) {
      history.shift();
    }
  }
}
