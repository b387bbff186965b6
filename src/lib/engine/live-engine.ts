// ============================================================
// Live Decision Engine
// ============================================================
// Event-driven front of the pipeline. Candle closes and trade
// outcomes arrive asynchronously; both are serialized through one
// queue so a settlement never races the next cycle.
// ============================================================

import { reportError } from '../errors';
import { loggers } from '../logger';
import type {
  Candle,
  IndicatorSnapshot,
  MarketMode,
  Timeframe,
  TradeOutcome,
  TradeSignal,
} from '../types';
import type { LossStreakState } from './loss-guard';
import { DecisionPipeline, type PipelineConfig } from './pipeline';
import { SerialQueue } from './serial-queue';

export type SignalListener = (signal: TradeSignal) => void;

export class LiveDecisionEngine {
  private readonly pipeline: DecisionPipeline;
  private readonly queue = new SerialQueue();
  private readonly listeners = new Set<SignalListener>();

  constructor(pipeline: DecisionPipeline) {
    this.pipeline = pipeline;
  }

  static create(config: PipelineConfig): LiveDecisionEngine {
    return new LiveDecisionEngine(new DecisionPipeline(config));
  }

  /** Events submitted and not yet processed */
  get pending(): number {
    return this.queue.pending;
  }

  get guardState(): LossStreakState {
    return this.pipeline.guard.state;
  }

  get mode(): MarketMode {
    return this.pipeline.mode;
  }

  /**
   * Feed a closed candle. Only M1 drives cycles; M5 and M15 are derived
   * from it, so higher-timeframe closes resolve to null.
   */
  onCandleClose(timeframe: Timeframe, candle: Candle): Promise<TradeSignal | null> {
    if (timeframe !== 'M1') {
      loggers.engine.debug(`Ignoring ${timeframe} close at ${candle.timestamp}; derived from M1`);
      return Promise.resolve(null);
    }
    return this.queue.run(() => {
      const signal = this.pipeline.onM1Close(candle);
      this.notify(signal);
      return signal;
    });
  }

  onTradeOutcome(outcome: TradeOutcome): Promise<boolean> {
    return this.queue.run(() => this.pipeline.recordOutcome(outcome));
  }

  /** Report a signal that was never placed (rejected order, no funds) */
  onTradeNotPlaced(): Promise<boolean> {
    return this.queue.run(() => this.pipeline.release());
  }

  warmup(candles: readonly Candle[]): Promise<void> {
    return this.queue.run(() => this.pipeline.warmup(candles));
  }

  /** Clear a hard stop or cooldown; queued behind pending events */
  resetGuard(): Promise<void> {
    return this.queue.run(() => this.pipeline.guard.reset());
  }

  latestSnapshot(timeframe: Timeframe): IndicatorSnapshot | null {
    return this.pipeline.latestSnapshot(timeframe);
  }

  subscribe(listener: SignalListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  idle(): Promise<void> {
    return this.queue.idle();
  }

  private notify(signal: TradeSignal): void {
    for (const listener of this.listeners) {
      try {
        listener(signal);
      } catch (error) {
        reportError(error, { module: 'lib/engine', function: 'LiveDecisionEngine.notify' });
      }
    }
  }
}
