// ============================================================
// Decision Selector
// ============================================================
// Picks the strictly stronger side if it clears both minimums.
// Stateless; mode lives upstream and the loss guard downstream.
// ============================================================

import type { MarketMode, NoTradeReason, Side, TradeSignal } from '../types';
import type { ScoreResult, SideScore } from './scoring';

export interface SelectionThresholds {
  minConfidence: number;
  minAgreement: number;
}

export interface SignalContext {
  mode: MarketMode;
  /** Close of the decision candle */
  price: number;
  timestamp: number;
}

export interface Selection {
  side: Side;
  blockedBy?: NoTradeReason;
}

export function selectSide(
  riseConfidence: number,
  fallConfidence: number,
  riseAgreement: number,
  fallAgreement: number,
  thresholds: SelectionThresholds,
): Selection {
  if (riseConfidence === fallConfidence) {
    return { side: 'NONE', blockedBy: 'tie' };
  }

  const rise = riseConfidence > fallConfidence;
  const confidence = rise ? riseConfidence : fallConfidence;
  const agreement = rise ? riseAgreement : fallAgreement;

  if (confidence < thresholds.minConfidence) {
    return { side: 'NONE', blockedBy: 'below-confidence' };
  }
  if (agreement < thresholds.minAgreement) {
    return { side: 'NONE', blockedBy: 'below-agreement' };
  }
  return { side: rise ? 'RISE' : 'FALL' };
}

function prefixed(score: SideScore): string[] {
  return score.factors.map((f) => `${score.side} ${f}`);
}

/** Turn a cycle's scores into its TradeSignal */
export function select(
  scores: ScoreResult,
  thresholds: SelectionThresholds,
  context: SignalContext,
): TradeSignal {
  const { rise, fall } = scores;
  const selection = selectSide(rise.confidence, fall.confidence, rise.agreement, fall.agreement, thresholds);

  if (selection.side === 'NONE') {
    const none: TradeSignal = {
      side: 'NONE',
      confidence: 0,
      riseConfidence: rise.confidence,
      fallConfidence: fall.confidence,
      agreement: 0,
      factors: Object.freeze([...prefixed(rise), ...prefixed(fall)]),
      confirmations: Object.freeze({ M1: false, M5: false, M15: false }),
      mode: context.mode,
      price: context.price,
      timestamp: context.timestamp,
      blockedBy: selection.blockedBy,
    };
    return Object.freeze(none);
  }

  const chosen = selection.side === 'RISE' ? rise : fall;
  const signal: TradeSignal = {
    side: selection.side,
    confidence: chosen.confidence,
    riseConfidence: rise.confidence,
    fallConfidence: fall.confidence,
    agreement: chosen.agreement,
    factors: Object.freeze(prefixed(chosen)),
    confirmations: Object.freeze({ ...chosen.confirmations }),
    mode: context.mode,
    price: context.price,
    timestamp: context.timestamp,
  };
  return Object.freeze(signal);
}

/** NONE signal for a cycle that could not be scored */
export function noTradeSignal(reason: NoTradeReason, context: SignalContext): TradeSignal {
  const signal: TradeSignal = {
    side: 'NONE',
    confidence: 0,
    riseConfidence: 0,
    fallConfidence: 0,
    agreement: 0,
    factors: Object.freeze([]),
    confirmations: Object.freeze({ M1: false, M5: false, M15: false }),
    mode: context.mode,
    price: context.price,
    timestamp: context.timestamp,
    blockedBy: reason,
  };
  return Object.freeze(signal);
}
