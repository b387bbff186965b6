// ============================================================
// Signal Scorer
// ============================================================
// Scores RISE and FALL independently through the rule pipeline.
// Pure: the same inputs always give the same result.
// ============================================================

import type { Confirmations, MarketMode, SnapshotTriple, TradeSide } from '../../types';
import { SCORING_RULES, m15Bias } from './rules';
import type { RuleContext, ScorerConfig, ScoreResult, ScoringRule, SideScore } from './types';

export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

function clampScore(points: number): number {
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, points));
}

function noConfirmations(): Confirmations {
  return { M1: false, M5: false, M15: false };
}

function formatDelta(delta: number): string {
  return delta >= 0 ? `+${delta}` : `${delta}`;
}

export function scoreSide(
  ctx: RuleContext,
  rules: readonly ScoringRule[] = SCORING_RULES,
): SideScore {
  let points = 0;
  const confirmations = noConfirmations();
  const factors: string[] = [];

  for (const rule of rules) {
    const outcome = rule.evaluate(ctx, { points, confirmations });
    if (outcome === null) continue;

    if (outcome.kind === 'veto') {
      return {
        side: ctx.side,
        confidence: 0,
        agreement: 0,
        confirmations: noConfirmations(),
        factors: [`${rule.name}: vetoed, ${outcome.reason}`],
        vetoedBy: rule.name,
      };
    }

    // A non-finite contribution counts as nothing
    const delta = Number.isFinite(outcome.delta) ? outcome.delta : 0;
    points += delta;
    if (outcome.confirms) confirmations[outcome.confirms] = true;
    factors.push(
      delta === 0
        ? `${rule.name}: ${outcome.factor}`
        : `${rule.name}: ${outcome.factor} (${formatDelta(delta)})`,
    );
  }

  const agreement = Object.values(confirmations).filter(Boolean).length;
  return { side: ctx.side, confidence: clampScore(points), agreement, confirmations, factors };
}

/**
 * Score both sides for one cycle.
 * @param now decision time; only the session rule reads it
 */
export function score(
  mode: MarketMode,
  snapshots: SnapshotTriple,
  now: number,
  config: ScorerConfig,
  rules: readonly ScoringRule[] = SCORING_RULES,
): ScoreResult {
  const bias = m15Bias(snapshots.m15);
  const contextFor = (side: TradeSide): RuleContext => ({
    side,
    mode,
    bias,
    now,
    config,
    ...snapshots,
  });

  return {
    mode,
    bias,
    rise: scoreSide(contextFor('RISE'), rules),
    fall: scoreSide(contextFor('FALL'), rules),
  };
}

/** Highest score the positive rules can add up to, session bonus included */
export function maxAchievableScore(config: ScorerConfig): number {
  const p = config.scoring.points;
  return (
    p.m15Bias +
    Math.max(p.trendSetup, p.rangeSetup) +
    p.macd +
    p.stochCross +
    p.reversalPattern +
    p.confluence +
    p.adxRising +
    config.session.highLiquidityBonus
  );
}
