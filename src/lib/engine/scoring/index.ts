export * from './types';
export { score, scoreSide, maxAchievableScore, MIN_SCORE, MAX_SCORE } from './scorer';
export { SCORING_RULES, m15Bias } from './rules';
export { DEFAULT_COUNTER_TREND_TIERS, findPassingTier, passesTier } from './counter-trend';
export { sessionAdjustment } from './session';
export type { SessionAdjustment } from './session';
export { DEFAULT_SCORING_CONFIG, DEFAULT_SESSION_CONFIG, DEFAULT_SCORER_CONFIG } from './defaults';
