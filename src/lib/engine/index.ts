export { classify, advanceMode, INITIAL_MODE_STATE, DEFAULT_MODE_THRESHOLDS } from './market-mode';
export type { ModeState, ModeThresholds } from './market-mode';
export * from './scoring';
export { select, selectSide, noTradeSignal } from './selector';
export type { Selection, SelectionThresholds, SignalContext } from './selector';
export { LossStreakGuard, DEFAULT_LOSS_GUARD_CONFIG, INITIAL_GUARD_STATE } from './loss-guard';
export type { GuardStatus, LossGuardConfig, LossStreakState } from './loss-guard';
export { SerialQueue } from './serial-queue';
export { DecisionPipeline } from './pipeline';
export type { PipelineConfig, PipelineOptions } from './pipeline';
export { LiveDecisionEngine } from './live-engine';
export type { SignalListener } from './live-engine';
