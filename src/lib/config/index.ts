// ============================================================
// EngineConfig - unified configuration
// ============================================================
// One config object composed of per-module sections.
// Layers, later wins: defaults <- JSON file <- env <- overrides.
// Validated once at startup; the engine never runs on a config
// with an inconsistent hysteresis band.
// ============================================================

import { readFileSync } from 'node:fs'
import { ErrorCode, Errors, EngineError, Result } from '../errors'
import { minimumCandles, type SnapshotConfig } from '../indicators/snapshot'
import { isLogLevel, loggers, type LogLevel } from '../logger'
import { DEFAULT_LOSS_GUARD_CONFIG, type LossGuardConfig } from '../engine/loss-guard'
import { DEFAULT_MODE_THRESHOLDS, type ModeThresholds } from '../engine/market-mode'
import {
  DEFAULT_SCORING_CONFIG,
  DEFAULT_SESSION_CONFIG,
  maxAchievableScore,
  type ClockWindow,
  type CounterTrendTier,
  type RangeSetupThresholds,
  type ScoringConfig,
  type ScoringPoints,
  type SessionConfig,
  type TrendSetupThresholds,
} from '../engine/scoring'
import { parseClock } from '../utils/time'

export type IndicatorConfig = SnapshotConfig

export interface ExecutionConfig {
  contractDurationMs: number
  /** Profit per unit stake on a win */
  payoutRate: number
  stake: number
  initialBalance: number
}

export interface ReplayConfig {
  /** Stop opening contracts after this many; 0 = unlimited */
  maxTrades: number
  /** Contracts allowed open at once */
  maxOpenContracts: number
  /** Minimum time between two entries */
  minTradeIntervalMs: number
}

/** Account limits applied before a contract is opened. 0 turns a limit off. */
export interface RiskLimitsConfig {
  /** Contracts opened per UTC day */
  maxDailyTrades: number
  /** Day's realised loss as a percentage of the initial balance */
  maxDailyLossPercent: number
  /** Day's realised profit at which no more contracts are opened that day */
  dailyProfitTarget: number
  /** Realised loss over the whole run that halts it */
  maxSessionLoss: number
}

export interface LoggingConfig {
  level: LogLevel
}

export interface EngineConfig {
  mode: ModeThresholds
  indicators: IndicatorConfig
  scoring: ScoringConfig
  session: SessionConfig
  guard: LossGuardConfig
  execution: ExecutionConfig
  replay: ReplayConfig
  limits: RiskLimitsConfig
  logging: LoggingConfig
}

export interface EngineConfigOverrides {
  mode?: Partial<ModeThresholds>
  indicators?: Partial<IndicatorConfig>
  scoring?: Partial<Omit<ScoringConfig, 'points' | 'trend' | 'range'>> & {
    points?: Partial<ScoringPoints>
    trend?: Partial<TrendSetupThresholds>
    range?: Partial<RangeSetupThresholds>
  }
  session?: Partial<SessionConfig>
  guard?: Partial<LossGuardConfig>
  execution?: Partial<ExecutionConfig>
  replay?: Partial<ReplayConfig>
  limits?: Partial<RiskLimitsConfig>
  logging?: Partial<LoggingConfig>
}

// ============================================================
// Defaults
// ============================================================

export const DEFAULT_INDICATOR_CONFIG: IndicatorConfig = {
  bbPeriod: 20,
  bbStdDev: 2,
  rsiPeriod: 14,
  stochKPeriod: 14,
  stochDPeriod: 3,
  adxPeriod: 14,
  adxSlopeLookback: 3,
  emaFastPeriod: 50,
  emaSlowPeriod: 200,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
  divergenceLookback: 14,
  divergenceBullishMaxRsi: 40,
  divergenceBearishMinRsi: 60,
  rsiOversold: 30,
  rsiOverbought: 70,
  stochOversold: 20,
  stochOverbought: 80,
  historyWindow: 250,
}

export const DEFAULT_EXECUTION_CONFIG: ExecutionConfig = {
  contractDurationMs: 180_000,
  payoutRate: 0.95,
  stake: 10,
  initialBalance: 1000,
}

export const DEFAULT_REPLAY_CONFIG: ReplayConfig = {
  maxTrades: 0,
  maxOpenContracts: 1,
  minTradeIntervalMs: 0,
}

export const DEFAULT_RISK_LIMITS: RiskLimitsConfig = {
  maxDailyTrades: 0,
  maxDailyLossPercent: 0,
  dailyProfitTarget: 0,
  maxSessionLoss: 0,
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  mode: DEFAULT_MODE_THRESHOLDS,
  indicators: DEFAULT_INDICATOR_CONFIG,
  scoring: DEFAULT_SCORING_CONFIG,
  session: DEFAULT_SESSION_CONFIG,
  guard: DEFAULT_LOSS_GUARD_CONFIG,
  execution: DEFAULT_EXECUTION_CONFIG,
  replay: DEFAULT_REPLAY_CONFIG,
  limits: DEFAULT_RISK_LIMITS,
  logging: { level: 'info' },
}

// ============================================================
// Merge
// ============================================================

export function mergeEngineConfig(base: EngineConfig, overrides: EngineConfigOverrides = {}): EngineConfig {
  const scoring: NonNullable<EngineConfigOverrides['scoring']> = overrides.scoring ?? {}
  return {
    mode: { ...base.mode, ...overrides.mode },
    indicators: { ...base.indicators, ...overrides.indicators },
    scoring: {
      ...base.scoring,
      ...scoring,
      points: { ...base.scoring.points, ...scoring.points },
      trend: { ...base.scoring.trend, ...scoring.trend },
      range: { ...base.scoring.range, ...scoring.range },
      counterTrendTiers: (scoring.counterTrendTiers ?? base.scoring.counterTrendTiers).map((t) => ({ ...t })),
    },
    session: {
      ...base.session,
      ...overrides.session,
      highLiquidity: [...(overrides.session?.highLiquidity ?? base.session.highLiquidity)],
      offPeak: [...(overrides.session?.offPeak ?? base.session.offPeak)],
      avoid: [...(overrides.session?.avoid ?? base.session.avoid)],
    },
    guard: { ...base.guard, ...overrides.guard },
    execution: { ...base.execution, ...overrides.execution },
    replay: { ...base.replay, ...overrides.replay },
    limits: { ...base.limits, ...overrides.limits },
    logging: { ...base.logging, ...overrides.logging },
  }
}

// ============================================================
// Validation
// ============================================================

function isPositiveInt(value: number): boolean {
  return Number.isInteger(value) && value > 0
}

function inRange(value: number, min: number, max: number): boolean {
  return Number.isFinite(value) && value >= min && value <= max
}

function checkWindows(name: string, windows: readonly ClockWindow[], violations: string[]): void {
  windows.forEach((w, i) => {
    if (parseClock(w.start) === null || parseClock(w.end) === null) {
      violations.push(`session.${name}[${i}] must be "HH:MM"-"HH:MM", got "${w.start}"-"${w.end}"`)
    }
  })
}

function checkTiers(tiers: readonly CounterTrendTier[], violations: string[]): void {
  tiers.forEach((tier, i) => {
    if (!inRange(tier.maxRsi, 0, 50)) {
      violations.push(`scoring.counterTrendTiers[${i}].maxRsi must be in [0, 50]`)
    }
    if (!inRange(tier.maxPercentB, 0, 0.5)) {
      violations.push(`scoring.counterTrendTiers[${i}].maxPercentB must be in [0, 0.5]`)
    }
    const previous = tiers[i - 1]
    if (previous && (tier.maxRsi < previous.maxRsi || tier.maxPercentB < previous.maxPercentB)) {
      violations.push(`scoring.counterTrendTiers[${i}] must be no stricter than the tier before it`)
    }
  })
}

/** Every rule the config breaks, in section order */
export function collectViolations(config: EngineConfig): string[] {
  const v: string[] = []
  const { mode, indicators, scoring, session, guard, execution } = config

  if (!(mode.rangeEntryAdx > 0 && mode.rangeEntryAdx < mode.trendEntryAdx && mode.trendEntryAdx <= 100)) {
    v.push(
      `mode: need 0 < rangeEntryAdx < trendEntryAdx <= 100, got ${mode.rangeEntryAdx} / ${mode.trendEntryAdx}`
    )
  }

  const periods = [
    'bbPeriod', 'rsiPeriod', 'stochKPeriod', 'stochDPeriod', 'adxPeriod', 'adxSlopeLookback',
    'emaFastPeriod', 'emaSlowPeriod', 'macdFast', 'macdSlow', 'macdSignal', 'divergenceLookback',
    'historyWindow',
  ] as const satisfies readonly (keyof IndicatorConfig)[]
  const badPeriods = periods.filter((key) => !isPositiveInt(indicators[key]))
  for (const key of badPeriods) {
    v.push(`indicators.${key} must be a positive integer`)
  }
  if (!(indicators.bbStdDev > 0)) v.push('indicators.bbStdDev must be > 0')
  if (indicators.macdFast >= indicators.macdSlow) v.push('indicators.macdFast must be < macdSlow')
  if (!(indicators.rsiOversold < indicators.rsiOverbought)) {
    v.push('indicators.rsiOversold must be < rsiOverbought')
  }
  if (!(indicators.stochOversold < indicators.stochOverbought)) {
    v.push('indicators.stochOversold must be < stochOverbought')
  }
  if (badPeriods.length === 0 && indicators.historyWindow < minimumCandles(indicators)) {
    v.push(`indicators.historyWindow must be at least ${minimumCandles(indicators)}`)
  }

  if (!inRange(scoring.minConfidence, 0, 100)) v.push('scoring.minConfidence must be in [0, 100]')
  if (!(Number.isInteger(scoring.minAgreement) && inRange(scoring.minAgreement, 1, 3))) {
    v.push('scoring.minAgreement must be an integer in [1, 3]')
  }
  for (const [key, value] of Object.entries(scoring.points)) {
    if (!(Number.isFinite(value) && value >= 0)) v.push(`scoring.points.${key} must be >= 0`)
  }
  const { trend, range } = scoring
  if (!inRange(trend.pullbackPercentB, 0, 0.5)) v.push('scoring.trend.pullbackPercentB must be in [0, 0.5]')
  if (!(trend.rsiFloor >= 0 && trend.rsiFloor < trend.rsiExtended && trend.rsiExtended <= 100)) {
    v.push('scoring.trend: need 0 <= rsiFloor < rsiExtended <= 100')
  }
  if (!inRange(range.extremePercentB, 0, 0.5)) v.push('scoring.range.extremePercentB must be in [0, 0.5]')
  if (!(range.rsiOversold < range.rsiOverbought)) v.push('scoring.range.rsiOversold must be < rsiOverbought')
  if (!inRange(scoring.stochMidline, 0, 100)) v.push('scoring.stochMidline must be in [0, 100]')
  if (!(scoring.adxSlopeThreshold >= 0)) v.push('scoring.adxSlopeThreshold must be >= 0')
  checkTiers(scoring.counterTrendTiers, v)

  if (!(Number.isInteger(session.utcOffsetMinutes) && inRange(session.utcOffsetMinutes, -720, 840))) {
    v.push('session.utcOffsetMinutes must be an integer in [-720, 840]')
  }
  checkWindows('highLiquidity', session.highLiquidity, v)
  checkWindows('offPeak', session.offPeak, v)
  checkWindows('avoid', session.avoid, v)
  if (!(session.highLiquidityBonus >= 0)) v.push('session.highLiquidityBonus must be >= 0')
  if (!(session.offPeakPenalty >= 0)) v.push('session.offPeakPenalty must be >= 0')
  const ceiling = maxAchievableScore({ scoring, session })
  if (!(session.avoidPenalty >= ceiling)) {
    v.push(`session.avoidPenalty must be >= ${ceiling}, the highest score the rules can add up to`)
  }

  if (!isPositiveInt(guard.maxConsecutiveLosses)) v.push('guard.maxConsecutiveLosses must be a positive integer')
  if (!(Number.isFinite(guard.cooldownMs) && guard.cooldownMs >= 0)) {
    v.push('guard.cooldownMs must be >= 0 (0 = hard stop)')
  }

  if (!(isPositiveInt(execution.contractDurationMs) && execution.contractDurationMs % 60_000 === 0)) {
    v.push('execution.contractDurationMs must be a positive multiple of 60000')
  }
  if (!(execution.payoutRate > 0 && execution.payoutRate <= 2)) v.push('execution.payoutRate must be in (0, 2]')
  if (!(execution.stake > 0)) v.push('execution.stake must be > 0')
  if (!(execution.initialBalance > 0)) v.push('execution.initialBalance must be > 0')

  const { replay, limits } = config
  if (!(Number.isInteger(replay.maxTrades) && replay.maxTrades >= 0)) {
    v.push('replay.maxTrades must be an integer >= 0')
  }
  if (!isPositiveInt(replay.maxOpenContracts)) v.push('replay.maxOpenContracts must be a positive integer')
  if (!(Number.isFinite(replay.minTradeIntervalMs) && replay.minTradeIntervalMs >= 0)) {
    v.push('replay.minTradeIntervalMs must be >= 0')
  }

  if (!(Number.isInteger(limits.maxDailyTrades) && limits.maxDailyTrades >= 0)) {
    v.push('limits.maxDailyTrades must be an integer >= 0 (0 = off)')
  }
  if (!inRange(limits.maxDailyLossPercent, 0, 100)) v.push('limits.maxDailyLossPercent must be in [0, 100] (0 = off)')
  if (!(Number.isFinite(limits.dailyProfitTarget) && limits.dailyProfitTarget >= 0)) {
    v.push('limits.dailyProfitTarget must be >= 0 (0 = off)')
  }
  if (!(Number.isFinite(limits.maxSessionLoss) && limits.maxSessionLoss >= 0)) {
    v.push('limits.maxSessionLoss must be >= 0 (0 = off)')
  }
  if (!isLogLevel(config.logging.level)) v.push(`logging.level "${config.logging.level}" is not a log level`)

  return v
}

export function validateEngineConfig(config: EngineConfig): Result<EngineConfig> {
  const violations = collectViolations(config)
  if (violations.length === 0) return Result.ok(config)
  return Result.err(
    Errors.config(`Invalid engine configuration: ${violations.join('; ')}`, violations, {
      function: 'validateEngineConfig',
    })
  )
}

/**
 * Defaults plus overrides, validated.
 * @throws EngineError(CONFIG_INVALID) listing every violation
 */
export function createEngineConfig(
  overrides: EngineConfigOverrides = {},
  base: EngineConfig = DEFAULT_ENGINE_CONFIG
): EngineConfig {
  return Result.unwrap(validateEngineConfig(mergeEngineConfig(base, overrides)))
}

// ============================================================
// Sources: JSON file and environment
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readNumbers<K extends string>(
  raw: unknown,
  keys: readonly K[],
  path: string,
  violations: string[]
): Partial<Record<K, number>> {
  const out: Partial<Record<K, number>> = {}
  if (raw === undefined) return out
  if (!isRecord(raw)) {
    violations.push(`${path} must be an object`)
    return out
  }
  for (const key of keys) {
    const value = raw[key]
    if (value === undefined) continue
    if (typeof value !== 'number') {
      violations.push(`${path}.${key} must be a number`)
      continue
    }
    out[key] = value
  }
  return out
}

function readWindows(raw: unknown, path: string, violations: string[]): ClockWindow[] | undefined {
  if (raw === undefined) return undefined
  if (!Array.isArray(raw)) {
    violations.push(`${path} must be an array`)
    return undefined
  }
  const windows: ClockWindow[] = []
  raw.forEach((item: unknown, i) => {
    if (isRecord(item) && typeof item.start === 'string' && typeof item.end === 'string') {
      windows.push({ start: item.start, end: item.end })
    } else {
      violations.push(`${path}[${i}] must be { start, end }`)
    }
  })
  return windows
}

function readTiers(raw: unknown, violations: string[]): CounterTrendTier[] | undefined {
  if (raw === undefined) return undefined
  if (!Array.isArray(raw)) {
    violations.push('scoring.counterTrendTiers must be an array')
    return undefined
  }
  const tiers: CounterTrendTier[] = []
  raw.forEach((item: unknown, i) => {
    if (
      isRecord(item) &&
      typeof item.name === 'string' &&
      typeof item.maxRsi === 'number' &&
      typeof item.maxPercentB === 'number' &&
      (item.confirmation === 'reversal-hint' || item.confirmation === 'price-action')
    ) {
      tiers.push({
        name: item.name,
        maxRsi: item.maxRsi,
        maxPercentB: item.maxPercentB,
        confirmation: item.confirmation,
      })
    } else {
      violations.push(`scoring.counterTrendTiers[${i}] is malformed`)
    }
  })
  return tiers
}

const MODE_KEYS = ['trendEntryAdx', 'rangeEntryAdx'] as const satisfies readonly (keyof ModeThresholds)[]
const INDICATOR_KEYS = Object.keys(DEFAULT_INDICATOR_CONFIG).filter(
  (key): key is keyof IndicatorConfig => key in DEFAULT_INDICATOR_CONFIG
)
const SCORING_KEYS = ['minConfidence', 'minAgreement', 'stochMidline', 'adxSlopeThreshold'] as const
const POINT_KEYS = Object.keys(DEFAULT_SCORING_CONFIG.points).filter(
  (key): key is keyof ScoringPoints => key in DEFAULT_SCORING_CONFIG.points
)
const TREND_KEYS = ['pullbackPercentB', 'rsiFloor', 'rsiExtended'] as const
const RANGE_KEYS = ['extremePercentB', 'rsiOversold', 'rsiOverbought'] as const
const SESSION_KEYS = ['utcOffsetMinutes', 'highLiquidityBonus', 'offPeakPenalty', 'avoidPenalty'] as const
const GUARD_KEYS = ['maxConsecutiveLosses', 'cooldownMs'] as const
const EXECUTION_KEYS = ['contractDurationMs', 'payoutRate', 'stake', 'initialBalance'] as const
const REPLAY_KEYS = ['maxTrades', 'maxOpenContracts', 'minTradeIntervalMs'] as const
const LIMIT_KEYS = ['maxDailyTrades', 'maxDailyLossPercent', 'dailyProfitTarget', 'maxSessionLoss'] as const

/**
 * Turn parsed JSON into overrides. Unknown keys are ignored; wrongly
 * typed values are reported.
 */
export function parseConfigOverrides(raw: unknown): Result<EngineConfigOverrides> {
  const v: string[] = []
  if (!isRecord(raw)) {
    return Result.err(Errors.config('Configuration file must hold a JSON object', ['root must be an object']))
  }

  const scoringRaw = isRecord(raw.scoring) ? raw.scoring : undefined
  if (raw.scoring !== undefined && !scoringRaw) v.push('scoring must be an object')
  const sessionRaw = isRecord(raw.session) ? raw.session : undefined
  if (raw.session !== undefined && !sessionRaw) v.push('session must be an object')

  const overrides: EngineConfigOverrides = {
    mode: readNumbers(raw.mode, MODE_KEYS, 'mode', v),
    indicators: readNumbers(raw.indicators, INDICATOR_KEYS, 'indicators', v),
    scoring: {
      ...readNumbers(scoringRaw, SCORING_KEYS, 'scoring', v),
      points: readNumbers(scoringRaw?.points, POINT_KEYS, 'scoring.points', v),
      trend: readNumbers(scoringRaw?.trend, TREND_KEYS, 'scoring.trend', v),
      range: readNumbers(scoringRaw?.range, RANGE_KEYS, 'scoring.range', v),
    },
    session: readNumbers(sessionRaw, SESSION_KEYS, 'session', v),
    guard: readNumbers(raw.guard, GUARD_KEYS, 'guard', v),
    execution: readNumbers(raw.execution, EXECUTION_KEYS, 'execution', v),
    replay: readNumbers(raw.replay, REPLAY_KEYS, 'replay', v),
    limits: readNumbers(raw.limits, LIMIT_KEYS, 'limits', v),
  }

  const tiers = readTiers(scoringRaw?.counterTrendTiers, v)
  if (tiers && overrides.scoring) overrides.scoring.counterTrendTiers = tiers

  for (const key of ['highLiquidity', 'offPeak', 'avoid'] as const) {
    const windows = readWindows(sessionRaw?.[key], `session.${key}`, v)
    if (windows && overrides.session) overrides.session[key] = windows
  }

  if (isRecord(raw.logging) && raw.logging.level !== undefined) {
    const level = raw.logging.level
    if (typeof level === 'string' && isLogLevel(level)) {
      overrides.logging = { level }
    } else {
      v.push('logging.level must be one of debug, info, warn, error, none')
    }
  }

  if (v.length > 0) {
    return Result.err(Errors.config(`Invalid configuration file: ${v.join('; ')}`, v))
  }
  return Result.ok(overrides)
}

export function readConfigFile(path: string): EngineConfigOverrides {
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  } catch (error) {
    throw new EngineError({
      code: ErrorCode.CONFIG_PARSE_FAILED,
      message: `Cannot read config file ${path}`,
      context: { module: 'lib/config', function: 'readConfigFile', extra: { path } },
      cause: error instanceof Error ? error : undefined,
    })
  }

  const parsed = Result.tryCatch<unknown>(
    () => JSON.parse(text),
    { module: 'lib/config', function: 'readConfigFile', extra: { path } },
    ErrorCode.CONFIG_PARSE_FAILED
  )
  return Result.unwrap(Result.flatMap(parsed, parseConfigOverrides))
}

type Env = Record<string, string | undefined>

function envNumber(env: Env, name: string, violations: string[]): number | undefined {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    violations.push(`${name}="${raw}" is not a number`)
    return undefined
  }
  return value
}

/** Overrides from environment variables; unset variables are skipped */
export function readEnvOverrides(env: Env = process.env): EngineConfigOverrides {
  const v: string[] = []
  const overrides: EngineConfigOverrides = {}

  const trendEntryAdx = envNumber(env, 'TREND_ENTRY_ADX', v)
  const rangeEntryAdx = envNumber(env, 'RANGE_ENTRY_ADX', v)
  if (trendEntryAdx !== undefined || rangeEntryAdx !== undefined) {
    overrides.mode = {}
    if (trendEntryAdx !== undefined) overrides.mode.trendEntryAdx = trendEntryAdx
    if (rangeEntryAdx !== undefined) overrides.mode.rangeEntryAdx = rangeEntryAdx
  }

  const minConfidence = envNumber(env, 'MIN_CONFIDENCE', v)
  const minAgreement = envNumber(env, 'MIN_AGREEMENT', v)
  if (minConfidence !== undefined || minAgreement !== undefined) {
    overrides.scoring = {}
    if (minConfidence !== undefined) overrides.scoring.minConfidence = minConfidence
    if (minAgreement !== undefined) overrides.scoring.minAgreement = minAgreement
  }

  const maxLosses = envNumber(env, 'MAX_CONSECUTIVE_LOSSES', v)
  const cooldownSeconds = envNumber(env, 'LOSS_COOLDOWN_SECONDS', v)
  if (maxLosses !== undefined || cooldownSeconds !== undefined) {
    overrides.guard = {}
    if (maxLosses !== undefined) overrides.guard.maxConsecutiveLosses = maxLosses
    if (cooldownSeconds !== undefined) overrides.guard.cooldownMs = cooldownSeconds * 1000
  }

  const durationSeconds = envNumber(env, 'TRADE_DURATION_SECONDS', v)
  const payoutRate = envNumber(env, 'PAYOUT_RATE', v)
  const stake = envNumber(env, 'STAKE', v)
  const initialBalance = envNumber(env, 'INITIAL_BALANCE', v)
  if ([durationSeconds, payoutRate, stake, initialBalance].some((x) => x !== undefined)) {
    overrides.execution = {}
    if (durationSeconds !== undefined) overrides.execution.contractDurationMs = durationSeconds * 1000
    if (payoutRate !== undefined) overrides.execution.payoutRate = payoutRate
    if (stake !== undefined) overrides.execution.stake = stake
    if (initialBalance !== undefined) overrides.execution.initialBalance = initialBalance
  }

  const maxTrades = envNumber(env, 'MAX_TRADES', v)
  const minIntervalSeconds = envNumber(env, 'MIN_TRADE_INTERVAL_SECONDS', v)
  if (maxTrades !== undefined || minIntervalSeconds !== undefined) {
    overrides.replay = {}
    if (maxTrades !== undefined) overrides.replay.maxTrades = maxTrades
    if (minIntervalSeconds !== undefined) overrides.replay.minTradeIntervalMs = minIntervalSeconds * 1000
  }

  const maxDailyTrades = envNumber(env, 'MAX_DAILY_TRADES', v)
  const maxDailyLossPercent = envNumber(env, 'MAX_DAILY_LOSS_PERCENT', v)
  const dailyProfitTarget = envNumber(env, 'MAX_DAILY_PROFIT_TARGET', v)
  const maxSessionLoss = envNumber(env, 'MAX_SESSION_LOSS', v)
  if ([maxDailyTrades, maxDailyLossPercent, dailyProfitTarget, maxSessionLoss].some((x) => x !== undefined)) {
    overrides.limits = {}
    if (maxDailyTrades !== undefined) overrides.limits.maxDailyTrades = maxDailyTrades
    if (maxDailyLossPercent !== undefined) overrides.limits.maxDailyLossPercent = maxDailyLossPercent
    if (dailyProfitTarget !== undefined) overrides.limits.dailyProfitTarget = dailyProfitTarget
    if (maxSessionLoss !== undefined) overrides.limits.maxSessionLoss = maxSessionLoss
  }

  const level = env.LOG_LEVEL?.trim().toLowerCase()
  if (level) {
    if (isLogLevel(level)) overrides.logging = { level }
    else v.push(`LOG_LEVEL="${env.LOG_LEVEL}" is not a log level`)
  }

  if (v.length > 0) {
    throw Errors.config(`Invalid environment: ${v.join('; ')}`, v, { function: 'readEnvOverrides' })
  }
  return overrides
}

export interface LoadConfigOptions {
  /** JSON file with EngineConfigOverrides */
  file?: string
  env?: Env
  overrides?: EngineConfigOverrides
}

/**
 * Defaults <- file <- env <- explicit overrides, validated.
 * @throws EngineError when a source cannot be read or the result is invalid
 */
export function loadEngineConfig(options: LoadConfigOptions = {}): EngineConfig {
  let config = DEFAULT_ENGINE_CONFIG
  if (options.file) {
    config = mergeEngineConfig(config, readConfigFile(options.file))
    loggers.config.debug(`Loaded ${options.file}`)
  }
  if (options.env) {
    config = mergeEngineConfig(config, readEnvOverrides(options.env))
  }
  return createEngineConfig(options.overrides ?? {}, config)
}
