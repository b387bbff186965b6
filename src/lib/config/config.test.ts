import { describe, it, expect } from 'vitest'
import { fileURLToPath } from 'node:url'
import {
  DEFAULT_ENGINE_CONFIG,
  collectViolations,
  createEngineConfig,
  loadEngineConfig,
  mergeEngineConfig,
  parseConfigOverrides,
  readConfigFile,
  readEnvOverrides,
  validateEngineConfig,
} from './index'
import { EngineError, ErrorCode } from '../errors'

const FIXTURE = fileURLToPath(new URL('../../test/fixtures/engine-config.json', import.meta.url))

describe('EngineConfig', () => {
  describe('defaults', () => {
    it('are valid', () => {
      expect(collectViolations(DEFAULT_ENGINE_CONFIG)).toEqual([])
    })

    it('carry the documented thresholds', () => {
      expect(DEFAULT_ENGINE_CONFIG.mode).toEqual({ trendEntryAdx: 27, rangeEntryAdx: 18 })
      expect(DEFAULT_ENGINE_CONFIG.guard).toEqual({ maxConsecutiveLosses: 3, cooldownMs: 600_000 })
      expect(DEFAULT_ENGINE_CONFIG.execution.contractDurationMs).toBe(180_000)
    })

    it('run one contract at a time with every account limit off', () => {
      expect(DEFAULT_ENGINE_CONFIG.replay).toEqual({ maxTrades: 0, maxOpenContracts: 1, minTradeIntervalMs: 0 })
      expect(DEFAULT_ENGINE_CONFIG.limits).toEqual({
        maxDailyTrades: 0,
        maxDailyLossPercent: 0,
        dailyProfitTarget: 0,
        maxSessionLoss: 0,
      })
    })
  })

  describe('mergeEngineConfig', () => {
    it('merges nested sections without touching the base', () => {
      const merged = mergeEngineConfig(DEFAULT_ENGINE_CONFIG, { scoring: { points: { macd: 7 } } })
      expect(merged.scoring.points.macd).toBe(7)
      expect(merged.scoring.points.m15Bias).toBe(15)
      expect(DEFAULT_ENGINE_CONFIG.scoring.points.macd).toBe(10)
    })

    it('replaces window lists wholesale', () => {
      const merged = mergeEngineConfig(DEFAULT_ENGINE_CONFIG, {
        session: { highLiquidity: [{ start: '13:00', end: '14:00' }] },
      })
      expect(merged.session.highLiquidity).toEqual([{ start: '13:00', end: '14:00' }])
      expect(merged.session.offPeak).toHaveLength(2)
    })
  })

  describe('validation', () => {
    it('rejects an inverted hysteresis band', () => {
      const result = validateEngineConfig(
        mergeEngineConfig(DEFAULT_ENGINE_CONFIG, { mode: { trendEntryAdx: 18, rangeEntryAdx: 27 } })
      )
      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.code).toBe(ErrorCode.CONFIG_INVALID)
        expect(result.error.context.extra).toEqual({
          violations: ['mode: need 0 < rangeEntryAdx < trendEntryAdx <= 100, got 27 / 18'],
        })
      }
    })

    it('lists every violation at once', () => {
      const violations = collectViolations(
        mergeEngineConfig(DEFAULT_ENGINE_CONFIG, {
          guard: { cooldownMs: -1, maxConsecutiveLosses: 0 },
          scoring: { minAgreement: 4 },
          execution: { contractDurationMs: 90_000 },
        })
      )
      expect(violations).toEqual([
        'scoring.minAgreement must be an integer in [1, 3]',
        'guard.maxConsecutiveLosses must be a positive integer',
        'guard.cooldownMs must be >= 0 (0 = hard stop)',
        'execution.contractDurationMs must be a positive multiple of 60000',
      ])
    })

    it('checks replay pacing and account limits', () => {
      const violations = collectViolations(
        mergeEngineConfig(DEFAULT_ENGINE_CONFIG, {
          replay: { maxOpenContracts: 0, minTradeIntervalMs: -60_000 },
          limits: { maxDailyTrades: 2.5, maxDailyLossPercent: 150, dailyProfitTarget: -1, maxSessionLoss: Number.NaN },
        })
      )
      expect(violations).toEqual([
        'replay.maxOpenContracts must be a positive integer',
        'replay.minTradeIntervalMs must be >= 0',
        'limits.maxDailyTrades must be an integer >= 0 (0 = off)',
        'limits.maxDailyLossPercent must be in [0, 100] (0 = off)',
        'limits.dailyProfitTarget must be >= 0 (0 = off)',
        'limits.maxSessionLoss must be >= 0 (0 = off)',
      ])
    })

    it('requires the avoid penalty to outweigh every bonus', () => {
      const violations = collectViolations(
        mergeEngineConfig(DEFAULT_ENGINE_CONFIG, { session: { avoidPenalty: 100 } })
      )
      expect(violations).toEqual(['session.avoidPenalty must be >= 105, the highest score the rules can add up to'])
    })

    it('rejects a history window too short for the indicators', () => {
      const violations = collectViolations(
        mergeEngineConfig(DEFAULT_ENGINE_CONFIG, { indicators: { historyWindow: 100 } })
      )
      expect(violations).toEqual(['indicators.historyWindow must be at least 200'])
    })

    it('rejects malformed session windows and out-of-order tiers', () => {
      const violations = collectViolations(
        mergeEngineConfig(DEFAULT_ENGINE_CONFIG, {
          session: { offPeak: [{ start: '25:00', end: '07:00' }] },
          scoring: {
            counterTrendTiers: [
              { name: 'a', maxRsi: 40, maxPercentB: 0.35, confirmation: 'price-action' },
              { name: 'b', maxRsi: 30, maxPercentB: 0.2, confirmation: 'reversal-hint' },
            ],
          },
        })
      )
      expect(violations).toEqual([
        'scoring.counterTrendTiers[1] must be no stricter than the tier before it',
        'session.offPeak[0] must be "HH:MM"-"HH:MM", got "25:00"-"07:00"',
      ])
    })

    it('createEngineConfig throws with the violations in the message', () => {
      expect(() => createEngineConfig({ execution: { stake: 0 } })).toThrow(
        'Invalid engine configuration: execution.stake must be > 0'
      )
    })
  })

  describe('parseConfigOverrides', () => {
    it('reports wrongly typed values', () => {
      const result = parseConfigOverrides({ mode: { trendEntryAdx: '30' }, guard: 3 })
      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.context.extra).toEqual({
          violations: ['mode.trendEntryAdx must be a number', 'guard must be an object'],
        })
      }
    })

    it('reads replay and limits sections', () => {
      const result = parseConfigOverrides({
        replay: { minTradeIntervalMs: 120_000 },
        limits: { maxDailyTrades: 20, maxSessionLoss: 100 },
      })
      expect(result.success).toBe(true)
      if (result.success) {
        expect(result.data.replay).toEqual({ minTradeIntervalMs: 120_000 })
        expect(result.data.limits).toEqual({ maxDailyTrades: 20, maxSessionLoss: 100 })
      }
    })

    it('rejects a non-object document', () => {
      expect(parseConfigOverrides([1, 2]).success).toBe(false)
    })
  })

  describe('readConfigFile', () => {
    it('reads overrides from JSON', () => {
      const overrides = readConfigFile(FIXTURE)
      expect(overrides.mode).toEqual({ trendEntryAdx: 25, rangeEntryAdx: 20 })
      expect(overrides.scoring?.minConfidence).toBe(65)
      expect(overrides.scoring?.points).toEqual({ macd: 5 })
      expect(overrides.session?.avoid).toEqual([{ start: '22:00', end: '22:30' }])
      expect(overrides.logging).toEqual({ level: 'warn' })
    })

    it('fails with CONFIG_PARSE_FAILED on a missing file', () => {
      try {
        readConfigFile('/nonexistent/engine.json')
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(EngineError)
        expect(EngineError.from(error).code).toBe(ErrorCode.CONFIG_PARSE_FAILED)
      }
    })
  })

  describe('readEnvOverrides', () => {
    it('maps variables onto sections with unit conversion', () => {
      expect(
        readEnvOverrides({
          TREND_ENTRY_ADX: '25',
          LOSS_COOLDOWN_SECONDS: '300',
          TRADE_DURATION_SECONDS: '60',
          MAX_TRADES: '50',
          LOG_LEVEL: 'DEBUG',
        })
      ).toEqual({
        mode: { trendEntryAdx: 25 },
        guard: { cooldownMs: 300_000 },
        execution: { contractDurationMs: 60_000 },
        replay: { maxTrades: 50 },
        logging: { level: 'debug' },
      })
    })

    it('maps the account limits and the entry spacing', () => {
      expect(
        readEnvOverrides({
          MIN_TRADE_INTERVAL_SECONDS: '60',
          MAX_DAILY_TRADES: '20',
          MAX_DAILY_LOSS_PERCENT: '10',
          MAX_DAILY_PROFIT_TARGET: '200',
          MAX_SESSION_LOSS: '100',
        })
      ).toEqual({
        replay: { minTradeIntervalMs: 60_000 },
        limits: { maxDailyTrades: 20, maxDailyLossPercent: 10, dailyProfitTarget: 200, maxSessionLoss: 100 },
      })
    })

    it('ignores unset and blank variables', () => {
      expect(readEnvOverrides({ STAKE: '', PAYOUT_RATE: undefined })).toEqual({})
    })

    it('throws on a value that is not a number', () => {
      expect(() => readEnvOverrides({ STAKE: 'ten' })).toThrow('STAKE="ten" is not a number')
    })
  })

  describe('loadEngineConfig', () => {
    it('layers file, env and explicit overrides in that order', () => {
      const config = loadEngineConfig({
        file: FIXTURE,
        env: { TREND_ENTRY_ADX: '30', MIN_CONFIDENCE: '70' },
        overrides: { scoring: { minConfidence: 75 } },
      })
      expect(config.mode).toEqual({ trendEntryAdx: 30, rangeEntryAdx: 20 })
      expect(config.scoring.minConfidence).toBe(75)
      expect(config.scoring.points.macd).toBe(5)
      expect(config.guard.cooldownMs).toBe(0)
      expect(config.session.utcOffsetMinutes).toBe(60)
    })
  })
})
