import { readFileSync } from 'node:fs'
import { EngineError, ErrorCode, Errors } from '../errors'
import type { Candle } from '../types'
import { toEpochMs } from '../utils/time'

// ============================================================
// Candle files
// ============================================================
// Accepted shapes:
//   [ { timestamp | ts_ms | time, open, high, low, close, volume? } ]
//   { candles: [ ... ] }
// Timestamps may be seconds or milliseconds, numbers or strings.
// ============================================================

const TIME_KEYS = ['timestamp', 'ts_ms', 'time'] as const
const PRICE_KEYS = ['open', 'high', 'low', 'close'] as const

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value)
    return Number.isFinite(n) ? n : null
  }
  return null
}

function formatError(message: string, extra: Record<string, unknown>): EngineError {
  return Errors.store(ErrorCode.STORE_FORMAT_INVALID, message, { function: 'parseCandleFile', extra })
}

function parseRow(raw: unknown, index: number): Candle {
  if (!isRecord(raw)) throw formatError(`Candle ${index} is not an object`, { index })

  const timeKey = TIME_KEYS.find(k => raw[k] !== undefined)
  const time = timeKey === undefined ? undefined : raw[timeKey]
  if (typeof time !== 'number' && typeof time !== 'string') {
    throw formatError(`Candle ${index} has no timestamp`, { index })
  }

  let timestamp: number
  try {
    timestamp = toEpochMs(time)
  } catch (error) {
    throw formatError(`Candle ${index} has an invalid timestamp: ${String(time)}`, {
      index,
      reason: error instanceof Error ? error.message : String(error),
    })
  }

  const prices: Record<(typeof PRICE_KEYS)[number], number> = { open: 0, high: 0, low: 0, close: 0 }
  for (const key of PRICE_KEYS) {
    const value = toNumber(raw[key])
    if (value === null) throw formatError(`Candle ${index} has an invalid ${key}`, { index, key })
    prices[key] = value
  }

  const candle: Candle = { timestamp, ...prices }
  if (raw.volume !== undefined) {
    const volume = toNumber(raw.volume)
    if (volume !== null) candle.volume = volume
  }
  return candle
}

/** Validate and normalize the parsed contents of a candle file */
export function parseCandleFile(raw: unknown): Candle[] {
  const rows = Array.isArray(raw) ? raw : isRecord(raw) ? raw.candles : undefined
  if (!Array.isArray(rows)) {
    throw formatError('Expected an array of candles or { candles: [...] }', {})
  }
  return rows.map((row: unknown, i) => parseRow(row, i))
}

export function loadCandlesFromJson(path: string): Candle[] {
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  } catch (error) {
    throw Errors.store(
      ErrorCode.STORE_READ_FAILED,
      `Cannot read candle file ${path}`,
      { function: 'loadCandlesFromJson', extra: { path } },
      error instanceof Error ? error : undefined
    )
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (error) {
    throw Errors.store(
      ErrorCode.STORE_FORMAT_INVALID,
      `Candle file ${path} is not valid JSON`,
      { function: 'loadCandlesFromJson', extra: { path } },
      error instanceof Error ? error : undefined
    )
  }
  return parseCandleFile(parsed)
}
