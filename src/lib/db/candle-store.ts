import Database from 'better-sqlite3'
import { isValidCandle } from '../backtest/candle-utils'
import { EngineError, ErrorCode, Errors } from '../errors'
import { loggers } from '../logger'
import type { Candle } from '../types'
import { normalizeSymbol } from '../utils/normalize'

// ============================================================
// Candle Store - M1 history in SQLite
// ============================================================
// One row per (symbol, minute). Symbols are stored normalized,
// timestamps as integer epoch ms of the candle open.
// ============================================================

interface CandleRow {
  ts_ms: number
  open: number
  high: number
  low: number
  close: number
  volume: number
}

export interface RangeQuery {
  /** Inclusive open-time bounds in epoch ms */
  start?: number
  end?: number
  limit?: number
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS candles_1m (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    symbol TEXT NOT NULL,
    ts_ms INTEGER NOT NULL,
    open REAL NOT NULL,
    high REAL NOT NULL,
    low REAL NOT NULL,
    close REAL NOT NULL,
    volume REAL DEFAULT 0,
    source TEXT DEFAULT 'import',
    created_at INTEGER DEFAULT (unixepoch())
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_c1m_unique
  ON candles_1m(symbol, ts_ms);
`

function wrap<T>(code: ErrorCode, fn: string, message: string, op: () => T): T {
  try {
    return op()
  } catch (error) {
    if (error instanceof EngineError) throw error
    throw Errors.store(code, message, { function: `CandleStore.${fn}` }, error instanceof Error ? error : undefined)
  }
}

export class CandleStore {
  private readonly db: Database.Database

  /** `path` may be ':memory:' */
  constructor(path: string) {
    this.db = wrap(ErrorCode.STORE_READ_FAILED, 'open', `Cannot open candle store ${path}`, () => {
      const db = new Database(path)
      if (path !== ':memory:') {
        db.pragma('journal_mode = WAL')
        db.pragma('busy_timeout = 5000')
      }
      db.exec(SCHEMA)
      return db
    })
  }

  /**
   * Insert candles for one symbol in a single transaction.
   * Rows already stored for the same minute are left untouched.
   * @returns number of rows actually inserted
   */
  insertMany(symbol: string, candles: readonly Candle[], source = 'import'): number {
    const key = normalizeSymbol(symbol)
    const invalid = candles.findIndex(c => !isValidCandle(c))
    if (invalid !== -1) {
      throw Errors.store(ErrorCode.STORE_FORMAT_INVALID, `Invalid candle at index ${invalid}`, {
        function: 'CandleStore.insertMany',
        extra: { index: invalid, candle: candles[invalid] },
      })
    }

    return wrap(ErrorCode.STORE_WRITE_FAILED, 'insertMany', `Cannot write candles for ${key}`, () => {
      const insert = this.db.prepare<[string, number, number, number, number, number, number, string]>(`
        INSERT OR IGNORE INTO candles_1m (symbol, ts_ms, open, high, low, close, volume, source)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `)
      const insertAll = this.db.transaction((rows: readonly Candle[]) => {
        let inserted = 0
        for (const c of rows) {
          inserted += insert.run(key, c.timestamp, c.open, c.high, c.low, c.close, c.volume ?? 0, source).changes
        }
        return inserted
      })

      const inserted = insertAll(candles)
      loggers.store.info(`Stored ${inserted}/${candles.length} candles for ${key}`)
      return inserted
    })
  }

  /** Candles in ascending open time */
  getRange(symbol: string, query: RangeQuery = {}): Candle[] {
    const key = normalizeSymbol(symbol)
    const { start = 0, end = Number.MAX_SAFE_INTEGER, limit = -1 } = query

    return wrap(ErrorCode.STORE_READ_FAILED, 'getRange', `Cannot read candles for ${key}`, () => {
      const rows = this.db
        .prepare<[string, number, number, number], CandleRow>(`
          SELECT ts_ms, open, high, low, close, volume
          FROM candles_1m
          WHERE symbol = ? AND ts_ms >= ? AND ts_ms <= ?
          ORDER BY ts_ms ASC
          LIMIT ?
        `)
        .all(key, start, end, limit)

      return rows.map(r => ({
        timestamp: r.ts_ms,
        open: r.open,
        high: r.high,
        low: r.low,
        close: r.close,
        volume: r.volume,
      }))
    })
  }

  count(symbol?: string): number {
    return wrap(ErrorCode.STORE_READ_FAILED, 'count', 'Cannot count candles', () => {
      const row =
        symbol === undefined
          ? this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM candles_1m').get()
          : this.db
              .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM candles_1m WHERE symbol = ?')
              .get(normalizeSymbol(symbol))
      return row?.count ?? 0
    })
  }

  symbols(): string[] {
    return wrap(ErrorCode.STORE_READ_FAILED, 'symbols', 'Cannot list symbols', () =>
      this.db
        .prepare<[], { symbol: string }>('SELECT DISTINCT symbol FROM candles_1m ORDER BY symbol')
        .all()
        .map(r => r.symbol)
    )
  }

  close(): void {
    this.db.close()
  }
}
