/**
 * Import a JSON candle file into the SQLite candle store.
 *
 * Run:
 *   npx tsx scripts/import-candles.ts --file data/eurusd-1m.json --symbol EURUSD
 *
 * Options:
 *   --file     JSON candle file (array or { candles })
 *   --symbol   symbol to store under
 *   --db       database path (default: $DB_PATH or data/candles.db)
 *   --source   source label stored with each row (default: import)
 */

import * as fs from 'fs'
import * as path from 'path'
import { fileURLToPath } from 'url'
import dotenv from 'dotenv'
import { sortAndDeduplicate } from '../src/lib/backtest'
import { CandleStore, loadCandlesFromJson } from '../src/lib/db'
import { reportError } from '../src/lib/errors'
import { loggers } from '../src/lib/logger'
import { parseCliArgs } from './cli-args'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

const log = loggers.cli

function main(): void {
  dotenv.config()
  const args = parseCliArgs()
  if (!args.file || !args.symbol) {
    throw new Error('Usage: import-candles --file <json> --symbol <symbol> [--db <path>]')
  }

  const dbPath = args.db ?? process.env.DB_PATH ?? path.join(__dirname, '../data/candles.db')
  fs.mkdirSync(path.dirname(dbPath), { recursive: true })

  const candles = sortAndDeduplicate(loadCandlesFromJson(args.file))
  const store = new CandleStore(dbPath)
  try {
    const inserted = store.insertMany(args.symbol, candles, args.source ?? 'import')
    log.info(`${inserted} new of ${candles.length} candles, ${store.count(args.symbol)} stored for ${args.symbol}`)
  } finally {
    store.close()
  }
}

try {
  main()
} catch (error) {
  reportError(error, { module: 'scripts', function: 'import-candles' }, log)
  process.exitCode = 1
}
