/**
 * Replay recorded M1 candles through the decision engine.
 *
 * Run:
 *   npx tsx scripts/replay-backtest.ts --file data/eurusd-1m.json
 *   npx tsx scripts/replay-backtest.ts --db data/candles.db --symbol EURUSD --start 1704067200000
 *
 * Options:
 *   --file        JSON candle file (array or { candles })
 *   --db          SQLite candle store (with --symbol, optional --start/--end in ms)
 *   --config      JSON config overrides
 *   --max-trades  stop after this many contracts
 *   --min-interval  seconds between entries
 *   --out         output directory (default: data/results/replay-<timestamp>)
 *
 * Output: decisions.jsonl, trades.csv, summary.json
 */

import * as fs from 'fs'
import * as path from 'path'
import { fileURLToPath } from 'url'
import dotenv from 'dotenv'
import { loadEngineConfig } from '../src/lib/config'
import { CandleStore, loadCandlesFromJson } from '../src/lib/db'
import { detectGaps, formatSummary, runReplay, toDecisionLog, toTradeCsv } from '../src/lib/backtest'
import { reportError } from '../src/lib/errors'
import { configureLogger, loggers } from '../src/lib/logger'
import type { Candle } from '../src/lib/types'
import { numberArg, parseCliArgs, type CliArgs } from './cli-args'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

const log = loggers.cli

function loadCandles(args: CliArgs): Candle[] {
  if (args.file) {
    return loadCandlesFromJson(args.file)
  }
  if (args.db && args.symbol) {
    const store = new CandleStore(args.db)
    try {
      return store.getRange(args.symbol, { start: numberArg(args, 'start'), end: numberArg(args, 'end') })
    } finally {
      store.close()
    }
  }
  throw new Error('Pass --file <json> or --db <sqlite> --symbol <symbol>')
}

function main(): void {
  dotenv.config()
  const args = parseCliArgs()

  const maxTrades = numberArg(args, 'max-trades')
  const minInterval = numberArg(args, 'min-interval')
  const config = loadEngineConfig({
    file: args.config,
    env: process.env,
    overrides: {
      replay: {
        ...(maxTrades === undefined ? {} : { maxTrades }),
        ...(minInterval === undefined ? {} : { minTradeIntervalMs: minInterval * 1000 }),
      },
    },
  })
  configureLogger({ level: config.logging.level })

  const candles = loadCandles(args)
  log.info(`Loaded ${candles.length} candles`)

  const gaps = detectGaps(candles)
  if (gaps.length > 0) {
    const missing = gaps.reduce((sum, g) => sum + g.missingCount, 0)
    log.warn(`${gaps.length} gap(s) in the data, ${missing} minute(s) missing`)
  }

  const result = runReplay(config, candles)

  const outDir = args.out ?? path.join(__dirname, '../data/results', `replay-${Date.now()}`)
  fs.mkdirSync(outDir, { recursive: true })
  fs.writeFileSync(path.join(outDir, 'decisions.jsonl'), toDecisionLog(result.records))
  fs.writeFileSync(path.join(outDir, 'trades.csv'), toTradeCsv(result.trades))
  fs.writeFileSync(path.join(outDir, 'summary.json'), JSON.stringify(result.summary, null, 2) + '\n')

  console.log(formatSummary(result.summary, config.execution.payoutRate))
  log.info(`Reports written to ${outDir}`)
}

try {
  main()
} catch (error) {
  reportError(error, { module: 'scripts', function: 'replay-backtest' }, log)
  process.exitCode = 1
}
