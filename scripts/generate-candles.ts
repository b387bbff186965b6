/**
 * Write seeded synthetic M1 candles to a JSON file.
 *
 * Run:
 *   npx tsx scripts/generate-candles.ts --seed 7 --count 5000 --out data/synthetic.json
 *
 * Options:
 *   --seed     PRNG seed (default 42)
 *   --count    number of candles (default 1000)
 *   --start    first open time in ms (default 2024-01-01T00:00Z)
 *   --price    starting price (default 1.1)
 *   --out      output file (default: data/synthetic-<seed>.json)
 */

import * as fs from 'fs'
import * as path from 'path'
import { fileURLToPath } from 'url'
import { generateCandles, type GeneratorOptions } from '../src/lib/backtest'
import { reportError } from '../src/lib/errors'
import { loggers } from '../src/lib/logger'
import { numberArg, parseCliArgs } from './cli-args'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

const log = loggers.cli

function main(): void {
  const args = parseCliArgs()
  const seed = numberArg(args, 'seed') ?? 42

  const options: Partial<GeneratorOptions> = { seed }
  const count = numberArg(args, 'count')
  const start = numberArg(args, 'start')
  const startPrice = numberArg(args, 'price')
  if (count !== undefined) options.count = count
  if (start !== undefined) options.start = start
  if (startPrice !== undefined) options.startPrice = startPrice

  const candles = generateCandles(options)

  const out = args.out ?? path.join(__dirname, '../data', `synthetic-${seed}.json`)
  fs.mkdirSync(path.dirname(out), { recursive: true })
  fs.writeFileSync(out, JSON.stringify({ candles }, null, 2) + '\n')
  log.info(`Wrote ${candles.length} candles to ${out}`)
}

try {
  main()
} catch (error) {
  reportError(error, { module: 'scripts', function: 'generate-candles' }, log)
  process.exitCode = 1
}
