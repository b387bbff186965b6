export { CandleStore } from './candle-store'
export type { RangeQuery } from './candle-store'
export { loadCandlesFromJson, parseCandleFile } from './candle-file'
