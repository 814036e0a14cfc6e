export { createFredAdapter, buildObservationsUrl, FRED_BASE_URL } from './adapter.js'
export type { FredAdapterOptions, FredUnit } from './adapter.js'
export { FRED_SERIES } from './series.js'
export type { FredSeries } from './series.js'
