export {
  createGdeltAdapter,
  credibilityTier,
  parseGkgDate,
  splitGkgList,
  GKG_DATASET,
  GKG_QUERY,
} from './adapter.js'
export type { GdeltAdapterOptions, GdeltUnit, GdeltUnitMeta } from './adapter.js'
export { estimateQueryBytes, runQuery, parseQueryPage, BIGQUERY_BASE_URL } from './bigquery.js'
export type { BigQueryConfig, BigQueryRow, QueryParameter } from './bigquery.js'
