export { createEcbAdapter, buildDataUrl, parseSdmxCsv, ECB_BASE_URL } from './adapter.js'
export type { EcbAdapterOptions, EcbUnit } from './adapter.js'
export { ECB_DATASETS } from './datasets.js'
export type { EcbDataset } from './datasets.js'
