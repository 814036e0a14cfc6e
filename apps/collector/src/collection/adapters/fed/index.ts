export { createFedAdapter, FED_RSS_URL } from './adapter.js'
export type { FedAdapterOptions, FedUnit, FedUnitMeta } from './adapter.js'
export { classifyFedDocument, extractSpeaker, FED_DATASETS } from './document-types.js'
export type { FedDocumentType } from './document-types.js'
export { extractArticleText } from './content.js'
